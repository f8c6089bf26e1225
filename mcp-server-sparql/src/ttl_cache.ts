/**
 * TTL Cache
 *
 * In-memory key → value store with per-pool expiry. Entries are checked
 * lazily on `get` and deleted there; nothing sweeps in the background and
 * there is no size bound (process-lifetime memory only).
 */

import { createHash } from "crypto"
import { systemClock, type Clock } from "./clock.js"

interface CacheEntry<T> {
	value: T
	storedAt: number
}

export class TTLCache<T> {
	private readonly store = new Map<string, CacheEntry<T>>()
	private readonly ttlMs: number

	constructor(
		ttlSeconds: number = 300,
		private readonly clock: Clock = systemClock,
	) {
		this.ttlMs = ttlSeconds * 1000
	}

	/** Cached value, or undefined when missing or expired */
	get(key: string): T | undefined {
		const entry = this.store.get(key)
		if (!entry) return undefined
		if (this.clock.now() - entry.storedAt > this.ttlMs) {
			this.store.delete(key)
			return undefined
		}
		return entry.value
	}

	set(key: string, value: T): void {
		this.store.set(key, { value, storedAt: this.clock.now() })
	}

	/** Entries currently held, expired or not */
	get size(): number {
		return this.store.size
	}

	clear(): void {
		this.store.clear()
	}

	/** Deterministic key from arbitrary parts */
	static makeKey(...parts: Array<string | number | boolean>): string {
		return createHash("md5").update(parts.map(String).join("|")).digest("hex")
	}
}

export interface CacheTtls {
	entityTtlS: number
	propertyTtlS: number
	schemaTtlS: number
	queryTtlS: number
}

/**
 * The four result pools. Staleness tolerance differs per category, so each
 * has its own TTL.
 */
export class CachePools<TEntity, TProperty, TSchema, TQuery> {
	readonly entity: TTLCache<TEntity>
	readonly property: TTLCache<TProperty>
	readonly schema: TTLCache<TSchema>
	readonly query: TTLCache<TQuery>

	constructor(ttls: CacheTtls, clock: Clock = systemClock) {
		this.entity = new TTLCache(ttls.entityTtlS, clock)
		this.property = new TTLCache(ttls.propertyTtlS, clock)
		this.schema = new TTLCache(ttls.schemaTtlS, clock)
		this.query = new TTLCache(ttls.queryTtlS, clock)
	}
}
