import { describe, it, expect } from "vitest"
import { ManualClock } from "./clock.js"
import { CachePools, TTLCache } from "./ttl_cache.js"

describe("TTLCache", () => {
	it("should return stored values", () => {
		const cache = new TTLCache<string>(10, new ManualClock())
		cache.set("k", "v")
		expect(cache.get("k")).toBe("v")
		expect(cache.get("missing")).toBeUndefined()
	})

	it("should expire entries lazily after the TTL", () => {
		const clock = new ManualClock()
		const cache = new TTLCache<number>(10, clock)
		cache.set("k", 1)

		clock.advance(10000)
		expect(cache.get("k")).toBe(1)

		clock.advance(1)
		expect(cache.size).toBe(1)
		expect(cache.get("k")).toBeUndefined()
		expect(cache.size).toBe(0)
	})

	it("should refresh the timestamp on overwrite", () => {
		const clock = new ManualClock()
		const cache = new TTLCache<number>(1, clock)
		cache.set("k", 1)
		clock.advance(800)
		cache.set("k", 2)
		clock.advance(800)
		expect(cache.get("k")).toBe(2)
	})

	it("should clear all entries", () => {
		const cache = new TTLCache<number>(10, new ManualClock())
		cache.set("a", 1)
		cache.set("b", 2)
		cache.clear()
		expect(cache.size).toBe(0)
	})

	describe("makeKey", () => {
		it("should be a deterministic md5 hex digest", () => {
			const key = TTLCache.makeKey("wd_ent", "douglas adams", 5)
			expect(key).toMatch(/^[0-9a-f]{32}$/)
			expect(TTLCache.makeKey("wd_ent", "douglas adams", 5)).toBe(key)
		})

		it("should stringify parts", () => {
			expect(TTLCache.makeKey("x", 5)).toBe(TTLCache.makeKey("x", "5"))
		})

		it("should differ when parts differ", () => {
			expect(TTLCache.makeKey("wikidata", "q")).not.toBe(TTLCache.makeKey("rhea", "q"))
		})
	})
})

describe("CachePools", () => {
	it("should give each pool its own TTL", () => {
		const clock = new ManualClock()
		const pools = new CachePools<string, string, string, string>(
			{ entityTtlS: 1, propertyTtlS: 2, schemaTtlS: 3, queryTtlS: 4 },
			clock,
		)
		pools.entity.set("k", "e")
		pools.property.set("k", "p")
		pools.schema.set("k", "s")
		pools.query.set("k", "q")

		clock.advance(2500)
		expect(pools.entity.get("k")).toBeUndefined()
		expect(pools.property.get("k")).toBeUndefined()
		expect(pools.schema.get("k")).toBe("s")
		expect(pools.query.get("k")).toBe("q")
	})
})
