/**
 * Rate Throttle
 *
 * Self-throttling for public SPARQL endpoints (WDQS answers bursts with 429s).
 * Per endpoint class it keeps the last call time and a count of consecutive
 * rate-limited responses:
 * - Normal pacing: at least `minIntervalMs` between calls.
 * - After 429s: wait `min(2^hits s, maxBackoffMs)` since the last call.
 *
 * State is owned by the instance and shared by every request using it.
 * Concurrent requests read-modify-write it without coordination, so two
 * callers may both pass the gate at once. That race is accepted.
 */

import type { EndpointClass } from "./config.js"
import { systemClock, type Clock } from "./clock.js"

export interface ThrottleOptions {
	minIntervalMs: number
	maxBackoffMs: number
	/** Cap on the consecutive-hit counter (bounds the exponent) */
	maxHits: number
}

export interface ThrottleState {
	lastCallAt: number
	consecutiveRateLimitHits: number
}

export const DEFAULT_THROTTLE_OPTIONS: ThrottleOptions = {
	minIntervalMs: 1000,
	maxBackoffMs: 32000,
	maxHits: 6,
}

export class RateThrottle {
	private readonly states = new Map<EndpointClass, ThrottleState>()
	private readonly options: ThrottleOptions

	constructor(
		options: Partial<ThrottleOptions> = {},
		private readonly clock: Clock = systemClock,
	) {
		this.options = { ...DEFAULT_THROTTLE_OPTIONS, ...options }
	}

	private state(endpointClass: EndpointClass): ThrottleState {
		let s = this.states.get(endpointClass)
		if (!s) {
			s = { lastCallAt: Number.NEGATIVE_INFINITY, consecutiveRateLimitHits: 0 }
			this.states.set(endpointClass, s)
		}
		return s
	}

	/**
	 * Required gap since the previous call for the current hit count.
	 */
	requiredGapMs(endpointClass: EndpointClass): number {
		const hits = this.state(endpointClass).consecutiveRateLimitHits
		if (hits > 0) {
			return Math.min(2 ** hits * 1000, this.options.maxBackoffMs)
		}
		return this.options.minIntervalMs
	}

	/**
	 * Suspend until this endpoint class may be called again, then stamp the
	 * call time. Returns how long the caller waited.
	 */
	async beforeCall(endpointClass: EndpointClass): Promise<number> {
		const s = this.state(endpointClass)
		const wait = this.requiredGapMs(endpointClass) - (this.clock.now() - s.lastCallAt)
		if (wait > 0) {
			await this.clock.sleep(wait)
		}
		s.lastCallAt = this.clock.now()
		return Math.max(0, wait)
	}

	/**
	 * Record the outcome of a call: a 429 bumps the counter (capped), any
	 * other outcome resets it.
	 */
	onResult(endpointClass: EndpointClass, wasRateLimited: boolean): void {
		const s = this.state(endpointClass)
		s.consecutiveRateLimitHits = wasRateLimited ? Math.min(s.consecutiveRateLimitHits + 1, this.options.maxHits) : 0
	}

	snapshot(endpointClass: EndpointClass): ThrottleState {
		return { ...this.state(endpointClass) }
	}
}
