/**
 * Time source shared by the throttle, the caches and the repair loop.
 * Tests substitute a manual clock whose sleep advances time instantly.
 */

export interface Clock {
	/** Milliseconds since epoch */
	now(): number
	sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
}

/**
 * Deterministic clock: `sleep` records the request and advances `now`.
 */
export class ManualClock implements Clock {
	readonly sleeps: number[] = []

	constructor(private current: number = 0) {}

	now(): number {
		return this.current
	}

	async sleep(ms: number): Promise<void> {
		this.sleeps.push(ms)
		this.current += Math.max(0, ms)
	}

	advance(ms: number): void {
		this.current += ms
	}
}
