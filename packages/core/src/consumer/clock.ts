/**
 * Monotonic time source for poll loops. Replaced by a manual clock in tests.
 */
export interface Clock {
	/**
	 * Monotonic milliseconds
	 */
	now(): number;
	sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
	now: () => performance.now(),
	sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};
