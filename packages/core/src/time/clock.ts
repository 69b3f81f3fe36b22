import { performance } from "node:perf_hooks";

/**
 * Monotonic time source plus the matching timed wait. Injected wherever the
 * pipeline waits so tests can advance time without sleeping.
 */
export interface Clock {
	/** Monotonic milliseconds; only differences are meaningful. */
	now(): number;
	sleep(ms: number): Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
	new Promise((resolve) => {
		if (ms <= 0) {
			resolve();
			return;
		}
		setTimeout(resolve, ms);
	});

export const systemClock: Clock = {
	now: () => performance.now(),
	sleep,
};

/** Wall-clock source for record timestamps. */
export type WallClock = () => Date;

export const systemWallClock: WallClock = () => new Date();
