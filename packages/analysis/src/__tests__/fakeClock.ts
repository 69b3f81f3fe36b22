import type { Clock } from "@cryptota/core";

export interface FakeClock extends Clock {
	sleeps: number[];
	advance(ms: number): void;
}

/** Clock whose sleeps advance time instantly and are recorded. */
export const createFakeClock = (start = 0): FakeClock => {
	let current = start;
	const sleeps: number[] = [];
	return {
		sleeps,
		now: () => current,
		sleep: async (ms: number) => {
			sleeps.push(ms);
			current += Math.max(0, ms);
		},
		advance: (ms: number) => {
			current += ms;
		},
	};
};

export const fixedWallClock = (iso = "2024-05-01T12:00:00.000Z") => () =>
	new Date(iso);
