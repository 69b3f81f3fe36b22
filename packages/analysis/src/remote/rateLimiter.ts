import { silentLogger, systemClock, type Clock, type ModuleLogger } from "@cryptota/core";

export interface RateLimiterConfig {
	/** Minimum spacing between granted slots; 0 or less disables throttling. */
	delayMs: number;
	clock?: Clock;
	logger?: ModuleLogger;
}

/**
 * Fixed-delay throttle for a strictly sequential caller. Tracks the time of
 * the last granted slot only; concurrent callers are not supported.
 */
export class RateLimiter {
	private readonly delayMs: number;
	private readonly clock: Clock;
	private readonly logger: ModuleLogger;
	private lastGrant: number | null = null;

	constructor(config: RateLimiterConfig) {
		this.delayMs = config.delayMs;
		this.clock = config.clock ?? systemClock;
		this.logger = config.logger ?? silentLogger;
	}

	/** Resolves once at least `delayMs` has passed since the previous grant. */
	async waitForSlot(): Promise<void> {
		if (this.delayMs <= 0) {
			this.lastGrant = this.clock.now();
			return;
		}

		if (this.lastGrant !== null) {
			let elapsed = this.clock.now() - this.lastGrant;
			while (elapsed < this.delayMs) {
				const waitMs = this.delayMs - elapsed;
				this.logger.debug("rate_limit_wait", { waitMs });
				await this.clock.sleep(waitMs);
				elapsed = this.clock.now() - this.lastGrant;
			}
		}

		this.lastGrant = this.clock.now();
	}
}
