export interface BackoffConfig {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** 0 disables jitter. */
	readonly jitterFactor?: number;
}

/**
 * Linear reconnect backoff: the n-th consecutive failure waits
 * `min(base * n, max)`, optionally jittered. There is no attempt limit.
 */
export class LinearBackoff {
	private readonly config: BackoffConfig;
	private failures = 0;

	constructor(config: BackoffConfig) {
		this.config = config;
	}

	get consecutiveFailures(): number {
		return this.failures;
	}

	/** Records a failure and returns how long to wait before the next attempt. */
	nextDelay(): number {
		this.failures += 1;
		const capped = Math.min(this.config.baseDelayMs * this.failures, this.config.maxDelayMs);
		const jitterFactor = this.config.jitterFactor ?? 0;
		if (jitterFactor === 0) return capped;
		const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
		return Math.max(0, Math.round(capped + jitter));
	}

	/** Called after a successful authentication. */
	reset(): void {
		this.failures = 0;
	}
}
