/**
 * Request and token budget over a sliding window, for quota-bound services
 * (Voyage embedding).
 *
 * `acquire` waits until the request fits, for at most `maxWaitMs`, and stops
 * waiting as soon as its signal aborts. `tryAcquire` never waits.
 */

import { RateLimitError } from './errors.js';
import { sleep } from './async.js';
import { Logger, LogLevel } from './logger.js';

export interface RateLimiterConfig {
	requestsPerMinute: number;
	tokensPerMinute: number;
	/** Window size in ms, default 60s */
	windowMs?: number;
	/** Longest `acquire` waits before failing, default one window */
	maxWaitMs?: number;
	now?: () => number;
	logger?: Logger;
}

interface Grant {
	at: number;
	tokens: number;
}

export class RateLimiter {
	private grants: Grant[] = [];
	private readonly requestLimit: number;
	private readonly tokenLimit: number;
	private readonly windowMs: number;
	private readonly maxWaitMs: number;
	private readonly now: () => number;
	private readonly logger: Logger;

	constructor(config: RateLimiterConfig) {
		this.requestLimit = config.requestsPerMinute;
		this.tokenLimit = config.tokensPerMinute;
		this.windowMs = config.windowMs ?? 60_000;
		this.maxWaitMs = config.maxWaitMs ?? this.windowMs;
		this.now = config.now ?? (() => Date.now());
		this.logger = config.logger ?? new Logger({ level: LogLevel.ERROR });
	}

	/**
	 * Milliseconds until a request of `tokens` fits: 0 when it fits now,
	 * Infinity when it is larger than the whole token budget.
	 */
	delayFor(tokens: number): number {
		if (tokens > this.tokenLimit) {
			return Number.POSITIVE_INFINITY;
		}
		const now = this.prune();
		let wait = 0;

		// Grants are in time order; the oldest leave the window first
		const surplusRequests = this.grants.length - this.requestLimit + 1;
		if (surplusRequests > 0) {
			wait = this.grants[surplusRequests - 1].at + this.windowMs - now;
		}

		let surplusTokens = this.usedTokens() + tokens - this.tokenLimit;
		for (let i = 0; surplusTokens > 0 && i < this.grants.length; i++) {
			surplusTokens -= this.grants[i].tokens;
			wait = Math.max(wait, this.grants[i].at + this.windowMs - now);
		}
		return wait;
	}

	/**
	 * Take budget for one request now
	 * @throws RateLimitError with the seconds until it would fit
	 */
	tryAcquire(tokens: number): void {
		const wait = this.delayFor(tokens);
		if (wait > 0) {
			throw this.limitError(tokens, wait);
		}
		this.grants.push({ at: this.now(), tokens });
	}

	/**
	 * Take budget for one request, waiting for the window to slide if needed
	 * @throws RateLimitError when the wait would exceed maxWaitMs
	 * @throws the abort reason of `signal`
	 */
	async acquire(tokens: number, signal?: AbortSignal): Promise<void> {
		const giveUpAt = this.now() + this.maxWaitMs;
		for (;;) {
			signal?.throwIfAborted();
			const wait = this.delayFor(tokens);
			if (wait === 0) {
				this.grants.push({ at: this.now(), tokens });
				return;
			}
			if (this.now() + wait > giveUpAt) {
				throw this.limitError(tokens, wait);
			}
			this.logger.debug(`Rate limited, waiting ${wait}ms for ${tokens} tokens`);
			await sleep(wait, signal);
		}
	}

	usage(): { requests: number; tokens: number } {
		this.prune();
		return { requests: this.grants.length, tokens: this.usedTokens() };
	}

	private prune(): number {
		const now = this.now();
		const cutoff = now - this.windowMs;
		this.grants = this.grants.filter(g => g.at > cutoff);
		return now;
	}

	private usedTokens(): number {
		return this.grants.reduce((sum, g) => sum + g.tokens, 0);
	}

	private limitError(tokens: number, wait: number): RateLimitError {
		if (!Number.isFinite(wait)) {
			return new RateLimitError(`Request of ${tokens} tokens exceeds the budget of ${this.tokenLimit} per ${this.windowMs}ms`);
		}
		return new RateLimitError(
			`Rate limit exceeded: ${this.grants.length}/${this.requestLimit} requests, ` +
			`${this.usedTokens() + tokens}/${this.tokenLimit} tokens per ${this.windowMs}ms`,
			Math.ceil(wait / 1000),
		);
	}
}

/**
 * Voyage API limiter; limits depend on the account tier.
 */
export function createVoyageRateLimiter(
	requestsPerMinute: number,
	tokensPerMinute: number,
	logger?: Logger,
): RateLimiter {
	return new RateLimiter({
		requestsPerMinute,
		tokensPerMinute,
		logger,
	});
}
