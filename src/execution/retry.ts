/**
 * Retry wrapper for adapter calls — exponential backoff with jitter.
 *
 * Non-retryable errors short-circuit immediately. RateLimitError stretches
 * the delay to at least its retry-after hint.
 */

import { RateLimitError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { sleep } from "../shared/time.js";
import { DEFAULT_RETRY_CONFIG } from "./types.js";
import type { RetryConfig } from "./types.js";

export interface RetryOptions {
	readonly signal?: AbortSignal;
	/** Narrows which retryable errors are retried. Defaults to `error.isRetryable`. */
	readonly shouldRetry?: (error: TradingError) => boolean;
	/** Called before each backoff sleep. */
	readonly onRetry?: (attempt: number, error: TradingError, delayMs: number) => void;
	readonly random?: () => number;
}

export function resolveRetryConfig(overrides?: Partial<RetryConfig>): RetryConfig {
	return {
		maxAttempts: overrides?.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
		baseDelayMs: overrides?.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
		maxDelayMs: overrides?.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
		jitterFactor: overrides?.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
	};
}

/** @internal Exported for testing only. */
export function computeDelay(
	attempt: number,
	config: RetryConfig,
	error: TradingError,
	random: () => number = Math.random,
): number {
	const exponential = config.baseDelayMs * 2 ** attempt;
	let delay = Math.min(exponential, config.maxDelayMs);

	if (error instanceof RateLimitError) {
		delay = Math.max(delay, error.retryAfterMs);
	}

	const jitter = 1 + (random() - 0.5) * 2 * config.jitterFactor;
	return delay * jitter;
}

/**
 * Runs `fn` until it succeeds, fails with a non-retryable error, the attempt
 * budget runs out, or `signal` aborts. Returns the last result.
 *
 * @example
 * ```ts
 * const snapshot = await withRetry(() => adapter.getAccountSnapshot(), { maxAttempts: 5 });
 * ```
 */
export async function withRetry<T>(
	fn: (attempt: number) => Promise<Result<T, TradingError>>,
	config?: Partial<RetryConfig>,
	options: RetryOptions = {},
): Promise<Result<T, TradingError>> {
	const resolved = resolveRetryConfig(config);
	const shouldRetry = options.shouldRetry ?? ((e: TradingError) => e.isRetryable);

	let lastResult = await fn(0);
	for (let attempt = 1; attempt < resolved.maxAttempts; attempt++) {
		if (lastResult.ok || !shouldRetry(lastResult.error)) return lastResult;
		if (options.signal?.aborted) return lastResult;

		const delay = computeDelay(attempt - 1, resolved, lastResult.error, options.random);
		options.onRetry?.(attempt, lastResult.error, delay);
		await sleep(delay, options.signal);
		if (options.signal?.aborted) return lastResult;

		lastResult = await fn(attempt);
	}
	return lastResult;
}
