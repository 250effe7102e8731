/**
 * TradingError hierarchy — structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). The category
 * drives the retry wrapper around the exchange adapter and decides whether a
 * failure degrades the agent or stops it.
 */

/** Error severity categories that drive retry and escalation behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing TradingError subclasses with optional cause chain. */
interface TradingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error class for all agent operations, with category-based retry semantics. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Startup ──────────────────────────────────────────────────────────

/** Fatal error for invalid grid or risk parameters. */
export class ConfigurationError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIGURATION_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigurationError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Local intent errors (intent dropped for this cycle) ──────────────

/** Intent has a non-positive size or price after quantization. */
export class InvalidOrderIntentError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_ORDER_INTENT", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidOrderIntentError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** No headroom left under the maximum net position. */
export class PositionLimitExceededError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"POSITION_LIMIT_EXCEEDED",
			ErrorCategory.NonRetryable,
			rest,
			"the intent is dropped; the next planning cycle may retry",
		);
		this.name = "PositionLimitExceededError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Venue-reported ───────────────────────────────────────────────────

/** The venue refused the order (validation, post-only cross, ...). */
export class OrderRejectedError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "ORDER_REJECTED", ErrorCategory.NonRetryable, rest);
		this.name = "OrderRejectedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A cancel lost the race against a fill. */
export class AlreadyFilledError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "ALREADY_FILLED", ErrorCategory.NonRetryable, rest);
		this.name = "AlreadyFilledError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The venue (or the ledger) does not know the order. */
export class OrderNotFoundError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "ORDER_NOT_FOUND", ErrorCategory.NonRetryable, rest);
		this.name = "OrderNotFoundError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Local view differed from the venue snapshot; reported after correction. */
export class ReconciliationDivergenceError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "RECONCILIATION_DIVERGENCE", ErrorCategory.NonRetryable, rest);
		this.name = "ReconciliationDivergenceError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Retryable ────────────────────────────────────────────────────────

/** Retryable error for connectivity failures between the adapter and the venue. */
export class TransportError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "TRANSPORT_FAILURE", ErrorCategory.Retryable, rest);
		this.name = "TransportError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** An outbound call exceeded its deadline. The venue may still have acted on it. */
export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "TIMEOUT", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for rate-limit responses; includes retry-after hint. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;
	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "RATE_LIMITED", ErrorCategory.Retryable, rest);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			retryAfterMs: this.retryAfterMs,
		};
	}
}

/** A store write failed. Never blocks trading; surfaced as a health signal. */
export class PersistenceError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "PERSISTENCE_FAILURE", ErrorCategory.Retryable, rest);
		this.name = "PersistenceError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

function readStatus(value: unknown): number | undefined {
	if (typeof value !== "object" || value === null) return undefined;
	const status = "status" in value ? value.status : undefined;
	if (typeof status === "number" && status >= 400) return status;
	const context = "context" in value ? value.context : undefined;
	if (typeof context === "object" && context !== null && "status" in context) {
		const nested = context.status;
		if (typeof nested === "number" && nested >= 400) return nested;
	}
	return undefined;
}

/** Extract an HTTP status from the error, its context, or its cause. */
function getHttpStatus(error: Error): number | undefined {
	return readStatus(error) ?? readStatus(error.cause);
}

function getErrnoCode(error: Error): string | undefined {
	const code = "code" in error ? error.code : undefined;
	return typeof code === "string" ? code : undefined;
}

/** Classify an unknown thrown value into the appropriate TradingError subtype. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = getErrnoCode(error);

		const httpStatus = getHttpStatus(error);
		if (httpStatus === 429 || code === "429") {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		if (httpStatus !== undefined && httpStatus >= 500) {
			return new TransportError(error.message, { cause: error, status: httpStatus });
		}

		if (code === "ETIMEDOUT" || error.name === "AbortError") {
			return new TimeoutError(error.message, { cause: error });
		}
		if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET") {
			return new TransportError(error.message, { cause: error });
		}

		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (msg.includes("econnrefused") || msg.includes("socket hang up")) {
			return new TransportError(error.message, { cause: error });
		}
		if (msg.includes("rate limit")) {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isConfigurationError(e: unknown): e is ConfigurationError {
	return e instanceof ConfigurationError;
}

export function isTransportError(e: unknown): e is TransportError {
	return e instanceof TransportError;
}

export function isTimeoutError(e: unknown): e is TimeoutError {
	return e instanceof TimeoutError;
}

export function isRateLimitError(e: unknown): e is RateLimitError {
	return e instanceof RateLimitError;
}

export function isAlreadyFilledError(e: unknown): e is AlreadyFilledError {
	return e instanceof AlreadyFilledError;
}

export function isOrderNotFoundError(e: unknown): e is OrderNotFoundError {
	return e instanceof OrderNotFoundError;
}

export function isOrderRejectedError(e: unknown): e is OrderRejectedError {
	return e instanceof OrderRejectedError;
}
