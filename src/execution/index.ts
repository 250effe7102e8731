export type {
	AccountSnapshot,
	ExchangeAdapter,
	OrderLookup,
	PlaceOrderRequest,
	RetryConfig,
	SnapshotOrder,
} from "./types.js";
export { DEFAULT_RETRY_CONFIG } from "./types.js";
export type { RetryOptions } from "./retry.js";
export { computeDelay, resolveRetryConfig, withRetry } from "./retry.js";
export { withDeadline } from "./deadline.js";
export type { FaultSpec, PaperExchangeConfig, PaperOperation } from "./paper-exchange.js";
export { PaperExchange } from "./paper-exchange.js";
