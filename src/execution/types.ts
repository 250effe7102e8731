/**
 * Execution bounded context — the exchange adapter contract.
 *
 * The core sees a venue only through ExchangeAdapter. Transport, signing and
 * credentials stay inside the adapter; every call returns a Result carrying a
 * TradingError so callers can branch on `isRetryable` without try/catch.
 */

import type { OrderEvent, OrderKind } from "../order/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { IntentId, VenueOrderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { OrderSide } from "../shared/side.js";

export interface PlaceOrderRequest {
	readonly side: OrderSide;
	readonly kind: OrderKind;
	/** Null for market orders. */
	readonly price: Decimal | null;
	readonly size: Decimal;
	readonly clientIntentId: IntentId;
}

/** An open order as listed in an account snapshot. */
export interface SnapshotOrder {
	readonly venueOrderId: VenueOrderId;
	readonly clientIntentId?: IntentId | undefined;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly size: Decimal;
	readonly filledSize: Decimal;
}

/** Venue ground truth for one account. */
export interface AccountSnapshot {
	/** Signed net position, positive = long. */
	readonly position: Decimal;
	readonly entryPrice?: Decimal | undefined;
	readonly markPrice?: Decimal | undefined;
	readonly openOrders: readonly SnapshotOrder[];
}

export type OrderLookup =
	| { readonly venueOrderId: VenueOrderId }
	| { readonly clientIntentId: IntentId };

/**
 * Normalized venue interface consumed by the reconciliation engine.
 * Implemented by PaperExchange; live adapters live outside this package.
 */
export interface ExchangeAdapter {
	/** Errors: OrderRejected, Transport, RateLimit, Timeout. */
	placeOrder(
		request: PlaceOrderRequest,
		signal?: AbortSignal,
	): Promise<Result<VenueOrderId, TradingError>>;
	/** Errors: AlreadyFilled, OrderNotFound, Transport, Timeout. */
	cancelOrder(venueOrderId: VenueOrderId, signal?: AbortSignal): Promise<Result<void, TradingError>>;
	/** Current state of one order as an event; null when the venue does not know it. */
	queryOrder(
		lookup: OrderLookup,
		signal?: AbortSignal,
	): Promise<Result<OrderEvent | null, TradingError>>;
	/** Live, non-restartable event stream. Ends when `signal` aborts. */
	streamOrderEvents(signal?: AbortSignal): AsyncIterable<OrderEvent>;
	getAccountSnapshot(signal?: AbortSignal): Promise<Result<AccountSnapshot, TradingError>>;
}

/** Configuration for exponential backoff retry around adapter calls. */
export interface RetryConfig {
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly jitterFactor: number;
}

/** Sensible retry defaults: 3 attempts, 100ms base delay, 5s max, 10% jitter. */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 100,
	maxDelayMs: 5000,
	jitterFactor: 0.1,
};
