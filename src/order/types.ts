/**
 * Order domain types.
 */

import type { Decimal } from "../shared/decimal.js";
import type { IntentId, PlanId, VenueOrderId } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/side.js";

// ── Order state (8-state machine) ───────────────────────────────────

/** Lifecycle of an order from local intent to a terminal venue outcome. */
export const OrderState = {
	/** Created locally, not yet sent. */
	Intended: "intended",
	/** Sent, awaiting venue acknowledgement. */
	Submitted: "submitted",
	/** Acknowledged and resting. */
	Open: "open",
	PartiallyFilled: "partially_filled",
	Filled: "filled",
	Cancelled: "cancelled",
	/** Venue-side validation failure. */
	Rejected: "rejected",
	/** Transport or unknown error after exhausting retries, or no acknowledgement by the deadline. */
	Failed: "failed",
} as const;

export type OrderState = (typeof OrderState)[keyof typeof OrderState];

// ── Order kind / purpose ────────────────────────────────────────────

export const OrderKind = {
	Limit: "limit",
	Market: "market",
} as const;

export type OrderKind = (typeof OrderKind)[keyof typeof OrderKind];

/** Why the agent placed an order; drives which follow-ups its fills trigger. */
export const OrderPurpose = {
	/** A rung of the current plan. */
	Grid: "grid",
	/** Recycles a filled rung on the opposite side. */
	Rearm: "rearm",
	/** Restores the position after a fill the grid does not recycle. */
	Fix: "fix",
	/** Flattens the position delta created by a fill. */
	AutoClose: "auto_close",
	/** Found on the venue but not placed by this run. */
	External: "external",
} as const;

export type OrderPurpose = (typeof OrderPurpose)[keyof typeof OrderPurpose];

/**
 * The grid slot an order occupies. `side` and `index` name the planned rung,
 * which keeps its identity while its order flips sides through re-arms.
 */
export interface LevelRef {
	readonly planId: PlanId;
	readonly side: OrderSide;
	readonly index: number;
	readonly step: Decimal;
}

// ── Intent ──────────────────────────────────────────────────────────

/** A proposed order before the risk guard and the ledger have seen it. */
export interface OrderIntent {
	readonly side: OrderSide;
	readonly kind: OrderKind;
	/** Null for market orders. */
	readonly price: Decimal | null;
	readonly size: Decimal;
	readonly purpose: OrderPurpose;
	readonly levelRef: LevelRef | null;
}

// ── Order ───────────────────────────────────────────────────────────

/** Immutable snapshot of one order as the ledger records it. */
export interface Order {
	readonly intentId: IntentId;
	readonly venueOrderId: VenueOrderId | null;
	readonly side: OrderSide;
	readonly kind: OrderKind;
	readonly price: Decimal | null;
	readonly size: Decimal;
	/** Monotonically non-decreasing. */
	readonly filledSize: Decimal;
	readonly avgFillPrice: Decimal | null;
	readonly state: OrderState;
	readonly purpose: OrderPurpose;
	readonly levelRef: LevelRef | null;
	/** Portion of `filledSize` already answered with a re-arm or fix-order. */
	readonly followedUpSize: Decimal;
	readonly cancelRequested: boolean;
	readonly lastSequence: number | null;
	readonly createdAtMs: number;
	readonly updatedAtMs: number;
	readonly reason: string | null;
}

// ── Venue facts ─────────────────────────────────────────────────────

/** States an exchange can report for an order. */
export type VenueOrderState =
	| typeof OrderState.Open
	| typeof OrderState.PartiallyFilled
	| typeof OrderState.Filled
	| typeof OrderState.Cancelled
	| typeof OrderState.Rejected;

/** One order-lifecycle event from the exchange stream (or a status query). */
export interface OrderEvent {
	readonly venueOrderId: VenueOrderId;
	readonly clientIntentId?: IntentId | undefined;
	readonly newState: VenueOrderState;
	readonly cumulativeFilledSize: Decimal;
	/** Price of the fill that produced this event; null when the event carries no fill. */
	readonly fillPrice: Decimal | null;
	readonly timestampMs: number;
	/** Venue-assigned sequence, when the venue provides one. */
	readonly sequence?: number | undefined;
}
