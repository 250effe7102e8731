/**
 * Agent events — what one grid agent reports to its owner.
 *
 * Emitted synchronously from inside the reconciliation mailbox, so listeners
 * observe ledger state exactly as it was when the event happened. Listener
 * errors are caught by the emitter and logged; they never reach the engine.
 */

import type { AgentStatus, FeedStatus } from "../lifecycle/types.js";
import type { FillDelta } from "../order/order-ledger.js";
import type { Order, OrderIntent, OrderState } from "../order/types.js";
import type {
	InvalidOrderIntentError,
	PersistenceError,
	PositionLimitExceededError,
	ReconciliationDivergenceError,
	TradingError,
} from "../shared/errors.js";
import type { IntentId } from "../shared/identifiers.js";

// ── Payloads ─────────────────────────────────────────────────────────

export interface OrderUpdated {
	readonly order: Order;
	readonly previousState: OrderState;
}

export interface FillApplied {
	readonly order: Order;
	readonly fill: FillDelta;
}

export type FollowUpType = "rearm" | "fix" | "auto_close";

export interface FollowUpEmitted {
	readonly type: FollowUpType;
	/** The order whose fill triggered the follow-up. */
	readonly source: IntentId;
	readonly intent: OrderIntent;
}

export interface IntentRejected {
	readonly intent: OrderIntent;
	readonly guard: string;
	readonly error: InvalidOrderIntentError | PositionLimitExceededError;
}

export interface IntentClipped {
	readonly intent: OrderIntent;
	readonly requestedSize: string;
	readonly guard: string;
}

export type DivergenceKind = "position" | "fill_gap" | "external_order" | "missing_order";

export interface DivergenceReport {
	readonly kind: DivergenceKind;
	readonly error: ReconciliationDivergenceError;
	readonly timestamp: number;
}

export interface EventAnomaly {
	readonly order: Order;
	readonly reason: string;
}

export interface StatusChanged {
	readonly from: AgentStatus;
	readonly to: AgentStatus;
}

export interface FeedHealthChanged {
	readonly from: FeedStatus;
	readonly to: FeedStatus;
	readonly silenceMs: number;
}

// ── Event map ────────────────────────────────────────────────────────

export type AgentEvents = {
	orderUpdated: (update: OrderUpdated) => void;
	fill: (fill: FillApplied) => void;
	followUp: (followUp: FollowUpEmitted) => void;
	intentRejected: (rejection: IntentRejected) => void;
	intentClipped: (clip: IntentClipped) => void;
	divergence: (report: DivergenceReport) => void;
	anomaly: (anomaly: EventAnomaly) => void;
	statusChanged: (change: StatusChanged) => void;
	feedHealthChanged: (change: FeedHealthChanged) => void;
	persistenceFailed: (error: PersistenceError) => void;
	/** Adapter failures that were logged and absorbed. */
	error: (error: TradingError) => void;
};

export type AgentEventName = keyof AgentEvents;
