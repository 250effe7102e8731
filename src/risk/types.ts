/**
 * Risk framework type definitions.
 *
 * Guards see one order intent plus a consistent snapshot of the position taken
 * at decision time. They perform no locking; the single-writer mailbox of the
 * reconciliation engine is what keeps that snapshot valid.
 */

import type { OrderIntent } from "../order/types.js";
import type { Decimal } from "../shared/decimal.js";
import type {
	InvalidOrderIntentError,
	PositionLimitExceededError,
} from "../shared/errors.js";

// ── Verdict (discriminated union) ───────────────────────────────────

export type RiskVerdict =
	| { readonly type: "accept"; readonly intent: OrderIntent }
	| {
			readonly type: "clip";
			readonly intent: OrderIntent;
			readonly requestedSize: Decimal;
			readonly guard: string;
	  }
	| {
			readonly type: "reject";
			readonly guard: string;
			readonly error: InvalidOrderIntentError | PositionLimitExceededError;
	  };

export function accept(intent: OrderIntent): RiskVerdict {
	return { type: "accept", intent };
}

export function clip(intent: OrderIntent, requestedSize: Decimal, guard: string): RiskVerdict {
	return { type: "clip", intent, requestedSize, guard };
}

export function reject(
	guard: string,
	error: InvalidOrderIntentError | PositionLimitExceededError,
): RiskVerdict {
	return { type: "reject", guard, error };
}

/** Type guard: narrows a verdict to the variants that let an intent through. */
export function isPassing(
	verdict: RiskVerdict,
): verdict is Extract<RiskVerdict, { readonly type: "accept" | "clip" }> {
	return verdict.type !== "reject";
}

// ── Context ─────────────────────────────────────────────────────────

export interface RiskContext {
	/** Signed net position at decision time. */
	readonly position: Decimal;
	readonly maxPosition: Decimal;
	readonly tickSize: Decimal;
	readonly lotSize: Decimal;
}

// ── Guard interface ─────────────────────────────────────────────────

/** Pre-trade check; may pass the intent through unchanged, shrink it, or drop it. */
export interface IntentGuard {
	readonly name: string;
	check(intent: OrderIntent, ctx: RiskContext): RiskVerdict;
}
