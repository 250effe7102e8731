/**
 * Order state machine — validated transitions.
 *
 * 8 states: Intended → Submitted → Open → PartiallyFilled → Filled / Cancelled / Rejected / Failed.
 *
 * Two exits from "terminal" states exist because the venue is the source of truth:
 * - Cancelled → Filled: a cancel that lost the race against a fill.
 * - Failed → any venue state: an ack deadline passed but the status query (or a
 *   later event) shows the order reached the venue.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { OrderState } from "./types.js";

const VALID_TRANSITIONS: ReadonlyMap<OrderState, readonly OrderState[]> = new Map([
	[
		OrderState.Intended,
		[OrderState.Submitted, OrderState.Failed, OrderState.Rejected, OrderState.Cancelled],
	],
	[
		OrderState.Submitted,
		[
			OrderState.Open,
			OrderState.PartiallyFilled,
			OrderState.Filled,
			OrderState.Cancelled,
			OrderState.Rejected,
			OrderState.Failed,
		],
	],
	[OrderState.Open, [OrderState.PartiallyFilled, OrderState.Filled, OrderState.Cancelled]],
	[
		OrderState.PartiallyFilled,
		[OrderState.PartiallyFilled, OrderState.Filled, OrderState.Cancelled],
	],
	[OrderState.Filled, []],
	[OrderState.Cancelled, [OrderState.Filled]],
	[OrderState.Rejected, []],
	[
		OrderState.Failed,
		[
			OrderState.Open,
			OrderState.PartiallyFilled,
			OrderState.Filled,
			OrderState.Cancelled,
			OrderState.Rejected,
		],
	],
]);

const TERMINAL_STATES: ReadonlySet<OrderState> = new Set([
	OrderState.Filled,
	OrderState.Cancelled,
	OrderState.Rejected,
	OrderState.Failed,
]);

/** Rank used to tell a forward move from a stale one when the venue repeats itself. */
const PROGRESS: Readonly<Record<OrderState, number>> = {
	[OrderState.Intended]: 0,
	[OrderState.Submitted]: 1,
	[OrderState.Failed]: 1,
	[OrderState.Open]: 2,
	[OrderState.PartiallyFilled]: 3,
	[OrderState.Cancelled]: 4,
	[OrderState.Rejected]: 4,
	[OrderState.Filled]: 5,
};

/**
 * True for states no regular event moves out of.
 *
 * @example
 * ```ts
 * isTerminal(OrderState.Filled); // true
 * isTerminal(OrderState.Submitted); // false
 * ```
 */
export function isTerminal(state: OrderState): boolean {
	return TERMINAL_STATES.has(state);
}

/** Working orders: intended, in flight, or resting on the venue. */
export function isLive(state: OrderState): boolean {
	return !TERMINAL_STATES.has(state);
}

export function progressOf(state: OrderState): number {
	return PROGRESS[state];
}

export function canTransitionTo(from: OrderState, to: OrderState): boolean {
	const valid = VALID_TRANSITIONS.get(from);
	if (!valid) return false;
	return valid.includes(to);
}

/**
 * @example
 * ```ts
 * const result = tryTransition(OrderState.Open, OrderState.Filled);
 * if (result.ok) console.log("now", result.value);
 * ```
 */
export function tryTransition(from: OrderState, to: OrderState): Result<OrderState, string> {
	if (canTransitionTo(from, to)) {
		return ok(to);
	}
	return err(`Invalid transition: ${from} → ${to}`);
}
