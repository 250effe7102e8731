/**
 * Follow-up policy — what a fill asks the agent to do next.
 *
 * Pure. Each fill yields at most one follow-up, so re-arm, fix-order and
 * auto-close can never be emitted together for the same fill:
 *
 * - auto-close: every fill delta of a grid, re-arm or external order is
 *   flattened with a market order on the other side
 * - re-arm: a level order that reaches Filled is recycled on the opposite
 *   side at the same level, exactly once
 * - fix-order: fill deltas the grid does not recycle (external orders,
 *   partial fills of level orders that were cancelled) are countered with a
 *   passive limit order priced off the entry
 *
 * Fills of fix and auto-close orders never trigger anything.
 */

import type { FillDelta } from "../order/order-ledger.js";
import { type Order, OrderKind, type OrderIntent, OrderPurpose, OrderState } from "../order/types.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigurationError } from "../shared/errors.js";
import { OrderSide, oppositeSide } from "../shared/side.js";

const BPS = Decimal.from(10_000);

export const FillPolicy = {
	/** Re-arm level fills, hold everything else. */
	Hold: "hold",
	FixOrder: "fix_order",
	AutoClose: "auto_close",
} as const;

export type FillPolicy = (typeof FillPolicy)[keyof typeof FillPolicy];

/** @throws ConfigurationError when both policies are enabled */
export function fillPolicyOf(config: {
	readonly fixOrderEnabled: boolean;
	readonly autoCloseEnabled: boolean;
}): FillPolicy {
	if (config.fixOrderEnabled && config.autoCloseEnabled) {
		throw new ConfigurationError("fix-order and auto-close are mutually exclusive");
	}
	if (config.autoCloseEnabled) return FillPolicy.AutoClose;
	if (config.fixOrderEnabled) return FillPolicy.FixOrder;
	return FillPolicy.Hold;
}

export interface FollowUpSettings {
	readonly policy: FillPolicy;
	readonly rearmSpacingLevels: number;
	readonly fixOrderOffsetBps: number;
	readonly tickSize: Decimal;
}

export interface FollowUp {
	readonly type: "rearm" | "fix" | "auto_close";
	readonly intent: OrderIntent;
	/** How much of the source order's fill this follow-up answers. */
	readonly covers: Decimal;
}

// ── Pricing ──────────────────────────────────────────────────────────

/**
 * Price of the order recycling a filled level: the level price moved
 * `spacingLevels` steps toward the new side, quantized away from the book.
 */
export function rearmPrice(
	filledSide: OrderSide,
	levelPrice: Decimal,
	step: Decimal,
	spacingLevels: number,
	tickSize: Decimal,
): Decimal {
	const shift = step.mul(Decimal.from(spacingLevels));
	return filledSide === OrderSide.Bid
		? levelPrice.add(shift).ceilTo(tickSize)
		: levelPrice.sub(shift).floorTo(tickSize);
}

/**
 * Price of a fix-order countering a fill on `filledSide`.
 *
 * Sell fix: max(entry, fill) × (1 + offset), rounded up.
 * Buy fix: min(entry, fill) × (1 − offset), rounded down.
 */
export function fixPrice(
	filledSide: OrderSide,
	entry: Decimal | null,
	fillPrice: Decimal,
	offsetBps: number,
	tickSize: Decimal,
): Decimal {
	const base = entry ?? fillPrice;
	const offset = Decimal.from(offsetBps).div(BPS);
	if (filledSide === OrderSide.Bid) {
		return Decimal.max(base, fillPrice).mul(Decimal.one().add(offset)).ceilTo(tickSize);
	}
	return Decimal.min(base, fillPrice).mul(Decimal.one().sub(offset)).floorTo(tickSize);
}

// ── Decisions ────────────────────────────────────────────────────────

function triggersFollowUps(order: Order): boolean {
	return order.purpose !== OrderPurpose.Fix && order.purpose !== OrderPurpose.AutoClose;
}

/**
 * The follow-up for one newly applied fill delta of `order` (as updated by
 * that fill), or null when the fill needs none yet.
 */
export function followUpForFill(
	order: Order,
	fill: FillDelta,
	settings: FollowUpSettings,
): FollowUp | null {
	if (!triggersFollowUps(order)) return null;

	if (settings.policy === FillPolicy.AutoClose) {
		return {
			type: "auto_close",
			intent: {
				side: oppositeSide(order.side),
				kind: OrderKind.Market,
				price: null,
				size: fill.size,
				purpose: OrderPurpose.AutoClose,
				levelRef: null,
			},
			covers: fill.size,
		};
	}

	const ref = order.levelRef;
	if (ref !== null) {
		if (order.state !== OrderState.Filled) return null;
		const levelPrice = order.price ?? order.avgFillPrice ?? fill.price;
		return {
			type: "rearm",
			intent: {
				side: oppositeSide(order.side),
				kind: OrderKind.Limit,
				price: rearmPrice(
					order.side,
					levelPrice,
					ref.step,
					settings.rearmSpacingLevels,
					settings.tickSize,
				),
				size: order.size,
				purpose: OrderPurpose.Rearm,
				levelRef: ref,
			},
			covers: order.filledSize.sub(order.followedUpSize),
		};
	}

	if (settings.policy === FillPolicy.FixOrder) {
		return fixFollowUp(order, fill.size, fill.entryBefore, fill.price, settings);
	}
	return null;
}

/**
 * The fix-order for fills a cancelled level order left behind; they will
 * never be re-armed. Null outside fix-order mode or when nothing is left.
 */
export function followUpForCancelled(order: Order, settings: FollowUpSettings): FollowUp | null {
	if (settings.policy !== FillPolicy.FixOrder) return null;
	if (!triggersFollowUps(order) || order.levelRef === null) return null;
	if (order.state !== OrderState.Cancelled) return null;

	const uncovered = order.filledSize.sub(order.followedUpSize);
	if (!uncovered.isPositive() || order.avgFillPrice === null) return null;
	return fixFollowUp(order, uncovered, null, order.avgFillPrice, settings);
}

function fixFollowUp(
	order: Order,
	size: Decimal,
	entry: Decimal | null,
	fillPrice: Decimal,
	settings: FollowUpSettings,
): FollowUp {
	return {
		type: "fix",
		intent: {
			side: oppositeSide(order.side),
			kind: OrderKind.Limit,
			price: fixPrice(order.side, entry, fillPrice, settings.fixOrderOffsetBps, settings.tickSize),
			size,
			purpose: OrderPurpose.Fix,
			levelRef: null,
		},
		covers: size,
	};
}
