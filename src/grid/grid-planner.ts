/**
 * Grid Planner — the target ladder for a reference price.
 *
 * Pure: no I/O, no clock. The reconciliation engine diffs the returned plan
 * against working orders and logs `plan.dropped` at warning level.
 *
 * Prices are quantized away from the reference (bids down, asks up), so a
 * rung never crosses the reference price it was computed from.
 */

import { Decimal } from "../shared/decimal.js";
import { ConfigurationError } from "../shared/errors.js";
import type { PlanId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import type { DroppedLevel, GridLevel, GridPlan, PlannerSettings } from "./types.js";

const HUNDRED = Decimal.from(100);

/** Price distance between adjacent rungs for the given reference. */
export function levelStep(referencePrice: Decimal, distance: PlannerSettings["distance"]): Decimal {
	return distance.mode === "percentage"
		? referencePrice.mul(distance.value).div(HUNDRED)
		: distance.value;
}

function validateInputs(referencePrice: Decimal, settings: PlannerSettings): void {
	if (!referencePrice.isPositive()) {
		throw new ConfigurationError("reference price must be positive", {
			referencePrice: referencePrice.toString(),
		});
	}
	if (!Number.isInteger(settings.levels) || settings.levels < 1) {
		throw new ConfigurationError("level count must be an integer >= 1", {
			levels: settings.levels,
		});
	}
	if (!settings.distance.value.isPositive()) {
		throw new ConfigurationError("level distance must be positive", {
			distance: settings.distance.value.toString(),
		});
	}
	if (!settings.tickSize.isPositive() || !settings.lotSize.isPositive()) {
		throw new ConfigurationError("tick and lot sizes must be positive");
	}
}

function assertSpacing(prices: readonly Decimal[], minimum: Decimal, side: OrderSide): void {
	for (let i = 1; i < prices.length; i++) {
		const prev = prices[i - 1];
		const curr = prices[i];
		if (prev === undefined || curr === undefined) continue;
		if (prev.sub(curr).abs().lt(minimum)) {
			throw new ConfigurationError("quantized level spacing below configured minimum", {
				side,
				index: i + 1,
				spacing: prev.sub(curr).abs().toString(),
				minimum: minimum.toString(),
			});
		}
	}
}

/**
 * Computes the target GridLevels for both sides.
 *
 * Levels per side are capped so that one side filling completely cannot exceed
 * `maxPosition` from flat; capped and zero-size rungs are reported in `dropped`.
 *
 * @throws ConfigurationError when inputs are invalid, spacing collapses below
 * max(tick, minLevelSpacing), or the lowest bid would not be positive
 *
 * @example
 * ```ts
 * const plan = planGrid(Decimal.from(100), settings, planId("p-1"));
 * // 1% distance, 3 levels, size 1 → bids 99, 98, 97; asks 101, 102, 103
 * ```
 */
export function planGrid(referencePrice: Decimal, settings: PlannerSettings, id: PlanId): GridPlan {
	validateInputs(referencePrice, settings);

	const step = levelStep(referencePrice, settings.distance);
	const minimumSpacing = Decimal.max(settings.tickSize, settings.minLevelSpacing);
	if (step.lt(minimumSpacing)) {
		throw new ConfigurationError("level distance is smaller than the minimum spacing", {
			step: step.toString(),
			minimum: minimumSpacing.toString(),
		});
	}

	const lowest = referencePrice.sub(step.mul(Decimal.from(settings.levels)));
	if (!lowest.isPositive()) {
		throw new ConfigurationError("grid would place bids at non-positive prices", {
			lowest: lowest.toString(),
		});
	}

	const size = settings.orderSize.floorTo(settings.lotSize);
	const dropped: DroppedLevel[] = [];

	if (size.isZero()) {
		for (let i = 1; i <= settings.levels; i++) {
			dropped.push({ side: OrderSide.Bid, index: i, reason: "zero_size" });
			dropped.push({ side: OrderSide.Ask, index: i, reason: "zero_size" });
		}
		return { id, referencePrice, step, levels: [], dropped };
	}

	const capacity = settings.maxPosition.div(size).floorTo(Decimal.one()).toNumber();
	const count = Math.min(settings.levels, capacity);
	for (let i = count + 1; i <= settings.levels; i++) {
		dropped.push({ side: OrderSide.Bid, index: i, reason: "position_cap" });
		dropped.push({ side: OrderSide.Ask, index: i, reason: "position_cap" });
	}

	const bids: GridLevel[] = [];
	const asks: GridLevel[] = [];
	for (let i = 1; i <= count; i++) {
		const offset = step.mul(Decimal.from(i));
		const bidPrice = referencePrice.sub(offset).floorTo(settings.tickSize);
		if (!bidPrice.isPositive()) {
			throw new ConfigurationError("bid price quantizes to zero", { index: i });
		}
		bids.push({ side: OrderSide.Bid, index: i, price: bidPrice, size });
		asks.push({
			side: OrderSide.Ask,
			index: i,
			price: referencePrice.add(offset).ceilTo(settings.tickSize),
			size,
		});
	}

	assertSpacing(
		bids.map((l) => l.price),
		settings.minLevelSpacing,
		OrderSide.Bid,
	);
	assertSpacing(
		asks.map((l) => l.price),
		settings.minLevelSpacing,
		OrderSide.Ask,
	);

	return { id, referencePrice, step, levels: [...bids, ...asks], dropped };
}

/**
 * True when `price` has moved more than `thresholdPct` percent away from `referencePrice`.
 * A zero threshold disables re-centering.
 */
export function shouldRecenter(
	referencePrice: Decimal,
	price: Decimal,
	thresholdPct: Decimal,
): boolean {
	if (thresholdPct.isZero() || !referencePrice.isPositive()) return false;
	const movePct = price.sub(referencePrice).abs().div(referencePrice).mul(HUNDRED);
	return movePct.gt(thresholdPct);
}
