/**
 * Grid bounded context — planned price rungs around a reference price.
 */

import type { Decimal } from "../shared/decimal.js";
import type { PlanId } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/side.js";

/** One planned rung. `index` counts outward from the reference price, starting at 1. */
export interface GridLevel {
	readonly side: OrderSide;
	readonly index: number;
	readonly price: Decimal;
	readonly size: Decimal;
}

/** A level the planner could not emit, reported at warning level. */
export interface DroppedLevel {
	readonly side: OrderSide;
	readonly index: number;
	readonly reason: "zero_size" | "position_cap";
}

export interface GridPlan {
	readonly id: PlanId;
	readonly referencePrice: Decimal;
	/** Unquantized price distance between adjacent rungs. */
	readonly step: Decimal;
	/** Bids (index ascending) followed by asks (index ascending). */
	readonly levels: readonly GridLevel[];
	readonly dropped: readonly DroppedLevel[];
}

/** The subset of GridConfig the planner reads. */
export interface PlannerSettings {
	readonly levels: number;
	readonly distance: { readonly mode: "absolute" | "percentage"; readonly value: Decimal };
	readonly orderSize: Decimal;
	readonly maxPosition: Decimal;
	readonly tickSize: Decimal;
	readonly lotSize: Decimal;
	readonly minLevelSpacing: Decimal;
}

export function levelKey(side: OrderSide, index: number): string {
	return `${side}:${index}`;
}
