/**
 * Level Differ — minimal action set to move the working grid to a plan.
 *
 * Matches by grid slot (`side:index` of the planned rung within the plan id),
 * not by price: a rung whose order was re-armed to the other side still
 * occupies its slot, so re-centering never stacks a second order on it.
 *
 * Orders without a level (fix, auto-close, external) are never touched.
 * Orders already being cancelled neither occupy a slot nor get cancelled twice.
 */

import { type GridLevel, type GridPlan, levelKey } from "../grid/types.js";
import type { IntentId } from "../shared/identifiers.js";
import type { Order } from "./types.js";

export type DiffAction =
	| { readonly type: "keep"; readonly intentId: IntentId }
	| { readonly type: "cancel"; readonly order: Order; readonly reason: string }
	| { readonly type: "place"; readonly level: GridLevel };

/** @param live working orders (the ledger's live set) */
export function diffLevels(plan: GridPlan, live: readonly Order[]): readonly DiffAction[] {
	const actions: DiffAction[] = [];
	const current: Order[] = [];

	for (const order of live) {
		if (order.levelRef === null || order.cancelRequested) continue;
		if (order.levelRef.planId !== plan.id) {
			actions.push({ type: "cancel", order, reason: "obsolete plan" });
		} else {
			current.push(order);
		}
	}

	const liveBySlot = groupBy(current, (o) =>
		o.levelRef === null ? "" : levelKey(o.levelRef.side, o.levelRef.index),
	);
	const desiredSlots = new Set<string>();

	for (const level of plan.levels) {
		const key = levelKey(level.side, level.index);
		desiredSlots.add(key);

		const [occupant, ...extras] = liveBySlot.get(key) ?? [];
		if (occupant === undefined) {
			actions.push({ type: "place", level });
			continue;
		}
		actions.push({ type: "keep", intentId: occupant.intentId });
		for (const extra of extras) {
			actions.push({ type: "cancel", order: extra, reason: "duplicate in slot" });
		}
	}

	for (const [key, orders] of liveBySlot) {
		if (desiredSlots.has(key)) continue;
		for (const order of orders) {
			actions.push({ type: "cancel", order, reason: "level no longer planned" });
		}
	}

	return actions;
}

function groupBy<T>(items: readonly T[], keyFn: (item: T) => string): Map<string, T[]> {
	const map = new Map<string, T[]>();
	for (const item of items) {
		const key = keyFn(item);
		const list = map.get(key);
		if (list) {
			list.push(item);
		} else {
			map.set(key, [item]);
		}
	}
	return map;
}
