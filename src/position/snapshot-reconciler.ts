import type { AccountSnapshot, SnapshotOrder } from "../execution/types.js";
import { isLive } from "../order/order-state-machine.js";
import { type Order, OrderState } from "../order/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { VenueOrderId } from "../shared/identifiers.js";

export type SnapshotAction =
	/** A local order the venue lists under our client intent id; bind its venue id. */
	| { readonly type: "adopt"; readonly order: Order; readonly venueOrder: SnapshotOrder }
	/** An open venue order this ledger never placed. */
	| { readonly type: "external"; readonly venueOrder: SnapshotOrder }
	/** A working local order the venue no longer lists; its final state needs a query. */
	| { readonly type: "missing"; readonly order: Order; readonly venueOrderId: VenueOrderId }
	/** The venue reports more fill than the ledger has seen. */
	| { readonly type: "fill_gap"; readonly order: Order; readonly venueOrder: SnapshotOrder };

export interface SnapshotDiff {
	readonly actions: readonly SnapshotAction[];
	readonly summary: string;
}

export interface PositionDrift {
	readonly local: Decimal;
	readonly venue: Decimal;
	/** venue − local */
	readonly difference: Decimal;
}

export interface SnapshotReconcilerConfig {
	/** Position differences up to this size are not divergence. */
	readonly tolerance: Decimal;
}

/**
 * SnapshotReconciler — compares the ledger with a full venue snapshot.
 *
 * Pure. The venue is the source of truth; the reconciliation engine applies
 * the returned actions and reports every divergence it corrects.
 */
export class SnapshotReconciler {
	readonly config: SnapshotReconcilerConfig;

	constructor(config: SnapshotReconcilerConfig) {
		this.config = config;
	}

	/**
	 * @param orders every order the ledger holds
	 * @param requestedAtMs when the snapshot was requested; orders the ledger
	 * created later cannot be in it and are never reported missing
	 */
	diffOrders(
		orders: readonly Order[],
		snapshot: AccountSnapshot,
		requestedAtMs: number,
	): SnapshotDiff {
		const actions: SnapshotAction[] = [];

		const byVenueId = new Map<VenueOrderId, Order>();
		const byIntentId = new Map<string, Order>();
		for (const order of orders) {
			if (order.venueOrderId !== null) byVenueId.set(order.venueOrderId, order);
			byIntentId.set(order.intentId, order);
		}

		const listed = new Set<VenueOrderId>();
		for (const venueOrder of snapshot.openOrders) {
			listed.add(venueOrder.venueOrderId);
			const known = byVenueId.get(venueOrder.venueOrderId);

			if (known) {
				if (known.state === OrderState.Failed) {
					actions.push({ type: "adopt", order: known, venueOrder });
				}
				if (venueOrder.filledSize.gt(known.filledSize)) {
					actions.push({ type: "fill_gap", order: known, venueOrder });
				}
				continue;
			}

			const byClient =
				venueOrder.clientIntentId === undefined
					? undefined
					: byIntentId.get(venueOrder.clientIntentId);
			if (byClient && byClient.venueOrderId === null) {
				actions.push({ type: "adopt", order: byClient, venueOrder });
				if (venueOrder.filledSize.gt(byClient.filledSize)) {
					actions.push({ type: "fill_gap", order: byClient, venueOrder });
				}
				continue;
			}

			actions.push({ type: "external", venueOrder });
		}

		for (const order of orders) {
			const venueId = order.venueOrderId;
			if (!isLive(order.state) || venueId === null) continue;
			if (order.createdAtMs >= requestedAtMs) continue;
			if (!listed.has(venueId)) {
				actions.push({ type: "missing", order, venueOrderId: venueId });
			}
		}

		const count = (type: SnapshotAction["type"]): number =>
			actions.filter((a) => a.type === type).length;
		const summary = `Sync: ${count("adopt")} adopted, ${count("external")} external, ${count("missing")} missing, ${count("fill_gap")} fill gaps`;

		return { actions, summary };
	}

	/** @returns the drift when |venue − local| exceeds the tolerance, else null */
	positionDrift(local: Decimal, venue: Decimal): PositionDrift | null {
		const difference = venue.sub(local);
		if (difference.abs().lte(this.config.tolerance)) return null;
		return { local, venue, difference };
	}
}
