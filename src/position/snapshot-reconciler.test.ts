import { describe, expect, it } from "vitest";
import type { AccountSnapshot, SnapshotOrder } from "../execution/types.js";
import { type Order, OrderKind, OrderPurpose, OrderState } from "../order/types.js";
import { Decimal } from "../shared/decimal.js";
import { intentId, venueOrderId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { SnapshotReconciler } from "./snapshot-reconciler.js";

const d = Decimal.from;

function order(id: string, venueId: string | null, overrides: Partial<Order> = {}): Order {
	return {
		intentId: intentId(id),
		venueOrderId: venueId === null ? null : venueOrderId(venueId),
		side: OrderSide.Bid,
		kind: OrderKind.Limit,
		price: d("99"),
		size: d("1"),
		filledSize: d("0"),
		avgFillPrice: null,
		state: OrderState.Open,
		purpose: OrderPurpose.Grid,
		levelRef: null,
		followedUpSize: d("0"),
		cancelRequested: false,
		lastSequence: null,
		createdAtMs: 100,
		updatedAtMs: 100,
		reason: null,
		...overrides,
	};
}

function listed(venueId: string, overrides: Partial<SnapshotOrder> = {}): SnapshotOrder {
	return {
		venueOrderId: venueOrderId(venueId),
		side: OrderSide.Bid,
		price: d("99"),
		size: d("1"),
		filledSize: d("0"),
		...overrides,
	};
}

function snapshot(openOrders: readonly SnapshotOrder[], position = "0"): AccountSnapshot {
	return { position: d(position), openOrders };
}

describe("SnapshotReconciler", () => {
	const reconciler = new SnapshotReconciler({ tolerance: d("0.001") });

	describe("diffOrders", () => {
		it("reports nothing when ledger and venue agree", () => {
			const diff = reconciler.diffOrders([order("a", "v1")], snapshot([listed("v1")]), 200);
			expect(diff.actions).toEqual([]);
			expect(diff.summary).toBe("Sync: 0 adopted, 0 external, 0 missing, 0 fill gaps");
		});

		it("adopts a submitted order listed under its client intent id", () => {
			const local = order("a", null, { state: OrderState.Submitted });
			const venue = listed("v9", { clientIntentId: intentId("a") });
			const diff = reconciler.diffOrders([local], snapshot([venue]), 200);
			expect(diff.actions).toEqual([{ type: "adopt", order: local, venueOrder: venue }]);
		});

		it("adopts a failed order whose venue id is still listed", () => {
			const local = order("a", "v1", { state: OrderState.Failed });
			const diff = reconciler.diffOrders([local], snapshot([listed("v1")]), 200);
			expect(diff.actions.map((a) => a.type)).toEqual(["adopt"]);
		});

		it("reports unknown venue orders as external", () => {
			const venue = listed("v7", { side: OrderSide.Ask, price: d("105") });
			const diff = reconciler.diffOrders([], snapshot([venue]), 200);
			expect(diff.actions).toEqual([{ type: "external", venueOrder: venue }]);
			expect(diff.summary).toBe("Sync: 0 adopted, 1 external, 0 missing, 0 fill gaps");
		});

		it("does not adopt by client id when the order is already bound elsewhere", () => {
			const local = order("a", "v1");
			const venue = listed("v2", { clientIntentId: intentId("a") });
			const diff = reconciler.diffOrders([local], snapshot([venue, listed("v1")]), 200);
			expect(diff.actions).toEqual([{ type: "external", venueOrder: venue }]);
		});

		it("reports fill gaps where the venue saw more fill", () => {
			const local = order("a", "v1", { filledSize: d("0.2"), state: OrderState.PartiallyFilled });
			const venue = listed("v1", { filledSize: d("0.5") });
			const diff = reconciler.diffOrders([local], snapshot([venue]), 200);
			expect(diff.actions).toEqual([{ type: "fill_gap", order: local, venueOrder: venue }]);
		});

		it("reports live orders the venue no longer lists as missing", () => {
			const local = order("a", "v1");
			const diff = reconciler.diffOrders([local], snapshot([]), 200);
			expect(diff.actions).toEqual([
				{ type: "missing", order: local, venueOrderId: venueOrderId("v1") },
			]);
		});

		it("never reports orders created after the snapshot request as missing", () => {
			const local = order("a", "v1", { createdAtMs: 200 });
			const diff = reconciler.diffOrders([local], snapshot([]), 200);
			expect(diff.actions).toEqual([]);
		});

		it("ignores terminal and unacknowledged orders when looking for missing ones", () => {
			const orders = [
				order("a", "v1", { state: OrderState.Filled, filledSize: d("1") }),
				order("b", "v2", { state: OrderState.Cancelled }),
				order("c", null, { state: OrderState.Submitted }),
			];
			const diff = reconciler.diffOrders(orders, snapshot([]), 200);
			expect(diff.actions).toEqual([]);
		});
	});

	describe("positionDrift", () => {
		it("returns null within tolerance", () => {
			expect(reconciler.positionDrift(d("1"), d("1.001"))).toBeNull();
		});

		it("returns the venue minus local difference beyond tolerance", () => {
			const drift = reconciler.positionDrift(d("1"), d("2.5"));
			expect(drift?.difference.toString()).toBe("1.5");
			expect(drift?.local.toString()).toBe("1");
			expect(drift?.venue.toString()).toBe("2.5");
		});

		it("detects drift in the short direction", () => {
			expect(reconciler.positionDrift(d("0"), d("-1"))?.difference.toString()).toBe("-1");
		});
	});
});
