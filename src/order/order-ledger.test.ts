import { beforeEach, describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { type IntentId, intentId, planId, venueOrderId } from "../shared/identifiers.js";
import { isErr, isOk } from "../shared/result.js";
import { OrderSide } from "../shared/side.js";
import { FakeClock } from "../shared/time.js";
import { OrderLedger } from "./order-ledger.js";
import {
	OrderKind,
	type OrderEvent,
	type OrderIntent,
	OrderPurpose,
	OrderState,
	type VenueOrderState,
} from "./types.js";

const d = Decimal.from;

function bid(price: string, size = "1"): OrderIntent {
	return {
		side: OrderSide.Bid,
		kind: OrderKind.Limit,
		price: d(price),
		size: d(size),
		purpose: OrderPurpose.Grid,
		levelRef: { planId: planId("plan-1"), side: OrderSide.Bid, index: 1, step: d("1") },
	};
}

function ask(price: string, size = "1"): OrderIntent {
	return { ...bid(price, size), side: OrderSide.Ask, purpose: OrderPurpose.Rearm };
}

function event(
	venueId: string,
	newState: VenueOrderState,
	cumulative: string,
	extra: Partial<OrderEvent> = {},
): OrderEvent {
	return {
		venueOrderId: venueOrderId(venueId),
		newState,
		cumulativeFilledSize: d(cumulative),
		fillPrice: null,
		timestampMs: 0,
		...extra,
	};
}

describe("OrderLedger", () => {
	let clock: FakeClock;
	let ledger: OrderLedger;

	beforeEach(() => {
		clock = new FakeClock(1_000);
		ledger = OrderLedger.create({ runTag: "run", clock });
	});

	function placed(intent: OrderIntent, venueId: string): IntentId {
		const order = ledger.record(intent);
		ledger.markSubmitted(order.intentId);
		ledger.acknowledge(order.intentId, venueOrderId(venueId));
		return order.intentId;
	}

	describe("record", () => {
		it("creates Intended orders with run-scoped ids", () => {
			const a = ledger.record(bid("99"));
			const b = ledger.record(bid("98"));
			expect(a.intentId).toBe("run-1");
			expect(b.intentId).toBe("run-2");
			expect(a.state).toBe(OrderState.Intended);
			expect(a.filledSize.isZero()).toBe(true);
			expect(a.createdAtMs).toBe(1_000);
		});
	});

	describe("acknowledge", () => {
		it("binds the venue id and opens the order", () => {
			const id = placed(bid("99"), "v-1");
			const order = ledger.getByVenueId(venueOrderId("v-1"));
			expect(order?.intentId).toBe(id);
			expect(order?.state).toBe(OrderState.Open);
		});

		it("fails for an unknown intent", () => {
			const result = ledger.acknowledge(intentId("nope"), venueOrderId("v-9"));
			expect(isErr(result)).toBe(true);
		});

		it("replays events that arrived before the acknowledgement", () => {
			const order = ledger.record(bid("99"));
			ledger.markSubmitted(order.intentId);

			const early = ledger.applyEvent(event("v-1", OrderState.Filled, "1", { fillPrice: d("99") }));
			expect(early.type).toBe("orphaned");
			expect(ledger.orphanCount()).toBe(1);

			const result = ledger.acknowledge(order.intentId, venueOrderId("v-1"));
			expect(isOk(result) && result.value.map((o) => o.type)).toEqual(["applied"]);
			expect(ledger.get(order.intentId)?.state).toBe(OrderState.Filled);
			expect(ledger.position().size.toString()).toBe("1");
			expect(ledger.orphanCount()).toBe(0);
		});

		it("matches an event by client intent id before the acknowledgement", () => {
			const order = ledger.record(bid("99"));
			ledger.markSubmitted(order.intentId);

			const outcome = ledger.applyEvent(
				event("v-7", OrderState.Open, "0", { clientIntentId: order.intentId }),
			);
			expect(outcome.type).toBe("applied");
			expect(ledger.getByVenueId(venueOrderId("v-7"))?.state).toBe(OrderState.Open);
		});
	});

	describe("applyEvent", () => {
		it("applies a full bid fill to the position", () => {
			const id = placed(bid("99"), "v-1");
			const outcome = ledger.applyEvent(event("v-1", OrderState.Filled, "1", { fillPrice: d("99") }));

			expect(outcome.type).toBe("applied");
			if (outcome.type === "applied") {
				expect(outcome.previousState).toBe(OrderState.Open);
				expect(outcome.fill?.size.toString()).toBe("1");
				expect(outcome.fill?.positionBefore.toString()).toBe("0");
				expect(outcome.fill?.positionAfter.toString()).toBe("1");
				expect(outcome.fill?.realizedPnl.isZero()).toBe(true);
			}
			expect(ledger.get(id)?.state).toBe(OrderState.Filled);
			expect(ledger.position().avgEntry?.toString()).toBe("99");
		});

		it("treats a repeated cumulative size as a no-op", () => {
			placed(bid("99"), "v-1");
			const fill = event("v-1", OrderState.Filled, "1", { fillPrice: d("99") });
			ledger.applyEvent(fill);
			const again = ledger.applyEvent(fill);
			expect(again.type).toBe("duplicate");
			expect(ledger.position().size.toString()).toBe("1");
		});

		it("ignores a decreasing cumulative size as an anomaly", () => {
			const id = placed(bid("99", "2"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.PartiallyFilled, "1.5", { fillPrice: d("99") }));
			const late = ledger.applyEvent(event("v-1", OrderState.PartiallyFilled, "0.5"));
			expect(late.type).toBe("anomaly");
			expect(ledger.get(id)?.filledSize.toString()).toBe("1.5");
			expect(ledger.position().size.toString()).toBe("1.5");
		});

		it("clamps a cumulative size above the order size", () => {
			const id = placed(bid("99"), "v-1");
			const outcome = ledger.applyEvent(
				event("v-1", OrderState.PartiallyFilled, "1.2", { fillPrice: d("99") }),
			);
			expect(outcome.type === "applied" && outcome.clamped).toBe(true);
			expect(ledger.get(id)?.state).toBe(OrderState.Filled);
			expect(ledger.position().size.toString()).toBe("1");
		});

		it("promotes an Open report that carries fills to PartiallyFilled", () => {
			const id = placed(bid("99", "2"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.Open, "1"));
			expect(ledger.get(id)?.state).toBe(OrderState.PartiallyFilled);
		});

		it("values a fill without a price at the order price", () => {
			placed(bid("99"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.Filled, "1"));
			expect(ledger.position().avgEntry?.toString()).toBe("99");
		});

		it("realizes P&L when a fill closes existing exposure", () => {
			placed(bid("99"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.Filled, "1", { fillPrice: d("99") }));
			placed(ask("101"), "v-2");
			const outcome = ledger.applyEvent(event("v-2", OrderState.Filled, "1", { fillPrice: d("101") }));

			expect(outcome.type === "applied" && outcome.fill?.realizedPnl.toString()).toBe("2");
			expect(outcome.type === "applied" && outcome.fill?.entryBefore?.toString()).toBe("99");
			expect(ledger.position().isFlat()).toBe(true);
			expect(ledger.position().realizedPnl.toString()).toBe("2");
		});

		it("lets a fill win over a confirmed cancel", () => {
			const id = placed(bid("99"), "v-1");
			ledger.markCancelRequested(id);
			ledger.applyEvent(event("v-1", OrderState.Cancelled, "0"));
			const outcome = ledger.applyEvent(event("v-1", OrderState.Filled, "1", { fillPrice: d("99") }));
			expect(outcome.type).toBe("applied");
			expect(ledger.get(id)?.state).toBe(OrderState.Filled);
			expect(ledger.position().size.toString()).toBe("1");
		});

		it("counts a late partial fill while the order stays Cancelled", () => {
			const id = placed(bid("99", "2"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.Cancelled, "0"));
			ledger.applyEvent(event("v-1", OrderState.PartiallyFilled, "0.5", { fillPrice: d("99") }));
			expect(ledger.get(id)?.state).toBe(OrderState.Cancelled);
			expect(ledger.get(id)?.filledSize.toString()).toBe("0.5");
			expect(ledger.position().size.toString()).toBe("0.5");
		});

		it("keeps the cancel-requested flag until the venue confirms", () => {
			const id = placed(bid("99"), "v-1");
			ledger.markCancelRequested(id);
			expect(ledger.get(id)?.state).toBe(OrderState.Open);
			expect(ledger.get(id)?.cancelRequested).toBe(true);
		});

		it("clears a cancel request that never reached the venue", () => {
			const id = placed(bid("99"), "v-1");
			ledger.markCancelRequested(id);
			ledger.clearCancelRequested(id);
			expect(ledger.get(id)?.cancelRequested).toBe(false);
		});

		it("drops an older sequence that adds no fill", () => {
			placed(bid("99", "2"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.PartiallyFilled, "1", { sequence: 5 }));
			const stale = ledger.applyEvent(event("v-1", OrderState.Cancelled, "1", { sequence: 4 }));
			expect(stale.type).toBe("stale");
		});

		it("rejects a state change the machine does not allow", () => {
			const order = ledger.record(bid("99"));
			ledger.markSubmitted(order.intentId);
			ledger.applyEvent(
				event("v-1", OrderState.Rejected, "0", { clientIntentId: order.intentId }),
			);
			expect(ledger.get(order.intentId)?.state).toBe(OrderState.Rejected);
			const outcome = ledger.applyEvent(event("v-1", OrderState.Cancelled, "0"));
			expect(outcome.type).toBe("invalid_transition");
		});

		it("resurrects a Failed order when the venue reports it", () => {
			const order = ledger.record(bid("99"));
			ledger.markSubmitted(order.intentId);
			ledger.markFailed(order.intentId, "ack deadline");
			expect(ledger.get(order.intentId)?.reason).toBe("ack deadline");

			ledger.applyEvent(event("v-1", OrderState.Open, "0", { clientIntentId: order.intentId }));
			expect(ledger.get(order.intentId)?.state).toBe(OrderState.Open);
			expect(ledger.get(order.intentId)?.reason).toBeNull();
		});
	});

	describe("local transitions", () => {
		it("refuses an invalid local transition", () => {
			const order = ledger.record(bid("99"));
			const result = ledger.markFailed(order.intentId, "x");
			expect(isOk(result)).toBe(true);
			const again = ledger.markSubmitted(order.intentId);
			expect(isErr(again) && again.error).toBe("Invalid transition: failed → submitted");
		});

		it("discards only intents that never left the process", () => {
			const kept = ledger.record(bid("99"));
			ledger.markSubmitted(kept.intentId);
			expect(isErr(ledger.discard(kept.intentId, "paused"))).toBe(true);

			const dropped = ledger.record(bid("98"));
			expect(isOk(ledger.discard(dropped.intentId, "paused"))).toBe(true);
			expect(ledger.get(dropped.intentId)?.state).toBe(OrderState.Cancelled);
		});

		it("caps the followed-up size at the filled size", () => {
			const id = placed(bid("99", "2"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.PartiallyFilled, "1", { fillPrice: d("99") }));
			const result = ledger.markFollowedUp(id, d("5"));
			expect(isOk(result) && result.value.followedUpSize.toString()).toBe("1");
		});
	});

	describe("adoptExternal", () => {
		it("records a venue order without moving the position", () => {
			const order = ledger.adoptExternal({
				venueOrderId: venueOrderId("ext-1"),
				side: OrderSide.Ask,
				price: d("105"),
				size: d("2"),
				filledSize: d("0.5"),
			});
			expect(order.purpose).toBe(OrderPurpose.External);
			expect(order.state).toBe(OrderState.PartiallyFilled);
			expect(order.followedUpSize.toString()).toBe("0.5");
			expect(ledger.position().isFlat()).toBe(true);

			const again = ledger.adoptExternal({
				venueOrderId: venueOrderId("ext-1"),
				side: OrderSide.Ask,
				price: d("105"),
				size: d("2"),
				filledSize: d("0.5"),
			});
			expect(again.intentId).toBe(order.intentId);
		});
	});

	describe("queries and cleanup", () => {
		it("lists live orders and counts them", () => {
			placed(bid("99"), "v-1");
			const id = placed(bid("98"), "v-2");
			ledger.applyEvent(event("v-2", OrderState.Cancelled, "0"));
			expect(ledger.activeCount()).toBe(1);
			expect(ledger.liveOrders().map((o) => o.venueOrderId)).toEqual(["v-1"]);
			expect(ledger.get(id)?.state).toBe(OrderState.Cancelled);
		});

		it("removes terminal orders after the TTL", () => {
			const id = placed(bid("99"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.Cancelled, "0"));
			clock.advance(500);
			expect(ledger.cleanup(1_000)).toBe(0);
			clock.advance(500);
			expect(ledger.cleanup(1_000)).toBe(1);
			expect(ledger.get(id)).toBeNull();
			expect(ledger.getByVenueId(venueOrderId("v-1"))).toBeNull();
		});

		it("keeps terminal orders whose fills await a follow-up", () => {
			const id = placed(bid("99"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.Filled, "1", { fillPrice: d("99") }));
			clock.advance(5_000);
			expect(ledger.cleanup(1_000)).toBe(0);
			ledger.markFollowedUp(id, d("1"));
			expect(ledger.cleanup(1_000)).toBe(1);
		});

		it("overwrites the position with venue truth", () => {
			placed(bid("99"), "v-1");
			ledger.applyEvent(event("v-1", OrderState.Filled, "1", { fillPrice: d("99") }));
			const book = ledger.overwritePosition(d("3"), d("98"));
			expect(book.size.toString()).toBe("3");
			expect(book.avgEntry?.toString()).toBe("98");
		});
	});
});
