import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { venueOrderId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { OrderLedger } from "./order-ledger.js";
import { OrderKind, OrderPurpose, OrderState } from "./types.js";

const SIZE = 10;

/** A ledger holding one acknowledged bid of SIZE units at 100. */
function ledgerWithOpenBid(): OrderLedger {
	const ledger = OrderLedger.create({ runTag: "prop" });
	const order = ledger.record({
		side: OrderSide.Bid,
		kind: OrderKind.Limit,
		price: Decimal.from(100),
		size: Decimal.from(SIZE),
		purpose: OrderPurpose.Grid,
		levelRef: null,
	});
	ledger.markSubmitted(order.intentId);
	ledger.acknowledge(order.intentId, venueOrderId("v-1"));
	return ledger;
}

function fillEvent(cumulative: number) {
	return {
		venueOrderId: venueOrderId("v-1"),
		newState: cumulative >= SIZE ? OrderState.Filled : OrderState.PartiallyFilled,
		cumulativeFilledSize: Decimal.from(cumulative),
		fillPrice: Decimal.from(100),
		timestampMs: 0,
	} as const;
}

describe("OrderLedger (property-based)", () => {
	it("never lowers the position on reordered or repeated fill events", () => {
		fc.assert(
			fc.property(fc.array(fc.integer({ min: 0, max: SIZE + 2 }), { maxLength: 40 }), (cums) => {
				const ledger = ledgerWithOpenBid();
				let previous = Decimal.zero();
				let highest = 0;

				for (const cum of cums) {
					ledger.applyEvent(fillEvent(cum));
					const size = ledger.position().size;
					expect(size.gte(previous)).toBe(true);
					previous = size;
					highest = Math.max(highest, Math.min(cum, SIZE));
				}

				expect(ledger.position().size.toString()).toBe(String(highest));
			}),
			{ numRuns: 500 },
		);
	});

	it("leaves state unchanged when the same event is replayed", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 1, max: SIZE }),
				fc.integer({ min: 1, max: 20 }),
				(cum, replays) => {
					const ledger = ledgerWithOpenBid();
					ledger.applyEvent(fillEvent(cum));
					const [first] = ledger.all();

					for (let i = 0; i < replays; i++) {
						expect(ledger.applyEvent(fillEvent(cum)).type).toBe("duplicate");
					}

					const [after] = ledger.all();
					expect(after).toEqual(first);
					expect(ledger.position().size.toString()).toBe(String(cum));
				},
			),
			{ numRuns: 300 },
		);
	});
});
