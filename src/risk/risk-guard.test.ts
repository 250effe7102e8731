import { describe, expect, it } from "vitest";
import { OrderKind, OrderPurpose, type OrderIntent } from "../order/types.js";
import { Decimal } from "../shared/decimal.js";
import { InvalidOrderIntentError, PositionLimitExceededError } from "../shared/errors.js";
import { OrderSide } from "../shared/side.js";
import { RiskGuard } from "./risk-guard.js";
import type { RiskContext } from "./types.js";

const d = Decimal.from;

function intent(side: OrderSide, size: string, price: string | null = "100"): OrderIntent {
	return {
		side,
		kind: price === null ? OrderKind.Market : OrderKind.Limit,
		price: price === null ? null : d(price),
		size: d(size),
		purpose: OrderPurpose.Grid,
		levelRef: null,
	};
}

function ctx(position: string, maxPosition = "3"): RiskContext {
	return {
		position: d(position),
		maxPosition: d(maxPosition),
		tickSize: d("0.01"),
		lotSize: d("0.001"),
	};
}

describe("RiskGuard.standard", () => {
	const guard = RiskGuard.standard();

	it("runs validity before the position limit", () => {
		expect(guard.guardNames()).toEqual(["IntentValidity", "PositionLimit"]);
	});

	it("clips a buy of 5 to 2 with max 3 and position +1", () => {
		const verdict = guard.evaluate(intent(OrderSide.Bid, "5"), ctx("1"));
		expect(verdict.type).toBe("clip");
		if (verdict.type === "clip") {
			expect(verdict.intent.size.toString()).toBe("2");
			expect(verdict.requestedSize.toString()).toBe("5");
			expect(verdict.guard).toBe("PositionLimit");
		}
	});

	it("accepts an intent that lands exactly on the limit", () => {
		const verdict = guard.evaluate(intent(OrderSide.Bid, "2"), ctx("1"));
		expect(verdict.type).toBe("accept");
	});

	it("rejects with PositionLimitExceeded when there is no headroom", () => {
		const verdict = guard.evaluate(intent(OrderSide.Bid, "1"), ctx("3"));
		expect(verdict.type).toBe("reject");
		if (verdict.type === "reject") {
			expect(verdict.error).toBeInstanceOf(PositionLimitExceededError);
			expect(verdict.error.context["headroom"]).toBe("0");
		}
	});

	it("gives sells headroom of max + position", () => {
		const verdict = guard.evaluate(intent(OrderSide.Ask, "5"), ctx("1"));
		expect(verdict.type === "clip" && verdict.intent.size.toString()).toBe("4");
		const short = guard.evaluate(intent(OrderSide.Ask, "1"), ctx("-3"));
		expect(short.type).toBe("reject");
	});

	it("lets a risk-reducing intent through when already beyond the limit", () => {
		const verdict = guard.evaluate(intent(OrderSide.Ask, "1"), ctx("5"));
		expect(verdict.type).toBe("accept");
	});

	it("rejects a clip that rounds to zero lots", () => {
		const verdict = guard.evaluate(intent(OrderSide.Bid, "1"), ctx("2.9995"));
		expect(verdict.type === "reject" && verdict.error).toBeInstanceOf(PositionLimitExceededError);
	});

	it("quantizes prices away from the market and sizes down", () => {
		const bid = guard.evaluate(intent(OrderSide.Bid, "0.0019", "99.999"), ctx("0"));
		const ask = guard.evaluate(intent(OrderSide.Ask, "1", "100.001"), ctx("0"));
		expect(bid.type === "accept" && bid.intent.price?.toString()).toBe("99.99");
		expect(bid.type === "accept" && bid.intent.size.toString()).toBe("0.001");
		expect(ask.type === "accept" && ask.intent.price?.toString()).toBe("100.01");
	});

	it.each([
		["zero size", intent(OrderSide.Bid, "0")],
		["size below one lot", intent(OrderSide.Bid, "0.0009")],
		["price below one tick", intent(OrderSide.Bid, "1", "0.009")],
		["negative price", intent(OrderSide.Ask, "1", "-5")],
	])("rejects %s as InvalidOrderIntent", (_label, candidate) => {
		const verdict = guard.evaluate(candidate, ctx("0"));
		expect(verdict.type).toBe("reject");
		if (verdict.type === "reject") {
			expect(verdict.guard).toBe("IntentValidity");
			expect(verdict.error).toBeInstanceOf(InvalidOrderIntentError);
		}
	});

	it("accepts market intents without a price", () => {
		const verdict = guard.evaluate(intent(OrderSide.Ask, "1", null), ctx("1"));
		expect(verdict.type).toBe("accept");
		if (verdict.type === "accept") {
			expect(verdict.intent.price).toBeNull();
		}
	});
});

describe("RiskGuard.create", () => {
	it("accepts everything when empty", () => {
		const verdict = RiskGuard.create().evaluate(intent(OrderSide.Bid, "100"), ctx("3"));
		expect(verdict.type).toBe("accept");
	});
});
