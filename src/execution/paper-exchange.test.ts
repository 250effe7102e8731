import { describe, expect, it } from "vitest";
import { OrderKind, type OrderEvent, OrderState } from "../order/types.js";
import { Decimal } from "../shared/decimal.js";
import {
	AlreadyFilledError,
	OrderNotFoundError,
	OrderRejectedError,
	RateLimitError,
	TimeoutError,
} from "../shared/errors.js";
import { intentId, venueOrderId } from "../shared/identifiers.js";
import { isErr, isOk, unwrap } from "../shared/result.js";
import { OrderSide } from "../shared/side.js";
import { PaperExchange } from "./paper-exchange.js";
import type { PlaceOrderRequest } from "./types.js";

const d = Decimal.from;

function limit(side: OrderSide, price: string, size = "1", id = "c-1"): PlaceOrderRequest {
	return { side, kind: OrderKind.Limit, price: d(price), size: d(size), clientIntentId: intentId(id) };
}

async function take(stream: AsyncIterator<OrderEvent>, count: number): Promise<OrderEvent[]> {
	const events: OrderEvent[] = [];
	for (let i = 0; i < count; i++) {
		const next = await stream.next();
		if (next.done) break;
		events.push(next.value);
	}
	return events;
}

describe("PaperExchange", () => {
	it("rests a limit order and publishes an open event", async () => {
		const venue = new PaperExchange();
		const stream = venue.streamOrderEvents()[Symbol.asyncIterator]();
		const id = unwrap(await venue.placeOrder(limit(OrderSide.Bid, "99")));

		const [opened] = await take(stream, 1);
		expect(id).toBe("paper-1");
		expect(opened?.newState).toBe(OrderState.Open);
		expect(opened?.clientIntentId).toBe("c-1");
		expect(opened?.sequence).toBe(1);
		expect(venue.openOrderCount()).toBe(1);
		venue.close();
	});

	it("fills resting orders the market crosses", async () => {
		const venue = new PaperExchange();
		await venue.placeOrder(limit(OrderSide.Bid, "99", "1", "c-1"));
		await venue.placeOrder(limit(OrderSide.Bid, "98", "1", "c-2"));
		await venue.placeOrder(limit(OrderSide.Ask, "101", "1", "c-3"));

		expect(venue.cross(d("98.5"))).toBe(1);
		expect(venue.position().toString()).toBe("1");

		const stream = venue.streamOrderEvents()[Symbol.asyncIterator]();
		const events = await take(stream, 4);
		const fill = events[3];
		expect(fill?.newState).toBe(OrderState.Filled);
		expect(fill?.cumulativeFilledSize.toString()).toBe("1");
		expect(fill?.fillPrice?.toString()).toBe("99");
		venue.close();
	});

	it("fills market orders at the last price", async () => {
		const venue = new PaperExchange({ lastPrice: d("100") });
		const request: PlaceOrderRequest = {
			side: OrderSide.Ask,
			kind: OrderKind.Market,
			price: null,
			size: d("2"),
			clientIntentId: intentId("c-1"),
		};
		expect(isOk(await venue.placeOrder(request))).toBe(true);
		expect(venue.position().toString()).toBe("-2");

		const snapshot = unwrap(await venue.getAccountSnapshot());
		expect(snapshot.entryPrice?.toString()).toBe("100");
		expect(snapshot.openOrders).toHaveLength(0);
	});

	it("rejects market orders without a price and invalid sizes", async () => {
		const venue = new PaperExchange();
		const market = await venue.placeOrder({
			...limit(OrderSide.Bid, "1"),
			kind: OrderKind.Market,
			price: null,
		});
		expect(isErr(market) && market.error).toBeInstanceOf(OrderRejectedError);
		const empty = await venue.placeOrder(limit(OrderSide.Bid, "99", "0"));
		expect(isErr(empty) && empty.error).toBeInstanceOf(OrderRejectedError);
	});

	it("cancels a resting order and reports races", async () => {
		const venue = new PaperExchange();
		const a = unwrap(await venue.placeOrder(limit(OrderSide.Bid, "99", "1", "c-1")));
		const b = unwrap(await venue.placeOrder(limit(OrderSide.Bid, "98", "1", "c-2")));
		venue.cross(d("99"));

		expect(isOk(await venue.cancelOrder(b))).toBe(true);
		expect(isOk(await venue.cancelOrder(b))).toBe(true);

		const late = await venue.cancelOrder(a);
		expect(isErr(late) && late.error).toBeInstanceOf(AlreadyFilledError);

		const unknown = await venue.cancelOrder(venueOrderId("nope"));
		expect(isErr(unknown) && unknown.error).toBeInstanceOf(OrderNotFoundError);
	});

	it("answers status queries by venue id or client intent id", async () => {
		const venue = new PaperExchange();
		const id = unwrap(await venue.placeOrder(limit(OrderSide.Ask, "101", "2", "c-9")));
		venue.fillPartially(id, d("0.5"));

		const byVenue = unwrap(await venue.queryOrder({ venueOrderId: id }));
		expect(byVenue?.newState).toBe(OrderState.PartiallyFilled);
		expect(byVenue?.cumulativeFilledSize.toString()).toBe("0.5");

		const byClient = unwrap(await venue.queryOrder({ clientIntentId: intentId("c-9") }));
		expect(byClient?.venueOrderId).toBe(id);

		const missing = unwrap(await venue.queryOrder({ clientIntentId: intentId("c-0") }));
		expect(missing).toBeNull();
	});

	it("lists resting orders in the account snapshot", async () => {
		const venue = new PaperExchange();
		await venue.placeOrder(limit(OrderSide.Bid, "99"));
		const external = venue.addExternalOrder(OrderSide.Ask, d("105"), d("3"));

		const snapshot = unwrap(await venue.getAccountSnapshot());
		expect(snapshot.openOrders.map((o) => o.venueOrderId)).toEqual(["paper-1", external]);
		expect(snapshot.openOrders[1]?.clientIntentId).toBeUndefined();
		expect(snapshot.position.isZero()).toBe(true);
	});

	describe("faults", () => {
		it("returns a queued error once", async () => {
			const venue = new PaperExchange();
			venue.failNext("place", { error: new RateLimitError("slow down", 10) });

			const first = await venue.placeOrder(limit(OrderSide.Bid, "99"));
			const second = await venue.placeOrder(limit(OrderSide.Bid, "99"));
			expect(isErr(first) && first.error).toBeInstanceOf(RateLimitError);
			expect(isOk(second)).toBe(true);
			expect(venue.callCount("place")).toBe(2);
			expect(venue.openOrderCount()).toBe(1);
		});

		it("can lose the response after the venue acted", async () => {
			const venue = new PaperExchange();
			venue.failNext("place", { applied: true });

			const result = await venue.placeOrder(limit(OrderSide.Bid, "99", "1", "c-5"));
			expect(isErr(result) && result.error).toBeInstanceOf(TimeoutError);
			const found = unwrap(await venue.queryOrder({ clientIntentId: intentId("c-5") }));
			expect(found?.newState).toBe(OrderState.Open);
		});

		it("hangs until the call is aborted", async () => {
			const venue = new PaperExchange();
			venue.failNext("snapshot", { hang: true });
			const controller = new AbortController();

			const pending = venue.getAccountSnapshot(controller.signal);
			controller.abort();
			const result = await pending;
			expect(isErr(result) && result.error).toBeInstanceOf(TimeoutError);
		});
	});

	describe("manual delivery", () => {
		it("holds events until delivered, in any order", async () => {
			const venue = new PaperExchange({ autoDeliver: false });
			const id = unwrap(await venue.placeOrder(limit(OrderSide.Bid, "99", "2")));
			venue.fillPartially(id, d("1"));
			venue.fillPartially(id, d("1"));

			const held = venue.pendingEvents();
			expect(held.map((e) => e.cumulativeFilledSize.toString())).toEqual(["0", "1", "2"]);

			venue.deliver([held[2], held[1], held[1]].filter((e): e is OrderEvent => e !== undefined));
			expect(venue.pendingEvents()).toHaveLength(0);

			const stream = venue.streamOrderEvents()[Symbol.asyncIterator]();
			const delivered = await take(stream, 3);
			expect(delivered.map((e) => e.sequence)).toEqual([3, 2, 2]);
			venue.close();
		});
	});

	it("ends the stream when aborted", async () => {
		const venue = new PaperExchange();
		const controller = new AbortController();
		const stream = venue.streamOrderEvents(controller.signal)[Symbol.asyncIterator]();
		const next = stream.next();
		controller.abort();
		expect((await next).done).toBe(true);
	});
});
