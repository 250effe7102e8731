/**
 * PaperExchange — an in-process venue implementing ExchangeAdapter.
 *
 * Limit orders rest until `cross(price)` trades through them; market orders
 * fill at the last price. Every state change is published as an OrderEvent
 * with a venue sequence number.
 *
 * With `autoDeliver: false` events collect in an outbox instead of reaching
 * the stream, so tests can deliver them late, out of order or twice. Faults
 * can be queued per operation, including responses lost after the venue
 * already acted.
 */

import { type OrderEvent, OrderKind, OrderState, type VenueOrderState } from "../order/types.js";
import { PositionBook } from "../position/position-book.js";
import { Decimal } from "../shared/decimal.js";
import {
	AlreadyFilledError,
	OrderNotFoundError,
	OrderRejectedError,
	TimeoutError,
	type TradingError,
} from "../shared/errors.js";
import { type IntentId, type VenueOrderId, venueOrderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { OrderSide } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type {
	AccountSnapshot,
	ExchangeAdapter,
	OrderLookup,
	PlaceOrderRequest,
	SnapshotOrder,
} from "./types.js";

export type PaperOperation = "place" | "cancel" | "query" | "snapshot";

export interface FaultSpec {
	/** Returned instead of the real response. */
	readonly error?: TradingError;
	/** The call never answers until its signal aborts, then yields a TimeoutError. */
	readonly hang?: boolean;
	/** The venue performs the operation before the fault hits (the response is lost). */
	readonly applied?: boolean;
}

export interface PaperExchangeConfig {
	readonly clock?: Clock;
	readonly lastPrice?: Decimal;
	/** Publish events to the stream as they happen. Default: true */
	readonly autoDeliver?: boolean;
	readonly venueIdPrefix?: string;
}

interface PaperOrder {
	readonly venueOrderId: VenueOrderId;
	readonly clientIntentId: IntentId | undefined;
	readonly side: OrderSide;
	readonly kind: OrderKind;
	readonly price: Decimal | null;
	readonly size: Decimal;
	filled: Decimal;
	state: VenueOrderState;
}

const RESTING: ReadonlySet<VenueOrderState> = new Set([
	OrderState.Open,
	OrderState.PartiallyFilled,
]);

export class PaperExchange implements ExchangeAdapter {
	private readonly clock: Clock;
	private readonly autoDeliver: boolean;
	private readonly venueIdPrefix: string;
	private readonly orders: Map<VenueOrderId, PaperOrder>;
	private readonly faults: Map<PaperOperation, FaultSpec[]>;
	private readonly calls: Map<PaperOperation, number>;
	private book: PositionBook;
	private lastPrice: Decimal | null;
	private counter: number;
	private sequence: number;
	private outbox: OrderEvent[];
	private readonly stream: OrderEvent[];
	private wake: (() => void) | null;
	private closed: boolean;

	constructor(config: PaperExchangeConfig = {}) {
		this.clock = config.clock ?? SystemClock;
		this.autoDeliver = config.autoDeliver ?? true;
		this.venueIdPrefix = config.venueIdPrefix ?? "paper";
		this.orders = new Map();
		this.faults = new Map();
		this.calls = new Map();
		this.book = PositionBook.flat();
		this.lastPrice = config.lastPrice ?? null;
		this.counter = 0;
		this.sequence = 0;
		this.outbox = [];
		this.stream = [];
		this.wake = null;
		this.closed = false;
	}

	// ── ExchangeAdapter ─────────────────────────────────────────────

	async placeOrder(
		request: PlaceOrderRequest,
		signal?: AbortSignal,
	): Promise<Result<VenueOrderId, TradingError>> {
		this.count("place");
		const fault = this.takeFault("place");
		if (fault && !fault.applied) return this.faultResult(fault, signal);

		const placed = this.accept(request);
		if (fault) return this.faultResult(fault, signal);
		return placed;
	}

	async cancelOrder(venueId: VenueOrderId, signal?: AbortSignal): Promise<Result<void, TradingError>> {
		this.count("cancel");
		const fault = this.takeFault("cancel");
		if (fault && !fault.applied) return this.faultResult(fault, signal);

		const result = this.cancelNow(venueId);
		if (fault) return this.faultResult(fault, signal);
		return result;
	}

	async queryOrder(
		lookup: OrderLookup,
		signal?: AbortSignal,
	): Promise<Result<OrderEvent | null, TradingError>> {
		this.count("query");
		const fault = this.takeFault("query");
		if (fault) return this.faultResult(fault, signal);

		const order = this.find(lookup);
		return ok(order ? this.toEvent(order, null) : null);
	}

	async getAccountSnapshot(signal?: AbortSignal): Promise<Result<AccountSnapshot, TradingError>> {
		this.count("snapshot");
		const fault = this.takeFault("snapshot");
		if (fault) return this.faultResult(fault, signal);
		return ok(this.snapshot());
	}

	async *streamOrderEvents(signal?: AbortSignal): AsyncGenerator<OrderEvent> {
		while (!this.closed && !signal?.aborted) {
			const next = this.stream.shift();
			if (next !== undefined) {
				yield next;
				continue;
			}
			await new Promise<void>((resolve) => {
				this.wake = resolve;
				signal?.addEventListener("abort", () => resolve(), { once: true });
			});
			this.wake = null;
		}
	}

	// ── Market simulation ───────────────────────────────────────────

	/**
	 * Trades the market to `price`: resting bids at or above it and asks at or
	 * below it fill completely at their own price.
	 * @returns number of orders filled
	 */
	cross(price: Decimal): number {
		this.lastPrice = price;
		let filled = 0;
		for (const order of this.orders.values()) {
			if (!RESTING.has(order.state) || order.price === null) continue;
			const hit = order.side === OrderSide.Bid ? order.price.gte(price) : order.price.lte(price);
			if (!hit) continue;
			this.fill(order, order.size.sub(order.filled), order.price);
			filled++;
		}
		return filled;
	}

	/** Fills `size` more of a resting order at its limit price. */
	fillPartially(venueId: VenueOrderId, size: Decimal): void {
		const order = this.orders.get(venueId);
		if (!order || !RESTING.has(order.state) || order.price === null) {
			throw new Error(`order ${venueId} is not resting`);
		}
		this.fill(order, Decimal.min(size, order.size.sub(order.filled)), order.price);
	}

	setLastPrice(price: Decimal): void {
		this.lastPrice = price;
	}

	/** Overrides the venue position, e.g. to simulate fills the stream never reported. */
	setPosition(size: Decimal, entry: Decimal | null): void {
		this.book = PositionBook.of(size, entry);
	}

	/** Rests an order placed outside this agent (another session, the web UI). */
	addExternalOrder(side: OrderSide, price: Decimal, size: Decimal): VenueOrderId {
		const order = this.createOrder({ side, kind: OrderKind.Limit, price, size }, undefined);
		this.publish(order, null);
		return order.venueOrderId;
	}

	// ── Test controls ───────────────────────────────────────────────

	/** Queues a fault for the next call of `operation`. */
	failNext(operation: PaperOperation, fault: FaultSpec): void {
		const queue = this.faults.get(operation) ?? [];
		queue.push(fault);
		this.faults.set(operation, queue);
	}

	callCount(operation: PaperOperation): number {
		return this.calls.get(operation) ?? 0;
	}

	/** Events held back while `autoDeliver` is off. */
	pendingEvents(): readonly OrderEvent[] {
		return [...this.outbox];
	}

	/** Pushes `events` (default: the whole outbox, in order) to the stream and clears the outbox. */
	deliver(events?: readonly OrderEvent[]): void {
		const batch = events ?? this.outbox;
		this.outbox = [];
		for (const event of batch) this.push(event);
	}

	/** Pushes an arbitrary event to the stream, bypassing the outbox. */
	inject(event: OrderEvent): void {
		this.push(event);
	}

	openOrderCount(): number {
		let count = 0;
		for (const order of this.orders.values()) {
			if (RESTING.has(order.state)) count++;
		}
		return count;
	}

	position(): Decimal {
		return this.book.size;
	}

	/** Ends every active stream. */
	close(): void {
		this.closed = true;
		this.wake?.();
	}

	// ── Internals ───────────────────────────────────────────────────

	private accept(request: PlaceOrderRequest): Result<VenueOrderId, TradingError> {
		if (!request.size.isPositive()) {
			return err(new OrderRejectedError("size must be positive", { size: request.size.toString() }));
		}
		if (request.kind === OrderKind.Limit && (request.price === null || !request.price.isPositive())) {
			return err(new OrderRejectedError("limit order needs a positive price"));
		}
		const marketPrice = this.lastPrice;
		if (request.kind === OrderKind.Market && marketPrice === null) {
			return err(new OrderRejectedError("no market price to fill against"));
		}

		const order = this.createOrder(request, request.clientIntentId);
		if (request.kind === OrderKind.Market && marketPrice !== null) {
			this.fill(order, order.size, marketPrice);
		} else {
			this.publish(order, null);
		}
		return ok(order.venueOrderId);
	}

	private createOrder(
		request: Pick<PlaceOrderRequest, "side" | "kind" | "price" | "size">,
		clientIntentId: IntentId | undefined,
	): PaperOrder {
		this.counter++;
		const order: PaperOrder = {
			venueOrderId: venueOrderId(`${this.venueIdPrefix}-${this.counter}`),
			clientIntentId,
			side: request.side,
			kind: request.kind,
			price: request.price,
			size: request.size,
			filled: Decimal.zero(),
			state: OrderState.Open,
		};
		this.orders.set(order.venueOrderId, order);
		return order;
	}

	private cancelNow(venueId: VenueOrderId): Result<void, TradingError> {
		const order = this.orders.get(venueId);
		if (!order) {
			return err(new OrderNotFoundError("unknown order", { venueOrderId: venueId }));
		}
		if (order.state === OrderState.Filled) {
			return err(new AlreadyFilledError("order already filled", { venueOrderId: venueId }));
		}
		if (order.state === OrderState.Cancelled) return ok(undefined);
		if (!RESTING.has(order.state)) {
			return err(new OrderNotFoundError("order is not working", { venueOrderId: venueId }));
		}
		order.state = OrderState.Cancelled;
		this.publish(order, null);
		return ok(undefined);
	}

	private fill(order: PaperOrder, size: Decimal, price: Decimal): void {
		if (!size.isPositive()) return;
		order.filled = order.filled.add(size);
		order.state = order.filled.gte(order.size) ? OrderState.Filled : OrderState.PartiallyFilled;
		this.book = this.book.applyFill(order.side, size, price).book;
		this.publish(order, price);
	}

	private publish(order: PaperOrder, fillPrice: Decimal | null): void {
		this.sequence++;
		const event = { ...this.toEvent(order, fillPrice), sequence: this.sequence };
		if (this.autoDeliver) {
			this.push(event);
		} else {
			this.outbox.push(event);
		}
	}

	private push(event: OrderEvent): void {
		this.stream.push(event);
		this.wake?.();
	}

	private toEvent(order: PaperOrder, fillPrice: Decimal | null): OrderEvent {
		return {
			venueOrderId: order.venueOrderId,
			clientIntentId: order.clientIntentId,
			newState: order.state,
			cumulativeFilledSize: order.filled,
			fillPrice,
			timestampMs: this.clock.now(),
		};
	}

	private find(lookup: OrderLookup): PaperOrder | null {
		if ("venueOrderId" in lookup) return this.orders.get(lookup.venueOrderId) ?? null;
		for (const order of this.orders.values()) {
			if (order.clientIntentId === lookup.clientIntentId) return order;
		}
		return null;
	}

	private snapshot(): AccountSnapshot {
		const openOrders: SnapshotOrder[] = [];
		for (const order of this.orders.values()) {
			if (!RESTING.has(order.state) || order.price === null) continue;
			openOrders.push({
				venueOrderId: order.venueOrderId,
				clientIntentId: order.clientIntentId,
				side: order.side,
				price: order.price,
				size: order.size,
				filledSize: order.filled,
			});
		}
		return {
			position: this.book.size,
			entryPrice: this.book.avgEntry ?? undefined,
			markPrice: this.lastPrice ?? undefined,
			openOrders,
		};
	}

	private count(operation: PaperOperation): void {
		this.calls.set(operation, this.callCount(operation) + 1);
	}

	private takeFault(operation: PaperOperation): FaultSpec | undefined {
		return this.faults.get(operation)?.shift();
	}

	private async faultResult<T>(
		fault: FaultSpec,
		signal: AbortSignal | undefined,
	): Promise<Result<T, TradingError>> {
		if (fault.hang) {
			await new Promise<void>((resolve) => {
				if (signal?.aborted) {
					resolve();
					return;
				}
				signal?.addEventListener("abort", () => resolve(), { once: true });
			});
			return err(new TimeoutError("paper venue did not answer"));
		}
		return err(fault.error ?? new TimeoutError("paper venue response lost"));
	}
}
