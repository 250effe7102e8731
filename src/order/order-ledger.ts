/**
 * OrderLedger — the authoritative in-process record of this agent's orders.
 *
 * Owns every Order and the PositionBook derived from their fills. Nothing else
 * mutates either; the reconciliation engine is the only caller and it runs one
 * mutation at a time, so the ledger itself is synchronous and lock-free.
 *
 * Venue events are matched by venue order id, falling back to the client
 * intent id for events that race the placement acknowledgement. Events that
 * match nothing are parked in a bounded orphan buffer and replayed when the
 * acknowledgement arrives.
 */

import { PositionBook } from "../position/position-book.js";
import { Decimal } from "../shared/decimal.js";
import { type IntentId, type VenueOrderId, intentId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { OrderSide } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { canTransitionTo, isLive, isTerminal, progressOf } from "./order-state-machine.js";
import {
	type Order,
	type OrderEvent,
	OrderKind,
	type OrderIntent,
	OrderPurpose,
	OrderState,
	type VenueOrderState,
} from "./types.js";

const DEFAULT_ORPHAN_CAPACITY = 256;

// ── Outcomes ────────────────────────────────────────────────────────

/** The position effect of one newly applied fill delta. */
export interface FillDelta {
	readonly size: Decimal;
	readonly price: Decimal;
	readonly positionBefore: Decimal;
	/** Average entry before the fill; null when flat. */
	readonly entryBefore: Decimal | null;
	readonly positionAfter: Decimal;
	readonly realizedPnl: Decimal;
	readonly closedSize: Decimal;
}

export type ApplyOutcome =
	| {
			readonly type: "applied";
			readonly order: Order;
			readonly previousState: OrderState;
			readonly fill: FillDelta | null;
			/** Cumulative size above the order size was capped to it. */
			readonly clamped: boolean;
	  }
	| { readonly type: "duplicate"; readonly order: Order }
	| { readonly type: "stale"; readonly order: Order; readonly reason: string }
	| { readonly type: "anomaly"; readonly order: Order; readonly reason: string }
	| { readonly type: "orphaned"; readonly event: OrderEvent }
	| { readonly type: "invalid_transition"; readonly order: Order; readonly reason: string };

/** A venue order the ledger did not place, as found in an account snapshot. */
export interface ExternalOrder {
	readonly venueOrderId: VenueOrderId;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly size: Decimal;
	readonly filledSize: Decimal;
}

export interface LedgerOptions {
	/** Prefix of generated intent ids; distinguishes runs of the same account. */
	readonly runTag: string;
	readonly clock?: Clock;
	readonly orphanCapacity?: number;
	readonly position?: PositionBook;
}

export class OrderLedger {
	private readonly orders: Map<IntentId, Order>;
	private readonly byVenueId: Map<VenueOrderId, IntentId>;
	private readonly terminalAtMs: Map<IntentId, number>;
	private orphans: OrderEvent[];
	private book: PositionBook;
	private counter: number;
	private readonly runTag: string;
	private readonly clock: Clock;
	private readonly orphanCapacity: number;

	private constructor(options: LedgerOptions) {
		this.orders = new Map();
		this.byVenueId = new Map();
		this.terminalAtMs = new Map();
		this.orphans = [];
		this.book = options.position ?? PositionBook.flat();
		this.counter = 0;
		this.runTag = options.runTag;
		this.clock = options.clock ?? SystemClock;
		this.orphanCapacity = options.orphanCapacity ?? DEFAULT_ORPHAN_CAPACITY;
	}

	static create(options: LedgerOptions): OrderLedger {
		return new OrderLedger(options);
	}

	// ── Local intents ───────────────────────────────────────────────

	/** Records an accepted intent as an `Intended` order with a fresh intent id. */
	record(intent: OrderIntent): Order {
		this.counter++;
		const now = this.clock.now();
		const order: Order = {
			intentId: intentId(`${this.runTag}-${this.counter}`),
			venueOrderId: null,
			side: intent.side,
			kind: intent.kind,
			price: intent.price,
			size: intent.size,
			filledSize: Decimal.zero(),
			avgFillPrice: null,
			state: OrderState.Intended,
			purpose: intent.purpose,
			levelRef: intent.levelRef,
			followedUpSize: Decimal.zero(),
			cancelRequested: false,
			lastSequence: null,
			createdAtMs: now,
			updatedAtMs: now,
			reason: null,
		};
		this.orders.set(order.intentId, order);
		return order;
	}

	markSubmitted(id: IntentId): Result<Order, string> {
		return this.transition(id, OrderState.Submitted, null);
	}

	markRejected(id: IntentId, reason: string): Result<Order, string> {
		return this.transition(id, OrderState.Rejected, reason);
	}

	/** Ack deadline passed or retries ran out; a status query may still resurrect the order. */
	markFailed(id: IntentId, reason: string): Result<Order, string> {
		return this.transition(id, OrderState.Failed, reason);
	}

	/** Drops an intent that never left the process (e.g. the agent paused meanwhile). */
	discard(id: IntentId, reason: string): Result<Order, string> {
		const order = this.orders.get(id);
		if (!order) return err(`Unknown intent ${id}`);
		if (order.state !== OrderState.Intended) {
			return err(`Intent ${id} already left the process (${order.state})`);
		}
		return this.transition(id, OrderState.Cancelled, reason);
	}

	/**
	 * Binds the venue order id and moves the order to `Open`, then replays any
	 * events that arrived before the acknowledgement.
	 */
	acknowledge(id: IntentId, venueId: VenueOrderId): Result<readonly ApplyOutcome[], string> {
		const order = this.orders.get(id);
		if (!order) return err(`Unknown intent ${id}`);

		this.bindVenueId(order, venueId);
		const bound = this.require(id);
		if (bound.state === OrderState.Submitted || bound.state === OrderState.Failed) {
			this.put({ ...bound, state: OrderState.Open, reason: null, updatedAtMs: this.clock.now() });
		}

		const outcomes: ApplyOutcome[] = [];
		for (const event of this.takeOrphans(id, venueId)) {
			outcomes.push(this.applyEvent(event));
		}
		return ok(outcomes);
	}

	/** Fire-and-forget cancel: state is unchanged until the venue confirms. */
	markCancelRequested(id: IntentId): Result<Order, string> {
		const order = this.orders.get(id);
		if (!order) return err(`Unknown intent ${id}`);
		const updated = { ...order, cancelRequested: true, updatedAtMs: this.clock.now() };
		this.put(updated);
		return ok(updated);
	}

	/** The cancel did not reach the venue; the order is working again as far as the diff is concerned. */
	clearCancelRequested(id: IntentId): Result<Order, string> {
		const order = this.orders.get(id);
		if (!order) return err(`Unknown intent ${id}`);
		const updated = { ...order, cancelRequested: false, updatedAtMs: this.clock.now() };
		this.put(updated);
		return ok(updated);
	}

	/** Records that `size` more of the order's fills have been answered by a follow-up. */
	markFollowedUp(id: IntentId, size: Decimal): Result<Order, string> {
		const order = this.orders.get(id);
		if (!order) return err(`Unknown intent ${id}`);
		const followed = Decimal.min(order.followedUpSize.add(size), order.filledSize);
		const updated = { ...order, followedUpSize: followed };
		this.put(updated);
		return ok(updated);
	}

	/**
	 * Adopts an open order found on the venue that this ledger never placed.
	 * Its existing fills are already part of the venue position, so they are
	 * recorded on the order without touching the book.
	 */
	adoptExternal(external: ExternalOrder): Order {
		const existing = this.byVenueId.get(external.venueOrderId);
		if (existing !== undefined) return this.require(existing);

		const order = this.record({
			side: external.side,
			kind: OrderKind.Limit,
			price: external.price,
			size: external.size,
			purpose: OrderPurpose.External,
			levelRef: null,
		});
		const filled = Decimal.min(external.filledSize, external.size);
		this.put({
			...order,
			venueOrderId: external.venueOrderId,
			filledSize: filled,
			followedUpSize: filled,
			avgFillPrice: filled.isPositive() ? external.price : null,
			state: filled.isPositive() ? OrderState.PartiallyFilled : OrderState.Open,
		});
		this.byVenueId.set(external.venueOrderId, order.intentId);
		return this.require(order.intentId);
	}

	// ── Venue events ────────────────────────────────────────────────

	/**
	 * Applies one venue event.
	 *
	 * - cumulative size below the recorded fill is an anomaly and is ignored
	 * - the same cumulative size at the same or an earlier state is a duplicate
	 * - an older venue sequence that adds no fill is stale
	 * - a fill always counts, even against an order already cancelled
	 */
	applyEvent(event: OrderEvent): ApplyOutcome {
		const order = this.match(event);
		if (!order) {
			this.parkOrphan(event);
			return { type: "orphaned", event };
		}

		if (event.cumulativeFilledSize.lt(order.filledSize)) {
			return {
				type: "anomaly",
				order,
				reason: `cumulative fill ${event.cumulativeFilledSize.toString()} below recorded ${order.filledSize.toString()}`,
			};
		}

		const clamped = event.cumulativeFilledSize.gt(order.size);
		const cumulative = clamped ? order.size : event.cumulativeFilledSize;
		const delta = cumulative.sub(order.filledSize);
		const hasFill = delta.isPositive();

		if (
			!hasFill &&
			event.sequence !== undefined &&
			order.lastSequence !== null &&
			event.sequence <= order.lastSequence
		) {
			return {
				type: "stale",
				order,
				reason: `sequence ${event.sequence} not after ${order.lastSequence}`,
			};
		}

		const target = targetState(event.newState, cumulative, order.size);
		if (!hasFill && (target === order.state || progressOf(target) < progressOf(order.state))) {
			return { type: "duplicate", order };
		}

		let nextState: OrderState;
		if (target === order.state || canTransitionTo(order.state, target)) {
			nextState = target;
		} else if (hasFill) {
			// fills are facts: count them and keep a state we cannot leave
			nextState = order.state;
		} else {
			return {
				type: "invalid_transition",
				order,
				reason: `Invalid transition: ${order.state} → ${target}`,
			};
		}

		let fill: FillDelta | null = null;
		let avgFillPrice = order.avgFillPrice;
		if (hasFill) {
			const price = event.fillPrice ?? order.price ?? order.avgFillPrice ?? this.book.avgEntry;
			if (price === null) {
				return { type: "anomaly", order, reason: "fill without a price to value it" };
			}
			const before = this.book;
			const outcome = before.applyFill(order.side, delta, price);
			this.book = outcome.book;
			fill = {
				size: delta,
				price,
				positionBefore: before.size,
				entryBefore: before.avgEntry,
				positionAfter: outcome.book.size,
				realizedPnl: outcome.realizedPnl,
				closedSize: outcome.closedSize,
			};
			avgFillPrice =
				order.avgFillPrice === null
					? price
					: order.avgFillPrice.mul(order.filledSize).add(price.mul(delta)).div(cumulative);
		}

		const lastSequence =
			event.sequence === undefined
				? order.lastSequence
				: Math.max(event.sequence, order.lastSequence ?? event.sequence);

		const updated: Order = {
			...order,
			filledSize: cumulative,
			avgFillPrice,
			state: nextState,
			lastSequence,
			reason: nextState === OrderState.Failed ? order.reason : null,
			updatedAtMs: this.clock.now(),
		};
		this.put(updated);

		return { type: "applied", order: updated, previousState: order.state, fill, clamped };
	}

	// ── Position ────────────────────────────────────────────────────

	position(): PositionBook {
		return this.book;
	}

	/** Replaces the position with venue truth. Realized P&L is kept. */
	overwritePosition(size: Decimal, avgEntry: Decimal | null): PositionBook {
		this.book = this.book.overwrite(size, avgEntry);
		return this.book;
	}

	// ── Queries ─────────────────────────────────────────────────────

	get(id: IntentId): Order | null {
		return this.orders.get(id) ?? null;
	}

	getByVenueId(venueId: VenueOrderId): Order | null {
		const id = this.byVenueId.get(venueId);
		return id === undefined ? null : (this.orders.get(id) ?? null);
	}

	all(): readonly Order[] {
		return [...this.orders.values()];
	}

	/** Intended, Submitted, Open and PartiallyFilled orders, oldest first. */
	liveOrders(): readonly Order[] {
		return this.all().filter((o) => isLive(o.state));
	}

	activeCount(): number {
		let count = 0;
		for (const order of this.orders.values()) {
			if (isLive(order.state)) count++;
		}
		return count;
	}

	orphanCount(): number {
		return this.orphans.length;
	}

	/**
	 * Removes terminal orders older than `ttlMs`. Orders whose fills still
	 * await a follow-up are kept.
	 * @returns number of orders removed
	 */
	cleanup(ttlMs: number): number {
		const now = this.clock.now();
		let cleaned = 0;

		for (const [id, terminalAt] of this.terminalAtMs.entries()) {
			if (now - terminalAt < ttlMs) continue;
			const order = this.orders.get(id);
			if (order && order.followedUpSize.lt(order.filledSize)) continue;

			this.orders.delete(id);
			this.terminalAtMs.delete(id);
			if (order?.venueOrderId) this.byVenueId.delete(order.venueOrderId);
			cleaned++;
		}
		return cleaned;
	}

	// ── Internals ───────────────────────────────────────────────────

	private transition(id: IntentId, to: OrderState, reason: string | null): Result<Order, string> {
		const order = this.orders.get(id);
		if (!order) return err(`Unknown intent ${id}`);
		if (!canTransitionTo(order.state, to)) {
			return err(`Invalid transition: ${order.state} → ${to}`);
		}
		const updated = { ...order, state: to, reason, updatedAtMs: this.clock.now() };
		this.put(updated);
		return ok(updated);
	}

	private put(order: Order): void {
		this.orders.set(order.intentId, order);
		if (isTerminal(order.state)) {
			if (!this.terminalAtMs.has(order.intentId)) {
				this.terminalAtMs.set(order.intentId, order.updatedAtMs);
			}
		} else {
			this.terminalAtMs.delete(order.intentId);
		}
	}

	private require(id: IntentId): Order {
		const order = this.orders.get(id);
		if (!order) throw new Error(`Order ${id} vanished from the ledger`);
		return order;
	}

	private bindVenueId(order: Order, venueId: VenueOrderId): void {
		if (order.venueOrderId !== null && order.venueOrderId !== venueId) {
			this.byVenueId.delete(order.venueOrderId);
		}
		this.byVenueId.set(venueId, order.intentId);
		if (order.venueOrderId !== venueId) {
			this.put({ ...order, venueOrderId: venueId });
		}
	}

	private match(event: OrderEvent): Order | null {
		const byVenue = this.byVenueId.get(event.venueOrderId);
		if (byVenue !== undefined) return this.orders.get(byVenue) ?? null;

		if (event.clientIntentId === undefined) return null;
		const order = this.orders.get(event.clientIntentId);
		if (!order) return null;
		if (order.venueOrderId !== null && order.venueOrderId !== event.venueOrderId) return null;

		this.bindVenueId(order, event.venueOrderId);
		return this.require(order.intentId);
	}

	private parkOrphan(event: OrderEvent): void {
		this.orphans.push(event);
		if (this.orphans.length > this.orphanCapacity) {
			this.orphans.shift();
		}
	}

	private takeOrphans(id: IntentId, venueId: VenueOrderId): readonly OrderEvent[] {
		const matching: OrderEvent[] = [];
		const rest: OrderEvent[] = [];
		for (const event of this.orphans) {
			if (event.venueOrderId === venueId || event.clientIntentId === id) {
				matching.push(event);
			} else {
				rest.push(event);
			}
		}
		this.orphans = rest;
		return matching;
	}
}

/** The state an event implies once its cumulative size is known. */
function targetState(reported: VenueOrderState, cumulative: Decimal, size: Decimal): OrderState {
	if (cumulative.gte(size) && cumulative.isPositive()) return OrderState.Filled;
	if (reported === OrderState.Open && cumulative.isPositive()) return OrderState.PartiallyFilled;
	return reported;
}
