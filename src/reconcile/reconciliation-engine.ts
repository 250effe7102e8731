/**
 * ReconciliationEngine — the single writer of one account's ledger.
 *
 * Every ledger mutation runs as a task on the account's mailbox: stream
 * events, placement and cancel results, status query answers, snapshot syncs,
 * re-centers. Adapter calls run outside the mailbox under a deadline and a
 * bounded retry, and post their results back as new tasks.
 *
 * A placement that times out is never retried and never assumed failed: the
 * order is marked Failed and the venue is asked for its true state by client
 * intent id. The same goes for cancels that time out or race a fill.
 *
 * Snapshots are ground truth. Adopted orders, fill gaps, external orders and
 * position drift are corrected to the venue and reported as divergences.
 */

import type { AgentEvents, DivergenceKind, DivergenceReport } from "../events/agent-events.js";
import { withDeadline } from "../execution/deadline.js";
import { withRetry } from "../execution/retry.js";
import type {
	AccountSnapshot,
	ExchangeAdapter,
	OrderLookup,
	PlaceOrderRequest,
} from "../execution/types.js";
import { planGrid } from "../grid/grid-planner.js";
import type { GridPlan } from "../grid/types.js";
import type { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { diffLevels } from "../order/level-differ.js";
import type { ApplyOutcome, OrderLedger } from "../order/order-ledger.js";
import { isLive, isTerminal } from "../order/order-state-machine.js";
import {
	type Order,
	type OrderEvent,
	type OrderIntent,
	OrderKind,
	OrderPurpose,
	OrderState,
} from "../order/types.js";
import type { Recorder } from "../persistence/recorder.js";
import { type SnapshotDiff, SnapshotReconciler } from "../position/snapshot-reconciler.js";
import { RiskGuard } from "../risk/risk-guard.js";
import type { RiskContext } from "../risk/types.js";
import type { GridConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import {
	AlreadyFilledError,
	OrderNotFoundError,
	OrderRejectedError,
	ReconciliationDivergenceError,
	TimeoutError,
	type TradingError,
	classifyError,
} from "../shared/errors.js";
import { type IntentId, type VenueOrderId, planId } from "../shared/identifiers.js";
import { closingSide } from "../shared/side.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import {
	type FollowUp,
	type FollowUpSettings,
	fillPolicyOf,
	followUpForCancelled,
	followUpForFill,
} from "./follow-ups.js";
import { Mailbox } from "./mailbox.js";

export interface EngineOptions {
	readonly adapter: ExchangeAdapter;
	readonly ledger: OrderLedger;
	readonly config: GridConfig;
	readonly recorder: Recorder;
	readonly logger: Logger;
	readonly events: TypedEmitter<AgentEvents>;
	readonly riskGuard?: RiskGuard;
	readonly clock?: Clock;
}

/** Which orders `cancelOrders` touches. `own` spares external orders. */
export type CancelScope = "grid" | "own";

/** Where an applied event came from. Only stream fills defer position checks. */
type EventSource = "stream" | "ack" | "query" | "snapshot";

type Applied = Extract<ApplyOutcome, { readonly type: "applied" }>;

export class ReconciliationEngine {
	private readonly adapter: ExchangeAdapter;
	private readonly ledger: OrderLedger;
	private readonly config: GridConfig;
	private readonly recorder: Recorder;
	private readonly logger: Logger;
	private readonly events: TypedEmitter<AgentEvents>;
	private readonly riskGuard: RiskGuard;
	private readonly clock: Clock;
	private readonly reconciler: SnapshotReconciler;
	private readonly followUps: FollowUpSettings;
	private readonly mailbox: Mailbox;
	private readonly inflight: Set<Promise<void>>;
	private readonly controller: AbortController;
	private plan: GridPlan | null;
	private planCounter: number;
	private trading: boolean;
	private streamFills: number;
	private snapshotAtMs: number | null;
	private markPrice: Decimal | null;
	private divergence: DivergenceReport | null;
	private anomalies: number;

	private constructor(options: EngineOptions) {
		this.adapter = options.adapter;
		this.ledger = options.ledger;
		this.config = options.config;
		this.recorder = options.recorder;
		this.logger = options.logger;
		this.events = options.events;
		this.riskGuard = options.riskGuard ?? RiskGuard.standard();
		this.clock = options.clock ?? SystemClock;
		this.reconciler = new SnapshotReconciler({ tolerance: options.config.divergenceTolerance });
		this.followUps = {
			policy: fillPolicyOf(options.config),
			rearmSpacingLevels: options.config.rearmSpacingLevels,
			fixOrderOffsetBps: options.config.fixOrderOffsetBps,
			tickSize: options.config.tickSize,
		};
		this.mailbox = new Mailbox((label, error) => this.reportFailure(label, error));
		this.inflight = new Set();
		this.controller = new AbortController();
		this.plan = null;
		this.planCounter = 0;
		this.trading = false;
		this.streamFills = 0;
		this.snapshotAtMs = null;
		this.markPrice = null;
		this.divergence = null;
		this.anomalies = 0;
	}

	/** @throws ConfigurationError when fix-order and auto-close are both enabled */
	static create(options: EngineOptions): ReconciliationEngine {
		return new ReconciliationEngine(options);
	}

	// ── Commands ────────────────────────────────────────────────────

	/**
	 * Plans a new grid around `referencePrice` and moves the working orders to
	 * it: missing levels are placed, levels of earlier plans cancelled.
	 * A price the grid cannot be planned around returns the ConfigurationError
	 * and leaves the current plan in place.
	 */
	async recenter(referencePrice: Decimal): Promise<Result<GridPlan, TradingError>> {
		let plan: GridPlan;
		try {
			plan = planGrid(referencePrice, this.config, planId(`plan-${this.planCounter + 1}`));
		} catch (error) {
			return err(classifyError(error));
		}
		this.planCounter++;
		const applied = await this.mailbox.run(() => {
			this.plan = plan;
			this.logger.info(
				{
					planId: plan.id,
					referencePrice: plan.referencePrice.toString(),
					levels: plan.levels.length,
				},
				"grid planned",
			);
			for (const dropped of plan.dropped) {
				this.logger.warn({ planId: plan.id, ...dropped }, "grid level dropped");
			}
			this.syncToPlan();
			return plan;
		});
		return ok(applied);
	}

	/** Enables or disables grid placement and passive follow-ups. */
	setTrading(enabled: boolean): Promise<void> {
		return this.mailbox.run(() => {
			this.trading = enabled;
			if (enabled) this.syncToPlan();
		});
	}

	/** Applies one event from the venue stream. */
	handleEvent(event: OrderEvent): Promise<void> {
		return this.mailbox.post("event", () => this.applyEvent(event, "stream"));
	}

	/**
	 * Requests cancels for working orders. Fire-and-forget: states change when
	 * the venue confirms.
	 * @returns number of cancels requested
	 */
	cancelOrders(scope: CancelScope, reason: string): Promise<number> {
		return this.mailbox.run(() => {
			let requested = 0;
			for (const order of this.ledger.liveOrders()) {
				if (order.cancelRequested || order.purpose === OrderPurpose.External) continue;
				if (scope === "grid" && order.levelRef === null) continue;
				this.requestCancel(order, reason);
				requested++;
			}
			return requested;
		});
	}

	/**
	 * Pulls a full account snapshot and corrects the ledger to it.
	 * Adapter failures are returned, not thrown; the next poll retries.
	 */
	async syncSnapshot(): Promise<Result<SnapshotDiff, TradingError>> {
		const requestedAtMs = this.clock.now();
		const fillsAtRequest = this.streamFills;
		const result = await this.call("getAccountSnapshot", (signal) =>
			this.adapter.getAccountSnapshot(signal),
		);
		if (!result.ok) {
			this.logger.warn(
				{ code: result.error.code, error: result.error.message },
				"account snapshot failed",
			);
			this.events.emit("error", result.error);
			return result;
		}
		const snapshot = result.value;
		const diff = await this.mailbox.run(() =>
			this.applySnapshot(snapshot, requestedAtMs, fillsAtRequest),
		);
		return ok(diff);
	}

	/** Drops terminal orders older than the configured TTL. */
	cleanup(): Promise<number> {
		return this.mailbox.run(() => this.ledger.cleanup(this.config.terminalOrderTtlMs));
	}

	/** Resolves once no task is queued and no adapter call is in flight. */
	async drain(): Promise<void> {
		while (this.inflight.size > 0 || this.mailbox.depth() > 0) {
			await Promise.all([...this.inflight]);
			await this.mailbox.idle();
		}
	}

	/** Aborts in-flight adapter calls; intents recorded afterwards are discarded. */
	close(): void {
		this.controller.abort();
	}

	// ── Health ──────────────────────────────────────────────────────

	currentPlan(): GridPlan | null {
		return this.plan;
	}

	isTrading(): boolean {
		return this.trading;
	}

	lastDivergence(): DivergenceReport | null {
		return this.divergence;
	}

	lastSnapshotAtMs(): number | null {
		return this.snapshotAtMs;
	}

	/** Mark price of the latest snapshot that reported one. */
	lastMarkPrice(): Decimal | null {
		return this.markPrice;
	}

	anomalyCount(): number {
		return this.anomalies;
	}

	inflightCount(): number {
		return this.inflight.size;
	}

	// ── Planning ────────────────────────────────────────────────────

	private syncToPlan(): void {
		const plan = this.plan;
		if (plan === null || !this.trading) return;

		for (const action of diffLevels(plan, this.ledger.liveOrders())) {
			switch (action.type) {
				case "keep":
					break;
				case "cancel":
					this.requestCancel(action.order, action.reason);
					break;
				case "place":
					this.submit({
						side: action.level.side,
						kind: OrderKind.Limit,
						price: action.level.price,
						size: action.level.size,
						purpose: OrderPurpose.Grid,
						levelRef: {
							planId: plan.id,
							side: action.level.side,
							index: action.level.index,
							step: plan.step,
						},
					});
					break;
			}
		}
	}

	// ── Placement ───────────────────────────────────────────────────

	private riskContext(): RiskContext {
		return {
			position: this.ledger.position().size,
			maxPosition: this.config.maxPosition,
			tickSize: this.config.tickSize,
			lotSize: this.config.lotSize,
		};
	}

	/** Risk-checks an intent against the position as of now and sends it. */
	private submit(intent: OrderIntent): void {
		const verdict = this.riskGuard.evaluate(intent, this.riskContext());
		if (verdict.type === "reject") {
			this.logger.warn(
				{
					guard: verdict.guard,
					purpose: intent.purpose,
					side: intent.side,
					size: intent.size.toString(),
					error: verdict.error.message,
				},
				"intent rejected",
			);
			this.events.emit("intentRejected", { intent, guard: verdict.guard, error: verdict.error });
			return;
		}
		if (verdict.type === "clip") {
			this.logger.warn(
				{
					guard: verdict.guard,
					purpose: intent.purpose,
					requested: verdict.requestedSize.toString(),
					size: verdict.intent.size.toString(),
				},
				"intent clipped",
			);
			this.events.emit("intentClipped", {
				intent: verdict.intent,
				requestedSize: verdict.requestedSize.toString(),
				guard: verdict.guard,
			});
		}

		const order = this.ledger.record(verdict.intent);
		if (this.controller.signal.aborted) {
			this.ledger.discard(order.intentId, "engine closed");
			return;
		}
		const submitted = this.ledger.markSubmitted(order.intentId);
		if (!submitted.ok) {
			this.logger.error({ intentId: order.intentId, error: submitted.error }, "submit failed");
			return;
		}
		this.track("placeOrder", this.place(submitted.value));
	}

	private async place(order: Order): Promise<void> {
		const request: PlaceOrderRequest = {
			side: order.side,
			kind: order.kind,
			price: order.price,
			size: order.size,
			clientIntentId: order.intentId,
		};
		// a timed-out placement may exist on the venue; resolve it by query instead
		const result = await this.call(
			"placeOrder",
			(signal) => this.adapter.placeOrder(request, signal),
			(error) => error.isRetryable && !(error instanceof TimeoutError),
		);
		await this.mailbox.post("placed", () => this.onPlaced(order.intentId, result));
	}

	private onPlaced(id: IntentId, result: Result<VenueOrderId, TradingError>): void {
		if (result.ok) {
			this.acknowledge(id, result.value, "ack");
			return;
		}

		const error = result.error;
		const before = this.ledger.get(id);
		if (error instanceof OrderRejectedError) {
			const rejected = this.ledger.markRejected(id, error.message);
			this.logger.warn({ intentId: id, error: error.message }, "order rejected by venue");
			if (rejected.ok && before) {
				this.events.emit("orderUpdated", { order: rejected.value, previousState: before.state });
			}
			return;
		}

		const failed = this.ledger.markFailed(id, error.message);
		if (!failed.ok) {
			// an event for the order arrived meanwhile and already settled it
			this.logger.debug({ intentId: id, error: failed.error }, "placement error superseded");
			return;
		}
		this.logger.warn(
			{ intentId: id, code: error.code, error: error.message },
			"placement unresolved, querying venue",
		);
		if (before) {
			this.events.emit("orderUpdated", { order: failed.value, previousState: before.state });
		}
		this.events.emit("error", error);
		this.track("queryOrder", this.resolve({ clientIntentId: id }, id));
	}

	private acknowledge(id: IntentId, venueId: VenueOrderId, source: EventSource): void {
		const before = this.ledger.get(id);
		const acked = this.ledger.acknowledge(id, venueId);
		if (!acked.ok) {
			this.logger.warn({ intentId: id, venueOrderId: venueId, error: acked.error }, "ack not applied");
			return;
		}
		const after = this.ledger.get(id);
		if (before && after && after.state !== before.state) {
			this.logger.debug({ intentId: id, venueOrderId: venueId }, "order acknowledged");
			this.events.emit("orderUpdated", { order: after, previousState: before.state });
		}
		for (const outcome of acked.value) {
			this.handleOutcome(outcome, source);
		}
		this.sendPendingCancel(id);
	}

	// ── Cancels ─────────────────────────────────────────────────────

	private requestCancel(order: Order, reason: string): void {
		this.ledger.markCancelRequested(order.intentId);
		this.logger.debug({ intentId: order.intentId, reason }, "cancelling order");
		// without a venue id the cancel goes out once the acknowledgement arrives
		if (order.venueOrderId === null) return;
		this.track("cancelOrder", this.cancel(order.intentId, order.venueOrderId));
	}

	private sendPendingCancel(id: IntentId): void {
		const order = this.ledger.get(id);
		if (!order || !order.cancelRequested || !isLive(order.state) || order.venueOrderId === null) {
			return;
		}
		this.track("cancelOrder", this.cancel(id, order.venueOrderId));
	}

	private async cancel(id: IntentId, venueId: VenueOrderId): Promise<void> {
		const result = await this.call("cancelOrder", (signal) =>
			this.adapter.cancelOrder(venueId, signal),
		);
		await this.mailbox.post("cancelled", () => this.onCancelResult(id, venueId, result));
	}

	private onCancelResult(id: IntentId, venueId: VenueOrderId, result: Result<void, TradingError>): void {
		if (result.ok) return;
		const error = result.error;
		if (
			error instanceof AlreadyFilledError ||
			error instanceof OrderNotFoundError ||
			error instanceof TimeoutError
		) {
			this.logger.debug({ intentId: id, code: error.code }, "cancel unresolved, querying venue");
			this.track("queryOrder", this.resolve({ venueOrderId: venueId }, id));
			return;
		}
		this.logger.warn({ intentId: id, code: error.code, error: error.message }, "cancel failed");
		this.events.emit("error", error);
		this.ledger.clearCancelRequested(id);
	}

	// ── Status queries ──────────────────────────────────────────────

	private async resolve(lookup: OrderLookup, id: IntentId): Promise<void> {
		const result = await this.call("queryOrder", (signal) => this.adapter.queryOrder(lookup, signal));
		await this.mailbox.post("resolved", () => this.onResolved(id, result));
	}

	private onResolved(id: IntentId, result: Result<OrderEvent | null, TradingError>): void {
		const order = this.ledger.get(id);
		if (!order) return;
		if (!result.ok) {
			this.logger.warn(
				{ intentId: id, code: result.error.code, error: result.error.message },
				"order query failed, next snapshot retries",
			);
			this.events.emit("error", result.error);
			return;
		}

		const event = result.value;
		if (event === null) {
			this.onUnknownToVenue(order);
			return;
		}

		if (order.state === OrderState.Failed && event.newState === OrderState.Rejected) {
			const rejected = this.ledger.markRejected(id, "rejected by venue");
			if (rejected.ok) {
				this.events.emit("orderUpdated", { order: rejected.value, previousState: order.state });
			}
			return;
		}
		if (order.venueOrderId === null || order.state === OrderState.Failed) {
			this.acknowledge(id, event.venueOrderId, "query");
		}
		this.applyEvent(event, "query");

		const latest = this.ledger.get(id);
		if (latest?.cancelRequested && isLive(latest.state) && isLive(event.newState)) {
			// the cancel never landed; let the next diff decide again
			this.ledger.clearCancelRequested(id);
		}
	}

	private onUnknownToVenue(order: Order): void {
		if (order.venueOrderId === null || order.state === OrderState.Failed) {
			this.logger.info({ intentId: order.intentId }, "venue has no such order, it stays failed");
			return;
		}
		if (!isLive(order.state)) return;
		this.reportDivergence("missing_order", `order ${order.intentId} is unknown to the venue`, {
			intentId: order.intentId,
			venueOrderId: order.venueOrderId,
		});
		this.applyEvent(
			{
				venueOrderId: order.venueOrderId,
				clientIntentId: order.intentId,
				newState: OrderState.Cancelled,
				cumulativeFilledSize: order.filledSize,
				fillPrice: null,
				timestampMs: this.clock.now(),
			},
			"query",
		);
	}

	// ── Events ──────────────────────────────────────────────────────

	private applyEvent(event: OrderEvent, source: EventSource): void {
		this.handleOutcome(this.ledger.applyEvent(event), source);
	}

	private handleOutcome(outcome: ApplyOutcome, source: EventSource): void {
		switch (outcome.type) {
			case "applied":
				this.onApplied(outcome, source);
				return;
			case "duplicate":
				this.logger.debug({ intentId: outcome.order.intentId }, "duplicate event ignored");
				return;
			case "stale":
				this.logger.debug({ intentId: outcome.order.intentId, reason: outcome.reason }, "stale event");
				return;
			case "anomaly":
				this.anomalies++;
				this.logger.warn({ intentId: outcome.order.intentId, reason: outcome.reason }, "event anomaly");
				this.events.emit("anomaly", { order: outcome.order, reason: outcome.reason });
				return;
			case "orphaned":
				this.logger.debug(
					{ venueOrderId: outcome.event.venueOrderId },
					"event parked until its order is acknowledged",
				);
				return;
			case "invalid_transition":
				this.logger.warn(
					{ intentId: outcome.order.intentId, reason: outcome.reason },
					"event would move order backward",
				);
				return;
		}
	}

	private onApplied(outcome: Applied, source: EventSource): void {
		const { order, previousState, fill } = outcome;
		if (outcome.clamped) {
			this.logger.warn({ intentId: order.intentId }, "cumulative fill above order size clamped");
		}
		if (order.state !== previousState) {
			this.events.emit("orderUpdated", { order, previousState });
		}

		if (fill !== null) {
			if (source === "stream") this.streamFills++;
			this.logger.info(
				{
					intentId: order.intentId,
					side: order.side,
					size: fill.size.toString(),
					price: fill.price.toString(),
					position: fill.positionAfter.toString(),
				},
				"fill applied",
			);
			this.events.emit("fill", { order, fill });
			if (fill.closedSize.isPositive()) {
				this.recorder.recordClosingFill({
					price: fill.price,
					position: fill.positionAfter,
					realizedPnl: fill.realizedPnl,
				});
			}
			this.alignFixOrders();
			this.dispatch(order, followUpForFill(order, fill, this.followUps));
		}

		const latest = this.ledger.get(order.intentId);
		if (latest?.state === OrderState.Cancelled) {
			this.dispatch(latest, followUpForCancelled(latest, this.followUps));
		}

		// no follow-up comes for fills a terminal order still leaves uncovered
		const settled = this.ledger.get(order.intentId);
		if (settled && isTerminal(settled.state) && settled.followedUpSize.lt(settled.filledSize)) {
			this.ledger.markFollowedUp(settled.intentId, settled.filledSize.sub(settled.followedUpSize));
		}
	}

	private dispatch(source: Order, followUp: FollowUp | null): void {
		if (followUp === null) return;
		this.ledger.markFollowedUp(source.intentId, followUp.covers);
		if (!this.trading && followUp.type !== "auto_close") {
			this.logger.info(
				{ intentId: source.intentId, type: followUp.type },
				"follow-up skipped while not trading",
			);
			return;
		}
		this.events.emit("followUp", {
			type: followUp.type,
			source: source.intentId,
			intent: followUp.intent,
		});
		this.submit(followUp.intent);
	}

	/**
	 * Keeps resting fix-orders within the position they were placed to close:
	 * all are cancelled once the position is flat or has flipped, and one that
	 * outgrew the position is replaced by a smaller one at the same price.
	 */
	private alignFixOrders(): void {
		const position = this.ledger.position().size;
		const closing = closingSide(position);
		let budget = position.abs();

		for (const order of this.ledger.liveOrders()) {
			if (order.purpose !== OrderPurpose.Fix || order.cancelRequested) continue;
			if (order.side !== closing || budget.isZero()) {
				this.requestCancel(order, "position no longer needs the fix-order");
				continue;
			}
			const remaining = order.size.sub(order.filledSize);
			if (remaining.lte(budget)) {
				budget = budget.sub(remaining);
				continue;
			}

			this.requestCancel(order, "fix-order larger than the position");
			if (this.trading && order.price !== null) {
				this.submit({
					side: order.side,
					kind: OrderKind.Limit,
					price: order.price,
					size: budget,
					purpose: OrderPurpose.Fix,
					levelRef: null,
				});
			}
			budget = Decimal.zero();
		}
	}

	// ── Snapshots ───────────────────────────────────────────────────

	private applySnapshot(
		snapshot: AccountSnapshot,
		requestedAtMs: number,
		fillsAtRequest: number,
	): SnapshotDiff {
		const diff = this.reconciler.diffOrders(this.ledger.all(), snapshot, requestedAtMs);
		let missing = 0;

		for (const action of diff.actions) {
			switch (action.type) {
				case "adopt":
					this.logger.info(
						{ intentId: action.order.intentId, venueOrderId: action.venueOrder.venueOrderId },
						"adopting order found in snapshot",
					);
					this.acknowledge(action.order.intentId, action.venueOrder.venueOrderId, "snapshot");
					break;
				case "fill_gap":
					this.reportDivergence(
						"fill_gap",
						`venue reports ${action.venueOrder.filledSize.toString()} filled on ${action.order.intentId}, ledger ${action.order.filledSize.toString()}`,
						{ intentId: action.order.intentId, venueOrderId: action.venueOrder.venueOrderId },
					);
					this.applyEvent(
						{
							venueOrderId: action.venueOrder.venueOrderId,
							clientIntentId: action.order.intentId,
							newState: OrderState.Open,
							cumulativeFilledSize: action.venueOrder.filledSize,
							fillPrice: action.venueOrder.price,
							timestampMs: this.clock.now(),
						},
						"snapshot",
					);
					break;
				case "external": {
					const adopted = this.ledger.adoptExternal(action.venueOrder);
					this.reportDivergence(
						"external_order",
						`adopted external ${action.venueOrder.side} order ${action.venueOrder.venueOrderId}`,
						{ intentId: adopted.intentId, venueOrderId: action.venueOrder.venueOrderId },
					);
					break;
				}
				case "missing":
					missing++;
					this.track(
						"queryOrder",
						this.resolve({ venueOrderId: action.venueOrderId }, action.order.intentId),
					);
					break;
			}
		}

		if (missing > 0 || this.streamFills !== fillsAtRequest) {
			this.logger.debug(
				{ missing, fillsSinceRequest: this.streamFills - fillsAtRequest },
				"position check deferred",
			);
		} else {
			this.correctPosition(snapshot);
		}

		if (diff.actions.length > 0) this.logger.info({ summary: diff.summary }, "snapshot reconciled");
		this.snapshotAtMs = this.clock.now();
		this.markPrice = snapshot.markPrice ?? this.markPrice;
		this.syncToPlan();
		return diff;
	}

	private correctPosition(snapshot: AccountSnapshot): void {
		const book = this.ledger.position();
		const drift = this.reconciler.positionDrift(book.size, snapshot.position);
		if (drift === null) return;

		this.ledger.overwritePosition(snapshot.position, snapshot.entryPrice ?? null);
		this.alignFixOrders();
		this.reportDivergence(
			"position",
			`position ${drift.local.toString()} corrected to venue ${drift.venue.toString()}`,
			{
				local: drift.local.toString(),
				venue: drift.venue.toString(),
				difference: drift.difference.toString(),
			},
		);
	}

	// ── Plumbing ────────────────────────────────────────────────────

	/** Runs one adapter call under the ack deadline and the retry budget. */
	private call<T>(
		label: string,
		fn: (signal: AbortSignal) => Promise<Result<T, TradingError>>,
		shouldRetry: (error: TradingError) => boolean = (error) => error.isRetryable,
	): Promise<Result<T, TradingError>> {
		const signal = this.controller.signal;
		return withRetry(
			() => withDeadline(fn, this.config.ackDeadlineMs, label, signal),
			this.config.retry,
			{
				signal,
				shouldRetry,
				onRetry: (attempt, error, delayMs) =>
					this.logger.debug({ label, attempt, delayMs, error: error.message }, "retrying venue call"),
			},
		);
	}

	private track(label: string, task: Promise<void>): void {
		const tracked: Promise<void> = task
			.catch((error: unknown) => this.reportFailure(label, error))
			.finally(() => this.inflight.delete(tracked));
		this.inflight.add(tracked);
	}

	private reportFailure(label: string, error: unknown): void {
		const classified = classifyError(error);
		this.logger.error(
			{ label, code: classified.code, error: classified.message },
			"reconciliation task failed",
		);
		this.events.emit("error", classified);
	}

	private reportDivergence(
		kind: DivergenceKind,
		message: string,
		context: Record<string, unknown>,
	): void {
		const report: DivergenceReport = {
			kind,
			error: new ReconciliationDivergenceError(message, context),
			timestamp: this.clock.now(),
		};
		this.divergence = report;
		this.logger.warn({ kind, ...context }, message);
		this.events.emit("divergence", report);
	}
}
