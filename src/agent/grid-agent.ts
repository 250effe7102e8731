/**
 * GridAgent — the explicit per-account context.
 *
 * Owns everything one account trades with: the ledger, the reconciliation
 * engine, the recorder, the status machine, the feed watchdog, a logger bound
 * to the account and the timers. Nothing here is shared between agents except
 * the stores handed in.
 *
 * The agent's timer drives `tick()`: feed health first, then the snapshot poll
 * when due, then ledger cleanup. A degraded feed pulls a snapshot early; a
 * critical one pauses the grid until events flow again.
 */

import type { AgentEvents } from "../events/agent-events.js";
import type { ExchangeAdapter } from "../execution/types.js";
import { shouldRecenter } from "../grid/grid-planner.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { AgentLifecycle } from "../lifecycle/agent-lifecycle.js";
import {
	AgentStatus,
	FeedStatus,
	PauseReason,
	type StatusError,
	StatusErrorKind,
} from "../lifecycle/types.js";
import { FeedWatchdog, watchdogConfigFor } from "../lifecycle/watchdog.js";
import { OrderLedger } from "../order/order-ledger.js";
import type { Order } from "../order/types.js";
import { Recorder } from "../persistence/recorder.js";
import { AccountStatus, type Stores } from "../persistence/types.js";
import { ReconciliationEngine } from "../reconcile/reconciliation-engine.js";
import type { RiskGuard } from "../risk/risk-guard.js";
import type { AgentConfig, GridConfig } from "../shared/config.js";
import type { Decimal } from "../shared/decimal.js";
import {
	ConfigurationError,
	SystemError,
	type TradingError,
	classifyError,
} from "../shared/errors.js";
import { type UserId, userId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, isErr, isOk, unwrap } from "../shared/result.js";
import { type Clock, SystemClock, sleep } from "../shared/time.js";
import type { AgentHealth } from "./health.js";

const DEFAULT_TICK_INTERVAL_MS = 1_000;
const DEFAULT_RESUBSCRIBE_DELAY_MS = 1_000;

/** `monitor_account.status` code for each agent status. */
const ACCOUNT_STATUS: Readonly<Record<AgentStatus, AccountStatus>> = {
	[AgentStatus.Active]: AccountStatus.Active,
	[AgentStatus.Paused]: AccountStatus.Paused,
	[AgentStatus.Stopped]: AccountStatus.Stopped,
};

export interface GridAgentOptions {
	readonly config: AgentConfig;
	readonly adapter: ExchangeAdapter;
	readonly stores: Stores;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly riskGuard?: RiskGuard;
	/** Prefix of intent ids. Default: user id and start time */
	readonly runTag?: string;
	/** How often the agent's timer calls `tick()`. Default: 1s */
	readonly tickIntervalMs?: number;
	/** Pause before re-subscribing to an ended or failed event stream. Default: 1s */
	readonly resubscribeDelayMs?: number;
}

export class GridAgent {
	readonly account: UserId;
	readonly events: TypedEmitter<AgentEvents>;
	private readonly username: string;
	private readonly grid: GridConfig;
	private readonly adapter: ExchangeAdapter;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly ledger: OrderLedger;
	private readonly recorder: Recorder;
	private readonly engine: ReconciliationEngine;
	private readonly lifecycle: AgentLifecycle;
	private readonly watchdog: FeedWatchdog;
	private readonly controller: AbortController;
	private readonly tickIntervalMs: number;
	private readonly resubscribeDelayMs: number;
	private referencePrice: Decimal | null;
	private pump: Promise<void> | null;
	private timer: ReturnType<typeof setInterval> | null;
	private started: boolean;
	private ticking: boolean;
	private snapshotDue: boolean;
	private lastPollMs: number;

	private constructor(options: GridAgentOptions) {
		const { account, grid } = options.config;
		this.account = userId(account.userId);
		this.username = account.username;
		this.grid = grid;
		this.adapter = options.adapter;
		this.clock = options.clock ?? SystemClock;
		this.logger = options.logger.child({ account: account.userId, symbol: grid.symbol });
		this.events = new TypedEmitter<AgentEvents>({
			onListenerError: (event, error) =>
				this.logger.error(
					{ event, error: error instanceof Error ? error.message : String(error) },
					"event listener threw",
				),
		});
		this.ledger = OrderLedger.create({
			runTag: options.runTag ?? `${account.userId}-${this.clock.now()}`,
			clock: this.clock,
		});
		this.recorder = Recorder.create({
			stores: options.stores,
			logger: this.logger,
			clock: this.clock,
			retry: grid.retry,
			profitIntervalMs: grid.profitLogIntervalMs,
			onFailure: (error) => this.events.emit("persistenceFailed", error),
		});
		this.engine = ReconciliationEngine.create({
			adapter: options.adapter,
			ledger: this.ledger,
			config: grid,
			recorder: this.recorder,
			logger: this.logger,
			events: this.events,
			riskGuard: options.riskGuard,
			clock: this.clock,
		});
		this.lifecycle = new AgentLifecycle(this.clock);
		this.watchdog = new FeedWatchdog(watchdogConfigFor(grid.feedSilenceMs), this.clock);
		this.controller = new AbortController();
		this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
		this.resubscribeDelayMs = options.resubscribeDelayMs ?? DEFAULT_RESUBSCRIBE_DELAY_MS;
		this.referencePrice = null;
		this.pump = null;
		this.timer = null;
		this.started = false;
		this.ticking = false;
		this.snapshotDue = false;
		this.lastPollMs = this.clock.now();
	}

	/** @throws ConfigurationError when fix-order and auto-close are both enabled */
	static create(options: GridAgentOptions): GridAgent {
		return new GridAgent(options);
	}

	// ── Lifecycle ───────────────────────────────────────────────────

	/**
	 * Registers the account, reconciles against an initial snapshot, starts the
	 * event pump and the timer, then places the grid around `referencePrice`
	 * (default: the snapshot's mark price).
	 *
	 * @throws the snapshot's TradingError when the venue stays unreachable
	 * @throws ConfigurationError when no reference price is known or the grid cannot be planned
	 */
	async start(referencePrice?: Decimal): Promise<void> {
		if (this.started || this.lifecycle.isStopped()) {
			throw new SystemError("agent already started", { account: this.account });
		}
		this.started = true;

		const registered = await this.recorder.registerAccount({
			userId: this.account,
			username: this.username,
			status: AccountStatus.Active,
		});
		if (isErr(registered)) {
			this.logger.warn({ error: registered.error.message }, "account row not written, trading anyway");
		}

		const initial = await this.engine.syncSnapshot();
		if (isErr(initial)) {
			this.logger.error(
				{ code: initial.error.code, error: initial.error.message },
				"initial snapshot failed",
			);
			throw initial.error;
		}
		this.watchdog.touch();
		this.lastPollMs = this.clock.now();

		const price = referencePrice ?? this.engine.lastMarkPrice();
		if (price === null) {
			throw new ConfigurationError("no reference price given and the venue reports no mark price", {
				symbol: this.grid.symbol,
			});
		}
		// plans without placing; a bad grid fails before anything runs in the background
		unwrap(await this.engine.recenter(price));
		this.referencePrice = price;

		this.pump = this.runEventPump(this.controller.signal);
		this.timer = setInterval(() => this.onTimer(), this.tickIntervalMs);
		this.timer.unref();
		this.recorder.start();

		await this.engine.setTrading(this.lifecycle.canTrade());
		this.logger.info(
			{ referencePrice: price.toString(), sync: initial.value.summary },
			"agent started",
		);
	}

	/** Cancels grid orders and stops re-arming. Auto-close keeps flattening fills. */
	async pause(
		reason: PauseReason = PauseReason.UserRequested,
	): Promise<Result<AgentStatus, StatusError>> {
		const from = this.lifecycle.status();
		const result = this.lifecycle.transition({ type: "pause", reason });
		if (!result.ok) return result;

		await this.engine.setTrading(false);
		const cancelled = await this.engine.cancelOrders("grid", `paused: ${reason}`);
		this.statusChanged(from, result.value, { reason, cancelled });
		return result;
	}

	/**
	 * Replans around the current reference price and places the grid again.
	 * A plan that fails leaves the agent paused.
	 */
	async resume(): Promise<Result<AgentStatus, StatusError>> {
		const from = this.lifecycle.status();
		const price = this.referencePrice;
		if (from === AgentStatus.Paused && price !== null) {
			const planned = await this.engine.recenter(price);
			if (isErr(planned)) {
				this.planFailed(price, planned.error);
				return err({
					kind: StatusErrorKind.PlanFailed,
					message: planned.error.message,
					from,
					transition: "resume",
				});
			}
		}
		const result = this.lifecycle.transition({ type: "resume" });
		if (!result.ok) return result;

		await this.engine.setTrading(true);
		this.statusChanged(from, result.value, {});
		return result;
	}

	/**
	 * Stops the agent for good: optionally cancels its own orders (external
	 * ones are left alone), waits for in-flight venue calls, ends the event
	 * stream and flushes the recorder.
	 */
	async stop(reason = "requested"): Promise<Result<AgentStatus, StatusError>> {
		const from = this.lifecycle.status();
		const result = this.lifecycle.transition({ type: "stop", reason });
		if (!result.ok) return result;

		if (this.timer !== null) {
			clearInterval(this.timer);
			this.timer = null;
		}
		await this.engine.setTrading(false);
		if (this.grid.cancelOnStop) {
			const cancelled = await this.engine.cancelOrders("own", `stopped: ${reason}`);
			this.logger.info({ cancelled }, "cancelling agent orders");
		}
		await this.engine.drain();

		this.controller.abort();
		this.engine.close();
		if (this.pump !== null) await this.pump;

		this.statusChanged(from, result.value, { reason });
		await this.recorder.stop();
		return result;
	}

	/**
	 * Re-centers the grid when `price` moved beyond the configured threshold.
	 * While paused the new plan is kept but nothing is placed until `resume()`.
	 * A price the grid cannot be planned around keeps the current grid.
	 * @returns true when the reference price was moved
	 */
	async updateReferencePrice(price: Decimal): Promise<boolean> {
		const current = this.referencePrice;
		if (current === null || this.lifecycle.isStopped()) return false;
		if (!shouldRecenter(current, price, this.grid.recenterThreshold)) return false;

		this.logger.info({ from: current.toString(), to: price.toString() }, "re-centering grid");
		const planned = await this.engine.recenter(price);
		if (isErr(planned)) {
			this.planFailed(price, planned.error);
			return false;
		}
		this.referencePrice = price;
		return true;
	}

	/**
	 * One round of the agent's timer: feed health, the snapshot poll when due,
	 * ledger cleanup. Overlapping calls return immediately.
	 */
	async tick(): Promise<void> {
		if (this.ticking || !this.started || this.lifecycle.isStopped()) return;
		this.ticking = true;
		try {
			await this.checkFeed();
			if (this.lifecycle.isStopped()) return;

			const due = this.clock.now() - this.lastPollMs >= this.grid.snapshotIntervalMs;
			if (this.snapshotDue || due) await this.pollSnapshot();

			const removed = await this.engine.cleanup();
			if (removed > 0) this.logger.debug({ removed }, "terminal orders pruned");
		} finally {
			this.ticking = false;
		}
	}

	/** Resolves once the engine has no queued task and no venue call in flight. */
	drain(): Promise<void> {
		return this.engine.drain();
	}

	// ── Queries ─────────────────────────────────────────────────────

	status(): AgentStatus {
		return this.lifecycle.status();
	}

	/** Every order the ledger still holds, oldest first. */
	orders(): readonly Order[] {
		return this.ledger.all();
	}

	health(): AgentHealth {
		const book = this.ledger.position();
		const divergence = this.engine.lastDivergence();
		const failure = this.recorder.lastFailure();
		return {
			account: this.account,
			symbol: this.grid.symbol,
			status: this.lifecycle.status(),
			checkedAtMs: this.clock.now(),
			feed: this.watchdog.status(),
			feedSilenceMs: this.watchdog.silenceMs(),
			trading: this.engine.isTrading(),
			referencePrice: this.referencePrice?.toString() ?? null,
			position: book.size.toString(),
			avgEntry: book.avgEntry?.toString() ?? null,
			realizedPnl: book.realizedPnl.toString(),
			openOrders: this.ledger.activeCount(),
			inflightCalls: this.engine.inflightCount(),
			snapshotIntervalMs: this.grid.snapshotIntervalMs,
			lastSnapshotAtMs: this.engine.lastSnapshotAtMs(),
			lastDivergence:
				divergence === null
					? null
					: {
							kind: divergence.kind,
							message: divergence.error.message,
							timestamp: divergence.timestamp,
						},
			anomalies: this.engine.anomalyCount(),
			persistence: {
				pendingWrites: this.recorder.pendingWrites(),
				written: this.recorder.writtenCount(),
				failures: this.recorder.failureCount(),
				lastFailure: failure?.message ?? null,
			},
		};
	}

	// ── Internals ───────────────────────────────────────────────────

	private onTimer(): void {
		this.tick().catch((error: unknown) => {
			const classified = classifyError(error);
			this.logger.error({ code: classified.code, error: classified.message }, "agent tick failed");
			this.events.emit("error", classified);
		});
	}

	private planFailed(price: Decimal, error: TradingError): void {
		this.logger.warn(
			{ referencePrice: price.toString(), code: error.code, error: error.message },
			"grid not planned, keeping the current grid",
		);
		this.events.emit("error", error);
	}

	private async runEventPump(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			try {
				for await (const event of this.adapter.streamOrderEvents(signal)) {
					this.watchdog.touch();
					await this.engine.handleEvent(event);
				}
			} catch (error) {
				const classified = classifyError(error);
				this.logger.warn({ code: classified.code, error: classified.message }, "order stream failed");
				this.events.emit("error", classified);
			}
			if (signal.aborted) return;

			// events may have been lost in the gap
			this.snapshotDue = true;
			this.logger.warn({ delayMs: this.resubscribeDelayMs }, "order stream ended, resubscribing");
			await sleep(this.resubscribeDelayMs, signal);
		}
	}

	private async checkFeed(): Promise<void> {
		const change = this.watchdog.poll();
		if (change === null) return;

		const silenceMs = this.watchdog.silenceMs();
		const context = { from: change.from, to: change.to, silenceMs };
		if (change.to === FeedStatus.Healthy) {
			this.logger.info(context, "order stream healthy");
		} else {
			this.logger.warn(context, "order stream silent");
		}
		this.events.emit("feedHealthChanged", context);

		switch (change.to) {
			case FeedStatus.Degraded:
				this.snapshotDue = true;
				return;
			case FeedStatus.Critical:
				await this.pause(PauseReason.FeedCritical);
				return;
			case FeedStatus.Healthy: {
				const metadata = this.lifecycle.snapshot().metadata;
				if (metadata.type === "pause" && metadata.reason === PauseReason.FeedCritical) {
					await this.resume();
				}
				return;
			}
		}
	}

	private async pollSnapshot(): Promise<void> {
		this.snapshotDue = false;
		this.lastPollMs = this.clock.now();
		const result = await this.engine.syncSnapshot();
		// a quiet market looks like a dead stream; a fresh snapshot proves the venue is there
		if (isOk(result)) this.watchdog.touch();
	}

	private statusChanged(from: AgentStatus, to: AgentStatus, context: Record<string, unknown>): void {
		this.logger.info({ from, to, ...context }, "agent status changed");
		this.recorder.recordStatus(this.account, ACCOUNT_STATUS[to]);
		this.events.emit("statusChanged", { from, to });
	}
}
