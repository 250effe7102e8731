/**
 * Recorder — the Profit/Account Recorder in front of the stores.
 *
 * Trading never waits on it: profit and status writes are queued on a single
 * promise chain and retried with backoff. A write that exhausts its retries
 * becomes a PersistenceError reported through `onFailure` and `lastFailure()`;
 * the row is dropped and the queue moves on.
 *
 * Profit rows are emitted per closing fill by default. With a profit interval
 * the realized P&L of each period is summed into one row, written only for
 * periods that saw a closing fill.
 */

import { resolveRetryConfig, withRetry } from "../execution/retry.js";
import type { RetryConfig } from "../execution/types.js";
import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { PersistenceError } from "../shared/errors.js";
import type { UserId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { AccountStatus, AccountUpsert, MonitorAccount, Stores } from "./types.js";

export interface RecorderOptions {
	readonly stores: Stores;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly retry?: Partial<RetryConfig>;
	/** 0 = one row per closing fill. */
	readonly profitIntervalMs?: number;
	readonly onFailure?: (error: PersistenceError) => void;
}

/** A fill that closed part of the position, with the P&L it realized. */
export interface ClosingFill {
	readonly price: Decimal;
	/** Net position after the fill. */
	readonly position: Decimal;
	readonly realizedPnl: Decimal;
}

interface Period {
	profit: Decimal;
	fills: number;
	lastPrice: Decimal;
	lastPosition: Decimal;
}

export class Recorder {
	private readonly stores: Stores;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly retry: RetryConfig;
	private readonly intervalMs: number;
	private readonly onFailure: ((error: PersistenceError) => void) | undefined;
	private queue: Promise<void> = Promise.resolve();
	private pending = 0;
	private failures = 0;
	private written = 0;
	private lastError: PersistenceError | null = null;
	private period: Period | null = null;
	private timer: ReturnType<typeof setInterval> | null = null;

	private constructor(options: RecorderOptions) {
		this.stores = options.stores;
		this.logger = options.logger;
		this.clock = options.clock ?? SystemClock;
		this.retry = resolveRetryConfig(options.retry);
		this.intervalMs = options.profitIntervalMs ?? 0;
		this.onFailure = options.onFailure;
	}

	static create(options: RecorderOptions): Recorder {
		return new Recorder(options);
	}

	// ── Account ─────────────────────────────────────────────────────

	/**
	 * Upserts the account row and waits for it. Only used at startup, where the
	 * agent has not placed anything yet.
	 */
	async registerAccount(account: AccountUpsert): Promise<Result<MonitorAccount, PersistenceError>> {
		const result = await this.withStoreRetry("account upsert", () =>
			this.stores.accounts.upsert(account),
		);
		if (!result.ok) this.fail(result.error);
		return result;
	}

	/** Queues a status change of an existing account row. */
	recordStatus(userId: UserId, status: AccountStatus): void {
		this.enqueue("account status", async () => {
			const row = await this.stores.accounts.setStatus(userId, status);
			if (row === null) {
				throw new Error(`no monitor_account row for ${userId}`);
			}
		});
	}

	// ── Profit ──────────────────────────────────────────────────────

	recordClosingFill(fill: ClosingFill): void {
		if (this.intervalMs <= 0) {
			this.writeProfit(fill.price, fill.position, fill.realizedPnl);
			return;
		}
		const period = this.period;
		if (period === null) {
			this.period = {
				profit: fill.realizedPnl,
				fills: 1,
				lastPrice: fill.price,
				lastPosition: fill.position,
			};
			return;
		}
		period.profit = period.profit.add(fill.realizedPnl);
		period.fills++;
		period.lastPrice = fill.price;
		period.lastPosition = fill.position;
	}

	/** Ends the current accounting period, writing its row when it saw a closing fill. */
	closePeriod(): void {
		const period = this.period;
		this.period = null;
		if (period === null || period.fills === 0) return;
		this.writeProfit(period.lastPrice, period.lastPosition, period.profit);
	}

	// ── Lifecycle ───────────────────────────────────────────────────

	/** Starts the period timer in interval mode; a no-op per fill. */
	start(): void {
		if (this.intervalMs <= 0 || this.timer !== null) return;
		this.timer = setInterval(() => this.closePeriod(), this.intervalMs);
		this.timer.unref();
	}

	/** Stops the timer, closes the open period and drains the queue. */
	async stop(): Promise<void> {
		if (this.timer !== null) {
			clearInterval(this.timer);
			this.timer = null;
		}
		this.closePeriod();
		await this.flush();
	}

	/** Resolves once every queued write has finished (or failed). */
	async flush(): Promise<void> {
		await this.queue;
	}

	// ── Health ──────────────────────────────────────────────────────

	pendingWrites(): number {
		return this.pending;
	}

	writtenCount(): number {
		return this.written;
	}

	failureCount(): number {
		return this.failures;
	}

	lastFailure(): PersistenceError | null {
		return this.lastError;
	}

	// ── Internals ───────────────────────────────────────────────────

	private writeProfit(price: Decimal, position: Decimal, periodProfit: Decimal): void {
		this.enqueue("profit append", () =>
			this.stores.profits.append({ price, position, periodProfit }),
		);
	}

	private enqueue(label: string, write: () => Promise<unknown>): void {
		this.pending++;
		this.queue = this.queue.then(async () => {
			const result = await this.withStoreRetry(label, write);
			this.pending--;
			if (result.ok) {
				this.written++;
			} else {
				this.fail(result.error);
			}
		});
	}

	private withStoreRetry<T>(
		label: string,
		write: () => Promise<T>,
	): Promise<Result<T, PersistenceError>> {
		return withRetry(
			async (attempt) => {
				try {
					return ok(await write());
				} catch (cause) {
					const message = cause instanceof Error ? cause.message : String(cause);
					return err(
						new PersistenceError(`${label} failed: ${message}`, {
							cause,
							attempt: attempt + 1,
						}),
					);
				}
			},
			this.retry,
			{
				onRetry: (attempt, error, delayMs) =>
					this.logger.debug({ attempt, delayMs, error: error.message }, "retrying store write"),
			},
		).then((result) => (result.ok ? result : err(asPersistenceError(result.error))));
	}

	private fail(error: PersistenceError): void {
		this.failures++;
		this.lastError = error;
		this.logger.warn(
			{ code: error.code, at: this.clock.now(), error: error.message },
			"store write dropped after retries",
		);
		if (!this.onFailure) return;
		try {
			this.onFailure(error);
		} catch (hookError) {
			this.logger.error(
				{ error: hookError instanceof Error ? hookError.message : String(hookError) },
				"persistence failure hook threw",
			);
		}
	}
}

function asPersistenceError(error: unknown): PersistenceError {
	if (error instanceof PersistenceError) return error;
	const message = error instanceof Error ? error.message : String(error);
	return new PersistenceError(message, { cause: error });
}
