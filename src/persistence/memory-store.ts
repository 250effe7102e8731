/**
 * In-memory stores with the same upsert / append semantics as PgStores.
 * Used by tests and paper runs.
 */

import type { UserId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type {
	AccountStatus,
	AccountStore,
	AccountUpsert,
	MonitorAccount,
	NewProfitLogEntry,
	ProfitLogEntry,
	ProfitLogQuery,
	ProfitLogStore,
	Stores,
} from "./types.js";

export class MemoryAccountStore implements AccountStore {
	private readonly rows = new Map<UserId, MonitorAccount>();
	private nextId = 1;

	constructor(private readonly clock: Clock = SystemClock) {}

	async upsert(account: AccountUpsert): Promise<MonitorAccount> {
		const now = new Date(this.clock.now());
		const existing = this.rows.get(account.userId);
		const row: MonitorAccount = existing
			? { ...existing, username: account.username, status: account.status, updatedAt: now }
			: {
					id: this.nextId++,
					userId: account.userId,
					username: account.username,
					status: account.status,
					createdAt: now,
					updatedAt: now,
				};
		this.rows.set(account.userId, row);
		return row;
	}

	async setStatus(userId: UserId, status: AccountStatus): Promise<MonitorAccount | null> {
		const existing = this.rows.get(userId);
		if (!existing) return null;
		const row = { ...existing, status, updatedAt: new Date(this.clock.now()) };
		this.rows.set(userId, row);
		return row;
	}

	async get(userId: UserId): Promise<MonitorAccount | null> {
		return this.rows.get(userId) ?? null;
	}

	size(): number {
		return this.rows.size;
	}
}

export class MemoryProfitLogStore implements ProfitLogStore {
	private readonly rows: ProfitLogEntry[] = [];

	constructor(private readonly clock: Clock = SystemClock) {}

	async append(entry: NewProfitLogEntry): Promise<ProfitLogEntry> {
		const row: ProfitLogEntry = {
			id: this.rows.length + 1,
			price: entry.price.toNumber(),
			position: entry.position.toNumber(),
			periodProfit: entry.periodProfit.toNumber(),
			createdAt: new Date(this.clock.now()),
		};
		this.rows.push(row);
		return row;
	}

	async list(query: ProfitLogQuery = {}): Promise<readonly ProfitLogEntry[]> {
		const since = query.since;
		const matching = since ? this.rows.filter((r) => r.createdAt >= since) : [...this.rows];
		return query.limit === undefined ? matching : matching.slice(0, query.limit);
	}
}

export function memoryStores(clock: Clock = SystemClock): Stores {
	return { accounts: new MemoryAccountStore(clock), profits: new MemoryProfitLogStore(clock) };
}
