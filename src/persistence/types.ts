/**
 * Persistence bounded context — stored rows and store interfaces.
 *
 * Stores are plain async I/O and throw on failure. The Recorder wraps them
 * with retry and turns failures into PersistenceError health signals.
 */

import type { Decimal } from "../shared/decimal.js";
import type { UserId } from "../shared/identifiers.js";

/** Integer codes stored in `monitor_account.status`. */
export const AccountStatus = {
	Active: 0,
	Paused: 1,
	Stopped: 2,
} as const;

export type AccountStatus = (typeof AccountStatus)[keyof typeof AccountStatus];

export interface MonitorAccount {
	readonly id: number;
	readonly userId: UserId;
	readonly username: string;
	readonly status: AccountStatus;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export interface AccountUpsert {
	readonly userId: UserId;
	readonly username: string;
	readonly status: AccountStatus;
}

/** One realized-P&L snapshot. Numbers, since the columns are FLOAT. */
export interface ProfitLogEntry {
	readonly id: number;
	readonly price: number;
	/** Signed net position at snapshot time. */
	readonly position: number;
	readonly periodProfit: number;
	readonly createdAt: Date;
}

export interface NewProfitLogEntry {
	readonly price: Decimal;
	readonly position: Decimal;
	readonly periodProfit: Decimal;
}

export interface AccountStore {
	/** Inserts, or updates username, status and updated_at of the existing row for `userId`. */
	upsert(account: AccountUpsert): Promise<MonitorAccount>;
	/** @returns null when no row exists for `userId` */
	setStatus(userId: UserId, status: AccountStatus): Promise<MonitorAccount | null>;
	get(userId: UserId): Promise<MonitorAccount | null>;
}

export interface ProfitLogQuery {
	/** Only rows created at or after this time. */
	readonly since?: Date;
	readonly limit?: number;
}

export interface ProfitLogStore {
	append(entry: NewProfitLogEntry): Promise<ProfitLogEntry>;
	/** Oldest first. */
	list(query?: ProfitLogQuery): Promise<readonly ProfitLogEntry[]>;
}

export interface Stores {
	readonly accounts: AccountStore;
	readonly profits: ProfitLogStore;
}
