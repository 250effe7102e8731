/**
 * PostgreSQL stores over a `pg` Pool.
 *
 * Concurrent agents share one pool; atomicity comes from the database:
 * `ON CONFLICT (userid) DO UPDATE` for accounts and plain inserts for the
 * append-only profit log. Rows are parsed with zod on the way out.
 */

import type { Pool } from "pg";
import { z } from "../lib/validation/index.js";
import { type UserId, userId } from "../shared/identifiers.js";
import {
	AccountStatus,
	type AccountStore,
	type AccountUpsert,
	type MonitorAccount,
	type NewProfitLogEntry,
	type ProfitLogEntry,
	type ProfitLogQuery,
	type ProfitLogStore,
	type Stores,
} from "./types.js";

const ACCOUNT_COLUMNS = "id, userid, username, status, created_at, updated_at";
const PROFIT_COLUMNS = `id, price, "position", period_profit, created_at`;

const AccountRow = z.object({
	id: z.coerce.number().int(),
	userid: z.string(),
	username: z.string(),
	status: z.coerce.number().pipe(z.nativeEnum(AccountStatus)),
	created_at: z.coerce.date(),
	updated_at: z.coerce.date(),
});

const ProfitRow = z.object({
	id: z.coerce.number().int(),
	price: z.coerce.number(),
	position: z.coerce.number(),
	period_profit: z.coerce.number(),
	created_at: z.coerce.date(),
});

function toAccount(row: unknown): MonitorAccount {
	const parsed = AccountRow.parse(row);
	return {
		id: parsed.id,
		userId: userId(parsed.userid),
		username: parsed.username,
		status: parsed.status,
		createdAt: parsed.created_at,
		updatedAt: parsed.updated_at,
	};
}

function toProfit(row: unknown): ProfitLogEntry {
	const parsed = ProfitRow.parse(row);
	return {
		id: parsed.id,
		price: parsed.price,
		position: parsed.position,
		periodProfit: parsed.period_profit,
		createdAt: parsed.created_at,
	};
}

export class PgAccountStore implements AccountStore {
	constructor(private readonly pool: Pool) {}

	async upsert(account: AccountUpsert): Promise<MonitorAccount> {
		const res = await this.pool.query(
			`INSERT INTO monitor_account (userid, username, status)
			 VALUES ($1, $2, $3)
			 ON CONFLICT (userid) DO UPDATE
			 SET username = EXCLUDED.username,
			     status = EXCLUDED.status,
			     updated_at = NOW()
			 RETURNING ${ACCOUNT_COLUMNS}`,
			[account.userId, account.username, account.status],
		);
		return toAccount(res.rows[0]);
	}

	async setStatus(id: UserId, status: AccountStatus): Promise<MonitorAccount | null> {
		const res = await this.pool.query(
			`UPDATE monitor_account
			 SET status = $2, updated_at = NOW()
			 WHERE userid = $1
			 RETURNING ${ACCOUNT_COLUMNS}`,
			[id, status],
		);
		return res.rows[0] ? toAccount(res.rows[0]) : null;
	}

	async get(id: UserId): Promise<MonitorAccount | null> {
		const res = await this.pool.query(
			`SELECT ${ACCOUNT_COLUMNS} FROM monitor_account WHERE userid = $1`,
			[id],
		);
		return res.rows[0] ? toAccount(res.rows[0]) : null;
	}
}

export class PgProfitLogStore implements ProfitLogStore {
	constructor(private readonly pool: Pool) {}

	async append(entry: NewProfitLogEntry): Promise<ProfitLogEntry> {
		const res = await this.pool.query(
			`INSERT INTO profit_log (price, "position", period_profit)
			 VALUES ($1, $2, $3)
			 RETURNING ${PROFIT_COLUMNS}`,
			[entry.price.toNumber(), entry.position.toNumber(), entry.periodProfit.toNumber()],
		);
		return toProfit(res.rows[0]);
	}

	async list(query: ProfitLogQuery = {}): Promise<readonly ProfitLogEntry[]> {
		const params: unknown[] = [];
		let sql = `SELECT ${PROFIT_COLUMNS} FROM profit_log`;
		if (query.since) {
			params.push(query.since);
			sql += ` WHERE created_at >= $${params.length}`;
		}
		sql += " ORDER BY id ASC";
		if (query.limit !== undefined) {
			sql += ` LIMIT ${Math.max(0, Math.trunc(query.limit))}`;
		}
		const res = await this.pool.query(sql, params);
		return res.rows.map(toProfit);
	}
}

export function pgStores(pool: Pool): Stores {
	return { accounts: new PgAccountStore(pool), profits: new PgProfitLogStore(pool) };
}
