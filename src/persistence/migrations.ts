import { readFile } from "node:fs/promises";
import type { Pool } from "pg";

const SCHEMA_URL = new URL("../../sql/schema.sql", import.meta.url);

const applied = new WeakSet<Pool>();

/** Splits a schema file into statements, dropping `--` comment lines. */
export function splitStatements(sql: string): readonly string[] {
	return sql
		.split("\n")
		.filter((line) => !line.trim().startsWith("--"))
		.join("\n")
		.split(";")
		.map((statement) => statement.trim())
		.filter((statement) => statement.length > 0);
}

/** Applies `sql/schema.sql` once per pool. Every statement is idempotent. */
export async function runMigrations(pool: Pool): Promise<void> {
	if (applied.has(pool)) return;
	const schema = await readFile(SCHEMA_URL, "utf-8");
	for (const statement of splitStatements(schema)) {
		await pool.query(statement);
	}
	applied.add(pool);
}
