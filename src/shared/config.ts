/**
 * Grid agent configuration — validated once at startup.
 *
 * Everything the planner, risk guard and reconciliation engine read comes from
 * a single `GridConfig` produced by `parseGridConfig`. Invalid values raise a
 * ConfigurationError carrying every issue, so a bad deployment fails before
 * the first order is placed.
 */

import { formatIssues, validate, z } from "../lib/validation/index.js";
import { Decimal } from "./decimal.js";
import { ConfigurationError } from "./errors.js";

// ── Field schemas ────────────────────────────────────────────────────

function decimalField(rule?: { readonly test: (v: Decimal) => boolean; readonly message: string }) {
	return z.union([z.string(), z.number()]).transform((value, ctx) => {
		let parsed: Decimal;
		try {
			parsed = Decimal.from(value);
		} catch (error) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `not a decimal: ${error instanceof Error ? error.message : String(value)}`,
				fatal: true,
			});
			return z.NEVER;
		}
		if (rule && !rule.test(parsed)) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: rule.message, fatal: true });
			return z.NEVER;
		}
		return parsed;
	});
}

const positiveDecimal = decimalField({ test: (v) => v.isPositive(), message: "must be positive" });
const nonNegativeDecimal = decimalField({
	test: (v) => !v.isNegative(),
	message: "must not be negative",
});

export const DistanceMode = {
	Absolute: "absolute",
	Percentage: "percentage",
} as const;

export type DistanceMode = (typeof DistanceMode)[keyof typeof DistanceMode];

const RetrySchema = z.object({
	maxAttempts: z.number().int().min(1).default(3),
	baseDelayMs: z.number().int().min(0).default(100),
	maxDelayMs: z.number().int().min(0).default(5_000),
	jitterFactor: z.number().min(0).max(1).default(0.1),
});

// ── Grid config ──────────────────────────────────────────────────────

export const GridConfigSchema = z
	.object({
		/** Reference market symbol, e.g. "BTC-PERP". */
		symbol: z.string().trim().min(1),
		/** Levels per side. */
		levels: z.number().int().min(1).max(1_000),
		/** Per-level distance; percentage values are in percent (1 = 1%). */
		distance: z.object({
			mode: z.enum([DistanceMode.Absolute, DistanceMode.Percentage]),
			value: positiveDecimal,
		}),
		orderSize: positiveDecimal,
		maxPosition: positiveDecimal,
		/** Percent move of the reference price that triggers a re-center; 0 disables. */
		recenterThreshold: nonNegativeDecimal.default(0),
		fixOrderEnabled: z.boolean().default(false),
		autoCloseEnabled: z.boolean().default(false),
		ackDeadlineMs: z.number().int().positive().default(5_000),
		snapshotIntervalMs: z.number().int().positive().default(20_000),
		tickSize: positiveDecimal.default("0.01"),
		lotSize: positiveDecimal.default("0.001"),
		minLevelSpacing: nonNegativeDecimal.default(0),
		rearmSpacingLevels: z.number().int().min(0).default(0),
		fixOrderOffsetBps: z.number().min(0).max(1_000).default(2),
		divergenceTolerance: nonNegativeDecimal.default("0.000000001"),
		/** 0 = one profit row per realized closing fill. */
		profitLogIntervalMs: z.number().int().min(0).default(0),
		terminalOrderTtlMs: z.number().int().positive().default(600_000),
		cancelOnStop: z.boolean().default(true),
		feedSilenceMs: z.number().int().positive().default(30_000),
		retry: RetrySchema.default({}),
	})
	.refine((c) => !(c.fixOrderEnabled && c.autoCloseEnabled), {
		message: "fixOrderEnabled and autoCloseEnabled are mutually exclusive",
		path: ["autoCloseEnabled"],
	})
	.refine(
		(c) =>
			c.distance.mode !== DistanceMode.Percentage ||
			Decimal.from(c.levels).mul(c.distance.value).lt(Decimal.from(100)),
		{
			message: "levels × distance must stay below 100% so every bid price is positive",
			path: ["distance", "value"],
		},
	);

export type GridConfig = z.output<typeof GridConfigSchema>;
export type GridConfigInput = z.input<typeof GridConfigSchema>;
export type RetrySettings = GridConfig["retry"];

export const AccountSchema = z.object({
	userId: z.string().trim().min(1),
	username: z.string().trim().min(1),
});

export type AccountConfig = z.output<typeof AccountSchema>;

export const AgentConfigSchema = z.object({
	account: AccountSchema,
	grid: GridConfigSchema,
});

export type AgentConfig = z.output<typeof AgentConfigSchema>;

/**
 * @throws ConfigurationError listing every invalid field
 * @example
 * ```ts
 * const grid = parseGridConfig({
 *   symbol: "BTC-PERP",
 *   levels: 3,
 *   distance: { mode: "percentage", value: 1 },
 *   orderSize: 1,
 *   maxPosition: 3,
 * });
 * ```
 */
export function parseGridConfig(raw: unknown): GridConfig {
	const result = validate(GridConfigSchema, raw);
	if (!result.ok) {
		throw new ConfigurationError(`Invalid grid config: ${formatIssues(result.error.issues)}`, {
			issues: result.error.issues,
		});
	}
	return result.value;
}

export function parseAgentConfig(raw: unknown): AgentConfig {
	const result = validate(AgentConfigSchema, raw);
	if (!result.ok) {
		throw new ConfigurationError(`Invalid agent config: ${formatIssues(result.error.issues)}`, {
			issues: result.error.issues,
		});
	}
	return result.value;
}

// ── Environment ──────────────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>;

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function intEnv(env: Env, key: string): number | undefined {
	const raw = env[key];
	if (raw === undefined || raw === "") return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed)) {
		throw new ConfigurationError(`Invalid ${key}: "${raw}" must be an integer`);
	}
	return parsed;
}

function boolEnv(env: Env, key: string): boolean | undefined {
	const raw = env[key];
	if (raw === undefined || raw === "") return undefined;
	if (raw === "true" || raw === "1") return true;
	if (raw === "false" || raw === "0") return false;
	throw new ConfigurationError(`Invalid ${key}: "${raw}" must be true or false`);
}

function strEnv(env: Env, key: string): string | undefined {
	const raw = env[key];
	return raw === undefined || raw === "" ? undefined : raw;
}

function defined(entries: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined));
}

/**
 * Builds an AgentConfig from environment variables.
 * Supported: AGENT_USER_ID, AGENT_USERNAME, GRID_SYMBOL, GRID_LEVELS, GRID_DISTANCE_MODE,
 * GRID_DISTANCE, GRID_ORDER_SIZE, GRID_MAX_POSITION, GRID_RECENTER_THRESHOLD, GRID_FIX_ORDER,
 * GRID_AUTO_CLOSE, GRID_ACK_DEADLINE_MS, GRID_SNAPSHOT_INTERVAL_MS, GRID_TICK_SIZE,
 * GRID_LOT_SIZE, GRID_REARM_SPACING_LEVELS, GRID_PROFIT_LOG_INTERVAL_MS.
 * @throws ConfigurationError if a variable is malformed or the result is invalid
 */
export function configFromEnv(env: Env = process.env): AgentConfig {
	const raw = {
		account: defined({
			userId: strEnv(env, "AGENT_USER_ID"),
			username: strEnv(env, "AGENT_USERNAME"),
		}),
		grid: defined({
			symbol: strEnv(env, "GRID_SYMBOL"),
			levels: intEnv(env, "GRID_LEVELS"),
			distance: defined({
				mode: strEnv(env, "GRID_DISTANCE_MODE") ?? DistanceMode.Percentage,
				value: strEnv(env, "GRID_DISTANCE"),
			}),
			orderSize: strEnv(env, "GRID_ORDER_SIZE"),
			maxPosition: strEnv(env, "GRID_MAX_POSITION"),
			recenterThreshold: strEnv(env, "GRID_RECENTER_THRESHOLD"),
			fixOrderEnabled: boolEnv(env, "GRID_FIX_ORDER"),
			autoCloseEnabled: boolEnv(env, "GRID_AUTO_CLOSE"),
			ackDeadlineMs: intEnv(env, "GRID_ACK_DEADLINE_MS"),
			snapshotIntervalMs: intEnv(env, "GRID_SNAPSHOT_INTERVAL_MS"),
			tickSize: strEnv(env, "GRID_TICK_SIZE"),
			lotSize: strEnv(env, "GRID_LOT_SIZE"),
			rearmSpacingLevels: intEnv(env, "GRID_REARM_SPACING_LEVELS"),
			profitLogIntervalMs: intEnv(env, "GRID_PROFIT_LOG_INTERVAL_MS"),
		}),
	};
	return parseAgentConfig(raw);
}
