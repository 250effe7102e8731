/**
 * Agent health — the observable status signal of one grid agent.
 *
 * Failures the agent absorbs (venue divergences, dropped store writes, a
 * silent stream) never crash it; they surface here instead.
 */

import type { DivergenceKind } from "../events/agent-events.js";
import { AgentStatus, FeedStatus } from "../lifecycle/types.js";
import type { UserId } from "../shared/identifiers.js";

export interface DivergenceSummary {
	readonly kind: DivergenceKind;
	readonly message: string;
	readonly timestamp: number;
}

export interface PersistenceHealth {
	readonly pendingWrites: number;
	readonly written: number;
	readonly failures: number;
	readonly lastFailure: string | null;
}

export interface AgentHealth {
	readonly account: UserId;
	readonly symbol: string;
	readonly status: AgentStatus;
	readonly checkedAtMs: number;
	readonly feed: FeedStatus;
	readonly feedSilenceMs: number;
	readonly trading: boolean;
	readonly referencePrice: string | null;
	/** Signed net position. */
	readonly position: string;
	readonly avgEntry: string | null;
	readonly realizedPnl: string;
	/** Live orders in the ledger, external ones included. */
	readonly openOrders: number;
	readonly inflightCalls: number;
	readonly snapshotIntervalMs: number;
	readonly lastSnapshotAtMs: number | null;
	readonly lastDivergence: DivergenceSummary | null;
	readonly anomalies: number;
	readonly persistence: PersistenceHealth;
}

export const HealthLevel = {
	Ok: "ok",
	Warning: "warning",
	Critical: "critical",
} as const;

export type HealthLevel = (typeof HealthLevel)[keyof typeof HealthLevel];

export interface HealthAssessment {
	readonly level: HealthLevel;
	readonly issues: readonly string[];
}

/** Snapshots older than this many poll intervals count as stale. */
const STALE_SNAPSHOT_INTERVALS = 3;

/**
 * Grades a health report. Critical: stopped or a dead order stream.
 * Warning: paused, a degraded stream, stale snapshots or dropped store writes.
 */
export function assessHealth(health: AgentHealth): HealthAssessment {
	const critical: string[] = [];
	const warnings: string[] = [];

	if (health.status === AgentStatus.Stopped) critical.push("agent stopped");
	if (health.status === AgentStatus.Paused) warnings.push("agent paused");

	if (health.feed === FeedStatus.Critical) {
		critical.push(`order stream silent for ${health.feedSilenceMs}ms`);
	} else if (health.feed === FeedStatus.Degraded) {
		warnings.push(`order stream quiet for ${health.feedSilenceMs}ms`);
	}

	if (health.status !== AgentStatus.Stopped) {
		const last = health.lastSnapshotAtMs;
		if (last === null) {
			warnings.push("no venue snapshot yet");
		} else if (
			health.checkedAtMs - last >
			health.snapshotIntervalMs * STALE_SNAPSHOT_INTERVALS
		) {
			warnings.push(`last venue snapshot ${health.checkedAtMs - last}ms ago`);
		}
	}

	if (health.persistence.failures > 0) {
		warnings.push(
			`${health.persistence.failures} store writes dropped (last: ${health.persistence.lastFailure ?? "unknown"})`,
		);
	}

	const level =
		critical.length > 0
			? HealthLevel.Critical
			: warnings.length > 0
				? HealthLevel.Warning
				: HealthLevel.Ok;
	return { level, issues: [...critical, ...warnings] };
}
