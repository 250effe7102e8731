/**
 * AgentLifecycle — validated status machine for one grid agent.
 *
 * All changes go through transition(). History is bounded to the last
 * MAX_HISTORY changes for debugging.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import {
	AgentStatus,
	type StatusChange,
	type StatusError,
	StatusErrorKind,
	type StatusMetadata,
	type StatusSnapshot,
	type StatusTransition,
} from "./types.js";

const MAX_HISTORY = 100;

export class AgentLifecycle {
	private current: AgentStatus;
	private currentEnteredAt: number;
	private currentMetadata: StatusMetadata;
	private readonly changes: StatusChange[];
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.current = AgentStatus.Active;
		this.currentEnteredAt = clock.now();
		this.currentMetadata = { type: "none" };
		this.changes = [];
	}

	// ── Queries ────────────────────────────────────────────────────

	status(): AgentStatus {
		return this.current;
	}

	snapshot(): StatusSnapshot {
		return {
			status: this.current,
			enteredAt: this.currentEnteredAt,
			metadata: this.currentMetadata,
		};
	}

	/** May grid orders be placed and fills re-armed? */
	canTrade(): boolean {
		return this.current === AgentStatus.Active;
	}

	isStopped(): boolean {
		return this.current === AgentStatus.Stopped;
	}

	timeInStatus(): number {
		return this.clock.now() - this.currentEnteredAt;
	}

	/** Most recent last. */
	history(): readonly StatusChange[] {
		return this.changes;
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: StatusTransition): Result<AgentStatus, StatusError> {
		const from = this.current;

		if (from === AgentStatus.Stopped) {
			return err({
				kind: StatusErrorKind.AlreadyStopped,
				message: "Agent already stopped",
				from,
				transition: t.type,
			});
		}

		const result = validateTransition(from, t);
		if (!result.ok) return result;

		const { status, metadata } = result.value;
		this.record(from, status, t.type);
		this.current = status;
		this.currentEnteredAt = this.clock.now();
		this.currentMetadata = metadata;

		return ok(status);
	}

	private record(from: AgentStatus, to: AgentStatus, transition: StatusTransition["type"]): void {
		if (this.changes.length >= MAX_HISTORY) {
			this.changes.shift();
		}
		this.changes.push({ from, to, transition, timestamp: this.clock.now() });
	}
}

function validateTransition(
	from: AgentStatus,
	t: StatusTransition,
): Result<{ status: AgentStatus; metadata: StatusMetadata }, StatusError> {
	switch (t.type) {
		case "pause":
			if (from === AgentStatus.Active) {
				return ok({ status: AgentStatus.Paused, metadata: { type: "pause", reason: t.reason } });
			}
			break;

		case "resume":
			if (from === AgentStatus.Paused) {
				return ok({ status: AgentStatus.Active, metadata: { type: "none" } });
			}
			break;

		case "stop":
			return ok({ status: AgentStatus.Stopped, metadata: { type: "stop", reason: t.reason } });
	}

	return err({
		kind: StatusErrorKind.InvalidTransition,
		message: `Cannot transition from ${from} via ${t.type}`,
		from,
		transition: t.type,
	});
}
