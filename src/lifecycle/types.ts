/**
 * Agent lifecycle types.
 *
 * Three statuses: Active ⇄ Paused → Stopped. Transitions are explicitly
 * validated; Stopped is terminal.
 */

// ── Agent status ─────────────────────────────────────────────────────

export const AgentStatus = {
	/** Grid orders rest and fills are re-armed. */
	Active: "active",
	/** Grid orders cancelled; no re-arms or fix-orders. Auto-close still flattens fills. */
	Paused: "paused",
	/** Terminal. */
	Stopped: "stopped",
} as const;

export type AgentStatus = (typeof AgentStatus)[keyof typeof AgentStatus];

export const PauseReason = {
	UserRequested: "user_requested",
	FeedCritical: "feed_critical",
} as const;

export type PauseReason = (typeof PauseReason)[keyof typeof PauseReason];

// ── Transitions ──────────────────────────────────────────────────────

export type StatusTransition =
	| { readonly type: "pause"; readonly reason: PauseReason }
	| { readonly type: "resume" }
	| { readonly type: "stop"; readonly reason: string };

export type StatusMetadata =
	| { readonly type: "none" }
	| { readonly type: "pause"; readonly reason: PauseReason }
	| { readonly type: "stop"; readonly reason: string };

export interface StatusSnapshot {
	readonly status: AgentStatus;
	readonly enteredAt: number;
	readonly metadata: StatusMetadata;
}

export interface StatusChange {
	readonly from: AgentStatus;
	readonly to: AgentStatus;
	readonly transition: StatusTransition["type"];
	readonly timestamp: number;
}

// ── Errors ───────────────────────────────────────────────────────────

export const StatusErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyStopped: "already_stopped",
	/** The grid could not be planned around the reference price; the status is unchanged. */
	PlanFailed: "plan_failed",
} as const;

export type StatusErrorKind = (typeof StatusErrorKind)[keyof typeof StatusErrorKind];

export interface StatusError {
	readonly kind: StatusErrorKind;
	readonly message: string;
	readonly from: AgentStatus;
	readonly transition: StatusTransition["type"];
}

// ── Feed watchdog ────────────────────────────────────────────────────

export const FeedStatus = {
	Healthy: "healthy",
	Degraded: "degraded",
	Critical: "critical",
} as const;

export type FeedStatus = (typeof FeedStatus)[keyof typeof FeedStatus];
