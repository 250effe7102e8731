// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { type ValidationIssue, ValidationError, formatIssues, validate } from "./lib/validation/index.js";
export { type EventMap, TypedEmitter, type TypedEmitterOptions } from "./lib/events/index.js";

// ── Grid Planning ────────────────────────────────────────────────────
export * from "./grid/index.js";

// ── Orders ───────────────────────────────────────────────────────────
export * from "./order/index.js";

// ── Risk ─────────────────────────────────────────────────────────────
export * from "./risk/index.js";

// ── Position ─────────────────────────────────────────────────────────
export * from "./position/index.js";

// ── Execution ────────────────────────────────────────────────────────
export * from "./execution/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export * from "./persistence/index.js";

// ── Lifecycle ────────────────────────────────────────────────────────
export * from "./lifecycle/index.js";

// ── Events ───────────────────────────────────────────────────────────
export type {
	AgentEventName,
	AgentEvents,
	DivergenceKind,
	DivergenceReport,
	EventAnomaly,
	FeedHealthChanged,
	FillApplied,
	FollowUpEmitted,
	FollowUpType,
	IntentClipped,
	IntentRejected,
	OrderUpdated,
	StatusChanged,
} from "./events/index.js";

// ── Reconciliation ───────────────────────────────────────────────────
export * from "./reconcile/index.js";

// ── Agent ────────────────────────────────────────────────────────────
export * from "./agent/index.js";
