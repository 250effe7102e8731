export { AgentLifecycle } from "./agent-lifecycle.js";
export {
	AgentStatus,
	FeedStatus,
	PauseReason,
	StatusErrorKind,
	type StatusChange,
	type StatusError,
	type StatusMetadata,
	type StatusSnapshot,
	type StatusTransition,
} from "./types.js";
export {
	DEFAULT_WATCHDOG_CONFIG,
	FeedWatchdog,
	type WatchdogConfig,
	watchdogConfigFor,
} from "./watchdog.js";
