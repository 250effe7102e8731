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
} from "./agent-events.js";
