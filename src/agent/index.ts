export { GridAgent, type GridAgentOptions } from "./grid-agent.js";
export { AgentSupervisor, type AccountHealth, type StartOutcome } from "./supervisor.js";
export {
	type AgentHealth,
	type DivergenceSummary,
	type HealthAssessment,
	HealthLevel,
	type PersistenceHealth,
	assessHealth,
} from "./health.js";
