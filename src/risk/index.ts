/**
 * Risk Guard — accept / clip / reject for order intents.
 *
 * @module
 */
export type { IntentGuard, RiskContext, RiskVerdict } from "./types.js";
export { accept, clip, isPassing, reject } from "./types.js";
export { RiskGuard } from "./risk-guard.js";
export { IntentValidityGuard } from "./guards/intent-validity.js";
export { PositionLimitGuard } from "./guards/position-limit.js";
