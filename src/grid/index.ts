export type { DroppedLevel, GridLevel, GridPlan, PlannerSettings } from "./types.js";
export { levelKey } from "./types.js";
export { levelStep, planGrid, shouldRecenter } from "./grid-planner.js";
