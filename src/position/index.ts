export type { FillOutcome } from "./position-book.js";
export { PositionBook } from "./position-book.js";
export type {
	PositionDrift,
	SnapshotAction,
	SnapshotDiff,
	SnapshotReconcilerConfig,
} from "./snapshot-reconciler.js";
export { SnapshotReconciler } from "./snapshot-reconciler.js";
