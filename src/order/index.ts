export type {
	LevelRef,
	Order,
	OrderEvent,
	OrderIntent,
	VenueOrderState,
} from "./types.js";
export { OrderKind, OrderPurpose, OrderState } from "./types.js";
export {
	canTransitionTo,
	isLive,
	isTerminal,
	progressOf,
	tryTransition,
} from "./order-state-machine.js";
export type { ApplyOutcome, ExternalOrder, FillDelta, LedgerOptions } from "./order-ledger.js";
export { OrderLedger } from "./order-ledger.js";
export type { DiffAction } from "./level-differ.js";
export { diffLevels } from "./level-differ.js";
