export { Mailbox, type MailboxErrorHandler } from "./mailbox.js";
export {
	FillPolicy,
	type FollowUp,
	type FollowUpSettings,
	fillPolicyOf,
	fixPrice,
	followUpForCancelled,
	followUpForFill,
	rearmPrice,
} from "./follow-ups.js";
export {
	type CancelScope,
	type EngineOptions,
	ReconciliationEngine,
} from "./reconciliation-engine.js";
