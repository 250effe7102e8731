export {
	type IntentId,
	type PlanId,
	type UserId,
	type VenueOrderId,
	idToString,
	intentId,
	planId,
	userId,
	venueOrderId,
} from "./identifiers.js";

export {
	type Result,
	err,
	isErr,
	isOk,
	ok,
	unwrap,
} from "./result.js";

export {
	AlreadyFilledError,
	ConfigurationError,
	ErrorCategory,
	InvalidOrderIntentError,
	OrderNotFoundError,
	OrderRejectedError,
	PersistenceError,
	PositionLimitExceededError,
	RateLimitError,
	ReconciliationDivergenceError,
	SystemError,
	TimeoutError,
	TradingError,
	TransportError,
	classifyError,
	isAlreadyFilledError,
	isConfigurationError,
	isOrderNotFoundError,
	isOrderRejectedError,
	isRateLimitError,
	isTimeoutError,
	isTransportError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { OrderSide, closingSide, oppositeSide, sideSign, signedSize } from "./side.js";
export { type Clock, Duration, FakeClock, SystemClock, sleep } from "./time.js";
export {
	type AccountConfig,
	type AgentConfig,
	type GridConfig,
	type GridConfigInput,
	type RetrySettings,
	AccountSchema,
	AgentConfigSchema,
	DistanceMode,
	GridConfigSchema,
	configFromEnv,
	parseAgentConfig,
	parseGridConfig,
} from "./config.js";
