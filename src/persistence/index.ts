export type {
	AccountStore,
	AccountUpsert,
	MonitorAccount,
	NewProfitLogEntry,
	ProfitLogEntry,
	ProfitLogQuery,
	ProfitLogStore,
	Stores,
} from "./types.js";
export { AccountStatus } from "./types.js";
export { MemoryAccountStore, MemoryProfitLogStore, memoryStores } from "./memory-store.js";
export { PgAccountStore, PgProfitLogStore, pgStores } from "./pg-store.js";
export { runMigrations, splitStatements } from "./migrations.js";
export type { ClosingFill, RecorderOptions } from "./recorder.js";
export { Recorder } from "./recorder.js";
