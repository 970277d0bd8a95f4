// ---------------------------------------------------------------------------
// trainlog — public library API
//
// Re-exports every public function, type, and interface needed to open,
// write, read, snapshot and restore a training log.
// ---------------------------------------------------------------------------

// ---- Backends --------------------------------------------------------------
export type {
	BackendConnectors,
	DocumentStore,
	DocumentStoreConnector,
	ExperimentDefaults,
	ExperimentSection,
	OpenBackendOptions,
	SqliteConnector,
	SqliteDatabase,
} from './backends/index.js';
export {
	createMemoryBackend,
	createMongoBackend,
	createMongooseConnector,
	createSqliteBackend,
	createSqliteOpener,
	foldRows,
	loadMongoose,
	mongoUri,
	openBackend,
} from './backends/index.js';
// ---- Configuration ---------------------------------------------------------
export type {
	BackendConfigInput,
	LogConfigInput,
	MemoryBackendInput,
	MongoBackendInput,
	SqliteBackendInput,
	ValidationIssue,
} from './config/schema.js';
export {
	BACKEND_KINDS,
	formatValidationIssues,
	validateBackendConfig,
	validateLogConfig,
} from './config/schema.js';
export type { TrainingLogConfig } from './config/settings.js';
export {
	defineLogConfig,
	MONGO_DEFAULTS,
	resolveLogConfigFromEnv,
} from './config/settings.js';
// ---- Errors ----------------------------------------------------------------
export * from './errors/index.js';
// ---- Log -------------------------------------------------------------------
export type { LazyEntrySource } from './log/entry.js';
export { createEagerEntry, createLazyEntry } from './log/entry.js';
export {
	EXPERIMENT_ID_BYTES,
	generateExperimentId,
	isExperimentId,
	parseExperimentId,
} from './log/experiment-id.js';
export type { TrainingLogSnapshot } from './log/snapshot.js';
export {
	parseSnapshot,
	parseSnapshotJson,
	SNAPSHOT_VERSION,
} from './log/snapshot.js';
export type {
	BaseStatus,
	StatusRecord,
	StatusRecordOptions,
} from './log/status.js';
export { BASE_STATUS, createStatusRecord } from './log/status.js';
export type {
	OpenTrainingLogOptions,
	RestoreTrainingLogOptions,
	TrainingLog,
} from './log/training-log.js';
export {
	isValidTimestamp,
	openTrainingLog,
	restoreTrainingLog,
	serializeTrainingLog,
} from './log/training-log.js';
export type {
	Backend,
	BackendConfig,
	BackendKind,
	Entry,
	LogRecord,
	LogValue,
	MemoryBackendConfig,
	MemoryBackendData,
	MongoBackendConfig,
	NumericArray,
	SqliteBackendConfig,
} from './log/types.js';
export {
	isLogValue,
	isNumericArray,
	parseLogJson,
	stringifyLogJson,
	toPlainRecord,
	toPlainValue,
} from './log/values.js';
// ---- Logging ---------------------------------------------------------------
export type {
	ConsoleTransportOptions,
	LogEntry,
	Logger,
	LoggerOptions,
	LogLevel,
	LogTransport,
	MemoryTransportHandle,
} from './logger.js';
export {
	createConsoleTransport,
	createLogger,
	createMemoryTransport,
	createNoopLogger,
	formatMetadata,
	getDefaultLogger,
	isLogLevel,
	LOG_LEVELS,
	resolveLogLevel,
	setDefaultLogger,
} from './logger.js';
