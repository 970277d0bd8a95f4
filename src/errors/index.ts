// ---------------------------------------------------------------------------
// Error barrel — re-exports all error factories, type guards, and utilities
// ---------------------------------------------------------------------------

export {
	createBackendClosedError,
	createBackendUnavailableError,
	createSnapshotInvalidError,
	isBackendClosedError,
	isBackendUnavailableError,
	isSnapshotInvalidError,
} from './backend.js';
export {
	createTrainingLogError,
	hasErrorCode,
	isTrainingLogError,
	type TrainingLogError,
	type TrainingLogErrorOptions,
	toError,
} from './base.js';
export {
	type ConfigIssue,
	createConfigError,
	createConfigValidationError,
	createUnknownBackendError,
	isConfigError,
	isConfigValidationError,
	isUnknownBackendError,
} from './config.js';
export {
	createInvalidExperimentIdError,
	createInvalidFieldNameError,
	createInvalidTimestampError,
	createKeyNotFoundError,
	isInvalidExperimentIdError,
	isInvalidFieldNameError,
	isInvalidTimestampError,
	isKeyNotFoundError,
} from './log.js';
