// ---------------------------------------------------------------------------
// Log access errors — timestamps, keys, experiment ids, field names
// ---------------------------------------------------------------------------

import type { TrainingLogError } from './base.js';
import { createTrainingLogError, isTrainingLogError } from './base.js';

export const createInvalidTimestampError = (
	timestamp: unknown,
): TrainingLogError =>
	createTrainingLogError(`Invalid timestamp: ${String(timestamp)}`, {
		name: 'InvalidTimestampError',
		code: 'INVALID_TIMESTAMP',
		statusCode: 400,
		metadata: { timestamp },
	});

export const createKeyNotFoundError = (
	key: string,
	scope: Readonly<Record<string, unknown>> = {},
): TrainingLogError & { readonly key: string } =>
	Object.assign(
		createTrainingLogError(`Key not found: ${key}`, {
			name: 'KeyNotFoundError',
			code: 'KEY_NOT_FOUND',
			statusCode: 404,
			metadata: { key, ...scope },
		}),
		{ key },
	);

export const createInvalidExperimentIdError = (
	value: unknown,
	reason: string,
): TrainingLogError =>
	createTrainingLogError(`Invalid experiment id: ${reason}`, {
		name: 'InvalidExperimentIdError',
		code: 'INVALID_EXPERIMENT_ID',
		statusCode: 400,
		metadata: { value },
	});

export const createInvalidFieldNameError = (
	field: string,
	backend: string,
): TrainingLogError =>
	createTrainingLogError(
		`Field name "${field}" cannot be stored by the ${backend} backend`,
		{
			name: 'InvalidFieldNameError',
			code: 'INVALID_FIELD_NAME',
			statusCode: 400,
			metadata: { field, backend },
		},
	);

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isInvalidTimestampError = (
	value: unknown,
): value is TrainingLogError =>
	isTrainingLogError(value) && value.code === 'INVALID_TIMESTAMP';

export const isKeyNotFoundError = (
	value: unknown,
): value is TrainingLogError & { readonly key: string } =>
	isTrainingLogError(value) &&
	value.code === 'KEY_NOT_FOUND' &&
	'key' in value &&
	typeof value.key === 'string';

export const isInvalidExperimentIdError = (
	value: unknown,
): value is TrainingLogError =>
	isTrainingLogError(value) && value.code === 'INVALID_EXPERIMENT_ID';

export const isInvalidFieldNameError = (
	value: unknown,
): value is TrainingLogError =>
	isTrainingLogError(value) && value.code === 'INVALID_FIELD_NAME';
