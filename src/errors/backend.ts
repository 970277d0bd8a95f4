// ---------------------------------------------------------------------------
// Backend Errors — driver availability, lifecycle, snapshots
// ---------------------------------------------------------------------------

import type { TrainingLogError } from './base.js';
import { createTrainingLogError, isTrainingLogError } from './base.js';

export const createBackendUnavailableError = (
	backend: string,
	driver: string,
	options: { cause?: unknown } = {},
): TrainingLogError =>
	createTrainingLogError(
		`The ${backend} backend is unavailable: could not load "${driver}"`,
		{
			name: 'BackendUnavailableError',
			code: 'BACKEND_UNAVAILABLE',
			statusCode: 503,
			cause: options.cause,
			metadata: { backend, driver },
		},
	);

export const createBackendClosedError = (
	backend: string,
	operation: string,
): TrainingLogError =>
	createTrainingLogError(
		`Cannot ${operation}: the ${backend} backend has been closed`,
		{
			name: 'BackendClosedError',
			code: 'BACKEND_CLOSED',
			statusCode: 409,
			metadata: { backend, operation },
		},
	);

export const createSnapshotInvalidError = (
	issues: ReadonlyArray<{ readonly path: string; readonly message: string }>,
	options: { cause?: unknown } = {},
): TrainingLogError =>
	createTrainingLogError(
		`Invalid training log snapshot: ${issues.length} issue(s)`,
		{
			name: 'SnapshotInvalidError',
			code: 'SNAPSHOT_INVALID',
			statusCode: 400,
			cause: options.cause,
			metadata: { issues },
		},
	);

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isBackendUnavailableError = (
	value: unknown,
): value is TrainingLogError =>
	isTrainingLogError(value) && value.code === 'BACKEND_UNAVAILABLE';

export const isBackendClosedError = (
	value: unknown,
): value is TrainingLogError =>
	isTrainingLogError(value) && value.code === 'BACKEND_CLOSED';

export const isSnapshotInvalidError = (
	value: unknown,
): value is TrainingLogError =>
	isTrainingLogError(value) && value.code === 'SNAPSHOT_INVALID';
