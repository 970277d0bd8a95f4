import { describe, expect, it } from 'vitest';
import {
	createBackendClosedError,
	createBackendUnavailableError,
	createConfigError,
	createConfigValidationError,
	createInvalidExperimentIdError,
	createInvalidFieldNameError,
	createInvalidTimestampError,
	createKeyNotFoundError,
	createSnapshotInvalidError,
	createTrainingLogError,
	createUnknownBackendError,
	hasErrorCode,
	isBackendClosedError,
	isBackendUnavailableError,
	isConfigError,
	isConfigValidationError,
	isInvalidExperimentIdError,
	isInvalidFieldNameError,
	isInvalidTimestampError,
	isKeyNotFoundError,
	isSnapshotInvalidError,
	isTrainingLogError,
	isUnknownBackendError,
	toError,
} from '../src/errors/index.js';

// ---------------------------------------------------------------------------
// TrainingLogError (base)
// ---------------------------------------------------------------------------

describe('createTrainingLogError', () => {
	it('should create an Error with defaults', () => {
		const err = createTrainingLogError('boom');

		expect(err).toBeInstanceOf(Error);
		expect(err.message).toBe('boom');
		expect(err.name).toBe('TrainingLogError');
		expect(err.code).toBe('TRAINING_LOG_ERROR');
		expect(err.statusCode).toBe(500);
		expect(err.metadata).toEqual({});
	});

	it('should freeze metadata', () => {
		const err = createTrainingLogError('boom', { metadata: { a: 1 } });

		expect(Object.isFrozen(err.metadata)).toBe(true);
	});

	it('should serialise through toJSON with a described cause', () => {
		const cause = new Error('root');
		const err = createTrainingLogError('wrapped', {
			name: 'CustomError',
			code: 'CUSTOM',
			statusCode: 418,
			cause,
			metadata: { key: 'loss' },
		});

		const json = err.toJSON();
		expect(json.name).toBe('CustomError');
		expect(json.code).toBe('CUSTOM');
		expect(json.message).toBe('wrapped');
		expect(json.statusCode).toBe(418);
		expect(json.metadata).toEqual({ key: 'loss' });
		expect(json.cause).toEqual({ name: 'Error', message: 'root' });
		expect(err.cause).toBe(cause);
	});
});

describe('isTrainingLogError / hasErrorCode / toError', () => {
	it('should reject plain errors and non-errors', () => {
		expect(isTrainingLogError(new Error('x'))).toBe(false);
		expect(isTrainingLogError({ code: 'X', statusCode: 1 })).toBe(false);
		expect(isTrainingLogError(null)).toBe(false);
	});

	it('should match an exact code', () => {
		const err = createInvalidTimestampError(-1);

		expect(hasErrorCode(err, 'INVALID_TIMESTAMP')).toBe(true);
		expect(hasErrorCode(err, 'KEY_NOT_FOUND')).toBe(false);
	});

	it('should return Error values unchanged and wrap the rest', () => {
		const err = new Error('same');

		expect(toError(err)).toBe(err);
		expect(toError('text').message).toBe('text');
		expect(isTrainingLogError(toError(42))).toBe(true);
	});
});

// ---------------------------------------------------------------------------
// Config errors
// ---------------------------------------------------------------------------

describe('config errors', () => {
	it('should create a generic config error', () => {
		const err = createConfigError('bad config');

		expect(err.name).toBe('ConfigError');
		expect(err.code).toBe('CONFIG_ERROR');
		expect(err.statusCode).toBe(400);
		expect(isConfigError(err)).toBe(true);
	});

	it('should summarise a single validation issue', () => {
		const err = createConfigValidationError([
			{ path: 'backend.port', message: 'Mongo port must be at most 65535' },
		]);

		expect(err.message).toBe(
			'Invalid configuration: Mongo port must be at most 65535',
		);
		expect(err.issues).toHaveLength(1);
		expect(isConfigValidationError(err)).toBe(true);
		expect(isConfigError(err)).toBe(true);
	});

	it('should count several validation issues', () => {
		const err = createConfigValidationError([
			{ path: 'a', message: 'x' },
			{ path: 'b', message: 'y' },
		]);

		expect(err.message).toBe('Invalid configuration: 2 validation errors');
	});

	it('should name the unknown backend', () => {
		const err = createUnknownBackendError('redis');

		expect(err.message).toBe('Unknown backend: redis');
		expect(err.code).toBe('CONFIG_UNKNOWN_BACKEND');
		expect(err.metadata.kind).toBe('redis');
		expect(isUnknownBackendError(err)).toBe(true);
		expect(isConfigError(err)).toBe(true);
		expect(isConfigValidationError(err)).toBe(false);
	});
});

// ---------------------------------------------------------------------------
// Log access errors
// ---------------------------------------------------------------------------

describe('log access errors', () => {
	it('should create an invalid timestamp error', () => {
		const err = createInvalidTimestampError(1.5);

		expect(err.message).toBe('Invalid timestamp: 1.5');
		expect(err.statusCode).toBe(400);
		expect(isInvalidTimestampError(err)).toBe(true);
	});

	it('should carry the key and scope of a missing key', () => {
		const err = createKeyNotFoundError('foo', { timestamp: 2 });

		expect(err.message).toBe('Key not found: foo');
		expect(err.key).toBe('foo');
		expect(err.statusCode).toBe(404);
		expect(err.metadata).toEqual({ key: 'foo', timestamp: 2 });
		expect(isKeyNotFoundError(err)).toBe(true);
		expect(isKeyNotFoundError(createInvalidTimestampError(0))).toBe(false);
	});

	it('should create an invalid experiment id error', () => {
		const err = createInvalidExperimentIdError('xyz', 'not a hex string');

		expect(err.message).toBe('Invalid experiment id: not a hex string');
		expect(err.metadata.value).toBe('xyz');
		expect(isInvalidExperimentIdError(err)).toBe(true);
	});

	it('should create an invalid field name error', () => {
		const err = createInvalidFieldNameError('a.b', 'mongo');

		expect(err.message).toBe(
			'Field name "a.b" cannot be stored by the mongo backend',
		);
		expect(isInvalidFieldNameError(err)).toBe(true);
	});
});

// ---------------------------------------------------------------------------
// Backend errors
// ---------------------------------------------------------------------------

describe('backend errors', () => {
	it('should create a backend unavailable error with its cause', () => {
		const cause = new Error("Cannot find package 'mongoose'");
		const err = createBackendUnavailableError('mongo', 'mongoose', { cause });

		expect(err.message).toBe(
			'The mongo backend is unavailable: could not load "mongoose"',
		);
		expect(err.statusCode).toBe(503);
		expect(err.cause).toBe(cause);
		expect(isBackendUnavailableError(err)).toBe(true);
	});

	it('should create a backend closed error', () => {
		const err = createBackendClosedError('sqlite', 'read entry');

		expect(err.message).toBe(
			'Cannot read entry: the sqlite backend has been closed',
		);
		expect(err.statusCode).toBe(409);
		expect(isBackendClosedError(err)).toBe(true);
	});

	it('should create a snapshot invalid error', () => {
		const err = createSnapshotInvalidError([
			{ path: 'version', message: 'Invalid literal value, expected 1' },
		]);

		expect(err.message).toBe('Invalid training log snapshot: 1 issue(s)');
		expect(err.metadata.issues).toEqual([
			{ path: 'version', message: 'Invalid literal value, expected 1' },
		]);
		expect(isSnapshotInvalidError(err)).toBe(true);
	});
});
