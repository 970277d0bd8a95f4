import { describe, expect, it } from 'vitest';
import { isInvalidExperimentIdError } from '../src/errors/index.js';
import {
	EXPERIMENT_ID_BYTES,
	generateExperimentId,
	isExperimentId,
	parseExperimentId,
} from '../src/log/experiment-id.js';

const catchError = (fn: () => unknown): unknown => {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error('expected a throw');
};

describe('generateExperimentId', () => {
	it('should produce 24 lower-case hex characters', () => {
		const id = generateExperimentId();

		expect(id).toMatch(/^[0-9a-f]{24}$/);
		expect(id).toHaveLength(EXPERIMENT_ID_BYTES * 2);
		expect(isExperimentId(id)).toBe(true);
	});

	it('should not repeat across calls', () => {
		const ids = new Set(Array.from({ length: 50 }, generateExperimentId));

		expect(ids.size).toBe(50);
	});
});

describe('parseExperimentId', () => {
	it('should accept a 24-character hex id', () => {
		expect(parseExperimentId('0123456789abcdef01234567')).toBe(
			'0123456789abcdef01234567',
		);
	});

	it('should lower-case upper-case hex', () => {
		expect(parseExperimentId('ABCDEF0123456789ABCDEF01')).toBe(
			'abcdef0123456789abcdef01',
		);
	});

	it('should reject the wrong length', () => {
		const err = catchError(() => parseExperimentId('abcd'));

		expect(isInvalidExperimentIdError(err)).toBe(true);
		expect(err).toHaveProperty(
			'message',
			'Invalid experiment id: expected 12 bytes, got 2',
		);
	});

	it('should reject an odd number of digits', () => {
		const err = catchError(() =>
			parseExperimentId('0123456789abcdef0123456'),
		);

		expect(err).toHaveProperty(
			'message',
			'Invalid experiment id: not a hex string',
		);
	});

	it('should reject non-hex characters', () => {
		expect(
			isInvalidExperimentIdError(
				catchError(() => parseExperimentId('zz23456789abcdef01234567')),
			),
		).toBe(true);
	});

	it('should reject non-strings', () => {
		const err = catchError(() => parseExperimentId(12));

		expect(err).toHaveProperty(
			'message',
			'Invalid experiment id: expected a hex string',
		);
	});
});

describe('isExperimentId', () => {
	it('should check length and alphabet only', () => {
		expect(isExperimentId('0123456789abcdef01234567')).toBe(true);
		expect(isExperimentId('0123456789abcdef0123456')).toBe(false);
		expect(isExperimentId('g123456789abcdef01234567')).toBe(false);
		expect(isExperimentId(undefined)).toBe(false);
	});
});
