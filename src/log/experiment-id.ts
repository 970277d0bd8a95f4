import { Buffer } from 'node:buffer';
import { randomBytes } from 'node:crypto';
import { createInvalidExperimentIdError } from '../errors/index.js';

/** Raw length of an experiment id; its hex form is twice as long. */
export const EXPERIMENT_ID_BYTES = 12;

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * A fresh experiment id: 12 random bytes, hex encoded.
 */
export const generateExperimentId = (): string =>
	randomBytes(EXPERIMENT_ID_BYTES).toString('hex');

/**
 * Validate a caller-supplied id and return it in lower case.
 *
 * @throws {InvalidExperimentIdError} When the value is not hex or does not
 *   decode to exactly 12 bytes.
 */
export function parseExperimentId(value: unknown): string {
	if (typeof value !== 'string') {
		throw createInvalidExperimentIdError(value, 'expected a hex string');
	}
	if (!HEX_PATTERN.test(value) || value.length % 2 !== 0) {
		throw createInvalidExperimentIdError(value, 'not a hex string');
	}
	const bytes = Buffer.from(value, 'hex');
	if (bytes.length !== EXPERIMENT_ID_BYTES) {
		throw createInvalidExperimentIdError(
			value,
			`expected ${EXPERIMENT_ID_BYTES} bytes, got ${bytes.length}`,
		);
	}
	return bytes.toString('hex');
}

export const isExperimentId = (value: unknown): value is string =>
	typeof value === 'string' &&
	value.length === EXPERIMENT_ID_BYTES * 2 &&
	HEX_PATTERN.test(value);
