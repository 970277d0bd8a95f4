// ---------------------------------------------------------------------------
// Training log snapshots
// ---------------------------------------------------------------------------
//
// A snapshot is plain JSON: identity, backend config, status and info, plus
// the entries themselves for the memory backend (which has nowhere else to
// keep them).  Live connections are never part of it; restoring reopens the
// backend from the config.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { createSnapshotInvalidError } from '../errors/index.js';
import { isExperimentId } from './experiment-id.js';
import { parseLogJson } from './values.js';

export const SNAPSHOT_VERSION = 1;

const recordSchema = z.record(z.string(), z.unknown());

const backendConfigSchema = z.discriminatedUnion('kind', [
	z.object({ kind: z.literal('memory') }),
	z.object({
		kind: z.literal('mongo'),
		host: z.string().min(1),
		port: z.number().int().min(1).max(65_535),
		database: z.string().min(1),
		timeoutMs: z.number().int().positive(),
	}),
	z.object({ kind: z.literal('sqlite'), path: z.string().min(1) }),
]);

export const snapshotSchema = z.object({
	version: z.literal(SNAPSHOT_VERSION),
	experimentId: z.string().refine(isExperimentId, {
		message: 'expected 24 hex characters',
	}),
	backend: backendConfigSchema,
	status: z.object({
		fields: recordSchema,
		exclude: z.array(z.string()),
	}),
	info: recordSchema,
	data: z
		.object({
			entries: z.array(z.tuple([z.number().int().nonnegative(), recordSchema])),
			info: recordSchema,
			status: recordSchema,
		})
		.optional(),
});

export type TrainingLogSnapshot = z.infer<typeof snapshotSchema>;

/**
 * Validate an untrusted snapshot object.
 *
 * @throws {SnapshotInvalidError} With one issue per failing path.
 */
export function parseSnapshot(value: unknown): TrainingLogSnapshot {
	const result = snapshotSchema.safeParse(value);
	if (!result.success) {
		throw createSnapshotInvalidError(
			result.error.issues.map((i) => ({
				path: i.path.join('.'),
				message: i.message,
			})),
			{ cause: result.error },
		);
	}
	return result.data;
}

/**
 * Parse a JSON string produced by `serializeTrainingLog`.
 */
export function parseSnapshotJson(json: string): TrainingLogSnapshot {
	let value: unknown;
	try {
		value = parseLogJson(json);
	} catch (error) {
		throw createSnapshotInvalidError(
			[{ path: '', message: 'snapshot is not valid JSON' }],
			{ cause: error },
		);
	}
	return parseSnapshot(value);
}
