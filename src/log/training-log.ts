// ---------------------------------------------------------------------------
// TrainingLog — the façade over one status record and one backend
// ---------------------------------------------------------------------------

import { type BackendConnectors, openBackend } from '../backends/index.js';
import { defineLogConfig, type LogConfigInput } from '../config/settings.js';
import { createInvalidTimestampError } from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { generateExperimentId, parseExperimentId } from './experiment-id.js';
import {
	parseSnapshot,
	parseSnapshotJson,
	SNAPSHOT_VERSION,
	type TrainingLogSnapshot,
} from './snapshot.js';
import { createStatusRecord, type StatusRecord } from './status.js';
import type {
	Backend,
	BackendConfig,
	BackendKind,
	Entry,
	LogRecord,
	LogValue,
	MemoryBackendData,
} from './types.js';
import { isLogValue, stringifyLogJson, toPlainRecord } from './values.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface TrainingLog {
	readonly experimentId: string;
	readonly backendKind: BackendKind;
	/** The loop's progress counters. Call `commitStatus()` to persist edits. */
	readonly status: StatusRecord;
	/** Experiment metadata; every call returns a fresh entry. */
	readonly info: () => Entry;
	/**
	 * The entry at `timestamp`. Returned without I/O; database backends read
	 * on first access.
	 *
	 * @throws {InvalidTimestampError} Unless `timestamp` is a non-negative
	 *   safe integer.
	 */
	readonly get: (timestamp: number) => Entry;
	/** `get(status.iterationsDone)` */
	readonly currentEntry: () => Entry;
	/** `get(status.iterationsDone - 1)`; throws before the first iteration. */
	readonly previousEntry: () => Entry;
	readonly timestamps: () => AsyncIterable<number>;
	readonly items: () => AsyncIterable<readonly [number, LogRecord]>;
	readonly size: () => Promise<number>;
	/** Write status fields changed since the last commit to the backend. */
	readonly commitStatus: () => Promise<void>;
	readonly toSnapshot: () => Promise<TrainingLogSnapshot>;
	/** Release the backend's connection. The log is unusable afterwards. */
	readonly close: () => Promise<void>;
}

export interface OpenTrainingLogOptions extends LogConfigInput {
	readonly logger?: Logger;
	readonly connectors?: BackendConnectors;
	/** Clock used for `info.created`. */
	readonly now?: () => Date;
}

export interface RestoreTrainingLogOptions {
	readonly logger?: Logger;
	readonly connectors?: BackendConnectors;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const isValidTimestamp = (value: unknown): value is number =>
	typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;

interface RestoreState {
	readonly status: Readonly<Record<string, unknown>>;
	readonly memoryData?: MemoryBackendData;
}

async function seedMissing(
	entry: Entry,
	fields: Readonly<Record<string, LogValue>>,
): Promise<void> {
	const present = new Set(await entry.keys());
	for (const [key, value] of Object.entries(fields)) {
		if (!present.has(key)) await entry.set(key, value);
	}
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

async function open(
	options: OpenTrainingLogOptions,
	restore?: RestoreState,
): Promise<TrainingLog> {
	// Everything that can be rejected is checked before a connection exists.
	const config = defineLogConfig(options);
	const experimentId =
		config.experimentId !== undefined
			? parseExperimentId(config.experimentId)
			: generateExperimentId();
	const logger = (options.logger ?? getDefaultLogger()).child('log');
	const now = options.now ?? (() => new Date());

	const backend: Backend = await openBackend(config.backend, {
		experimentId,
		logger,
		connectors: options.connectors,
		memoryData: restore?.memoryData,
		now,
	});

	const status = createStatusRecord({ exclude: config.statusExclude });
	const commitStatus = async (): Promise<void> => {
		const dirty = status.dirtyKeys();
		if (dirty.length === 0) return;
		const target = backend.status();
		const fields = status.toObject();
		for (const key of dirty) {
			const value = fields[key];
			if (isLogValue(value)) {
				await target.set(key, value);
			} else {
				logger.warn('Status field is not storable, skipped', { key });
			}
		}
		status.markClean();
		logger.debug('Status committed', { fields: dirty });
	};

	try {
		await seedMissing(backend.info(), {
			created: now().toISOString(),
			experimentId,
		});
		// Resume whatever the backend persisted for this experiment.
		for (const [key, value] of Object.entries(
			await backend.status().toObject(),
		)) {
			if (isLogValue(value)) status.set(key, value);
		}
		status.markClean();
		// A snapshot is newer than the backend's copy, so its values are
		// applied as edits and committed.
		for (const [key, value] of Object.entries(restore?.status ?? {})) {
			if (isLogValue(value)) status.set(key, value);
		}
		await seedMissing(backend.status(), {
			iterationsDone: status.iterationsDone,
			epochsDone: status.epochsDone,
		});
		await commitStatus();
	} catch (error) {
		await backend.close();
		throw error;
	}

	logger.info('Training log opened', {
		experimentId,
		backend: backend.kind,
		iterationsDone: status.iterationsDone,
		restored: restore !== undefined,
	});

	const get = (timestamp: number): Entry => {
		if (!isValidTimestamp(timestamp)) {
			throw createInvalidTimestampError(timestamp);
		}
		return backend.getEntry(timestamp);
	};

	const toSnapshot = async (): Promise<TrainingLogSnapshot> => ({
		version: SNAPSHOT_VERSION,
		experimentId,
		backend: backend.toConfig(),
		status: {
			fields: toPlainRecord(status.toObject()),
			exclude: [...status.exclude],
		},
		info: toPlainRecord(await backend.info().toObject()),
		...(backend.exportData
			? { data: toSnapshotData(backend.exportData()) }
			: {}),
	});

	return Object.freeze({
		experimentId,
		backendKind: backend.kind,
		status,
		info: () => backend.info(),
		get,
		currentEntry: () => get(status.iterationsDone),
		previousEntry: () => get(status.iterationsDone - 1),
		timestamps: () => backend.timestamps(),
		items: () => backend.items(),
		size: () => backend.count(),
		commitStatus,
		toSnapshot,
		close: async () => {
			await backend.close();
			logger.info('Training log closed', { experimentId });
		},
	} satisfies TrainingLog);
}

const toSnapshotData = (
	data: MemoryBackendData,
): NonNullable<TrainingLogSnapshot['data']> => ({
	entries: data.entries.map(
		([timestamp, record]): [number, Record<string, unknown>] => [
			timestamp,
			{ ...record },
		],
	),
	info: { ...data.info },
	status: { ...data.status },
});

/**
 * Open (or resume) a training log.
 *
 * @example
 * ```ts
 * const log = await openTrainingLog({ backend: { kind: 'memory' } });
 * await log.get(0).set('loss', 0.42);
 * log.status.iterationsDone += 1;
 * await log.previousEntry().get('loss'); // 0.42
 * ```
 *
 * Passing the `experimentId` of an existing experiment on a database
 * backend resumes it: its info is kept and the status is loaded.
 *
 * @throws {ConfigError} For an unknown backend or invalid backend options.
 * @throws {InvalidExperimentIdError} For a malformed `experimentId`.
 * @throws {BackendUnavailableError} When the backend's driver is missing.
 */
export const openTrainingLog = (
	options: OpenTrainingLogOptions = {},
): Promise<TrainingLog> => open(options);

/**
 * Rebuild a log from `toSnapshot()` output (or its JSON). The backend is
 * reconnected from the stored config; snapshot status values win over
 * persisted ones.
 */
export async function restoreTrainingLog(
	snapshot: TrainingLogSnapshot | string,
	options: RestoreTrainingLogOptions = {},
): Promise<TrainingLog> {
	const parsed =
		typeof snapshot === 'string'
			? parseSnapshotJson(snapshot)
			: parseSnapshot(snapshot);
	const backend: BackendConfig = parsed.backend;

	return open(
		{
			backend,
			experimentId: parsed.experimentId,
			statusExclude: parsed.status.exclude,
			logger: options.logger,
			connectors: options.connectors,
		},
		{ status: parsed.status.fields, memoryData: parsed.data },
	);
}

/**
 * Serialize a log to JSON. Connections are not part of the output.
 */
export async function serializeTrainingLog(log: TrainingLog): Promise<string> {
	return stringifyLogJson(await log.toSnapshot());
}
