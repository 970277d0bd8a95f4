// ---------------------------------------------------------------------------
// Mongo backend — lazy entries over a DocumentStore
// ---------------------------------------------------------------------------

import {
	createBackendClosedError,
	createInvalidFieldNameError,
} from '../../errors/index.js';
import { createLazyEntry } from '../../log/entry.js';
import type {
	Backend,
	Entry,
	LogRecord,
	LogValue,
	MongoBackendConfig,
} from '../../log/types.js';
import { toPlainValue } from '../../log/values.js';
import { createNoopLogger, type Logger } from '../../logger.js';
import type { DocumentStore, ExperimentSection } from './document-store.js';

export interface MongoBackendOptions {
	readonly experimentId: string;
	/** An open store for `config`. The backend owns it from here on. */
	readonly store: DocumentStore;
	readonly logger?: Logger;
	/** Creation time written when the experiment is new. */
	readonly now?: () => Date;
}

/**
 * Mongo treats `.` as a path separator and `$` as an operator prefix, so
 * such names cannot be set as a single field.
 */
const assertFieldName = (field: string): void => {
	if (field.length === 0 || field.includes('.') || field.startsWith('$')) {
		throw createInvalidFieldNameError(field, 'mongo');
	}
};

/** Entry documents are flat, so their scoping fields are taken. */
const ENTRY_SCOPE_FIELDS: ReadonlySet<string> = new Set([
	'_id',
	'experiment',
	'iteration',
]);

const assertEntryFieldName = (field: string): void => {
	assertFieldName(field);
	if (ENTRY_SCOPE_FIELDS.has(field)) {
		throw createInvalidFieldNameError(field, 'mongo');
	}
};

/**
 * Open a mongo backend: registers the experiment (without touching an
 * existing one) and returns a backend whose entries read lazily.
 */
export async function createMongoBackend(
	config: MongoBackendConfig,
	options: MongoBackendOptions,
): Promise<Backend> {
	const { experimentId, store } = options;
	const logger = (options.logger ?? createNoopLogger()).child('mongo');
	const now = options.now ?? (() => new Date());
	let closed = false;

	const guard = (operation: string): void => {
		if (closed) throw createBackendClosedError('mongo', operation);
	};

	const created = now();
	await store.ensureExperiment(experimentId, {
		created,
		info: { created: created.toISOString(), experimentId },
		status: { iterationsDone: 0, epochsDone: 0 },
	});
	logger.info('Experiment opened', {
		experimentId,
		host: config.host,
		port: config.port,
		database: config.database,
	});

	const sectionEntry = (section: ExperimentSection): Entry =>
		createLazyEntry({
			scope: { experimentId, section },
			materialize: async () => {
				guard(`read ${section}`);
				return (await store.findSection(experimentId, section)) ?? {};
			},
			write: async (key: string, value: LogValue) => {
				guard(`write ${section}`);
				assertFieldName(key);
				await store.setSectionField(
					experimentId,
					section,
					key,
					toPlainValue(value),
				);
			},
			remove: async (key: string) => {
				guard(`delete from ${section}`);
				assertFieldName(key);
				await store.unsetSectionField(experimentId, section, key);
			},
		});

	const getEntry = (timestamp: number): Entry =>
		createLazyEntry({
			scope: { experimentId, timestamp },
			materialize: async () => {
				guard('read entry');
				logger.debug('Materializing entry', { timestamp });
				return (await store.findEntry(experimentId, timestamp)) ?? {};
			},
			write: async (key: string, value: LogValue) => {
				guard('write entry');
				assertEntryFieldName(key);
				await store.setEntryField(
					experimentId,
					timestamp,
					key,
					toPlainValue(value),
				);
			},
			remove: async (key: string) => {
				guard('delete from entry');
				assertEntryFieldName(key);
				await store.unsetEntryField(experimentId, timestamp, key);
			},
		});

	const snapshotConfig: MongoBackendConfig = Object.freeze({ ...config });

	return Object.freeze({
		kind: 'mongo',
		experimentId,
		info: () => sectionEntry('info'),
		status: () => sectionEntry('status'),
		getEntry,

		async *timestamps(): AsyncGenerator<number> {
			guard('list timestamps');
			yield* await store.distinctIterations(experimentId);
		},

		async *items(): AsyncGenerator<readonly [number, LogRecord]> {
			guard('list entries');
			yield* store.findEntries(experimentId);
		},

		count: async () => {
			guard('count entries');
			return store.countEntries(experimentId);
		},

		toConfig: () => snapshotConfig,

		close: async () => {
			if (closed) return;
			closed = true;
			await store.close();
			logger.info('Experiment closed', { experimentId });
		},
	} satisfies Backend);
}
