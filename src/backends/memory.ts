// ---------------------------------------------------------------------------
// In-memory backend
// ---------------------------------------------------------------------------
//
// Entries live in an insertion-ordered Map.  Looking up an absent timestamp
// creates and keeps an empty record, and the returned entry is a live view
// of it, so no caching is involved.
// ---------------------------------------------------------------------------

import { createEagerEntry } from '../log/entry.js';
import type {
	Backend,
	Entry,
	LogRecord,
	MemoryBackendConfig,
	MemoryBackendData,
} from '../log/types.js';
import { toPlainRecord } from '../log/values.js';
import { createNoopLogger, type Logger } from '../logger.js';

export interface MemoryBackendOptions {
	readonly experimentId: string;
	/** Data exported by a previous memory backend. */
	readonly data?: MemoryBackendData;
	readonly logger?: Logger;
}

export function createMemoryBackend(options: MemoryBackendOptions): Backend {
	const { experimentId } = options;
	const logger = (options.logger ?? createNoopLogger()).child('memory');
	const records = new Map<number, Record<string, unknown>>();
	const info = toPlainRecord(options.data?.info ?? {});
	const status = toPlainRecord(options.data?.status ?? {});

	// Restored data is copied in full so two restores never share values.
	for (const [timestamp, record] of options.data?.entries ?? []) {
		records.set(timestamp, toPlainRecord(record));
	}

	const recordAt = (timestamp: number): Record<string, unknown> => {
		let record = records.get(timestamp);
		if (!record) {
			record = {};
			records.set(timestamp, record);
		}
		return record;
	};

	const config: MemoryBackendConfig = Object.freeze({ kind: 'memory' });

	logger.debug('Memory backend ready', {
		experimentId,
		restoredEntries: records.size,
	});

	return Object.freeze({
		kind: 'memory',
		experimentId,
		info: () => createEagerEntry(info, { section: 'info' }),
		status: () => createEagerEntry(status, { section: 'status' }),

		getEntry: (timestamp: number): Entry =>
			createEagerEntry(recordAt(timestamp), { timestamp }),

		async *timestamps(): AsyncGenerator<number> {
			for (const timestamp of [...records.keys()]) yield timestamp;
		},

		async *items(): AsyncGenerator<readonly [number, LogRecord]> {
			for (const [timestamp, record] of [...records]) {
				yield [timestamp, { ...record }] as const;
			}
		},

		count: async () => records.size,

		toConfig: () => config,

		exportData: (): MemoryBackendData => ({
			entries: [...records].map(
				([timestamp, record]) => [timestamp, toPlainRecord(record)] as const,
			),
			info: toPlainRecord(info),
			status: toPlainRecord(status),
		}),

		close: async () => {
			logger.debug('Memory backend closed', { experimentId });
		},
	} satisfies Backend);
}
