// ---------------------------------------------------------------------------
// Entries — eager (live record) and lazy (materialize once, write through)
// ---------------------------------------------------------------------------

import { createKeyNotFoundError } from '../errors/index.js';
import type { Entry, LogRecord, LogValue } from './types.js';

const lookup = (
	record: LogRecord,
	key: string,
	scope: Readonly<Record<string, unknown>>,
): unknown => {
	if (!Object.hasOwn(record, key)) throw createKeyNotFoundError(key, scope);
	return record[key];
};

// ---------------------------------------------------------------------------
// Eager entry
// ---------------------------------------------------------------------------

/**
 * Wrap a live record. Every operation acts on `record` directly, so the
 * entry always reflects the latest state.
 */
export function createEagerEntry(
	record: Record<string, unknown>,
	scope: Readonly<Record<string, unknown>> = {},
): Entry {
	return Object.freeze({
		get: async (key: string) => lookup(record, key, scope),
		has: async (key: string) => Object.hasOwn(record, key),
		set: async (key: string, value: LogValue) => {
			record[key] = value;
		},
		delete: async (key: string) => {
			delete record[key];
		},
		keys: async () => Object.keys(record),
		entries: async () => Object.entries(record),
		size: async () => Object.keys(record).length,
		toObject: async () => ({ ...record }),
	});
}

// ---------------------------------------------------------------------------
// Lazy entry
// ---------------------------------------------------------------------------

export interface LazyEntrySource {
	/** Fetch the full current snapshot; `{}` when nothing is stored. */
	readonly materialize: () => Promise<LogRecord>;
	/** Persist a single field. */
	readonly write: (key: string, value: LogValue) => Promise<void>;
	/** Remove a single field. */
	readonly remove: (key: string) => Promise<void>;
	/** Attached to `KEY_NOT_FOUND` errors (timestamp, experiment, ...). */
	readonly scope?: Readonly<Record<string, unknown>>;
}

/**
 * Create an entry that reads from storage at most once.
 *
 * The first read (`get`, `has`, `keys`, `entries`, `size`, `toObject`)
 * materializes the snapshot and caches it for the lifetime of this object.
 * `set` and `delete` are pushed straight to storage and do NOT touch the
 * cache: re-read through a fresh entry to observe them.
 */
export function createLazyEntry(source: LazyEntrySource): Entry {
	const scope = source.scope ?? {};
	let pending: Promise<LogRecord> | undefined;

	const snapshot = (): Promise<LogRecord> => {
		if (!pending) {
			pending = source.materialize().catch((error: unknown) => {
				// Failed reads are retried on the next access.
				pending = undefined;
				throw error;
			});
		}
		return pending;
	};

	return Object.freeze({
		get: async (key: string) => lookup(await snapshot(), key, scope),
		has: async (key: string) => Object.hasOwn(await snapshot(), key),
		set: (key: string, value: LogValue) => source.write(key, value),
		delete: (key: string) => source.remove(key),
		keys: async () => Object.keys(await snapshot()),
		entries: async () => Object.entries(await snapshot()),
		size: async () => Object.keys(await snapshot()).length,
		toObject: async () => ({ ...(await snapshot()) }),
	});
}
