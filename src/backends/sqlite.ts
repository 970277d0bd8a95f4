// ---------------------------------------------------------------------------
// SQLite backend — append-only rows folded into lazy entries
// ---------------------------------------------------------------------------
//
// Entry writes INSERT a new (experiment, iteration, key, value) row and never
// update in place.  Reads fold the rows of a timestamp in rowid order, so
// the last write of a key wins.  Deletes append a tombstone (SQL NULL value)
// which the fold treats as "key removed".  Values are JSON text, with
// non-finite numbers tagged (see `stringifyLogJson`).
// ---------------------------------------------------------------------------

import type Database from 'better-sqlite3';
import {
	createBackendClosedError,
	createBackendUnavailableError,
} from '../errors/index.js';
import { createLazyEntry } from '../log/entry.js';
import type {
	Backend,
	Entry,
	LogRecord,
	LogValue,
	SqliteBackendConfig,
} from '../log/types.js';
import {
	parseLogJson,
	stringifyLogJson,
	toPlainValue,
} from '../log/values.js';
import { createNoopLogger, type Logger } from '../logger.js';

const importBetterSqlite3 = (): Promise<{
	default: typeof Database;
	prototype: Database.Database;
	SqliteError: Database.SqliteError;
}> => import('better-sqlite3');

export type SqliteDatabase = Database.Database;
export type BetterSqlite3Module = Awaited<
	ReturnType<typeof importBetterSqlite3>
>;
export type SqliteConnector = (
	config: SqliteBackendConfig,
) => Promise<SqliteDatabase>;

type Section = 'info' | 'status';

interface KeyValueRow {
	readonly key: string;
	readonly value: string | null;
}

interface IterationRow extends KeyValueRow {
	readonly iteration: number;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS log (
  experiment TEXT NOT NULL,
  iteration  INTEGER NOT NULL,
  key        TEXT NOT NULL,
  value
);
CREATE INDEX IF NOT EXISTS idx_log_experiment_iteration ON log(experiment, iteration);
CREATE TABLE IF NOT EXISTS metadata (
  experiment TEXT NOT NULL,
  section    TEXT NOT NULL,
  key        TEXT NOT NULL,
  value,
  PRIMARY KEY (experiment, section, key)
);
`;

// ---------------------------------------------------------------------------
// Connector
// ---------------------------------------------------------------------------

/**
 * Create the default connector. better-sqlite3 is loaded when the first
 * file is opened; a missing module becomes `BACKEND_UNAVAILABLE`.
 */
export function createSqliteOpener(
	options: { readonly load?: () => Promise<BetterSqlite3Module> } = {},
): SqliteConnector {
	const load = options.load ?? importBetterSqlite3;

	return async (config: SqliteBackendConfig): Promise<SqliteDatabase> => {
		let mod: BetterSqlite3Module;
		try {
			mod = await load();
		} catch (error) {
			throw createBackendUnavailableError('sqlite', 'better-sqlite3', {
				cause: error,
			});
		}
		const db = new mod.default(config.path);
		db.pragma('journal_mode = WAL');
		db.pragma('busy_timeout = 3000');
		return db;
	};
}

// ---------------------------------------------------------------------------
// Row folding
// ---------------------------------------------------------------------------

const encode = (value: LogValue): string =>
	stringifyLogJson(toPlainValue(value));

const decode = (value: string): unknown => parseLogJson(value);

/**
 * Fold rows in insertion order: later rows replace earlier ones and a
 * tombstone removes the key.
 */
export function foldRows(rows: Iterable<KeyValueRow>): Record<string, unknown> {
	const record: Record<string, unknown> = {};
	for (const row of rows) {
		if (row.value === null) {
			delete record[row.key];
		} else {
			record[row.key] = decode(row.value);
		}
	}
	return record;
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export interface SqliteBackendOptions {
	readonly experimentId: string;
	/** An open database for `config.path`. The backend owns it from here on. */
	readonly database: SqliteDatabase;
	readonly logger?: Logger;
	readonly now?: () => Date;
}

export function createSqliteBackend(
	config: SqliteBackendConfig,
	options: SqliteBackendOptions,
): Backend {
	const { experimentId, database: db } = options;
	const logger = (options.logger ?? createNoopLogger()).child('sqlite');
	const now = options.now ?? (() => new Date());
	let closed = false;

	db.exec(SCHEMA);

	const insertRow = db.prepare<[string, number, string, string | null]>(
		'INSERT INTO log (experiment, iteration, key, value) VALUES (?, ?, ?, ?)',
	);
	const selectEntry = db.prepare<[string, number], KeyValueRow>(
		'SELECT key, value FROM log WHERE experiment = ? AND iteration = ? ORDER BY rowid',
	);
	const selectAll = db.prepare<[string], IterationRow>(
		'SELECT iteration, key, value FROM log WHERE experiment = ? ORDER BY iteration, rowid',
	);
	const selectIterations = db.prepare<[string], { iteration: number }>(
		'SELECT DISTINCT iteration FROM log WHERE experiment = ? ORDER BY iteration',
	);
	const selectAnyRow = db.prepare<[string, number], { found: number }>(
		'SELECT 1 AS found FROM log WHERE experiment = ? AND iteration = ? LIMIT 1',
	);
	const countIterations = db.prepare<[string], { count: number }>(
		'SELECT COUNT(DISTINCT iteration) AS count FROM log WHERE experiment = ?',
	);
	const selectSection = db.prepare<[string, Section], KeyValueRow>(
		'SELECT key, value FROM metadata WHERE experiment = ? AND section = ?',
	);
	const upsertField = db.prepare<[string, Section, string, string]>(
		'INSERT INTO metadata (experiment, section, key, value) VALUES (?, ?, ?, ?) ' +
			'ON CONFLICT (experiment, section, key) DO UPDATE SET value = excluded.value',
	);
	const seedField = db.prepare<[string, Section, string, string]>(
		'INSERT OR IGNORE INTO metadata (experiment, section, key, value) VALUES (?, ?, ?, ?)',
	);
	const deleteField = db.prepare<[string, Section, string]>(
		'DELETE FROM metadata WHERE experiment = ? AND section = ? AND key = ?',
	);

	const guard = (operation: string): void => {
		if (closed) throw createBackendClosedError('sqlite', operation);
	};

	// Seed metadata without overwriting an experiment that already exists.
	const created = now().toISOString();
	db.transaction(() => {
		seedField.run(experimentId, 'info', 'created', encode(created));
		seedField.run(experimentId, 'info', 'experimentId', encode(experimentId));
		seedField.run(experimentId, 'status', 'iterationsDone', encode(0));
		seedField.run(experimentId, 'status', 'epochsDone', encode(0));
	})();
	logger.info('Experiment opened', { experimentId, path: config.path });

	const sectionEntry = (section: Section): Entry =>
		createLazyEntry({
			scope: { experimentId, section },
			materialize: async () => {
				guard(`read ${section}`);
				return foldRows(selectSection.all(experimentId, section));
			},
			write: async (key: string, value: LogValue) => {
				guard(`write ${section}`);
				upsertField.run(experimentId, section, key, encode(value));
			},
			remove: async (key: string) => {
				guard(`delete from ${section}`);
				deleteField.run(experimentId, section, key);
			},
		});

	const getEntry = (timestamp: number): Entry =>
		createLazyEntry({
			scope: { experimentId, timestamp },
			materialize: async () => {
				guard('read entry');
				return foldRows(selectEntry.all(experimentId, timestamp));
			},
			write: async (key: string, value: LogValue) => {
				guard('write entry');
				insertRow.run(experimentId, timestamp, key, encode(value));
			},
			remove: async (key: string) => {
				guard('delete from entry');
				// Nothing to remove from a timestamp that was never written.
				if (selectAnyRow.get(experimentId, timestamp) === undefined) return;
				insertRow.run(experimentId, timestamp, key, null);
			},
		});

	const snapshotConfig: SqliteBackendConfig = Object.freeze({ ...config });

	return Object.freeze({
		kind: 'sqlite',
		experimentId,
		info: () => sectionEntry('info'),
		status: () => sectionEntry('status'),
		getEntry,

		async *timestamps(): AsyncGenerator<number> {
			guard('list timestamps');
			for (const row of selectIterations.all(experimentId)) {
				yield row.iteration;
			}
		},

		async *items(): AsyncGenerator<readonly [number, LogRecord]> {
			guard('list entries');
			let current: number | undefined;
			let group: KeyValueRow[] = [];
			for (const row of selectAll.all(experimentId)) {
				if (current !== undefined && row.iteration !== current) {
					yield [current, foldRows(group)] as const;
					group = [];
				}
				current = row.iteration;
				group.push(row);
			}
			if (current !== undefined) yield [current, foldRows(group)] as const;
		},

		count: async () => {
			guard('count entries');
			return countIterations.get(experimentId)?.count ?? 0;
		},

		toConfig: () => snapshotConfig,

		close: async () => {
			if (closed) return;
			closed = true;
			db.close();
			logger.info('Experiment closed', { experimentId, path: config.path });
		},
	} satisfies Backend);
}
