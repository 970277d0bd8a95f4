// ---------------------------------------------------------------------------
// DocumentStore — the collection operations the mongo backend relies on
// ---------------------------------------------------------------------------
//
// Two collections:
//   experiments  { _id: <experimentId>, created, info: {...}, status: {...} }
//   entries      { experiment: <experimentId>, iteration: <int>, <field>: ... }
//
// Entry fields share the entry document with `_id`, `experiment` and
// `iteration`, so the backend refuses those three as field names.
//
// Every write touches one field of one document, so concurrent writers only
// rely on the server's per-document atomic upsert.
// ---------------------------------------------------------------------------

import type { LogRecord, MongoBackendConfig } from '../../log/types.js';

export type ExperimentSection = 'info' | 'status';

export interface ExperimentDefaults {
	readonly created: Date;
	readonly info: LogRecord;
	readonly status: LogRecord;
}

export interface DocumentStore {
	/** Insert the experiment document unless it already exists ($setOnInsert). */
	readonly ensureExperiment: (
		experimentId: string,
		defaults: ExperimentDefaults,
	) => Promise<void>;
	/** Entry fields for one iteration, without the scoping fields. */
	readonly findEntry: (
		experimentId: string,
		iteration: number,
	) => Promise<LogRecord | undefined>;
	/** Every entry of the experiment, ascending by iteration. */
	readonly findEntries: (
		experimentId: string,
	) => AsyncIterable<readonly [number, LogRecord]>;
	readonly setEntryField: (
		experimentId: string,
		iteration: number,
		field: string,
		value: unknown,
	) => Promise<void>;
	readonly unsetEntryField: (
		experimentId: string,
		iteration: number,
		field: string,
	) => Promise<void>;
	/** Distinct iterations of the experiment, ascending. */
	readonly distinctIterations: (experimentId: string) => Promise<number[]>;
	readonly countEntries: (experimentId: string) => Promise<number>;
	readonly findSection: (
		experimentId: string,
		section: ExperimentSection,
	) => Promise<LogRecord | undefined>;
	readonly setSectionField: (
		experimentId: string,
		section: ExperimentSection,
		field: string,
		value: unknown,
	) => Promise<void>;
	readonly unsetSectionField: (
		experimentId: string,
		section: ExperimentSection,
		field: string,
	) => Promise<void>;
	readonly close: () => Promise<void>;
}

/** Opens a store from a serialisable config. */
export type DocumentStoreConnector = (
	config: MongoBackendConfig,
) => Promise<DocumentStore>;
