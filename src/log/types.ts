// ---------------------------------------------------------------------------
// Training log — shared types
// ---------------------------------------------------------------------------

export type NumericArray =
	| Float32Array
	| Float64Array
	| Int8Array
	| Int16Array
	| Int32Array
	| Uint8Array
	| Uint8ClampedArray
	| Uint16Array
	| Uint32Array;

/** Anything a caller may record under an entry or status field. */
export type LogValue =
	| null
	| boolean
	| number
	| string
	| NumericArray
	| readonly LogValue[]
	| { readonly [key: string]: LogValue };

/** A materialized entry: field name to stored value. */
export type LogRecord = Readonly<Record<string, unknown>>;

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

/**
 * All data recorded at one timestamp, exposed as an associative record.
 *
 * Database-backed entries read lazily: the first read fetches the whole
 * snapshot and every later read on the same object is served from it.
 * Writes go straight to storage and leave that snapshot untouched.
 */
export interface Entry {
	/** Value stored under `key`; rejects with `KEY_NOT_FOUND` when absent. */
	readonly get: (key: string) => Promise<unknown>;
	readonly has: (key: string) => Promise<boolean>;
	readonly set: (key: string, value: LogValue) => Promise<void>;
	readonly delete: (key: string) => Promise<void>;
	readonly keys: () => Promise<string[]>;
	readonly entries: () => Promise<Array<[string, unknown]>>;
	readonly size: () => Promise<number>;
	/** Shallow copy of the entry's fields. */
	readonly toObject: () => Promise<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Backend configuration
// ---------------------------------------------------------------------------

export interface MemoryBackendConfig {
	readonly kind: 'memory';
}

export interface MongoBackendConfig {
	readonly kind: 'mongo';
	readonly host: string;
	readonly port: number;
	readonly database: string;
	/** Server selection / connect timeout in milliseconds. */
	readonly timeoutMs: number;
}

export interface SqliteBackendConfig {
	readonly kind: 'sqlite';
	readonly path: string;
}

/** Serialisable backend description. Never holds live handles. */
export type BackendConfig =
	| MemoryBackendConfig
	| MongoBackendConfig
	| SqliteBackendConfig;

export type BackendKind = BackendConfig['kind'];

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

/** Data a memory backend hands over so it can be rebuilt elsewhere. */
export interface MemoryBackendData {
	readonly entries: ReadonlyArray<readonly [number, LogRecord]>;
	readonly info: LogRecord;
	readonly status: LogRecord;
}

export interface Backend {
	readonly kind: BackendKind;
	readonly experimentId: string;
	/** Experiment metadata (creation time, id, caller extensions). */
	readonly info: () => Entry;
	/** Persisted copy of the loop's status counters. */
	readonly status: () => Entry;
	readonly getEntry: (timestamp: number) => Entry;
	readonly timestamps: () => AsyncIterable<number>;
	readonly items: () => AsyncIterable<readonly [number, LogRecord]>;
	readonly count: () => Promise<number>;
	readonly toConfig: () => BackendConfig;
	/** Only backends without durable storage provide this. */
	readonly exportData?: () => MemoryBackendData;
	readonly close: () => Promise<void>;
}
