// ---------------------------------------------------------------------------
// StatusRecord — the training loop's progress counters
// ---------------------------------------------------------------------------
//
// A small mutable mapping owned by the log.  It always holds
// `iterationsDone` and `epochsDone`; the loop may add anything else
// (`epochEnds`, flags, ...).  Excluded names stay readable and writable but
// are skipped by `keys()` and `size`, so they don't show up when the
// status is printed.
// ---------------------------------------------------------------------------

import {
	createKeyNotFoundError,
	createTrainingLogError,
} from '../errors/index.js';
import type { LogValue } from './types.js';

export interface BaseStatus {
	readonly iterationsDone: number;
	readonly epochsDone: number;
}

export const BASE_STATUS: BaseStatus = Object.freeze({
	iterationsDone: 0,
	epochsDone: 0,
});

export interface StatusRecordOptions {
	/** Names hidden from `keys()` / `size`. */
	readonly exclude?: readonly string[];
	/** Values applied over the base counters. */
	readonly initial?: Readonly<Record<string, unknown>>;
}

export interface StatusRecord {
	readonly get: (name: string) => unknown;
	readonly set: (name: string, value: LogValue) => void;
	readonly has: (name: string) => boolean;
	readonly keys: () => Iterable<string>;
	readonly size: number;
	readonly exclude: readonly string[];
	/** Shorthand for `get('iterationsDone')`, checked to be an integer. */
	iterationsDone: number;
	/** Shorthand for `get('epochsDone')`, checked to be an integer. */
	epochsDone: number;
	/** Every field, excluded ones included. */
	readonly toObject: () => Record<string, unknown>;
	/** Names set since the last `markClean()`. */
	readonly dirtyKeys: () => string[];
	readonly markClean: () => void;
}

export function createStatusRecord(
	options: StatusRecordOptions = {},
): StatusRecord {
	const exclude = Object.freeze([...(options.exclude ?? [])]);
	const excluded = new Set(exclude);
	const fields = new Map<string, unknown>(Object.entries(BASE_STATUS));
	const dirty = new Set<string>();

	for (const [name, value] of Object.entries(options.initial ?? {})) {
		fields.set(name, value);
	}

	const get = (name: string): unknown => {
		if (!fields.has(name)) throw createKeyNotFoundError(name, { status: true });
		return fields.get(name);
	};

	const set = (name: string, value: LogValue): void => {
		fields.set(name, value);
		dirty.add(name);
	};

	const counter = (name: keyof BaseStatus): number => {
		const value = get(name);
		if (typeof value !== 'number' || !Number.isInteger(value)) {
			throw createTrainingLogError(
				`status.${name} is not an integer: ${String(value)}`,
				{ name: 'StatusError', code: 'STATUS_INVALID', metadata: { name } },
			);
		}
		return value;
	};

	const visible = (): string[] =>
		[...fields.keys()].filter((name) => !excluded.has(name));

	return {
		get,
		set,
		has: (name) => fields.has(name),
		keys: () => ({
			*[Symbol.iterator]() {
				for (const name of fields.keys()) {
					if (!excluded.has(name)) yield name;
				}
			},
		}),
		get size() {
			return visible().length;
		},
		exclude,
		get iterationsDone() {
			return counter('iterationsDone');
		},
		set iterationsDone(value: number) {
			set('iterationsDone', value);
		},
		get epochsDone() {
			return counter('epochsDone');
		},
		set epochsDone(value: number) {
			set('epochsDone', value);
		},
		toObject: () => Object.fromEntries(fields),
		dirtyKeys: () => [...dirty],
		markClean: () => {
			dirty.clear();
		},
	};
}
