// ---------------------------------------------------------------------------
// Value conversion for stores that only hold JSON-like data
// ---------------------------------------------------------------------------

import type { LogValue, NumericArray } from './types.js';

const NUMERIC_ARRAY_TYPES = [
	Float32Array,
	Float64Array,
	Int8Array,
	Int16Array,
	Int32Array,
	Uint8Array,
	Uint8ClampedArray,
	Uint16Array,
	Uint32Array,
] as const;

export const isNumericArray = (value: unknown): value is NumericArray =>
	NUMERIC_ARRAY_TYPES.some((type) => value instanceof type);

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
	if (typeof value !== 'object' || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
};

/**
 * Replace numeric typed arrays, at any depth, with plain number arrays.
 * Everything else is returned as is (arrays and plain objects are copied).
 */
export function toPlainValue(value: unknown): unknown {
	if (isNumericArray(value)) return Array.from(value);
	if (Array.isArray(value)) return value.map(toPlainValue);
	if (isPlainObject(value)) {
		const out: Record<string, unknown> = {};
		for (const [key, item] of Object.entries(value)) {
			out[key] = toPlainValue(item);
		}
		return out;
	}
	return value;
}

/**
 * Convert every field of a record with {@link toPlainValue}.
 */
export const toPlainRecord = (
	record: Readonly<Record<string, unknown>>,
): Record<string, unknown> => {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(record)) {
		out[key] = toPlainValue(value);
	}
	return out;
};

/**
 * Structural check for {@link LogValue}: JSON-like data, any number
 * (non-finite included) and numeric typed arrays, at any depth. Cyclic
 * values fail.
 */
export function isLogValue(value: unknown): value is LogValue {
	return checkLogValue(value, new Set());
}

function checkLogValue(value: unknown, ancestors: Set<object>): boolean {
	if (value === null) return true;
	switch (typeof value) {
		case 'boolean':
		case 'string':
		case 'number':
			return true;
		case 'object': {
			if (isNumericArray(value)) return true;
			if (ancestors.has(value)) return false;
			ancestors.add(value);
			const items: readonly unknown[] | undefined = Array.isArray(value)
				? value
				: isPlainObject(value)
					? Object.values(value)
					: undefined;
			const valid =
				items !== undefined &&
				items.every((item) => checkLogValue(item, ancestors));
			ancestors.delete(value);
			return valid;
		}
		default:
			return false;
	}
}

// ---------------------------------------------------------------------------
// JSON text
// ---------------------------------------------------------------------------
//
// JSON has no NaN or Infinity.  Non-finite numbers are written in the
// MongoDB Extended JSON form, `{"$numberDouble": "NaN"}`, and turned back
// into numbers on parse.
// ---------------------------------------------------------------------------

const NON_FINITE_TAG = '$numberDouble';

const NON_FINITE: Readonly<Record<string, number>> = Object.freeze({
	NaN: Number.NaN,
	Infinity: Number.POSITIVE_INFINITY,
	'-Infinity': Number.NEGATIVE_INFINITY,
});

const tagNonFinite = (_key: string, value: unknown): unknown =>
	typeof value === 'number' && !Number.isFinite(value)
		? { [NON_FINITE_TAG]: String(value) }
		: value;

const untagNonFinite = (_key: string, value: unknown): unknown => {
	if (!isPlainObject(value)) return value;
	const keys = Object.keys(value);
	if (keys.length !== 1 || keys[0] !== NON_FINITE_TAG) return value;
	const tag = value[NON_FINITE_TAG];
	return typeof tag === 'string' && Object.hasOwn(NON_FINITE, tag)
		? NON_FINITE[tag]
		: value;
};

/**
 * `JSON.stringify` that keeps NaN and the infinities.
 *
 * @example
 * stringifyLogJson({ loss: NaN }) // => '{"loss":{"$numberDouble":"NaN"}}'
 */
export const stringifyLogJson = (value: unknown): string =>
	JSON.stringify(value, tagNonFinite);

/** Inverse of {@link stringifyLogJson}. Throws on malformed text. */
export const parseLogJson = (text: string): unknown => {
	const value: unknown = JSON.parse(text, untagNonFinite);
	return value;
};
