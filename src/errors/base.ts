// ---------------------------------------------------------------------------
// TrainingLogError — base interface, factory, type guard, and utilities
// ---------------------------------------------------------------------------

/**
 * Shape of every error produced by the training log.  Consumers
 * discriminate errors via the `code` field and the type guards exported
 * from sibling modules.
 */
export interface TrainingLogError extends Error {
	/** Machine-readable error code (e.g. "INVALID_TIMESTAMP", "BACKEND_UNAVAILABLE"). */
	readonly code: string;
	/** HTTP-style status hint. */
	readonly statusCode: number;
	/** Arbitrary structured context attached to the error. */
	readonly metadata: Readonly<Record<string, unknown>>;
	/** Plain-object representation suitable for logging / serialisation. */
	readonly toJSON: () => Record<string, unknown>;
}

export interface TrainingLogErrorOptions {
	readonly name?: string;
	readonly code?: string;
	readonly statusCode?: number;
	readonly cause?: unknown;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Base factory
// ---------------------------------------------------------------------------

const describeCause = (cause: unknown): unknown =>
	cause instanceof Error ? { name: cause.name, message: cause.message } : cause;

/**
 * Create a `TrainingLogError` — a plain `Error` augmented with structured
 * fields.  This is the only place in the codebase where `new Error` is used.
 */
export const createTrainingLogError = (
	message: string,
	options: TrainingLogErrorOptions = {},
): TrainingLogError => {
	const err = new Error(message, { cause: options.cause });
	err.name = options.name ?? 'TrainingLogError';

	const code = options.code ?? 'TRAINING_LOG_ERROR';
	const statusCode = options.statusCode ?? 500;
	const metadata = Object.freeze({ ...options.metadata });

	return Object.assign(err, {
		code,
		statusCode,
		metadata,
		toJSON: (): Record<string, unknown> => ({
			name: err.name,
			code,
			message: err.message,
			statusCode,
			metadata,
			cause: describeCause(err.cause),
			stack: err.stack,
		}),
	});
};

// ---------------------------------------------------------------------------
// Base type guard
// ---------------------------------------------------------------------------

/**
 * Duck-typed on `code` / `statusCode` / `toJSON` rather than `instanceof`.
 */
export const isTrainingLogError = (
	value: unknown,
): value is TrainingLogError =>
	value instanceof Error &&
	'code' in value &&
	typeof value.code === 'string' &&
	'statusCode' in value &&
	typeof value.statusCode === 'number' &&
	'toJSON' in value &&
	typeof value.toJSON === 'function';

/**
 * Narrow on an exact error code.
 */
export const hasErrorCode = (
	value: unknown,
	code: string,
): value is TrainingLogError => isTrainingLogError(value) && value.code === code;

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

/**
 * Normalise an unknown thrown value into a proper `Error` instance.
 */
export const toError = (value: unknown): Error => {
	if (value instanceof Error) return value;
	return createTrainingLogError(String(value));
};
