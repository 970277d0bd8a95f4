// ---------------------------------------------------------------------------
// Configuration — pure interfaces + functional validation
// ---------------------------------------------------------------------------
//
// `defineLogConfig` validates a plain object and returns a frozen,
// fully-resolved `TrainingLogConfig`.  `resolveLogConfigFromEnv` builds the
// same input from `TRAINLOG_*` environment variables.
// ---------------------------------------------------------------------------

import {
	createConfigValidationError,
	createUnknownBackendError,
} from '../errors/index.js';
import type { BackendConfig } from '../log/types.js';
import {
	BACKEND_KINDS,
	type BackendConfigInput,
	type LogConfigInput,
	type MongoBackendInput,
	type SqliteBackendInput,
	type ValidationIssue,
	validateLogConfig,
} from './schema.js';

export type { BackendConfigInput, LogConfigInput, ValidationIssue };

export const MONGO_DEFAULTS = Object.freeze({
	host: 'localhost',
	port: 27_017,
	database: 'training_log',
	timeoutMs: 30_000,
});

export interface TrainingLogConfig {
	readonly backend: BackendConfig;
	readonly experimentId?: string;
	readonly statusExclude: readonly string[];
}

const isKnownKind = (kind: unknown): kind is BackendConfigInput['kind'] =>
	BACKEND_KINDS.some((known) => known === kind);

const resolveBackend = (input: BackendConfigInput): BackendConfig => {
	switch (input.kind) {
		case 'memory':
			return Object.freeze({ kind: 'memory' });
		case 'mongo':
			return Object.freeze({
				kind: 'mongo',
				host: input.host ?? MONGO_DEFAULTS.host,
				port: input.port ?? MONGO_DEFAULTS.port,
				database: input.database ?? MONGO_DEFAULTS.database,
				timeoutMs: input.timeoutMs ?? MONGO_DEFAULTS.timeoutMs,
			});
		case 'sqlite':
			return Object.freeze({ kind: 'sqlite', path: input.path });
	}
};

/**
 * Validate and resolve a log configuration.
 *
 * @example
 * ```ts
 * const config = defineLogConfig({
 *   backend: { kind: 'sqlite', path: './runs/log.sqlite' },
 *   statusExclude: ['trainingStarted'],
 * });
 * ```
 *
 * @throws {ConfigError} `CONFIG_UNKNOWN_BACKEND` for an unknown `kind`,
 *   `CONFIG_VALIDATION` (with `issues`) for invalid options.
 */
export function defineLogConfig(input: LogConfigInput = {}): TrainingLogConfig {
	const backend: BackendConfigInput = input.backend ?? { kind: 'memory' };
	// Inputs may come from untyped JSON or JS callers.
	const kind: unknown = backend.kind;
	if (!isKnownKind(kind)) throw createUnknownBackendError(kind);

	const issues = validateLogConfig(input);
	if (issues.length > 0) {
		throw createConfigValidationError([...issues]);
	}

	return Object.freeze({
		backend: resolveBackend(backend),
		experimentId: input.experimentId,
		statusExclude: Object.freeze([...(input.statusExclude ?? [])]),
	});
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

const parseNumber = (value: string | undefined): number | undefined =>
	value === undefined || value.trim() === '' ? undefined : Number(value);

/**
 * Build a config input from environment variables:
 * `TRAINLOG_BACKEND` (`memory` | `mongo` | `sqlite`), `TRAINLOG_MONGO_HOST`,
 * `TRAINLOG_MONGO_PORT`, `TRAINLOG_MONGO_DATABASE`,
 * `TRAINLOG_MONGO_TIMEOUT_MS`, `TRAINLOG_SQLITE_PATH`,
 * `TRAINLOG_EXPERIMENT_ID`, `TRAINLOG_STATUS_EXCLUDE` (comma separated).
 */
export function resolveLogConfigFromEnv(
	env: Readonly<Record<string, string | undefined>> = process.env,
): LogConfigInput {
	const kind = env.TRAINLOG_BACKEND ?? 'memory';
	const experimentId = env.TRAINLOG_EXPERIMENT_ID || undefined;
	const statusExclude = (env.TRAINLOG_STATUS_EXCLUDE ?? '')
		.split(',')
		.map((name) => name.trim())
		.filter((name) => name.length > 0);

	let backend: BackendConfigInput;
	if (kind === 'memory') {
		backend = { kind };
	} else if (kind === 'mongo') {
		const mongo: MongoBackendInput = {
			kind,
			host: env.TRAINLOG_MONGO_HOST || undefined,
			port: parseNumber(env.TRAINLOG_MONGO_PORT),
			database: env.TRAINLOG_MONGO_DATABASE || undefined,
			timeoutMs: parseNumber(env.TRAINLOG_MONGO_TIMEOUT_MS),
		};
		backend = mongo;
	} else if (kind === 'sqlite') {
		const sqlite: SqliteBackendInput = {
			kind,
			path: env.TRAINLOG_SQLITE_PATH ?? '',
		};
		backend = sqlite;
	} else {
		throw createUnknownBackendError(kind);
	}

	return { backend, experimentId, statusExclude };
}
