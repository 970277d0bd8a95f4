// ---------------------------------------------------------------------------
// Configuration Validation
// ---------------------------------------------------------------------------
//
// Validators accept typed input interfaces and check the semantic
// constraints TypeScript cannot: non-empty strings, numeric ranges,
// database-name characters.  Each returns a (possibly empty) list of issues.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Validation primitives
// ---------------------------------------------------------------------------

export interface ValidationIssue {
	readonly path: string;
	readonly message: string;
}

const issue = (path: string, message: string): readonly ValidationIssue[] =>
	Object.freeze([Object.freeze({ path, message })]);

const ok: readonly ValidationIssue[] = Object.freeze([]);

const combine = (
	...results: ReadonlyArray<readonly ValidationIssue[]>
): readonly ValidationIssue[] => Object.freeze(results.flat());

const validateNonEmpty = (
	value: string,
	path: string,
	label: string,
): readonly ValidationIssue[] => {
	if (value.trim().length === 0) return issue(path, `${label} cannot be empty`);
	return ok;
};

const validateRange = (
	value: number,
	path: string,
	label: string,
	constraints: {
		readonly min?: number;
		readonly max?: number;
		readonly integer?: boolean;
	},
): readonly ValidationIssue[] => {
	if (Number.isNaN(value)) return issue(path, `${label} must be a number`);
	if (constraints.integer && !Number.isInteger(value))
		return issue(path, `${label} must be an integer`);
	if (constraints.min !== undefined && value < constraints.min)
		return issue(path, `${label} must be at least ${constraints.min}`);
	if (constraints.max !== undefined && value > constraints.max)
		return issue(path, `${label} must be at most ${constraints.max}`);
	return ok;
};

// ---------------------------------------------------------------------------
// Backend inputs
// ---------------------------------------------------------------------------

export const BACKEND_KINDS = ['memory', 'mongo', 'sqlite'] as const;

export interface MemoryBackendInput {
	readonly kind: 'memory';
}

export interface MongoBackendInput {
	readonly kind: 'mongo';
	/** Defaults to `localhost`. */
	readonly host?: string;
	/** Defaults to `27017`. */
	readonly port?: number;
	/** Defaults to `training_log`. */
	readonly database?: string;
	/** Server selection / connect timeout. Defaults to `30_000`. */
	readonly timeoutMs?: number;
}

export interface SqliteBackendInput {
	readonly kind: 'sqlite';
	/** Database file, created if absent. */
	readonly path: string;
}

export type BackendConfigInput =
	| MemoryBackendInput
	| MongoBackendInput
	| SqliteBackendInput;

export interface LogConfigInput {
	/** Defaults to the memory backend. */
	readonly backend?: BackendConfigInput;
	/** 24 hex characters; generated when omitted. */
	readonly experimentId?: string;
	/** Status names hidden when iterating the status. */
	readonly statusExclude?: readonly string[];
}

// ---------------------------------------------------------------------------
// Validators
// ---------------------------------------------------------------------------

const FORBIDDEN_DATABASE_CHARS = /[/\\. "$*<>:|?]/;

export const validateMongoBackend = (
	value: MongoBackendInput,
	path: string,
): readonly ValidationIssue[] =>
	combine(
		value.host !== undefined
			? validateNonEmpty(value.host, `${path}.host`, 'Mongo host')
			: ok,
		value.port !== undefined
			? validateRange(value.port, `${path}.port`, 'Mongo port', {
					min: 1,
					max: 65_535,
					integer: true,
				})
			: ok,
		value.database !== undefined
			? combine(
					validateNonEmpty(
						value.database,
						`${path}.database`,
						'Database name',
					),
					FORBIDDEN_DATABASE_CHARS.test(value.database)
						? issue(
								`${path}.database`,
								'Database name contains a character mongo does not allow',
							)
						: ok,
				)
			: ok,
		value.timeoutMs !== undefined
			? validateRange(value.timeoutMs, `${path}.timeoutMs`, 'timeoutMs', {
					min: 1,
					max: 600_000,
					integer: true,
				})
			: ok,
	);

export const validateSqliteBackend = (
	value: SqliteBackendInput,
	path: string,
): readonly ValidationIssue[] =>
	typeof value.path === 'string'
		? validateNonEmpty(value.path, `${path}.path`, 'SQLite path')
		: issue(`${path}.path`, 'SQLite path is required');

export const validateBackendConfig = (
	value: BackendConfigInput,
	path = 'backend',
): readonly ValidationIssue[] => {
	switch (value.kind) {
		case 'memory':
			return ok;
		case 'mongo':
			return validateMongoBackend(value, path);
		case 'sqlite':
			return validateSqliteBackend(value, path);
	}
};

export const validateLogConfig = (
	value: LogConfigInput,
): readonly ValidationIssue[] =>
	combine(
		value.backend ? validateBackendConfig(value.backend) : ok,
		...(value.statusExclude ?? []).map((name, i) =>
			validateNonEmpty(name, `statusExclude[${i}]`, 'Excluded status name'),
		),
	);

/**
 * Render issues as one line per issue, for CLI output and logs.
 */
export const formatValidationIssues = (
	issues: readonly ValidationIssue[],
): string => issues.map((i) => `${i.path}: ${i.message}`).join('\n');
