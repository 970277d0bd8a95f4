// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

import type { TrainingLogError } from './base.js';
import { createTrainingLogError, isTrainingLogError } from './base.js';

export interface ConfigIssue {
	readonly path: string;
	readonly message: string;
}

export const createConfigError = (
	message: string,
	options: {
		code?: string;
		cause?: unknown;
		metadata?: Record<string, unknown>;
	} = {},
): TrainingLogError =>
	createTrainingLogError(message, {
		name: 'ConfigError',
		code: options.code ?? 'CONFIG_ERROR',
		statusCode: 400,
		cause: options.cause,
		metadata: options.metadata,
	});

export const createConfigValidationError = (
	issues: readonly ConfigIssue[],
	options: { cause?: unknown } = {},
): TrainingLogError & { readonly issues: readonly ConfigIssue[] } => {
	const [first] = issues;
	const summary =
		issues.length === 1 && first !== undefined
			? first.message
			: `${issues.length} validation errors`;

	const frozenIssues = Object.freeze([...issues]);

	const err = createTrainingLogError(`Invalid configuration: ${summary}`, {
		name: 'ConfigValidationError',
		code: 'CONFIG_VALIDATION',
		statusCode: 400,
		cause: options.cause,
		metadata: { issues: frozenIssues },
	});

	return Object.assign(err, { issues: frozenIssues });
};

export const createUnknownBackendError = (kind: unknown): TrainingLogError =>
	createConfigError(`Unknown backend: ${String(kind)}`, {
		code: 'CONFIG_UNKNOWN_BACKEND',
		metadata: { kind },
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isConfigError = (value: unknown): value is TrainingLogError =>
	isTrainingLogError(value) && value.code.startsWith('CONFIG_');

export const isConfigValidationError = (
	value: unknown,
): value is TrainingLogError & { readonly issues: readonly ConfigIssue[] } =>
	isTrainingLogError(value) &&
	value.code === 'CONFIG_VALIDATION' &&
	'issues' in value &&
	Array.isArray(value.issues);

export const isUnknownBackendError = (
	value: unknown,
): value is TrainingLogError =>
	isTrainingLogError(value) && value.code === 'CONFIG_UNKNOWN_BACKEND';
