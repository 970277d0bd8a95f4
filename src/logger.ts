// ---------------------------------------------------------------------------
// Structured logging
// ---------------------------------------------------------------------------
//
// A logger is a frozen record of functions.  `child()` derives a logger
// with a longer context (`training-log:log:sqlite`) that shares its
// parent's level and transports, so one `setLevel` call tunes a whole
// tree.  Nothing here logs entry values above `debug`.
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'none'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const isLogLevel = (value: unknown): value is LogLevel =>
	LOG_LEVELS.some((level) => level === value);

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export interface LogEntry {
	readonly level: LogLevel;
	readonly message: string;
	/** ISO-8601 */
	readonly timestamp: string;
	readonly context?: string;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface LogTransport {
	readonly write: (entry: LogEntry) => void;
}

// ---------------------------------------------------------------------------
// Console transport
// ---------------------------------------------------------------------------

const ANSI: Readonly<Record<LogLevel | 'reset', string>> = Object.freeze({
	debug: '\x1b[90m',
	info: '\x1b[36m',
	warn: '\x1b[33m',
	error: '\x1b[31m',
	none: '',
	reset: '\x1b[0m',
});

const formatValue = (value: unknown): string => {
	if (typeof value === 'string') {
		return /^[^\s="]+$/.test(value) ? value : JSON.stringify(value);
	}
	if (value instanceof Date) return value.toISOString();
	if (typeof value === 'object' && value !== null) {
		try {
			return JSON.stringify(value);
		} catch {
			return String(value);
		}
	}
	return String(value);
};

/**
 * Render metadata as `key=value` pairs. Strings with spaces or quotes are
 * JSON-quoted; objects and arrays are JSON.
 *
 * @example
 * formatMetadata({ experimentId: 'ab12', path: '/tmp/a b.db' })
 * // => 'experimentId=ab12 path="/tmp/a b.db"'
 */
export const formatMetadata = (
	metadata: Readonly<Record<string, unknown>>,
): string =>
	Object.entries(metadata)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${formatValue(value)}`)
		.join(' ');

export interface ConsoleTransportOptions {
	/** ANSI colours on the level tag. Defaults to whether stdout is a TTY. */
	readonly colour?: boolean;
}

/**
 * One line per entry: `LEVEL timestamp [context] message key=value ...`.
 * `warn` and `error` go to stderr through `console.warn` / `console.error`.
 */
export const createConsoleTransport = (
	options: ConsoleTransportOptions = {},
): LogTransport => {
	const colour = options.colour ?? process.stdout.isTTY === true;

	return Object.freeze({
		write(entry: LogEntry): void {
			const tag = entry.level.toUpperCase().padEnd(5);
			const parts = [
				colour ? `${ANSI[entry.level]}${tag}${ANSI.reset}` : tag,
				entry.timestamp,
				...(entry.context ? [`[${entry.context}]`] : []),
				entry.message,
			];
			const fields = entry.metadata ? formatMetadata(entry.metadata) : '';
			if (fields.length > 0) parts.push(fields);
			const line = parts.join(' ');

			switch (entry.level) {
				case 'error':
					console.error(line);
					break;
				case 'warn':
					console.warn(line);
					break;
				case 'debug':
					console.debug(line);
					break;
				default:
					console.log(line);
			}
		},
	});
};

// ---------------------------------------------------------------------------
// Memory transport
// ---------------------------------------------------------------------------

export interface MemoryTransportHandle extends LogTransport {
	readonly entries: LogEntry[];
	readonly clear: () => void;
	readonly filter: (level: LogLevel) => readonly LogEntry[];
	/** Entries whose context is `context` or one of its children. */
	readonly forContext: (context: string) => readonly LogEntry[];
}

export const createMemoryTransport = (): MemoryTransportHandle => {
	const entries: LogEntry[] = [];

	return {
		entries,
		write(entry) {
			entries.push(entry);
		},
		clear() {
			entries.length = 0;
		},
		filter: (level) => entries.filter((e) => e.level === level),
		forContext: (context) =>
			entries.filter(
				(e) =>
					e.context === context ||
					(e.context?.startsWith(`${context}:`) ?? false),
			),
	};
};

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

type Metadata = Readonly<Record<string, unknown>>;

export interface Logger {
	readonly debug: (message: string, metadata?: Metadata) => void;
	readonly info: (message: string, metadata?: Metadata) => void;
	readonly warn: (message: string, metadata?: Metadata) => void;
	/** An `Error` is flattened to `errorName`, `errorMessage`, `stack`, `cause`. */
	readonly error: (message: string, errorOrMetadata?: Error | Metadata) => void;
	readonly child: (childContext: string) => Logger;
	readonly setLevel: (level: LogLevel) => void;
	readonly getLevel: () => LogLevel;
	readonly addTransport: (transport: LogTransport) => void;
	readonly clearTransports: () => void;
}

export interface LoggerOptions {
	readonly context?: string;
	/** Defaults to `info`. */
	readonly level?: LogLevel;
	/** Defaults to a single console transport. */
	readonly transports?: readonly LogTransport[];
}

const flattenError = (error: Error): Metadata => {
	const cause: unknown = error.cause;
	return {
		errorName: error.name,
		errorMessage: error.message,
		stack: error.stack,
		...(cause != null
			? { cause: cause instanceof Error ? cause.message : String(cause) }
			: {}),
	};
};

interface SharedState {
	level: LogLevel;
	readonly transports: LogTransport[];
}

const buildLogger = (
	context: string | undefined,
	state: SharedState,
): Logger => {
	const emit = (level: LogLevel, message: string, metadata?: Metadata) => {
		if (level === 'none' || rank(level) < rank(state.level)) return;

		const entry: LogEntry = Object.freeze({
			level,
			message,
			timestamp: new Date().toISOString(),
			context,
			metadata,
		});
		for (const transport of state.transports) transport.write(entry);
	};

	return Object.freeze({
		debug: (message, metadata) => emit('debug', message, metadata),
		info: (message, metadata) => emit('info', message, metadata),
		warn: (message, metadata) => emit('warn', message, metadata),
		error: (message, errorOrMetadata) =>
			emit(
				'error',
				message,
				errorOrMetadata instanceof Error
					? flattenError(errorOrMetadata)
					: errorOrMetadata,
			),
		child: (childContext) =>
			buildLogger(
				context ? `${context}:${childContext}` : childContext,
				state,
			),
		setLevel: (level) => {
			state.level = level;
		},
		getLevel: () => state.level,
		addTransport: (transport) => {
			state.transports.push(transport);
		},
		clearTransports: () => {
			state.transports.length = 0;
		},
	} satisfies Logger);
};

export const createLogger = (options: LoggerOptions = {}): Logger =>
	buildLogger(options.context, {
		level: options.level ?? 'info',
		transports: [...(options.transports ?? [createConsoleTransport()])],
	});

/** Drops everything; what backends use when no logger is injected. */
export const createNoopLogger = (): Logger =>
	createLogger({ level: 'none', transports: [] });

// ---------------------------------------------------------------------------
// Default logger
// ---------------------------------------------------------------------------

/**
 * `TRAINLOG_LOG_LEVEL`, when it names a level; `warn` otherwise.
 */
export const resolveLogLevel = (
	env: Readonly<Record<string, string | undefined>> = process.env,
): LogLevel => {
	const value = env.TRAINLOG_LOG_LEVEL?.trim().toLowerCase();
	return isLogLevel(value) ? value : 'warn';
};

let defaultLogger: Logger | undefined;

/**
 * The logger `openTrainingLog` uses when none is passed: context
 * `training-log`, console output, level from {@link resolveLogLevel}.
 */
export const getDefaultLogger = (): Logger => {
	defaultLogger ??= createLogger({
		context: 'training-log',
		level: resolveLogLevel(),
	});
	return defaultLogger;
};

export const setDefaultLogger = (logger: Logger): void => {
	defaultLogger = logger;
};
