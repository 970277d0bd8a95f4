// ---------------------------------------------------------------------------
// Mongoose-backed DocumentStore
// ---------------------------------------------------------------------------

import type { Connection } from 'mongoose';
import type { LogRecord, MongoBackendConfig } from '../../log/types.js';
import { createBackendUnavailableError } from '../../errors/index.js';
import { createNoopLogger, type Logger } from '../../logger.js';
import type {
	DocumentStore,
	DocumentStoreConnector,
	ExperimentDefaults,
	ExperimentSection,
} from './document-store.js';

const importMongoose = () => import('mongoose');

export type MongooseModule = Awaited<ReturnType<typeof importMongoose>>;
export type Mongoose = MongooseModule['default'];

export interface ExperimentDoc {
	_id: string;
	created: Date;
	info: Record<string, unknown>;
	status: Record<string, unknown>;
}

export interface EntryDoc {
	experiment: string;
	iteration: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Import mongoose, turning a missing module into `BACKEND_UNAVAILABLE`.
 */
export async function loadMongoose(
	load: () => Promise<MongooseModule> = importMongoose,
): Promise<Mongoose> {
	try {
		const mod = await load();
		return mod.default;
	} catch (error) {
		throw createBackendUnavailableError('mongo', 'mongoose', { cause: error });
	}
}

export const mongoUri = (config: MongoBackendConfig): string =>
	`mongodb://${config.host}:${config.port}`;

// ---------------------------------------------------------------------------
// Models and queries
// ---------------------------------------------------------------------------

/**
 * Compile the `experiments` and `entries` models on a connection. Each
 * connection can compile them once.
 */
export function defineModels(mongoose: Mongoose, connection: Connection) {
	const experimentSchema = new mongoose.Schema(
		{
			_id: { type: String, required: true },
			created: { type: Date, required: true },
			info: { type: mongoose.Schema.Types.Mixed, default: {} },
			status: { type: mongoose.Schema.Types.Mixed, default: {} },
		},
		{
			collection: 'experiments',
			versionKey: false,
			minimize: false,
			strict: false,
		},
	);

	const entrySchema = new mongoose.Schema(
		{
			experiment: { type: String, required: true },
			iteration: { type: Number, required: true },
		},
		{ collection: 'entries', versionKey: false, strict: false },
	);
	entrySchema.index({ experiment: 1, iteration: 1 }, { unique: true });

	return {
		Experiments: connection.model<ExperimentDoc>('Experiment', experimentSchema),
		Entries: connection.model<EntryDoc>('Entry', entrySchema),
	};
}

export type MongooseModels = ReturnType<typeof defineModels>;

const sectionPath = (section: ExperimentSection, field: string): string =>
	`${section}.${field}`;

/**
 * The queries behind each store operation, built but not executed.
 */
export function createQueries({ Experiments, Entries }: MongooseModels) {
	return {
		ensureExperiment: (experimentId: string, defaults: ExperimentDefaults) =>
			Experiments.updateOne(
				{ _id: experimentId },
				{
					$setOnInsert: {
						created: defaults.created,
						info: defaults.info,
						status: defaults.status,
					},
				},
				{ upsert: true },
			),

		findEntry: (experimentId: string, iteration: number) =>
			Entries.findOne(
				{ experiment: experimentId, iteration },
				{ _id: 0, experiment: 0, iteration: 0 },
			).lean(),

		findEntries: (experimentId: string) =>
			Entries.find({ experiment: experimentId }, { _id: 0, experiment: 0 })
				.sort({ iteration: 1 })
				.lean(),

		setEntryField: (
			experimentId: string,
			iteration: number,
			field: string,
			value: unknown,
		) =>
			Entries.updateOne(
				{ experiment: experimentId, iteration },
				{ $set: { [field]: value } },
				{ upsert: true },
			),

		unsetEntryField: (experimentId: string, iteration: number, field: string) =>
			Entries.updateOne(
				{ experiment: experimentId, iteration },
				{ $unset: { [field]: '' } },
			),

		distinctIterations: (experimentId: string) =>
			Entries.distinct('iteration', { experiment: experimentId }),

		countEntries: (experimentId: string) =>
			Entries.countDocuments({ experiment: experimentId }),

		findSection: (experimentId: string, section: ExperimentSection) =>
			Experiments.findById(experimentId, { [section]: 1 }).lean(),

		setSectionField: (
			experimentId: string,
			section: ExperimentSection,
			field: string,
			value: unknown,
		) =>
			Experiments.updateOne(
				{ _id: experimentId },
				{ $set: { [sectionPath(section, field)]: value } },
			),

		unsetSectionField: (
			experimentId: string,
			section: ExperimentSection,
			field: string,
		) =>
			Experiments.updateOne(
				{ _id: experimentId },
				{ $unset: { [sectionPath(section, field)]: '' } },
			),
	};
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface MongooseStoreOptions {
	/** Where the models are connected; logged on close. */
	readonly uri: string;
	/** Releases the connection. */
	readonly disconnect: () => Promise<void>;
	readonly logger?: Logger;
}

/**
 * A `DocumentStore` that runs {@link createQueries} against `models`.
 */
export function createMongooseStore(
	models: MongooseModels,
	options: MongooseStoreOptions,
): DocumentStore {
	const logger = options.logger ?? createNoopLogger();
	const queries = createQueries(models);

	const ensureExperiment = async (
		experimentId: string,
		defaults: ExperimentDefaults,
	): Promise<void> => {
		const result = await queries.ensureExperiment(experimentId, defaults).exec();
		logger.debug('Experiment ensured', {
			experimentId,
			inserted: result.upsertedCount > 0,
		});
	};

	const findEntry = async (
		experimentId: string,
		iteration: number,
	): Promise<LogRecord | undefined> => {
		const doc: unknown = await queries.findEntry(experimentId, iteration).exec();
		return isRecord(doc) ? doc : undefined;
	};

	async function* findEntries(
		experimentId: string,
	): AsyncGenerator<readonly [number, LogRecord]> {
		for await (const doc of queries.findEntries(experimentId).cursor()) {
			const raw: unknown = doc;
			if (!isRecord(raw)) continue;
			const { iteration, ...fields } = raw;
			if (typeof iteration !== 'number') continue;
			yield [iteration, fields] as const;
		}
	}

	const distinctIterations = async (
		experimentId: string,
	): Promise<number[]> => {
		const values: unknown[] = await queries
			.distinctIterations(experimentId)
			.exec();
		return values
			.filter((value): value is number => typeof value === 'number')
			.sort((a, b) => a - b);
	};

	const findSection = async (
		experimentId: string,
		section: ExperimentSection,
	): Promise<LogRecord | undefined> => {
		const doc: unknown = await queries.findSection(experimentId, section).exec();
		if (!isRecord(doc)) return undefined;
		const value = doc[section];
		return isRecord(value) ? value : undefined;
	};

	return Object.freeze({
		ensureExperiment,
		findEntry,
		findEntries,
		setEntryField: async (experimentId, iteration, field, value) => {
			await queries.setEntryField(experimentId, iteration, field, value).exec();
		},
		unsetEntryField: async (experimentId, iteration, field) => {
			await queries.unsetEntryField(experimentId, iteration, field).exec();
		},
		distinctIterations,
		countEntries: (experimentId) =>
			queries.countEntries(experimentId).exec(),
		findSection,
		setSectionField: async (experimentId, section, field, value) => {
			await queries
				.setSectionField(experimentId, section, field, value)
				.exec();
		},
		unsetSectionField: async (experimentId, section, field) => {
			await queries.unsetSectionField(experimentId, section, field).exec();
		},
		close: async () => {
			await options.disconnect();
			logger.info('Disconnected', { uri: options.uri });
		},
	} satisfies DocumentStore);
}

// ---------------------------------------------------------------------------
// Connector
// ---------------------------------------------------------------------------

/**
 * Create the default connector. mongoose is loaded when the first store is
 * opened, not when this module is imported.
 */
export function createMongooseConnector(
	options: {
		readonly load?: () => Promise<MongooseModule>;
		readonly logger?: Logger;
	} = {},
): DocumentStoreConnector {
	const logger = (options.logger ?? createNoopLogger()).child('mongoose');

	return async (config: MongoBackendConfig): Promise<DocumentStore> => {
		const mongoose = await loadMongoose(options.load);
		const uri = mongoUri(config);

		const connection = await mongoose
			.createConnection(uri, {
				dbName: config.database,
				serverSelectionTimeoutMS: config.timeoutMs,
				connectTimeoutMS: config.timeoutMs,
			})
			.asPromise();
		logger.info('Connected', { uri, database: config.database });

		return createMongooseStore(defineModels(mongoose, connection), {
			uri,
			logger,
			disconnect: () => connection.close(),
		});
	};
}
