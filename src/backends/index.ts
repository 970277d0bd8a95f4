// ---------------------------------------------------------------------------
// Backend registry — opens the backend a config describes
// ---------------------------------------------------------------------------

import { createUnknownBackendError } from '../errors/index.js';
import type { Backend, BackendConfig, MemoryBackendData } from '../log/types.js';
import { createNoopLogger, type Logger } from '../logger.js';
import { createMemoryBackend } from './memory.js';
import { createMongoBackend } from './mongo/backend.js';
import type { DocumentStoreConnector } from './mongo/document-store.js';
import { createMongooseConnector } from './mongo/mongoose-store.js';
import {
	createSqliteBackend,
	createSqliteOpener,
	type SqliteConnector,
} from './sqlite.js';

export interface BackendConnectors {
	readonly mongo?: DocumentStoreConnector;
	readonly sqlite?: SqliteConnector;
}

export interface OpenBackendOptions {
	readonly experimentId: string;
	readonly logger?: Logger;
	/** Replace the default mongoose / better-sqlite3 connectors. */
	readonly connectors?: BackendConnectors;
	/** Memory backend only: data exported by a previous instance. */
	readonly memoryData?: MemoryBackendData;
	readonly now?: () => Date;
}

/**
 * Open the backend described by `config`. Drivers are loaded here, so a
 * missing driver fails now with `BACKEND_UNAVAILABLE` rather than on the
 * first read or write.
 */
export async function openBackend(
	config: BackendConfig,
	options: OpenBackendOptions,
): Promise<Backend> {
	const logger = options.logger ?? createNoopLogger();
	const { experimentId, now } = options;

	switch (config.kind) {
		case 'memory':
			return createMemoryBackend({
				experimentId,
				data: options.memoryData,
				logger,
			});
		case 'mongo': {
			const connect =
				options.connectors?.mongo ?? createMongooseConnector({ logger });
			const store = await connect(config);
			try {
				return await createMongoBackend(config, {
					experimentId,
					store,
					logger,
					now,
				});
			} catch (error) {
				await store.close();
				throw error;
			}
		}
		case 'sqlite': {
			const open = options.connectors?.sqlite ?? createSqliteOpener();
			const database = await open(config);
			try {
				return createSqliteBackend(config, {
					experimentId,
					database,
					logger,
					now,
				});
			} catch (error) {
				database.close();
				throw error;
			}
		}
		default: {
			const unknownConfig: unknown = config;
			const kind =
				typeof unknownConfig === 'object' &&
				unknownConfig !== null &&
				'kind' in unknownConfig
					? unknownConfig.kind
					: undefined;
			throw createUnknownBackendError(kind);
		}
	}
}

export { createMemoryBackend } from './memory.js';
export { createMongoBackend } from './mongo/backend.js';
export type {
	DocumentStore,
	DocumentStoreConnector,
	ExperimentDefaults,
	ExperimentSection,
} from './mongo/document-store.js';
export {
	createMongooseConnector,
	createMongooseStore,
	createQueries,
	defineModels,
	loadMongoose,
	type MongooseModels,
	type MongooseStoreOptions,
	mongoUri,
} from './mongo/mongoose-store.js';
export {
	createSqliteBackend,
	createSqliteOpener,
	foldRows,
	type SqliteConnector,
	type SqliteDatabase,
} from './sqlite.js';
