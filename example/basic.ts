/**
 * trainlog — Basic Usage Example
 *
 * Demonstrates:
 * - Opening a log on the memory and SQLite backends
 * - Writing and reading entries while advancing the status counters
 * - Resuming an experiment by id
 * - Snapshot and restore
 * - Logging
 *
 * The mongo demo needs a server on localhost:27017 and is skipped
 * when none answers.
 *
 * Run:
 *   npm run example
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
	createConsoleTransport,
	createLogger,
	isTrainingLogError,
	openTrainingLog,
	restoreTrainingLog,
	serializeTrainingLog,
	setDefaultLogger,
	type TrainingLog,
} from '../src/lib.js';

const logger = createLogger({
	context: 'example',
	level: 'info',
	transports: [createConsoleTransport()],
});
setDefaultLogger(logger);

// ---------------------------------------------------------------------------
// A toy training loop
// ---------------------------------------------------------------------------

async function train(log: TrainingLog, iterations: number): Promise<void> {
	for (let i = 0; i < iterations; i++) {
		const entry = log.currentEntry();
		await entry.set('loss', 1 / (log.status.iterationsDone + 1));
		await entry.set('weights', new Float32Array([0.5, -0.25, 0.125]));
		log.status.iterationsDone += 1;
	}
	log.status.epochsDone += 1;
	await log.commitStatus();
}

// ---------------------------------------------------------------------------
// 1. Memory backend + snapshot
// ---------------------------------------------------------------------------

async function demonstrateMemory(): Promise<void> {
	const log = await openTrainingLog();
	await train(log, 3);

	logger.info('Previous loss', { loss: await log.previousEntry().get('loss') });
	logger.info('Entries recorded', { size: await log.size() });

	const json = await serializeTrainingLog(log);
	const restored = await restoreTrainingLog(json);
	logger.info('Restored', {
		experimentId: restored.experimentId,
		iterationsDone: restored.status.iterationsDone,
		size: await restored.size(),
	});
	await restored.close();
	await log.close();
}

// ---------------------------------------------------------------------------
// 2. SQLite backend + resume by id
// ---------------------------------------------------------------------------

async function demonstrateSqlite(dir: string): Promise<void> {
	const backend = { kind: 'sqlite', path: join(dir, 'log.sqlite') } as const;

	const first = await openTrainingLog({ backend });
	await train(first, 2);
	await first.close();

	const resumed = await openTrainingLog({
		backend,
		experimentId: first.experimentId,
	});
	logger.info('Resumed', { iterationsDone: resumed.status.iterationsDone });
	for await (const [timestamp, record] of resumed.items()) {
		logger.info('Entry', { timestamp, loss: record.loss });
	}
	await resumed.close();
}

// ---------------------------------------------------------------------------
// 3. Mongo backend
// ---------------------------------------------------------------------------

async function demonstrateMongo(): Promise<void> {
	const log = await openTrainingLog({
		backend: { kind: 'mongo', timeoutMs: 2_000 },
	});
	await train(log, 2);
	logger.info('Mongo entries', { size: await log.size() });
	await log.close();
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
	const dir = await mkdtemp(join(tmpdir(), 'trainlog-example-'));
	try {
		await demonstrateMemory();
		await demonstrateSqlite(dir);

		try {
			await demonstrateMongo();
		} catch (err) {
			if (isTrainingLogError(err)) {
				logger.warn('Mongo demo skipped', { code: err.code });
			} else {
				logger.warn('Mongo demo skipped (server not available)', {
					error: err instanceof Error ? err.message : String(err),
				});
			}
		}
	} finally {
		await rm(dir, { recursive: true, force: true });
	}

	logger.info('Example complete!');
}

main().catch((err) => {
	console.error('Fatal error:', err);
	process.exit(1);
});
