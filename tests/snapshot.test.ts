import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSqliteOpener } from '../src/backends/sqlite.js';
import {
	isBackendUnavailableError,
	isSnapshotInvalidError,
} from '../src/errors/index.js';
import {
	parseSnapshot,
	parseSnapshotJson,
	type TrainingLogSnapshot,
} from '../src/log/snapshot.js';
import {
	type OpenTrainingLogOptions,
	openTrainingLog,
	restoreTrainingLog,
	serializeTrainingLog,
	type TrainingLog,
} from '../src/log/training-log.js';
import { createNoopLogger } from '../src/logger.js';
import { createFakeMongoServer } from './utils/fake-document-store.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const EXPERIMENT = '0123456789abcdef01234567';
const CREATED = new Date('2024-03-01T12:00:00.000Z');
const logger = createNoopLogger();

const collect = async <T>(iterable: AsyncIterable<T>): Promise<T[]> => {
	const out: T[] = [];
	for await (const item of iterable) out.push(item);
	return out;
};

const catchError = (fn: () => unknown): unknown => {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error('expected a throw');
};

const opened: TrainingLog[] = [];

const track = (log: TrainingLog): TrainingLog => {
	opened.push(log);
	return log;
};

async function open(options: OpenTrainingLogOptions = {}): Promise<TrainingLog> {
	return track(
		await openTrainingLog({ logger, now: () => CREATED, ...options }),
	);
}

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), 'trainlog-snapshot-'));
});

afterEach(async () => {
	for (const log of opened.splice(0)) await log.close();
	await rm(dir, { recursive: true, force: true });
});

// ===========================================================================
// Memory snapshots
// ===========================================================================

describe('memory snapshots', () => {
	it('should carry identity, status, info and entries', async () => {
		const log = await open({
			experimentId: EXPERIMENT,
			statusExclude: ['trainingStarted'],
		});
		await log.get(0).set('loss', 1);
		await log.get(1).set('weights', new Float32Array([0.5, 0.25]));
		await log.info().set('model', 'mlp');
		log.status.iterationsDone = 2;
		log.status.set('trainingStarted', true);

		expect(await log.toSnapshot()).toEqual({
			version: 1,
			experimentId: EXPERIMENT,
			backend: { kind: 'memory' },
			status: {
				fields: { iterationsDone: 2, epochsDone: 0, trainingStarted: true },
				exclude: ['trainingStarted'],
			},
			info: {
				created: '2024-03-01T12:00:00.000Z',
				experimentId: EXPERIMENT,
				model: 'mlp',
			},
			data: {
				entries: [
					[0, { loss: 1 }],
					[1, { weights: [0.5, 0.25] }],
				],
				info: {
					created: '2024-03-01T12:00:00.000Z',
					experimentId: EXPERIMENT,
					model: 'mlp',
				},
				status: { iterationsDone: 0, epochsDone: 0 },
			},
		});
	});

	it('should restore from JSON with the snapshot status', async () => {
		const log = await open({ statusExclude: ['trainingStarted'] });
		await log.get(0).set('loss', 1);
		await log.get(1).set('loss', 0.5);
		log.status.iterationsDone = 2;
		log.status.set('trainingStarted', true);

		const json = await serializeTrainingLog(log);
		const restored = track(await restoreTrainingLog(json, { logger }));

		expect(restored.experimentId).toBe(log.experimentId);
		expect(restored.backendKind).toBe('memory');
		expect(restored.status.iterationsDone).toBe(2);
		expect(restored.status.get('trainingStarted')).toBe(true);
		expect(restored.status.exclude).toEqual(['trainingStarted']);
		expect(await restored.previousEntry().get('loss')).toBe(0.5);
		expect(await collect(restored.timestamps())).toEqual([0, 1]);
		expect(await restored.info().get('created')).toBe(
			'2024-03-01T12:00:00.000Z',
		);
	});

	it('should produce an independent copy', async () => {
		const log = await open();
		await log.get(0).set('loss', 1);

		const restored = track(
			await restoreTrainingLog(await log.toSnapshot(), { logger }),
		);
		await restored.get(0).set('loss', 2);
		await restored.get(5).set('loss', 3);

		expect(await log.get(0).get('loss')).toBe(1);
		expect(await log.size()).toBe(1);
		expect(await restored.size()).toBe(2);
	});

	it('should carry NaN and the infinities through JSON', async () => {
		const log = await open();
		await log.get(0).set('loss', Number.NaN);
		await log.get(0).set('lr', Number.NEGATIVE_INFINITY);

		const json = await serializeTrainingLog(log);
		const restored = track(await restoreTrainingLog(json, { logger }));

		expect(json).toContain('"loss":{"$numberDouble":"NaN"}');
		expect(await restored.get(0).get('loss')).toBe(Number.NaN);
		expect(await restored.get(0).get('lr')).toBe(Number.NEGATIVE_INFINITY);
	});

	it('should not share values between restores of one snapshot', async () => {
		const history = [1, 2];
		const snapshot: TrainingLogSnapshot = {
			version: 1,
			experimentId: EXPERIMENT,
			backend: { kind: 'memory' },
			status: { fields: {}, exclude: [] },
			info: {},
			data: { entries: [[0, { history }]], info: {}, status: {} },
		};

		const first = track(await restoreTrainingLog(snapshot, { logger }));
		const second = track(await restoreTrainingLog(snapshot, { logger }));
		history.push(3);

		const fromFirst = await first.get(0).get('history');
		const fromSecond = await second.get(0).get('history');
		expect(fromFirst).toEqual([1, 2]);
		expect(fromSecond).toEqual([1, 2]);
		expect(fromFirst).not.toBe(fromSecond);
	});

	it('should round trip through serialize and parse', async () => {
		const log = await open();
		await log.get(0).set('loss', 1);

		const json = await serializeTrainingLog(log);

		expect(parseSnapshotJson(json)).toEqual(await log.toSnapshot());
	});
});

// ===========================================================================
// Database snapshots
// ===========================================================================

describe('sqlite snapshots', () => {
	it('should hold only the config and reconnect on restore', async () => {
		const path = join(dir, 'log.sqlite');
		const log = await open({
			backend: { kind: 'sqlite', path },
			experimentId: EXPERIMENT,
		});
		await log.get(0).set('loss', 0.8);
		log.status.iterationsDone = 1;

		const snapshot = await log.toSnapshot();
		expect(snapshot.backend).toEqual({ kind: 'sqlite', path });
		expect(snapshot.data).toBeUndefined();
		await log.close();

		const restored = track(await restoreTrainingLog(snapshot, { logger }));

		expect(restored.status.iterationsDone).toBe(1);
		expect(await restored.previousEntry().get('loss')).toBe(0.8);
	});

	it('should commit the snapshot status over the stored one', async () => {
		const path = join(dir, 'log.sqlite');
		const log = await open({
			backend: { kind: 'sqlite', path },
			experimentId: EXPERIMENT,
		});
		log.status.iterationsDone = 4;
		const snapshot = await log.toSnapshot();
		await log.close();

		track(await restoreTrainingLog(snapshot, { logger }));
		const reopened = await open({
			backend: { kind: 'sqlite', path },
			experimentId: EXPERIMENT,
		});

		expect(reopened.status.iterationsDone).toBe(4);
	});

	it('should report a missing driver on restore', async () => {
		const log = await open({
			backend: { kind: 'sqlite', path: join(dir, 'log.sqlite') },
		});
		const snapshot = await log.toSnapshot();

		await expect(
			restoreTrainingLog(snapshot, {
				logger,
				connectors: {
					sqlite: createSqliteOpener({
						load: () => Promise.reject(new Error('driver missing')),
					}),
				},
			}),
		).rejects.toSatisfy(isBackendUnavailableError);
	});
});

describe('mongo snapshots', () => {
	it('should reconnect to the same experiment through the connector', async () => {
		const server = createFakeMongoServer();
		const connectors = { mongo: server.connect };
		const log = await open({
			backend: { kind: 'mongo', host: 'db', database: 'runs' },
			connectors,
		});
		await log.get(0).set('loss', 0.6);

		const json = await serializeTrainingLog(log);
		const restored = track(
			await restoreTrainingLog(json, { logger, connectors }),
		);

		expect(parseSnapshotJson(json).backend).toEqual({
			kind: 'mongo',
			host: 'db',
			port: 27017,
			database: 'runs',
			timeoutMs: 30_000,
		});
		expect(restored.experimentId).toBe(log.experimentId);
		expect(await restored.get(0).get('loss')).toBe(0.6);
		expect(server.stores).toHaveLength(2);
	});
});

// ===========================================================================
// Invalid snapshots
// ===========================================================================

describe('invalid snapshots', () => {
	it('should reject text that is not JSON', () => {
		const err = catchError(() => parseSnapshotJson('{not json'));

		expect(isSnapshotInvalidError(err)).toBe(true);
		expect(err).toHaveProperty(['metadata', 'issues'], [
			{ path: '', message: 'snapshot is not valid JSON' },
		]);
	});

	it('should reject through restore as a rejected promise', async () => {
		await expect(restoreTrainingLog('[]')).rejects.toSatisfy(
			isSnapshotInvalidError,
		);
	});

	it('should name the failing paths', () => {
		const err = catchError(() =>
			parseSnapshot({
				version: 2,
				experimentId: 'abc',
				backend: { kind: 'memory' },
				status: { fields: {}, exclude: [] },
				info: {},
			}),
		);

		expect(isSnapshotInvalidError(err)).toBe(true);
		expect(err).toHaveProperty(
			'message',
			'Invalid training log snapshot: 2 issue(s)',
		);
		expect(err).toHaveProperty(['metadata', 'issues', 1], {
			path: 'experimentId',
			message: 'expected 24 hex characters',
		});
	});

	it('should reject an unknown backend kind', () => {
		const err = catchError(() =>
			parseSnapshot({
				version: 1,
				experimentId: EXPERIMENT,
				backend: { kind: 'redis' },
				status: { fields: {}, exclude: [] },
				info: {},
			}),
		);

		expect(err).toHaveProperty(
			['metadata', 'issues', 0, 'path'],
			'backend.kind',
		);
	});
});
