import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isInvalidFieldNameError } from '../src/errors/index.js';
import { openTrainingLog, type TrainingLog } from '../src/log/training-log.js';
import type { BackendKind, LogValue } from '../src/log/types.js';
import { createNoopLogger } from '../src/logger.js';
import { createFakeMongoServer } from './utils/fake-document-store.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const EXPERIMENT = '0123456789abcdef01234567';

const FIELDS: Readonly<Record<string, LogValue>> = {
	loss: Number.NaN,
	lr: Number.POSITIVE_INFINITY,
	floor: Number.NEGATIVE_INFINITY,
	model: 'mlp',
	converged: false,
	note: null,
	layer: { sizes: [3, 2], dropout: 0.1 },
};

const collect = async <T>(iterable: AsyncIterable<T>): Promise<T[]> => {
	const out: T[] = [];
	for await (const item of iterable) out.push(item);
	return out;
};

let dir: string;
const opened: TrainingLog[] = [];

async function open(kind: BackendKind): Promise<TrainingLog> {
	const server = createFakeMongoServer();
	const backend =
		kind === 'sqlite'
			? { kind, path: join(dir, 'log.sqlite') }
			: kind === 'mongo'
				? { kind, database: 'runs' }
				: { kind };
	const log = await openTrainingLog({
		backend,
		experimentId: EXPERIMENT,
		connectors: { mongo: server.connect },
		logger: createNoopLogger(),
	});
	opened.push(log);
	return log;
}

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), 'trainlog-parity-'));
});

afterEach(async () => {
	for (const log of opened.splice(0)) await log.close();
	await rm(dir, { recursive: true, force: true });
});

// ===========================================================================
// Values
// ===========================================================================

describe.each(['memory', 'sqlite', 'mongo'] as const)('%s backend', (kind) => {
	it('should read back every field as written', async () => {
		const log = await open(kind);

		for (const [key, value] of Object.entries(FIELDS)) {
			await log.get(0).set(key, value);
		}

		expect(await log.get(0).toObject()).toEqual(FIELDS);
		expect(await collect(log.items())).toEqual([[0, FIELDS]]);
		expect(await log.size()).toBe(1);
	});
});

// ===========================================================================
// Field names
// ===========================================================================

describe.each(['memory', 'sqlite'] as const)(
	'%s backend: scoping names',
	(kind) => {
		it('should store fields named iteration, experiment and _id', async () => {
			const log = await open(kind);

			await log.get(0).set('iteration', 7);
			await log.get(0).set('experiment', 'other');
			await log.get(0).set('_id', 'x');

			expect(await log.get(0).toObject()).toEqual({
				iteration: 7,
				experiment: 'other',
				_id: 'x',
			});
			expect(await collect(log.timestamps())).toEqual([0]);
		});
	},
);

describe('mongo backend: scoping names', () => {
	it('should reject fields named iteration, experiment and _id', async () => {
		const log = await open('mongo');

		for (const field of ['iteration', 'experiment', '_id']) {
			await expect(log.get(0).set(field, 7)).rejects.toSatisfy(
				isInvalidFieldNameError,
			);
		}

		expect(await collect(log.timestamps())).toEqual([]);
	});
});
