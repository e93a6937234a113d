import { VectorIndex } from '../src/core/index/vector_index';
import { DimensionMismatchError, IndexCorruptError, IndexMismatchError } from '../src/core/errors';
import { IIndexDescriptor, IIndexEntry } from '../src/types';
import { MemoryIndexStore, RecordingLogger } from './helpers/fakes';

const DESCRIPTOR: IIndexDescriptor = { embeddingModel: 'keyword-test', dimensions: 3, metric: 'cosine' };

const entry = (chunkId: string, vector: number[], documentId = 'doc-a', tags: string[] = []): IIndexEntry => ({
	chunkId,
	vector,
	metadata: {
		documentId,
		source: `${documentId}.md`,
		title: documentId,
		tags,
		type: 'md',
		ordinal: 0,
		text: `text of ${chunkId}`,
		start: 0,
		end: 10,
		contentHash: `hash-${documentId}`,
	},
});

describe('VectorIndex', () => {
	let store: MemoryIndexStore;
	let logger: RecordingLogger;
	let index: VectorIndex;

	beforeEach(async () => {
		store = new MemoryIndexStore();
		logger = new RecordingLogger();
		index = await VectorIndex.open(store, DESCRIPTOR, logger);
	});

	it('pins the descriptor on a fresh store', () => {
		expect(store.header).toMatchObject(DESCRIPTOR);
		expect(index.size).toBe(0);
		expect(index.dimensions).toBe(3);
	});

	it('returns the nearest entries first', async () => {
		await index.upsert([entry('x', [1, 0, 0]), entry('y', [0, 1, 0]), entry('xy', [1, 1, 0])]);

		const hits = index.search([1, 0, 0], 2);

		expect(hits.map((hit) => hit.chunk.id)).toEqual(['x', 'xy']);
		expect(hits[0].similarity).toBeCloseTo(1);
		expect(hits[1].similarity).toBeCloseTo(Math.SQRT1_2);
		expect(hits[0].chunk.source).toBe('doc-a.md');
	});

	it('breaks ties by insertion order and keeps it when an entry is overwritten', async () => {
		await index.upsert([entry('first', [1, 0, 0])]);
		await index.upsert([entry('second', [2, 0, 0])]);
		await index.upsert([entry('first', [3, 0, 0])]);

		expect(index.search([1, 0, 0], 2).map((hit) => hit.chunk.id)).toEqual(['first', 'second']);
		expect(index.search([1, 0, 0], 2)).toEqual(index.search([1, 0, 0], 2));
	});

	it('rejects a batch holding one vector of the wrong dimensionality', async () => {
		await expect(index.upsert([entry('ok', [1, 0, 0]), entry('bad', [1, 0])])).rejects.toBeInstanceOf(DimensionMismatchError);

		expect(index.size).toBe(0);
		expect(store.commits).toBe(0);
	});

	it('rejects a query vector of the wrong dimensionality', () => {
		expect(() => index.search([1, 0], 3)).toThrow(DimensionMismatchError);
	});

	it('applies filters conjunctively', async () => {
		await index.upsert([entry('a1', [1, 0, 0], 'doc-a', ['lasers']), entry('b1', [1, 0, 0], 'doc-b', ['lasers', 'thermal']), entry('c1', [1, 0, 0], 'doc-c', ['thermal'])]);

		expect(index.search([1, 0, 0], 5, { tags: ['THERMAL'] }).map((hit) => hit.chunk.id)).toEqual(['b1', 'c1']);
		expect(index.search([1, 0, 0], 5, { tags: ['thermal'], documentIds: ['doc-b'] }).map((hit) => hit.chunk.id)).toEqual(['b1']);
		expect(index.search([1, 0, 0], 5, { sources: ['doc-a.md'] }).map((hit) => hit.chunk.id)).toEqual(['a1']);
	});

	it('replaces the chunks of a document', async () => {
		await index.replaceDocument('doc-a', [entry('a1', [1, 0, 0]), entry('a2', [0, 1, 0])]);

		const result = await index.replaceDocument('doc-a', [entry('a2', [0, 1, 0]), entry('a3', [0, 0, 1])]);

		expect(result).toEqual({ added: 1, updated: 1, removed: 1 });
		expect(index.documentEntries('doc-a').map((stored) => stored.chunkId)).toEqual(['a2', 'a3']);
		expect([...store.entries.keys()].sort()).toEqual(['a2', 'a3']);
	});

	it('deletes entries and reports how many existed', async () => {
		await index.upsert([entry('a1', [1, 0, 0]), entry('a2', [0, 1, 0])]);

		expect(await index.delete(['a1', 'missing'])).toBe(1);
		expect(index.has('a1')).toBe(false);
		expect(index.size).toBe(1);
	});

	it('loses no update under concurrent writers', async () => {
		const writes = Array.from({ length: 20 }, (_, i) => index.upsert([entry(`chunk-${i}`, [1, i, 0], `doc-${i % 4}`)]));

		await Promise.all(writes);

		expect(index.size).toBe(20);
		expect(store.entries.size).toBe(20);
		expect(index.version).toBe(20);
	});

	it('keeps a snapshot stable while writers publish new versions', async () => {
		await index.upsert([entry('a1', [1, 0, 0])]);
		const before = index.snapshot();

		await index.upsert([entry('a2', [0, 1, 0])]);

		expect(before.entries.map((stored) => stored.chunkId)).toEqual(['a1']);
		expect(index.snapshot().entries.map((stored) => stored.chunkId)).toEqual(['a1', 'a2']);
	});

	it('publishes nothing when the store fails to commit', async () => {
		store.failCommits = 1;

		await expect(index.upsert([entry('a1', [1, 0, 0])])).rejects.toThrow('commit failed');
		expect(index.size).toBe(0);

		await index.upsert([entry('a2', [1, 0, 0])]);
		expect(index.size).toBe(1);
	});

	it('reloads persisted entries in insertion order', async () => {
		await index.upsert([entry('b', [1, 0, 0]), entry('a', [1, 0, 0])]);

		const reopened = await VectorIndex.open(store, DESCRIPTOR, logger);

		expect(reopened.search([1, 0, 0], 2).map((hit) => hit.chunk.id)).toEqual(['b', 'a']);
	});

	const mismatches: Array<[Partial<IIndexDescriptor>, string]> = [
		[{ embeddingModel: 'other-model' }, 'embeddingModel'],
		[{ dimensions: 4 }, 'dimensions'],
		[{ metric: 'dot' }, 'metric'],
	];

	it.each(mismatches)('refuses to open with a different %p', async (change, field) => {
		const opening = VectorIndex.open(store, { ...DESCRIPTOR, ...change }, logger);

		await expect(opening).rejects.toBeInstanceOf(IndexMismatchError);
		await expect(opening).rejects.toMatchObject({ field });
	});

	it('rebuilds for a new descriptor', async () => {
		await index.upsert([entry('a1', [1, 0, 0])]);

		const rebuilt = await VectorIndex.open(store, { ...DESCRIPTOR, dimensions: 4 }, logger, { rebuild: true });

		expect(rebuilt.size).toBe(0);
		expect(rebuilt.dimensions).toBe(4);
		expect(store.header?.dimensions).toBe(4);
	});

	it('refuses entries without a header', async () => {
		await index.upsert([entry('a1', [1, 0, 0])]);
		store.header = null;

		await expect(VectorIndex.open(store, DESCRIPTOR, logger)).rejects.toBeInstanceOf(IndexCorruptError);
	});

	it('clears every entry', async () => {
		await index.upsert([entry('a1', [1, 0, 0])]);

		await index.clear();

		expect(index.size).toBe(0);
		expect(store.entries.size).toBe(0);
		expect(store.header).toMatchObject(DESCRIPTOR);
	});
});
