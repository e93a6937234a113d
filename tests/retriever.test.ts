import { EmbeddingClient } from '../src/core/ai/embedding';
import { VectorIndex } from '../src/core/index/vector_index';
import { IRetrieverOptions, Retriever } from '../src/core/rag/retriever';
import { lexicalOverlap, rerankByOverlap, tokenize } from '../src/core/rag/reranker';
import { IIndexEntry, IRetrievalHit } from '../src/types';
import { KeywordEmbeddingService, MemoryIndexStore, RecordingLogger } from './helpers/fakes';

const VOCABULARY = ['laser', 'ring', 'thermal'];

const entry = (chunkId: string, text: string, service: KeywordEmbeddingService, tags: string[] = []): IIndexEntry => ({
	chunkId,
	vector: service.embedText(text),
	metadata: {
		documentId: `doc-${chunkId}`,
		source: `${chunkId}.md`,
		title: chunkId,
		tags,
		type: 'md',
		ordinal: 0,
		text,
		start: 0,
		end: text.length,
		contentHash: `hash-${chunkId}`,
	},
});

const OPTIONS: IRetrieverOptions = { topK: 2, minScore: 0.2, rerank: { enabled: false, weight: 0.5, candidateMultiplier: 3 } };

describe('Retriever', () => {
	let service: KeywordEmbeddingService;
	let index: VectorIndex;
	let logger: RecordingLogger;

	const retriever = (options: Partial<IRetrieverOptions> = {}): Retriever =>
		new Retriever(new EmbeddingClient(service, { batchSize: 8, maxAttempts: 1, retryDelayMs: 1 }, logger), index, { ...OPTIONS, ...options }, logger);

	beforeEach(async () => {
		service = new KeywordEmbeddingService(VOCABULARY);
		logger = new RecordingLogger();
		index = await VectorIndex.open(new MemoryIndexStore(), { embeddingModel: service.model, dimensions: VOCABULARY.length, metric: 'cosine' }, logger);
		await index.upsert([
			entry('lasers', 'The laser is a laser.', service, ['sources']),
			entry('rings', 'A ring resonator ring.', service, ['modulators']),
			entry('thermal-ring', 'Thermal tuning of the ring.', service, ['modulators']),
		]);
	});

	it('returns the top-k hits above the threshold', async () => {
		const hits = await retriever().retrieve({ text: 'How does a ring behave?' });

		expect(hits.map((hit) => hit.chunk.id)).toEqual(['rings', 'thermal-ring']);
		expect(hits[0].similarity).toBeCloseTo(1);
		expect(hits[1].similarity).toBeCloseTo(Math.SQRT1_2);
		expect(hits[1].score).toBe(hits[1].similarity);
	});

	it('returns an empty result when nothing meets the threshold', async () => {
		expect(await retriever().retrieve({ text: 'What about packaging?' })).toEqual([]);
		expect(await retriever({ minScore: 0.99 }).retrieve({ text: 'thermal' })).toEqual([]);
	});

	it('returns the same result for the same question', async () => {
		const first = await retriever().retrieve({ text: 'ring thermal laser' });
		const second = await retriever().retrieve({ text: 'ring thermal laser' });

		expect(second).toEqual(first);
	});

	it('applies metadata filters', async () => {
		const hits = await retriever().retrieve({ text: 'ring', filters: { tags: ['modulators'] } });

		expect(hits.map((hit) => hit.chunk.id)).toEqual(['rings', 'thermal-ring']);
		expect(await retriever().retrieve({ text: 'laser', filters: { tags: ['modulators'] } })).toEqual([]);
	});

	it('re-ranks a wider candidate set by query term overlap', async () => {
		const hits = await retriever({ topK: 1, rerank: { enabled: true, weight: 0.5, candidateMultiplier: 3 } }).retrieve({ text: 'thermal tuning ring' });

		expect(hits.map((hit) => hit.chunk.id)).toEqual(['thermal-ring']);
		expect(hits[0].score).toBeCloseTo(0.5 * hits[0].similarity + 0.5);
	});
});

describe('rerankByOverlap', () => {
	const hit = (id: string, text: string, similarity: number): IRetrievalHit => ({
		chunk: { id, documentId: id, source: id, title: id, tags: [], type: 'txt', ordinal: 0, text, start: 0, end: text.length, contentHash: id },
		similarity,
		score: similarity,
	});

	it('drops stopwords and punctuation from query terms', () => {
		expect(tokenize('What is the Loss of a ring-resonator?')).toEqual(['loss', 'ring', 'resonator']);
	});

	it('measures the share of query terms present in a passage', () => {
		expect(lexicalOverlap(new Set(['ring', 'loss']), 'Ring loss is low.')).toBe(1);
		expect(lexicalOverlap(new Set(['ring', 'loss']), 'The ring.')).toBe(0.5);
		expect(lexicalOverlap(new Set(), 'The ring.')).toBe(0);
	});

	it('keeps the incoming order for equal scores', () => {
		const hits = [hit('a', 'nothing shared', 0.6), hit('b', 'nothing shared', 0.6)];

		expect(rerankByOverlap('ring loss', hits, { weight: 0.4 }).map((result) => result.chunk.id)).toEqual(['a', 'b']);
	});

	it('leaves similarity unchanged and combines the score', () => {
		const [result] = rerankByOverlap('ring loss', [hit('a', 'ring', 0.8)], { weight: 0.25 });

		expect(result.similarity).toBe(0.8);
		expect(result.score).toBeCloseTo(0.75 * 0.8 + 0.25 * 0.5);
	});
});
