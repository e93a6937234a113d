import path from 'path';
import { randomUUID } from 'crypto';

import { IAnswer, IChunkingOptions, IDocument, IIndexEntry, IIngestOptions, IIngestedDocument, IIngestionReport, ILogger, IQueryOptions, IQueryTimings, ISkippedSource } from '../../types';
import { mapWithConcurrency } from '../../utils/concurrency';
import { EmbeddingClient } from '../ai/embedding';
import { GenerationClient } from '../ai/llm';
import { VectorIndex } from '../index/vector_index';
import { DocumentLoaderRegistry, documentIdFor, toSourcePath } from '../loader';
import { EmbeddingServiceError, InvalidQueryError, UnreadableSourceError, describeError, throwIfCancelled } from '../errors';
import { chunkDocument } from './chunker';
import { IngestionAbortedError, QueryLifecycle, QueryState, QueryTransitionListener } from './lifecycle';
import { IPromptOptions, assemblePrompt, sourcesOf } from './prompt';
import { Retriever } from './retriever';

export interface IPipelineOptions {
	corpus: {
		path: string;
		extensions: string[];
		/** Added to every document ingested from the corpus */
		tags: string[];
	};
	chunking: IChunkingOptions;
	prompt: IPromptOptions;
	/** Documents processed at once during ingestion */
	concurrency: number;
}

export interface IPipelineComponents {
	loaders: DocumentLoaderRegistry;
	embeddings: EmbeddingClient;
	index: VectorIndex;
	retriever: Retriever;
	generation: GenerationClient;
}

export type DocumentOutcome = { status: 'ingested'; document: IIngestedDocument } | { status: 'unchanged'; source: string };

const bySource = <T extends { source: string }>(a: T, b: T): number => (a.source < b.source ? -1 : a.source > b.source ? 1 : 0);

/**
 * Ingests the corpus into the index and answers questions over it
 */
export class Pipeline {
	private readonly loaders: DocumentLoaderRegistry;
	private readonly embeddings: EmbeddingClient;
	private readonly index: VectorIndex;
	private readonly retriever: Retriever;
	private readonly generation: GenerationClient;
	private readonly listeners: QueryTransitionListener[] = [];

	constructor(
		components: IPipelineComponents,
		private readonly options: IPipelineOptions,
		private readonly logger: ILogger
	) {
		this.loaders = components.loaders;
		this.embeddings = components.embeddings;
		this.index = components.index;
		this.retriever = components.retriever;
		this.generation = components.generation;
	}

	/**
	 * Registers a listener called on every query state change
	 * @returns A function that removes the listener
	 */
	public onTransition = (listener: QueryTransitionListener): (() => void) => {
		this.listeners.push(listener);
		return () => {
			const position = this.listeners.indexOf(listener);
			if (position >= 0) this.listeners.splice(position, 1);
		};
	};

	/**
	 * Loads, chunks, embeds and indexes the corpus (or `options.sources`).
	 * Unreadable files are skipped and reported; unchanged documents are left alone.
	 * @throws {IngestionAbortedError} If embedding fails for good; documents committed before stay indexed
	 * @throws {OperationCancelledError} If `options.signal` fires
	 */
	public ingest = async (options: IIngestOptions = {}): Promise<IIngestionReport> => {
		const startedAt = Date.now();
		const corpusRoot = path.resolve(this.options.corpus.path);
		const { signal } = options;
		const tags = [...this.options.corpus.tags, ...(options.tags ?? [])];

		const files = options.sources ? options.sources.map((source) => path.resolve(corpusRoot, source)) : await this.loaders.scanCorpus(corpusRoot, this.options.corpus.extensions);
		this.logger.info(`[PIPELINE] Ingesting ${files.length} files from ${options.sources ? 'the given sources' : corpusRoot}`);

		const ingested: IIngestedDocument[] = [];
		const unchanged: string[] = [];
		const skipped: ISkippedSource[] = [];
		const pruned: string[] = [];
		const report = (): IIngestionReport => ({
			ingested: [...ingested].sort(bySource),
			unchanged: [...unchanged].sort(),
			skipped: [...skipped].sort(bySource),
			pruned: [...pruned].sort(),
			durationMs: Date.now() - startedAt,
		});

		try {
			await mapWithConcurrency(files, this.options.concurrency, async (file) => {
				throwIfCancelled(signal, 'pipeline');

				let document: IDocument;
				try {
					document = await this.loaders.loadDocument(file, { corpusRoot, tags });
				} catch (error) {
					if (!(error instanceof UnreadableSourceError)) throw error;
					const source = toSourcePath(file, corpusRoot);
					this.logger.warn(`[PIPELINE] Skipping ${source}: ${error.message}`);
					skipped.push({ source, reason: error.message });
					return;
				}

				const outcome = await this.indexDocument(document, { force: options.force, signal });
				if (outcome.status === 'unchanged') {
					unchanged.push(outcome.source);
				} else {
					ingested.push(outcome.document);
				}
			});

			if (options.prune && !options.sources) {
				const present = new Set(files.map((file) => documentIdFor(toSourcePath(file, corpusRoot))));
				for (const [documentId, source] of this.index.documents()) {
					if (present.has(documentId)) continue;
					throwIfCancelled(signal, 'pipeline');
					await this.index.replaceDocument(documentId, []);
					pruned.push(source);
					this.logger.info(`[PIPELINE] Pruned ${source}`);
				}
			}
		} catch (error) {
			if (error instanceof EmbeddingServiceError) {
				const partial = report();
				this.logger.error(`[PIPELINE] Ingestion aborted after ${partial.ingested.length} documents: ${error.message}`);
				throw new IngestionAbortedError(partial, error);
			}
			throw error;
		}

		const result = report();
		this.logger.success(
			`[PIPELINE] Ingestion finished in ${result.durationMs}ms: ${result.ingested.length} ingested, ${result.unchanged.length} unchanged, ${result.skipped.length} skipped, ${result.pruned.length} pruned`
		);
		return result;
	};

	/**
	 * Chunks, embeds and indexes one loaded document, replacing its previous chunks
	 */
	public indexDocument = async (document: IDocument, options: { force?: boolean; signal?: AbortSignal } = {}): Promise<DocumentOutcome> => {
		const chunks = chunkDocument(document, this.options.chunking).toArray();

		if (!options.force && this.isUnchanged(document, chunks.map((chunk) => chunk.id))) {
			this.logger.debug(`[PIPELINE] ${document.source} is unchanged`);
			return { status: 'unchanged', source: document.source };
		}

		const vectors = await this.embeddings.embed(
			chunks.map((chunk) => chunk.text),
			options.signal
		);
		throwIfCancelled(options.signal, 'pipeline');

		const entries: IIndexEntry[] = chunks.map((chunk, i) => ({
			chunkId: chunk.id,
			vector: vectors[i],
			metadata: {
				documentId: document.id,
				source: document.source,
				title: document.metadata.title,
				tags: document.metadata.tags,
				type: document.metadata.type,
				ordinal: chunk.ordinal,
				text: chunk.text,
				start: chunk.start,
				end: chunk.end,
				contentHash: document.metadata.contentHash,
			},
		}));

		const result = await this.index.replaceDocument(document.id, entries);
		this.logger.info(`[PIPELINE] Indexed ${document.source}: ${chunks.length} chunks (${result.added} new, ${result.removed} removed)`);
		return { status: 'ingested', document: { documentId: document.id, source: document.source, chunks: chunks.length, removed: result.removed } };
	};

	/**
	 * Answers `question` from the indexed corpus. An answer without grounding
	 * passages is still an answer; `grounded` tells them apart.
	 * @throws {QueryFailedError} Carrying the failing component, error kind and state
	 */
	public query = async (question: string, options: IQueryOptions = {}): Promise<IAnswer> => {
		const { signal, filters } = options;
		const lifecycle = new QueryLifecycle(randomUUID(), this.listeners, this.logger);
		const startedAt = Date.now();
		const timings: IQueryTimings = { embeddingMs: 0, retrievalMs: 0, assemblyMs: 0, generationMs: 0, totalMs: 0 };
		let mark = startedAt;
		const lap = (): number => {
			const now = Date.now();
			const elapsed = now - mark;
			mark = now;
			return elapsed;
		};

		try {
			if (question.trim().length === 0) {
				throw new InvalidQueryError('Question is empty');
			}
			throwIfCancelled(signal, 'pipeline');

			lifecycle.transition(QueryState.Embedding);
			const vector = await this.retriever.embedQuery(question, signal);
			timings.embeddingMs = lap();
			throwIfCancelled(signal, 'retriever');

			lifecycle.transition(QueryState.Retrieving);
			const hits = this.retriever.searchByVector(question, vector, filters);
			timings.retrievalMs = lap();

			lifecycle.transition(QueryState.Assembling);
			const prompt = assemblePrompt(question, hits, this.options.prompt);
			timings.assemblyMs = lap();
			if (prompt.dropped.length > 0) {
				this.logger.warn(`[PIPELINE] Dropped ${prompt.dropped.length} passages to fit ${this.options.prompt.maxContextChars} characters`);
			}
			throwIfCancelled(signal, 'assembler');

			lifecycle.transition(QueryState.Generating);
			const text = await this.generation.generate(prompt, signal);
			timings.generationMs = lap();
			timings.totalMs = Date.now() - startedAt;

			lifecycle.transition(QueryState.Completed);
			this.logger.info(`[PIPELINE] Query ${lifecycle.queryId} completed in ${timings.totalMs}ms with ${prompt.passages.length} passages`);

			return {
				text,
				citations: prompt.passages.map((passage) => passage.chunkId),
				sources: sourcesOf(prompt),
				grounded: prompt.passages.length > 0,
				timings,
			};
		} catch (error) {
			if (lifecycle.isTerminal()) throw error;
			const failure = lifecycle.fail(error);
			this.logger.error(`[PIPELINE] Query ${lifecycle.queryId} failed in ${failure.state} (${failure.component}, ${failure.kind}): ${describeError(error)}`);
			throw failure;
		}
	};

	private isUnchanged = (document: IDocument, chunkIds: string[]): boolean => {
		const existing = this.index.documentEntries(document.id);
		if (existing.length !== chunkIds.length) return false;
		const ids = new Set(chunkIds);
		return existing.every((entry) => ids.has(entry.chunkId) && entry.metadata.contentHash === document.metadata.contentHash);
	};
}
