export type DocumentType = 'txt' | 'md' | 'pdf';

export interface IDocumentMetadata {
	title: string;
	tags: string[];
	type: DocumentType;
	ingestedAt: Date;
	/** sha256 of the normalised text */
	contentHash: string;
}

export interface IDocument {
	/** Derived from the source path, stable across runs */
	id: string;
	source: string;
	text: string;
	metadata: IDocumentMetadata;
}

export interface IChunk {
	id: string;
	documentId: string;
	ordinal: number;
	text: string;
	/** Offset of the first character in the document text */
	start: number;
	/** Offset one past the last character */
	end: number;
	/** Leading characters shared with the previous chunk */
	overlap: number;
	embedding: number[] | null;
}

export interface IIndexEntryMetadata {
	documentId: string;
	source: string;
	title: string;
	tags: string[];
	type: DocumentType;
	ordinal: number;
	text: string;
	start: number;
	end: number;
	contentHash: string;
}

export interface IIndexEntry {
	chunkId: string;
	vector: number[];
	metadata: IIndexEntryMetadata;
}

export interface ISearchFilters {
	/** Matches entries carrying at least one of these tags */
	tags?: string[];
	documentIds?: string[];
	sources?: string[];
}

export interface IQuery {
	text: string;
	filters?: ISearchFilters;
}

export interface IRetrievedChunk extends IIndexEntryMetadata {
	id: string;
}

export interface IRetrievalHit {
	chunk: IRetrievedChunk;
	/** Raw similarity between the query and chunk vectors */
	similarity: number;
	/** Ranking score; equals `similarity` unless re-ranking is on */
	score: number;
}

export type RetrievalResult = IRetrievalHit[];

export interface IPromptPassage {
	marker: string;
	rank: number;
	chunkId: string;
	documentId: string;
	source: string;
	title: string;
	text: string;
}

export interface IAssembledPrompt {
	system: string;
	user: string;
	passages: IPromptPassage[];
	/** Chunk ids left out to stay within the context budget, best-ranked first */
	dropped: string[];
	length: number;
}

export interface IAnswerSource {
	marker: string;
	documentId: string;
	source: string;
	title: string;
}

export interface IQueryTimings {
	embeddingMs: number;
	retrievalMs: number;
	assemblyMs: number;
	generationMs: number;
	totalMs: number;
}

export interface IAnswer {
	text: string;
	/** Chunk ids of the passages the prompt carried, in rank order */
	citations: string[];
	sources: IAnswerSource[];
	grounded: boolean;
	timings: IQueryTimings;
}

export interface IEmbeddingService {
	readonly model: string;
	embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface IGenerationService {
	readonly model: string;
	complete(prompt: IAssembledPrompt, signal?: AbortSignal): Promise<string>;
}

export interface IChunkingOptions {
	chunkSize: number;
	chunkOverlap: number;
}

export interface IIngestOptions {
	/** Restrict the run to these files instead of scanning the corpus */
	sources?: string[];
	tags?: string[];
	/** Re-embed documents even when their content is unchanged */
	force?: boolean;
	/** Remove indexed documents whose source is no longer in the corpus */
	prune?: boolean;
	signal?: AbortSignal;
}

export interface IIngestedDocument {
	documentId: string;
	source: string;
	chunks: number;
	removed: number;
}

export interface ISkippedSource {
	source: string;
	reason: string;
}

export interface IIngestionReport {
	ingested: IIngestedDocument[];
	unchanged: string[];
	skipped: ISkippedSource[];
	pruned: string[];
	durationMs: number;
}

export interface IQueryOptions {
	filters?: ISearchFilters;
	signal?: AbortSignal;
}
