import { ILogger, IQuery, ISearchFilters, RetrievalResult } from '../../types';
import { EmbeddingClient } from '../ai/embedding';
import { VectorIndex } from '../index/vector_index';
import { ConfigurationError, throwIfCancelled } from '../errors';
import { rerankByOverlap } from './reranker';

export interface IRetrieverOptions {
	topK: number;
	/** Hits with a similarity below this are dropped */
	minScore: number;
	rerank: {
		enabled: boolean;
		weight: number;
		/** Candidates fetched per final hit when re-ranking */
		candidateMultiplier: number;
	};
}

/**
 * Embeds a question and returns the best matching chunks
 */
export class Retriever {
	constructor(
		private readonly embeddings: EmbeddingClient,
		private readonly index: VectorIndex,
		private readonly options: IRetrieverOptions,
		private readonly logger: ILogger
	) {
		if (!Number.isInteger(options.topK) || options.topK <= 0) {
			throw new ConfigurationError(`topK must be a positive integer, got ${options.topK}`);
		}
		if (options.rerank.weight < 0 || options.rerank.weight > 1) {
			throw new ConfigurationError(`rerank weight must be within [0, 1], got ${options.rerank.weight}`);
		}
	}

	public embedQuery = async (text: string, signal?: AbortSignal): Promise<number[]> => {
		return this.embeddings.embedOne(text, signal);
	};

	/**
	 * Searches with an already embedded question. An empty result means
	 * nothing met the threshold.
	 * @throws {DimensionMismatchError} If the vector does not match the index
	 */
	public searchByVector = (question: string, vector: number[], filters?: ISearchFilters): RetrievalResult => {
		const { topK, minScore, rerank } = this.options;
		const candidates = rerank.enabled ? topK * Math.max(1, rerank.candidateMultiplier) : topK;

		const hits = this.index.search(vector, candidates, filters).filter((hit) => hit.similarity >= minScore);
		const ranked = rerank.enabled ? rerankByOverlap(question, hits, { weight: rerank.weight }) : hits;
		const result = ranked.slice(0, topK);

		this.logger.debug(`[RETRIEVER] ${result.length} of ${hits.length} candidates kept (top_k=${topK}, min_score=${minScore}${rerank.enabled ? ', reranked' : ''})`);
		return result;
	};

	/**
	 * @throws {EmbeddingServiceError} If the question cannot be embedded
	 * @throws {OperationCancelledError} If `signal` fires
	 */
	public retrieve = async (query: IQuery, signal?: AbortSignal): Promise<RetrievalResult> => {
		const vector = await this.embedQuery(query.text, signal);
		throwIfCancelled(signal, 'retriever');
		return this.searchByVector(query.text, vector, query.filters);
	};
}
