import { OpenAI } from 'openai';

import { IEmbeddingService, ILogger } from '../../types';
import { sleep } from '../../utils/concurrency';
import { isFiniteVector } from '../../utils/vector';
import { EmbeddingServiceError, OperationCancelledError, PipelineErrorKind, describeError, throwIfCancelled } from '../errors';
import { classifyServiceError, isTransientFailure } from './service_errors';

export interface IOpenAIEmbeddingOptions {
	baseUrl: string;
	apiKey: string;
	model: string;
	timeoutMs: number;
}

export interface IEmbeddingClientOptions {
	batchSize: number;
	maxAttempts: number;
	retryDelayMs: number;
	/** Pinned dimensionality; learnt from the first response when null */
	dimensions?: number | null;
}

const kindFor = (failure: ReturnType<typeof classifyServiceError>): PipelineErrorKind => {
	switch (failure) {
		case 'timeout':
			return PipelineErrorKind.SERVICE_TIMEOUT;
		case 'unavailable':
			return PipelineErrorKind.SERVICE_UNAVAILABLE;
		case 'rejected':
			return PipelineErrorKind.SERVICE_REJECTED;
		case 'rate_limited':
		case 'server':
			return PipelineErrorKind.SERVICE_TRANSIENT;
		default:
			return PipelineErrorKind.SERVICE_FAILED;
	}
};

/**
 * Embedding service behind an OpenAI-compatible `/embeddings` endpoint
 * (a local Ollama or llama.cpp server). SDK retries are off: the
 * EmbeddingClient owns the retry policy.
 */
export class OpenAIEmbeddingService implements IEmbeddingService {
	public readonly model: string;
	private readonly openai_client: OpenAI;

	constructor(options: IOpenAIEmbeddingOptions) {
		this.model = options.model;
		this.openai_client = new OpenAI({
			baseURL: options.baseUrl,
			apiKey: options.apiKey,
			timeout: options.timeoutMs,
			maxRetries: 0,
		});
	}

	/**
	 * @throws {EmbeddingServiceError} Flagged transient for timeouts, connection errors, 429 and 5xx
	 * @throws {OperationCancelledError} If `signal` fires
	 */
	public embedBatch = async (texts: string[], signal?: AbortSignal): Promise<number[][]> => {
		try {
			const response = await this.openai_client.embeddings.create({ model: this.model, input: texts, encoding_format: 'float' }, { signal });
			return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
		} catch (error) {
			const failure = classifyServiceError(error);
			if (failure === 'cancelled') {
				throw new OperationCancelledError('embedding', error);
			}
			throw new EmbeddingServiceError(`Embedding request failed (${failure}): ${describeError(error)}`, isTransientFailure(failure), error, kindFor(failure));
		}
	};
}

/**
 * Batching, order-preserving embedding client with bounded exponential backoff
 * for transient service failures.
 */
export class EmbeddingClient {
	private readonly batchSize: number;
	private readonly maxAttempts: number;
	private readonly retryDelayMs: number;
	private detectedDimensions: number | null;

	constructor(
		private readonly service: IEmbeddingService,
		options: IEmbeddingClientOptions,
		private readonly logger: ILogger
	) {
		this.batchSize = Math.max(1, options.batchSize);
		this.maxAttempts = Math.max(1, options.maxAttempts);
		this.retryDelayMs = options.retryDelayMs;
		this.detectedDimensions = options.dimensions ?? null;
	}

	public get model(): string {
		return this.service.model;
	}

	/**
	 * Generates one vector per input text, in input order.
	 * @throws {EmbeddingServiceError} When a batch fails for good
	 * @throws {OperationCancelledError} If `signal` fires
	 */
	public embed = async (texts: readonly string[], signal?: AbortSignal): Promise<number[][]> => {
		const vectors: number[][] = [];
		for (let i = 0; i < texts.length; i += this.batchSize) {
			const batch = texts.slice(i, i + this.batchSize);
			vectors.push(...(await this.embedBatchWithRetry(batch, signal)));
		}
		return vectors;
	};

	public embedOne = async (text: string, signal?: AbortSignal): Promise<number[]> => {
		const [vector] = await this.embedBatchWithRetry([text], signal);
		return vector;
	};

	/**
	 * Get the dimension size of the current model, probing it once when unknown
	 */
	public getExpectedDimensions = async (signal?: AbortSignal): Promise<number> => {
		if (this.detectedDimensions === null) {
			const probe = await this.embedOne('dimension probe', signal);
			this.logger.info(`[EMBEDDING] Detected ${probe.length} dimensions for model ${this.model}`);
		}
		if (this.detectedDimensions === null) {
			throw new EmbeddingServiceError(`Could not detect dimensions for model ${this.model}`, false);
		}
		return this.detectedDimensions;
	};

	public getCachedDimensions = (): number | null => this.detectedDimensions;

	private embedBatchWithRetry = async (batch: string[], signal?: AbortSignal): Promise<number[][]> => {
		let attempt = 0;

		while (true) {
			attempt++;
			throwIfCancelled(signal, 'embedding');

			try {
				const vectors = await this.service.embedBatch(batch, signal);
				this.validate(vectors, batch.length);
				return vectors;
			} catch (error) {
				if (error instanceof OperationCancelledError) throw error;

				const failure = error instanceof EmbeddingServiceError ? error : new EmbeddingServiceError(`Embedding request failed: ${describeError(error)}`, false, error);
				if (!failure.transient) {
					throw failure;
				}
				if (attempt >= this.maxAttempts) {
					throw new EmbeddingServiceError(`Failed to generate embeddings after ${this.maxAttempts} attempts: ${failure.message}`, false, failure);
				}

				const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
				this.logger.warn(`[EMBEDDING] Transient failure, retrying in ${delay}ms (attempt ${attempt + 1} of ${this.maxAttempts}): ${failure.message}`);
				try {
					await sleep(delay, signal);
				} catch (abortReason) {
					throw new OperationCancelledError('embedding', abortReason);
				}
			}
		}
	};

	private validate(vectors: unknown, expectedCount: number): void {
		if (!Array.isArray(vectors) || vectors.length !== expectedCount) {
			throw new EmbeddingServiceError(`Embedding service returned ${Array.isArray(vectors) ? vectors.length : 'no'} vectors for ${expectedCount} inputs`, false);
		}
		for (const vector of vectors) {
			if (!isFiniteVector(vector) || vector.length === 0) {
				throw new EmbeddingServiceError('Embedding service returned a malformed vector', false);
			}
			if (this.detectedDimensions === null) {
				this.detectedDimensions = vector.length;
			} else if (vector.length !== this.detectedDimensions) {
				throw new EmbeddingServiceError(`Embedding service returned a ${vector.length}-dimensional vector, expected ${this.detectedDimensions}`, false);
			}
		}
	}
}
