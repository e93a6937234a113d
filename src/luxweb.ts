import 'reflect-metadata';
import path from 'path';

import { IConfig, ILogger } from './types';
import Logger from './utils/logger';
import { ConfigManager, loadConfig } from './utils/config';
import { EmbeddingClient, OpenAIEmbeddingService } from './core/ai/embedding';
import { GenerationClient, OpenAIGenerationService } from './core/ai/llm';
import { VectorIndex } from './core/index/vector_index';
import { DocumentLoaderRegistry } from './core/loader';
import { Pipeline } from './core/rag/pipeline';
import { Retriever } from './core/rag/retriever';
import { connectIndexDatabase } from './database/connect/connect_sqlite';
import { VectorIndexRepository } from './database/repo';

export interface ICreateLuxWebOptions {
	/** Pipeline configuration; read from the YAML file when omitted */
	config?: IConfig;
	configPath?: string;
	env?: ConfigManager;
	logger?: ILogger;
	/** Clear the index and pin it to the current embedding model */
	rebuild?: boolean;
}

export interface ILuxWeb {
	pipeline: Pipeline;
	index: VectorIndex;
	config: IConfig;
	logger: ILogger;
	close: () => Promise<void>;
}

/**
 * Wires the pipeline against the configured embedding and generation
 * endpoints and opens the persisted index.
 * @throws {ConfigurationError} If the environment or configuration is invalid
 * @throws {IndexMismatchError} If the index was built with another embedding model
 * @throws {IndexCorruptError} If the index cannot be read
 */
export const createLuxWeb = async (options: ICreateLuxWebOptions = {}): Promise<ILuxWeb> => {
	const env = options.env ?? ConfigManager.getInstance();
	const logger = options.logger ?? new Logger({ debug: env.isDebugMode() });
	const configPath = options.configPath ?? env.getConfigPath();
	const config = options.config ?? (configPath ? loadConfig(path.resolve(configPath)) : loadConfig());

	const embeddings = new EmbeddingClient(
		new OpenAIEmbeddingService({
			baseUrl: env.getEmbeddingBaseUrl(),
			apiKey: env.getEmbeddingApiKey(),
			model: env.getEmbeddingModel(),
			timeoutMs: config.embedding.timeout,
		}),
		{
			batchSize: config.embedding.batch_size,
			maxAttempts: config.embedding.max_attempts,
			retryDelayMs: config.embedding.retry_delay,
			dimensions: config.embedding.dimensions,
		},
		logger
	);
	const generation = new GenerationClient(
		new OpenAIGenerationService({
			baseUrl: env.getGenerationBaseUrl(),
			apiKey: env.getGenerationApiKey(),
			model: env.getGenerationModel(),
			timeoutMs: config.generation.timeout,
			temperature: config.generation.temperature,
		}),
		logger
	);

	const dimensions = await embeddings.getExpectedDimensions();
	const dataSource = await connectIndexDatabase(config.index.path, logger);
	const store = new VectorIndexRepository(dataSource, logger);

	let index: VectorIndex;
	try {
		index = await VectorIndex.open(store, { embeddingModel: embeddings.model, dimensions, metric: config.index.metric }, logger, { rebuild: options.rebuild });
	} catch (error) {
		await store.close();
		throw error;
	}

	const retriever = new Retriever(
		embeddings,
		index,
		{
			topK: config.retrieval.top_k,
			minScore: config.retrieval.min_score,
			rerank: {
				enabled: config.retrieval.rerank.enabled,
				weight: config.retrieval.rerank.weight,
				candidateMultiplier: config.retrieval.rerank.candidate_multiplier,
			},
		},
		logger
	);

	const pipeline = new Pipeline(
		{ loaders: new DocumentLoaderRegistry(), embeddings, index, retriever, generation },
		{
			corpus: { path: config.corpus.path, extensions: config.corpus.extensions, tags: config.corpus.tags },
			chunking: { chunkSize: config.chunking.size, chunkOverlap: config.chunking.overlap },
			prompt: { instructions: config.prompt.instructions, maxContextChars: config.prompt.max_context_chars },
			concurrency: config.ingestion.concurrency,
		},
		logger
	);

	logger.success(`[LUXWEB] Ready: ${index.size} chunks indexed, embedding with ${embeddings.model}, generating with ${generation.model}`);
	return { pipeline, index, config, logger, close: index.close };
};
