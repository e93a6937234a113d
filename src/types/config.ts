export type SimilarityMetric = 'cosine' | 'dot';

export interface IConfig {
    corpus: {
        path: string;
        extensions: Array<string>;
        tags: Array<string>;
    };
    chunking: {
        size: number;
        overlap: number;
    };
    embedding: {
        dimensions: number | null;
        batch_size: number;
        max_attempts: number;
        /** Milliseconds, doubled after every failed attempt. */
        retry_delay: number;
        timeout: number;
    };
    index: {
        path: string;
        metric: SimilarityMetric;
    };
    retrieval: {
        top_k: number;
        min_score: number;
        rerank: {
            enabled: boolean;
            weight: number;
            candidate_multiplier: number;
        };
    };
    prompt: {
        max_context_chars: number;
        instructions: string;
    };
    generation: {
        timeout: number;
        temperature: number;
    };
    ingestion: {
        concurrency: number;
    };
}

export interface IServiceEnv {
    EMBEDDING_BASE_URL: string;
    EMBEDDING_API_KEY: string;
    EMBEDDING_MODEL: string;
    GENERATION_BASE_URL: string;
    GENERATION_API_KEY: string;
    GENERATION_MODEL: string;
    DEBUG_MODE: boolean;
    LUXWEB_CONFIG?: string;
}
