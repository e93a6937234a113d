import 'reflect-metadata';

export * from './types';
export * from './core/errors';
export * from './core/loader';
export * from './core/rag/chunker';
export * from './core/rag/reranker';
export * from './core/rag/retriever';
export * from './core/rag/prompt';
export * from './core/rag/lifecycle';
export * from './core/rag/pipeline';
export * from './core/ai/embedding';
export * from './core/ai/llm';
export * from './core/index/format';
export * from './core/index/vector_index';
export * from './database/connect/connect_sqlite';
export * from './database/repo';
export { ConfigManager, loadConfig, parseConfig, parseEnv } from './utils/config';
export { mapWithConcurrency } from './utils/concurrency';
export { default as Logger } from './utils/logger';
export { createLuxWeb } from './luxweb';
export type { ICreateLuxWebOptions, ILuxWeb } from './luxweb';
