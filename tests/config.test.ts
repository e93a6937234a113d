import fs from 'fs';
import os from 'os';
import path from 'path';

import { ConfigManager, loadConfig, parseConfig, parseEnv } from '../src/utils/config';
import { ConfigurationError } from '../src/core/errors';

describe('parseConfig', () => {
	it('fills in defaults', () => {
		const config = parseConfig({});

		expect(config.chunking).toEqual({ size: 1000, overlap: 100 });
		expect(config.retrieval).toEqual({ top_k: 3, min_score: 0.2, rerank: { enabled: false, weight: 0.3, candidate_multiplier: 3 } });
		expect(config.embedding).toEqual({ dimensions: null, batch_size: 32, max_attempts: 3, retry_delay: 500, timeout: 30_000 });
		expect(config.generation).toEqual({ timeout: 120_000, temperature: 0 });
		expect(config.index.metric).toBe('cosine');
		expect(config.ingestion.concurrency).toBe(4);
	});

	it('accepts durations as strings or milliseconds', () => {
		const config = parseConfig({ embedding: { timeout: '45s', retry_delay: 250 }, generation: { timeout: '2m' } });

		expect(config.embedding.timeout).toBe(45_000);
		expect(config.embedding.retry_delay).toBe(250);
		expect(config.generation.timeout).toBe(120_000);
	});

	it.each([
		['an overlap as large as the chunk', { chunking: { size: 100, overlap: 100 } }],
		['an unparseable duration', { embedding: { timeout: 'soon' } }],
		['an unknown metric', { index: { metric: 'euclidean' } }],
		['a non-positive top_k', { retrieval: { top_k: 0 } }],
	])('rejects %s', (_label, raw) => {
		expect(() => parseConfig(raw)).toThrow(ConfigurationError);
	});
});

describe('loadConfig', () => {
	let directory: string;

	beforeEach(() => {
		directory = fs.mkdtempSync(path.join(os.tmpdir(), 'luxweb-config-'));
	});

	afterEach(() => {
		fs.rmSync(directory, { recursive: true, force: true });
	});

	it('reads the bundled configuration', () => {
		const config = loadConfig();

		expect(config.index).toEqual({ path: './data/vector_db/lux_industrial_kb.sqlite', metric: 'cosine' });
		expect(config.embedding.retry_delay).toBe(500);
		expect(config.generation.timeout).toBe(120_000);
		expect(config.prompt.instructions).toContain('LuxAgent');
	});

	it('reads a YAML file', () => {
		const file = path.join(directory, 'config.yml');
		fs.writeFileSync(file, 'retrieval:\n  top_k: 5\nprompt:\n  max_context_chars: 2000\n');

		const config = loadConfig(file);

		expect(config.retrieval.top_k).toBe(5);
		expect(config.prompt.max_context_chars).toBe(2000);
	});

	it('rejects a missing or malformed file', () => {
		const file = path.join(directory, 'broken.yml');
		fs.writeFileSync(file, 'retrieval: [unclosed\n');

		expect(() => loadConfig(path.join(directory, 'missing.yml'))).toThrow(ConfigurationError);
		expect(() => loadConfig(file)).toThrow(ConfigurationError);
	});
});

describe('parseEnv', () => {
	it('defaults to a local OpenAI-compatible server', () => {
		const env = parseEnv({});

		expect(env.EMBEDDING_BASE_URL).toBe('http://localhost:11434/v1');
		expect(env.GENERATION_MODEL).toBe('gemma3');
		expect(env.DEBUG_MODE).toBe(false);
	});

	it('reads overrides', () => {
		const manager = ConfigManager.fromEnv({ EMBEDDING_MODEL: 'nomic-embed-text', EMBEDDING_API_KEY: 'test-secret', DEBUG_MODE: 'true' });

		expect(manager.getEmbeddingModel()).toBe('nomic-embed-text');
		expect(manager.getEmbeddingApiKey()).toBe('test-secret');
		expect(manager.isDebugMode()).toBe(true);
	});

	it('rejects an invalid endpoint', () => {
		expect(() => parseEnv({ GENERATION_BASE_URL: 'not a url' })).toThrow(ConfigurationError);
	});
});
