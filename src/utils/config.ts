import fs from 'fs';
import ms from 'ms';
import yaml from 'yaml';
import path from 'path';
import { z } from 'zod';
import { config } from 'dotenv';

import { IConfig, IServiceEnv } from '../types';
import { ConfigurationError } from '../core/errors';

/**
 * Schema for validating environment variables
 * Endpoints default to a local Ollama server exposing the OpenAI-compatible API
 */
const EnvSchema = z.object({
	EMBEDDING_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
	EMBEDDING_API_KEY: z.string().default('ollama'),
	EMBEDDING_MODEL: z.string().min(1).default('all-minilm'),
	GENERATION_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
	GENERATION_API_KEY: z.string().default('ollama'),
	GENERATION_MODEL: z.string().min(1).default('gemma3'),
	DEBUG_MODE: z
		.union([z.boolean(), z.string()])
		.default(false)
		.transform((val) => {
			if (typeof val === 'string') {
				return val.toLowerCase() === 'true';
			}
			return val;
		}),
	LUXWEB_CONFIG: z.string().optional(),
});

/**
 * Duration given either as milliseconds or as an `ms` string such as "30s"
 */
const Duration = z.union([z.number().nonnegative(), z.string()]).transform((val, ctx) => {
	if (typeof val === 'number') return val;
	const parsed = ms(val);
	if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration: ${val}` });
		return z.NEVER;
	}
	return parsed;
});

const ConfigSchema = z
	.object({
		corpus: z
			.object({
				path: z.string().default('./data'),
				extensions: z.array(z.string()).default(['.pdf', '.md', '.txt']),
				tags: z.array(z.string()).default([]),
			})
			.default({}),
		chunking: z
			.object({
				size: z.number().int().positive().default(1000),
				overlap: z.number().int().nonnegative().default(100),
			})
			.default({})
			.refine((chunking) => chunking.overlap < chunking.size, { message: 'chunking.overlap must be smaller than chunking.size' }),
		embedding: z
			.object({
				dimensions: z.number().int().positive().nullable().default(null),
				batch_size: z.number().int().positive().default(32),
				max_attempts: z.number().int().positive().default(3),
				retry_delay: Duration.default(500),
				timeout: Duration.default(30_000),
			})
			.default({}),
		index: z
			.object({
				path: z.string().default('./data/vector_db/lux_industrial_kb.sqlite'),
				metric: z.enum(['cosine', 'dot']).default('cosine'),
			})
			.default({}),
		retrieval: z
			.object({
				top_k: z.number().int().positive().default(3),
				min_score: z.number().min(-1).max(1).default(0.2),
				rerank: z
					.object({
						enabled: z.boolean().default(false),
						weight: z.number().min(0).max(1).default(0.3),
						candidate_multiplier: z.number().int().positive().default(3),
					})
					.default({}),
			})
			.default({}),
		prompt: z
			.object({
				max_context_chars: z.number().int().positive().default(6000),
				instructions: z.string().min(1).default(
					[
						'You are LuxAgent, a technical expert in Silicon Photonics and Co-Packaged Optics (CPO).',
						"Use the provided industrial paper snippets to answer the user's question and cite them with their [n] markers.",
						"If the answer isn't in the context, say you don't know based on current data.",
					].join('\n')
				),
			})
			.default({}),
		generation: z
			.object({
				timeout: Duration.default(120_000),
				temperature: z.number().min(0).max(2).default(0),
			})
			.default({}),
		ingestion: z
			.object({
				concurrency: z.number().int().positive().default(4),
			})
			.default({}),
	})
	.default({});

const formatIssues = (error: z.ZodError): string => {
	return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
};

/**
 * Validates raw environment values
 * @throws {ConfigurationError} If a variable is invalid
 */
export const parseEnv = (env: NodeJS.ProcessEnv): IServiceEnv => {
	const result = EnvSchema.safeParse({
		EMBEDDING_BASE_URL: env.EMBEDDING_BASE_URL || undefined,
		EMBEDDING_API_KEY: env.EMBEDDING_API_KEY || undefined,
		EMBEDDING_MODEL: env.EMBEDDING_MODEL || undefined,
		GENERATION_BASE_URL: env.GENERATION_BASE_URL || undefined,
		GENERATION_API_KEY: env.GENERATION_API_KEY || undefined,
		GENERATION_MODEL: env.GENERATION_MODEL || undefined,
		DEBUG_MODE: env.DEBUG_MODE || undefined,
		LUXWEB_CONFIG: env.LUXWEB_CONFIG || undefined,
	});
	if (!result.success) {
		throw new ConfigurationError(`Missing or invalid environment variables: ${formatIssues(result.error)}`, result.error);
	}
	return result.data;
};

/**
 * Manages service configuration using environment variables
 * Implements the Singleton pattern to ensure only one configuration instance exists
 * @class ConfigManager
 */
export class ConfigManager {
	private static instance: ConfigManager | undefined;
	private readonly config: IServiceEnv;

	private constructor(env: IServiceEnv) {
		this.config = env;
	}

	/**
	 * Gets the singleton instance of ConfigManager
	 * Loads `.env.<NODE_ENV>` when present, `.env` otherwise
	 * @returns {ConfigManager} The singleton ConfigManager instance
	 * @throws {ConfigurationError} If environment variables cannot be loaded or validated
	 */
	public static getInstance(): ConfigManager {
		if (!ConfigManager.instance) {
			const environment = process.env.NODE_ENV || 'prod';
			const envPath = path.resolve(process.cwd(), `.env.${environment}`);
			const fallbackPath = path.resolve(process.cwd(), '.env');
			const selected = fs.existsSync(envPath) ? envPath : fallbackPath;

			if (fs.existsSync(selected)) {
				const result = config({ path: selected });
				if (result.error) {
					throw new ConfigurationError(`Failed to load environment variables: ${result.error.message}`, result.error);
				}
			}

			ConfigManager.instance = new ConfigManager(parseEnv(process.env));
		}
		return ConfigManager.instance;
	}

	/**
	 * Builds a standalone manager from explicit values, bypassing `.env` files
	 */
	public static fromEnv(env: NodeJS.ProcessEnv): ConfigManager {
		return new ConfigManager(parseEnv(env));
	}

	public getConfig(): IServiceEnv {
		return this.config;
	}

	public getEmbeddingBaseUrl(): string {
		return this.config.EMBEDDING_BASE_URL;
	}

	public getEmbeddingApiKey(): string {
		return this.config.EMBEDDING_API_KEY;
	}

	public getEmbeddingModel(): string {
		return this.config.EMBEDDING_MODEL;
	}

	public getGenerationBaseUrl(): string {
		return this.config.GENERATION_BASE_URL;
	}

	public getGenerationApiKey(): string {
		return this.config.GENERATION_API_KEY;
	}

	public getGenerationModel(): string {
		return this.config.GENERATION_MODEL;
	}

	/**
	 * Gets the debug mode status
	 * @returns {boolean} The current debug mode status
	 */
	public isDebugMode(): boolean {
		return this.config.DEBUG_MODE;
	}

	/**
	 * Path of the YAML pipeline configuration, when overridden
	 */
	public getConfigPath(): string | undefined {
		return this.config.LUXWEB_CONFIG;
	}
}

/**
 * Validates an already parsed configuration object, filling in defaults
 * @throws {ConfigurationError} If a value is invalid
 */
export const parseConfig = (raw: unknown): IConfig => {
	const result = ConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`, result.error);
	}
	return result.data;
};

/**
 * Loads configuration from YAML file
 * @param configPath - Defaults to config/config.yml at the project root
 * @returns Configuration object
 * @throws {ConfigurationError} If the file cannot be read, parsed or validated
 */
export const loadConfig = (configPath: string = path.join(__dirname, '../../config/config.yml')): IConfig => {
	let file: string;
	try {
		file = fs.readFileSync(configPath, 'utf8');
	} catch (error) {
		throw new ConfigurationError(`Failed to read configuration ${configPath}: ${error}`, error);
	}

	let raw: unknown;
	try {
		raw = yaml.parse(file);
	} catch (error) {
		throw new ConfigurationError(`Failed to parse configuration ${configPath}: ${error}`, error);
	}

	return parseConfig(raw);
};
