import { OpenAI } from 'openai';

import { IAssembledPrompt, IGenerationService, ILogger } from '../../types';
import { GenerationServiceError, OperationCancelledError, PipelineErrorKind, describeError, throwIfCancelled } from '../errors';
import { classifyServiceError } from './service_errors';

export interface IOpenAIGenerationOptions {
	baseUrl: string;
	apiKey: string;
	model: string;
	timeoutMs: number;
	temperature: number;
}

/**
 * Chat completion service behind an OpenAI-compatible endpoint, e.g. a local
 * Ollama serving gemma3. The SDK's own retries are disabled.
 */
export class OpenAIGenerationService implements IGenerationService {
	public readonly model: string;
	private readonly openai_client: OpenAI;
	private readonly temperature: number;

	constructor(options: IOpenAIGenerationOptions) {
		this.model = options.model;
		this.temperature = options.temperature;
		this.openai_client = new OpenAI({
			baseURL: options.baseUrl,
			apiKey: options.apiKey,
			timeout: options.timeoutMs,
			maxRetries: 0,
		});
	}

	/**
	 * Sends the prompt as a system message and a user message.
	 * @returns The first choice's content, or an empty string when there is none
	 */
	public complete = async (prompt: IAssembledPrompt, signal?: AbortSignal): Promise<string> => {
		const response = await this.openai_client.chat.completions.create(
			{
				model: this.model,
				temperature: this.temperature,
				messages: [
					{ role: 'system', content: prompt.system },
					{ role: 'user', content: prompt.user },
				],
			},
			{ signal }
		);
		return response.choices[0]?.message?.content ?? '';
	};
}

/**
 * Blocking generation call. Failures surface to the caller and are never retried:
 * a second attempt could answer without the context the first one carried.
 */
export class GenerationClient {
	constructor(
		private readonly service: IGenerationService,
		private readonly logger: ILogger
	) {}

	public get model(): string {
		return this.service.model;
	}

	/**
	 * @throws {GenerationServiceError} On timeout, unavailable service, rejected request or empty completion
	 * @throws {OperationCancelledError} If `signal` fires
	 */
	public generate = async (prompt: IAssembledPrompt, signal?: AbortSignal): Promise<string> => {
		throwIfCancelled(signal, 'generation');

		let text: string;
		try {
			text = await this.service.complete(prompt, signal);
		} catch (error) {
			if (error instanceof GenerationServiceError || error instanceof OperationCancelledError) throw error;
			throw this.translate(error, signal);
		}

		if (text.trim().length === 0) {
			throw new GenerationServiceError(PipelineErrorKind.EMPTY_COMPLETION, `Model ${this.model} returned an empty completion`);
		}

		this.logger.debug(`[LLM] ${this.model} produced ${text.length} characters`);
		return text;
	};

	private translate = (error: unknown, signal?: AbortSignal): GenerationServiceError | OperationCancelledError => {
		const failure = classifyServiceError(error);
		if (failure === 'cancelled' || signal?.aborted) {
			return new OperationCancelledError('generation', error);
		}

		const message = `Generation with ${this.model} failed (${failure}): ${describeError(error)}`;
		this.logger.error(`[LLM] ${message}`);
		switch (failure) {
			case 'timeout':
				return new GenerationServiceError(PipelineErrorKind.SERVICE_TIMEOUT, message, error);
			case 'unavailable':
			case 'rate_limited':
			case 'server':
				return new GenerationServiceError(PipelineErrorKind.SERVICE_UNAVAILABLE, message, error);
			case 'rejected':
				return new GenerationServiceError(PipelineErrorKind.SERVICE_REJECTED, message, error);
			default:
				return new GenerationServiceError(PipelineErrorKind.SERVICE_FAILED, message, error);
		}
	};
}
