/**
 * Error taxonomy shared by every pipeline component.
 */

export type PipelineComponent = 'config' | 'loader' | 'chunker' | 'embedding' | 'index' | 'retriever' | 'assembler' | 'generation' | 'pipeline';

export enum PipelineErrorKind {
	// Per-document, ingestion carries on
	UNREADABLE_SOURCE = 'UNREADABLE_SOURCE',

	// External services
	SERVICE_TRANSIENT = 'SERVICE_TRANSIENT',
	SERVICE_FAILED = 'SERVICE_FAILED',
	SERVICE_TIMEOUT = 'SERVICE_TIMEOUT',
	SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
	SERVICE_REJECTED = 'SERVICE_REJECTED',
	EMPTY_COMPLETION = 'EMPTY_COMPLETION',

	// Index, fatal until re-ingested
	INDEX_CORRUPT = 'INDEX_CORRUPT',
	INDEX_MISMATCH = 'INDEX_MISMATCH',
	DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',

	CONTEXT_OVERFLOW = 'CONTEXT_OVERFLOW',
	INVALID_QUERY = 'INVALID_QUERY',
	CANCELLED = 'CANCELLED',
	INVALID_CONFIG = 'INVALID_CONFIG',
	INGESTION_ABORTED = 'INGESTION_ABORTED',
	UNKNOWN = 'UNKNOWN',
}

/**
 * Base pipeline error
 */
export class PipelineError extends Error {
	constructor(
		public readonly kind: PipelineErrorKind,
		public readonly component: PipelineComponent,
		message: string,
		public readonly originalError?: unknown
	) {
		super(message);
		this.name = 'PipelineError';
		Error.captureStackTrace(this, this.constructor);
	}
}

export class UnreadableSourceError extends PipelineError {
	constructor(
		public readonly source: string,
		reason: string,
		originalError?: unknown
	) {
		super(PipelineErrorKind.UNREADABLE_SOURCE, 'loader', `Cannot read ${source}: ${reason}`, originalError);
		this.name = 'UnreadableSourceError';
	}
}

export class EmbeddingServiceError extends PipelineError {
	constructor(
		message: string,
		public readonly transient: boolean,
		originalError?: unknown,
		kind: PipelineErrorKind = transient ? PipelineErrorKind.SERVICE_TRANSIENT : PipelineErrorKind.SERVICE_FAILED
	) {
		super(kind, 'embedding', message, originalError);
		this.name = 'EmbeddingServiceError';
	}
}

export class GenerationServiceError extends PipelineError {
	constructor(kind: PipelineErrorKind, message: string, originalError?: unknown) {
		super(kind, 'generation', message, originalError);
		this.name = 'GenerationServiceError';
	}
}

export class IndexCorruptError extends PipelineError {
	constructor(message: string, originalError?: unknown, kind: PipelineErrorKind = PipelineErrorKind.INDEX_CORRUPT) {
		super(kind, 'index', message, originalError);
		this.name = 'IndexCorruptError';
	}
}

/**
 * The persisted header was written for another embedding model, dimensionality or metric.
 */
export class IndexMismatchError extends IndexCorruptError {
	constructor(
		public readonly field: 'embeddingModel' | 'dimensions' | 'metric' | 'formatVersion',
		public readonly expected: string | number,
		public readonly actual: string | number
	) {
		super(`Index was built with ${field}=${actual} but the runtime uses ${field}=${expected}; re-ingest with rebuild`, undefined, PipelineErrorKind.INDEX_MISMATCH);
		this.name = 'IndexMismatchError';
	}
}

export class DimensionMismatchError extends PipelineError {
	constructor(
		public readonly expected: number,
		public readonly actual: number,
		subject: string
	) {
		super(PipelineErrorKind.DIMENSION_MISMATCH, 'index', `${subject} has ${actual} dimensions, index expects ${expected}`);
		this.name = 'DimensionMismatchError';
	}
}

export class ContextOverflowError extends PipelineError {
	constructor(
		public readonly required: number,
		public readonly budget: number
	) {
		super(PipelineErrorKind.CONTEXT_OVERFLOW, 'assembler', `Instructions and question need ${required} characters, budget is ${budget}`);
		this.name = 'ContextOverflowError';
	}
}

export class InvalidQueryError extends PipelineError {
	constructor(message: string) {
		super(PipelineErrorKind.INVALID_QUERY, 'pipeline', message);
		this.name = 'InvalidQueryError';
	}
}

export class OperationCancelledError extends PipelineError {
	constructor(component: PipelineComponent, originalError?: unknown) {
		super(PipelineErrorKind.CANCELLED, component, 'Operation was cancelled', originalError);
		this.name = 'OperationCancelledError';
	}
}

export class ConfigurationError extends PipelineError {
	constructor(message: string, originalError?: unknown) {
		super(PipelineErrorKind.INVALID_CONFIG, 'config', message, originalError);
		this.name = 'ConfigurationError';
	}
}

/**
 * Throws `OperationCancelledError` when the signal has fired.
 */
export const throwIfCancelled = (signal: AbortSignal | undefined, component: PipelineComponent): void => {
	if (signal?.aborted) {
		throw new OperationCancelledError(component, signal.reason);
	}
};

export const describeError = (error: unknown): string => {
	return error instanceof Error ? error.message : String(error);
};
