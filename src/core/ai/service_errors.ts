import { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';

export type ServiceFailure = 'cancelled' | 'timeout' | 'unavailable' | 'rate_limited' | 'server' | 'rejected' | 'unknown';

/**
 * Classifies an error thrown by the OpenAI SDK (or a fetch underneath it).
 */
export const classifyServiceError = (error: unknown): ServiceFailure => {
	if (error instanceof APIUserAbortError) return 'cancelled';
	if (error instanceof APIConnectionTimeoutError) return 'timeout';
	if (error instanceof APIConnectionError) return 'unavailable';
	if (error instanceof APIError) {
		if (error.status === undefined) return 'unknown';
		if (error.status === 429) return 'rate_limited';
		if (error.status >= 500) return 'server';
		return 'rejected';
	}
	if (error instanceof Error && error.name === 'AbortError') return 'cancelled';
	return 'unknown';
};

/**
 * Failures worth another attempt: the request may succeed unchanged.
 */
export const isTransientFailure = (failure: ServiceFailure): boolean => {
	return failure === 'timeout' || failure === 'unavailable' || failure === 'rate_limited' || failure === 'server';
};
