import crypto from 'crypto';

import { SimilarityMetric } from '../types';

export const dot = (a: readonly number[], b: readonly number[]): number => {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		sum += a[i] * b[i];
	}
	return sum;
};

export const norm = (vector: readonly number[]): number => Math.sqrt(dot(vector, vector));

/**
 * Similarity under `metric`. Callers may pass precomputed norms.
 * A zero vector has cosine similarity 0 with everything.
 */
export const similarity = (metric: SimilarityMetric, a: readonly number[], b: readonly number[], normA: number = norm(a), normB: number = norm(b)): number => {
	const product = dot(a, b);
	if (metric === 'dot') return product;
	if (normA === 0 || normB === 0) return 0;
	return product / (normA * normB);
};

export const isFiniteVector = (value: unknown): value is number[] => {
	return Array.isArray(value) && value.every((component) => typeof component === 'number' && Number.isFinite(component));
};

export const sha256 = (...parts: string[]): string => {
	const hash = crypto.createHash('sha256');
	for (const part of parts) {
		hash.update(part);
		hash.update('\u0000');
	}
	return hash.digest('hex');
};
