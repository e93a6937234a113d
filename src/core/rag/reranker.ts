import { IRetrievalHit, RetrievalResult } from '../../types';

export interface IRerankOptions {
	/** Share of the final score given to lexical overlap, in [0, 1] */
	weight: number;
}

const STOPWORDS = new Set([
	'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'for', 'from', 'how', 'in', 'is', 'it',
	'its', 'of', 'on', 'or', 'that', 'the', 'this', 'to', 'was', 'what', 'when', 'where', 'which', 'who', 'why', 'with',
]);

/**
 * Lowercased word tokens with stopwords removed
 */
export const tokenize = (text: string): string[] => {
	const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
	return words.filter((word) => !STOPWORDS.has(word));
};

/**
 * Fraction of the distinct query terms that occur in `text`
 */
export const lexicalOverlap = (queryTerms: ReadonlySet<string>, text: string): number => {
	if (queryTerms.size === 0) return 0;
	const terms = new Set(tokenize(text));
	let shared = 0;
	for (const term of queryTerms) {
		if (terms.has(term)) shared++;
	}
	return shared / queryTerms.size;
};

/**
 * Recombines vector similarity with query-term overlap:
 * `score = (1 - weight) * similarity + weight * overlap`.
 * Equal scores keep their incoming order.
 */
export const rerankByOverlap = (question: string, hits: RetrievalResult, { weight }: IRerankOptions): RetrievalResult => {
	const queryTerms = new Set(tokenize(question));
	const rescored = hits.map((hit, position): { hit: IRetrievalHit; position: number } => ({
		hit: { ...hit, score: (1 - weight) * hit.similarity + weight * lexicalOverlap(queryTerms, hit.chunk.text) },
		position,
	}));
	rescored.sort((a, b) => b.hit.score - a.hit.score || a.position - b.position);
	return rescored.map(({ hit }) => hit);
};
