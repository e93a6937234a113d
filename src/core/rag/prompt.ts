import { IAnswerSource, IAssembledPrompt, IPromptPassage, RetrievalResult } from '../../types';
import { ConfigurationError, ContextOverflowError } from '../errors';

export interface IPromptOptions {
	instructions: string;
	/** Upper bound on system plus user message length, in characters */
	maxContextChars: number;
}

export const NO_CONTEXT = '(no relevant passages were found)';

const numberPassages = (hits: RetrievalResult): IPromptPassage[] => {
	const markers = new Map<string, string>();
	return hits.map((hit, rank) => {
		const { chunk } = hit;
		let marker = markers.get(chunk.documentId);
		if (!marker) {
			marker = `[${markers.size + 1}]`;
			markers.set(chunk.documentId, marker);
		}
		return {
			marker,
			rank,
			chunkId: chunk.id,
			documentId: chunk.documentId,
			source: chunk.source,
			title: chunk.title,
			text: chunk.text,
		};
	});
};

const renderPassage = (passage: IPromptPassage): string => `${passage.marker} ${passage.title} (${passage.source})\n${passage.text.trim()}`;

const renderUser = (question: string, passages: IPromptPassage[]): string => {
	const context = passages.length > 0 ? passages.map(renderPassage).join('\n\n') : NO_CONTEXT;
	return `Context:\n${context}\n\nQuestion: ${question.trim()}`;
};

/**
 * Builds the prompt from the instructions, the ranked hits and the question.
 *
 * Passages are added best-ranked first and are never cut: when the budget
 * runs out, the remaining lower-ranked passages are dropped whole. Each
 * source document gets one `[n]` marker, numbered by first appearance.
 * @throws {ContextOverflowError} If the instructions and question alone exceed the budget
 */
export const assemblePrompt = (question: string, hits: RetrievalResult, options: IPromptOptions): IAssembledPrompt => {
	const { instructions, maxContextChars } = options;
	if (!Number.isInteger(maxContextChars) || maxContextChars <= 0) {
		throw new ConfigurationError(`maxContextChars must be a positive integer, got ${maxContextChars}`);
	}

	const system = instructions.trim();
	const required = system.length + renderUser(question, []).length;
	if (required > maxContextChars) {
		throw new ContextOverflowError(required, maxContextChars);
	}

	// Markers depend on which passages make it in, so each candidate prefix is rendered in full
	for (let count = hits.length; count >= 0; count--) {
		const passages = numberPassages(hits.slice(0, count));
		const user = renderUser(question, passages);
		const length = system.length + user.length;
		if (length <= maxContextChars) {
			return {
				system,
				user,
				passages,
				dropped: hits.slice(count).map((hit) => hit.chunk.id),
				length,
			};
		}
	}

	// Unreachable: the empty prefix was checked against the budget above
	throw new ContextOverflowError(required, maxContextChars);
};

/**
 * One entry per marker, in marker order
 */
export const sourcesOf = (prompt: IAssembledPrompt): IAnswerSource[] => {
	const sources = new Map<string, IAnswerSource>();
	for (const passage of prompt.passages) {
		if (!sources.has(passage.marker)) {
			sources.set(passage.marker, { marker: passage.marker, documentId: passage.documentId, source: passage.source, title: passage.title });
		}
	}
	return [...sources.values()];
};
