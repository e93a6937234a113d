import { IChunk, IChunkingOptions, IDocument } from '../../types';
import { sha256 } from '../../utils/vector';
import { ConfigurationError } from '../errors';

export interface ISpan {
	start: number;
	end: number;
}

/**
 * A sentence ends after terminal punctuation (with any closing quotes or
 * brackets) followed by whitespace, or at a blank line. The whitespace stays
 * with the sentence it follows.
 */
const SENTENCE_BOUNDARY = /[.!?]+["'”’)\]]*\s+|\n[ \t]*\n\s*/g;

/**
 * Splits text into contiguous sentence spans that together cover it exactly.
 */
export const detectSentences = (text: string): ISpan[] => {
	const spans: ISpan[] = [];
	const pattern = new RegExp(SENTENCE_BOUNDARY.source, 'g');
	let start = 0;
	let match: RegExpExecArray | null;

	while ((match = pattern.exec(text)) !== null) {
		const end = match.index + match[0].length;
		if (end > start) {
			spans.push({ start, end });
			start = end;
		}
	}
	if (start < text.length) {
		spans.push({ start, end: text.length });
	}
	return spans;
};

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/** True when `index` falls between the two halves of a surrogate pair. */
const splitsPair = (text: string, index: number): boolean =>
	index > 0 && index < text.length && isHighSurrogate(text.charCodeAt(index - 1)) && isLowSurrogate(text.charCodeAt(index));

/**
 * Sentence spans, with any sentence longer than `maxSize` cut into
 * `maxSize`-long pieces. A cut never separates a surrogate pair: it moves back
 * one unit, or forward one when the piece would otherwise be empty.
 */
export const splitUnits = (text: string, maxSize: number): ISpan[] => {
	const units: ISpan[] = [];
	for (const sentence of detectSentences(text)) {
		let start = sentence.start;
		while (start < sentence.end) {
			let end = Math.min(start + maxSize, sentence.end);
			if (splitsPair(text, end)) {
				end = end - 1 > start ? end - 1 : end + 1;
			}
			units.push({ start, end });
			start = end;
		}
	}
	return units;
};

export const chunkIdFor = (documentId: string, ordinal: number, text: string): string => sha256('chunk', documentId, String(ordinal), text).slice(0, 32);

const validateOptions = ({ chunkSize, chunkOverlap }: IChunkingOptions): void => {
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
	}
	if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
		throw new ConfigurationError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`);
	}
};

/**
 * Lazy, restartable sequence of the chunks of one document. Every iteration
 * starts from the beginning and yields the same chunks.
 *
 * Chunks are built greedily from whole sentences up to `chunkSize`
 * characters. The next chunk starts with the longest run of trailing
 * sentences of the previous one that fits in `chunkOverlap` characters, as
 * long as the following sentence still fits beside it; a chunk is never
 * repeated whole.
 */
export class ChunkSequence implements Iterable<IChunk> {
	constructor(
		private readonly document: IDocument,
		private readonly options: IChunkingOptions
	) {
		validateOptions(options);
	}

	*[Symbol.iterator](): Iterator<IChunk> {
		const { text, id: documentId } = this.document;
		const { chunkSize, chunkOverlap } = this.options;
		const units = splitUnits(text, chunkSize);

		let first = 0;
		let previousEnd = 0;
		let ordinal = 0;

		while (first < units.length) {
			const start = units[first].start;
			let last = first;
			while (last + 1 < units.length && units[last + 1].end - start <= chunkSize) {
				last++;
			}
			const end = units[last].end;
			const chunkText = text.slice(start, end);

			yield {
				id: chunkIdFor(documentId, ordinal, chunkText),
				documentId,
				ordinal,
				text: chunkText,
				start,
				end,
				overlap: ordinal === 0 ? 0 : Math.max(0, previousEnd - start),
				embedding: null,
			};

			if (last === units.length - 1) {
				return;
			}

			const nextEnd = units[last + 1].end;
			let next = last + 1;
			while (next - 1 > first && end - units[next - 1].start <= chunkOverlap && nextEnd - units[next - 1].start <= chunkSize) {
				next--;
			}

			previousEnd = end;
			first = next;
			ordinal++;
		}
	}

	public toArray = (): IChunk[] => [...this];
}

export const chunkDocument = (document: IDocument, options: IChunkingOptions): ChunkSequence => new ChunkSequence(document, options);
