import type { DocumentType } from '../../types';

export interface ILoadedContent {
	text: string;
	title?: string;
	tags: string[];
}

export interface IDocumentLoader {
	getDocumentType(): DocumentType;
	/** Lowercase extensions including the dot */
	getSupportedExtensions(): string[];
	/** @throws UnreadableSourceError */
	load(filePath: string): Promise<ILoadedContent>;
}
