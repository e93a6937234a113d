import fs from 'fs/promises';
import path from 'path';
import type { Dirent } from 'fs';

import { IDocument } from '../../types';
import { sha256 } from '../../utils/vector';
import { UnreadableSourceError, describeError } from '../errors';
import { MarkdownDocumentLoader, TextDocumentLoader } from './text';
import { PdfDocumentLoader } from './pdf';
import { IDocumentLoader } from './types';

export * from './types';
export { TextDocumentLoader, MarkdownDocumentLoader, readUtf8, parseFrontMatter } from './text';
export { PdfDocumentLoader } from './pdf';

export interface ILoadDocumentOptions {
	/** Corpus root; sources under it are recorded relative to it */
	corpusRoot?: string;
	tags?: string[];
}

export const defaultLoaders = (): IDocumentLoader[] => [new TextDocumentLoader(), new MarkdownDocumentLoader(), new PdfDocumentLoader()];

const normaliseTags = (tags: Iterable<string>): string[] => {
	const unique = new Set<string>();
	for (const tag of tags) {
		const value = tag.trim().toLowerCase();
		if (value) unique.add(value);
	}
	return [...unique].sort();
};

/**
 * Source path as recorded in the index: corpus-relative with forward slashes
 * when the file lives under the corpus root, absolute otherwise.
 */
export const toSourcePath = (filePath: string, corpusRoot?: string): string => {
	const absolute = path.resolve(filePath);
	if (corpusRoot) {
		const relative = path.relative(path.resolve(corpusRoot), absolute);
		if (relative && !relative.startsWith('..') && !path.isAbsolute(relative)) {
			return relative.split(path.sep).join('/');
		}
	}
	return absolute.split(path.sep).join('/');
};

export const documentIdFor = (source: string): string => sha256('document', source).slice(0, 32);

/**
 * Picks loaders by file extension and turns files into documents.
 */
export class DocumentLoaderRegistry {
	private readonly loaders = new Map<string, IDocumentLoader>();

	constructor(loaders: IDocumentLoader[] = defaultLoaders()) {
		for (const loader of loaders) {
			for (const extension of loader.getSupportedExtensions()) {
				this.loaders.set(extension.toLowerCase(), loader);
			}
		}
	}

	public supports = (filePath: string): boolean => this.loaders.has(path.extname(filePath).toLowerCase());

	/**
	 * Lists supported files under `root`, recursively, in sorted order
	 * @param extensions - Further restricts the accepted extensions
	 * @throws {UnreadableSourceError} If the root directory cannot be read
	 */
	public scanCorpus = async (root: string, extensions?: string[]): Promise<string[]> => {
		const accepted = extensions ? new Set(extensions.map((ext) => ext.toLowerCase())) : null;
		const files: string[] = [];

		const walk = async (directory: string): Promise<void> => {
			let entries: Dirent[];
			try {
				entries = await fs.readdir(directory, { withFileTypes: true });
			} catch (error) {
				throw new UnreadableSourceError(directory, `cannot list directory: ${describeError(error)}`, error);
			}
			entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
			for (const entry of entries) {
				if (entry.name.startsWith('.')) continue;
				const entryPath = path.join(directory, entry.name);
				if (entry.isDirectory()) {
					await walk(entryPath);
				} else if (entry.isFile()) {
					const extension = path.extname(entry.name).toLowerCase();
					if (this.loaders.has(extension) && (!accepted || accepted.has(extension))) {
						files.push(entryPath);
					}
				}
			}
		};

		await walk(path.resolve(root));
		return files;
	};

	/**
	 * Loads and normalises one document
	 * @throws {UnreadableSourceError} If the file is unsupported, unreadable or empty
	 */
	public loadDocument = async (filePath: string, options: ILoadDocumentOptions = {}): Promise<IDocument> => {
		const extension = path.extname(filePath).toLowerCase();
		const loader = this.loaders.get(extension);
		if (!loader) {
			throw new UnreadableSourceError(filePath, `unsupported file type '${extension || '(none)'}'`);
		}

		const content = await loader.load(filePath);
		if (content.text.trim().length === 0) {
			throw new UnreadableSourceError(filePath, 'no text content');
		}

		const source = toSourcePath(filePath, options.corpusRoot);
		const directoryTags = source.includes('/') && !path.isAbsolute(source) ? source.split('/').slice(0, -1) : [];

		return {
			id: documentIdFor(source),
			source,
			text: content.text,
			metadata: {
				title: content.title ?? path.basename(filePath, path.extname(filePath)),
				tags: normaliseTags([...content.tags, ...directoryTags, ...(options.tags ?? [])]),
				type: loader.getDocumentType(),
				ingestedAt: new Date(),
				contentHash: sha256(content.text),
			},
		};
	};
}
