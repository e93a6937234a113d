import fs from 'fs/promises';
import path from 'path';
import yaml from 'yaml';

import type { DocumentType } from '../../types';
import { UnreadableSourceError, describeError } from '../errors';
import { IDocumentLoader, ILoadedContent } from './types';

const FRONT_MATTER = /^---[ \t]*\n([\s\S]*?)\n---[ \t]*(?:\n|$)/;
const BINARY_SAMPLE_BYTES = 8192;

/**
 * Reads a file and decodes it as strict UTF-8. BOM is dropped and line endings normalised.
 */
export const readUtf8 = async (filePath: string): Promise<string> => {
	let buffer: Buffer;
	try {
		buffer = await fs.readFile(filePath);
	} catch (error) {
		throw new UnreadableSourceError(filePath, describeError(error), error);
	}

	const sample = buffer.subarray(0, Math.min(buffer.length, BINARY_SAMPLE_BYTES));
	if (sample.includes(0)) {
		throw new UnreadableSourceError(filePath, 'file contains null bytes, likely binary');
	}

	let content: string;
	try {
		content = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
	} catch (error) {
		throw new UnreadableSourceError(filePath, 'not valid UTF-8 text', error);
	}

	return content.replace(/\r\n?/g, '\n');
};

const toTagList = (value: unknown): string[] => {
	if (typeof value === 'string') {
		return value
			.split(',')
			.map((tag) => tag.trim())
			.filter(Boolean);
	}
	if (Array.isArray(value)) {
		return value.filter((tag): tag is string | number => typeof tag === 'string' || typeof tag === 'number').map((tag) => String(tag).trim()).filter(Boolean);
	}
	return [];
};

/**
 * Splits YAML front matter off a markdown body.
 */
export const parseFrontMatter = (source: string, content: string): { body: string; title?: string; tags: string[] } => {
	const match = FRONT_MATTER.exec(content);
	if (!match) {
		return { body: content, tags: [] };
	}

	let data: unknown;
	try {
		data = yaml.parse(match[1]);
	} catch (error) {
		throw new UnreadableSourceError(source, `invalid front matter: ${describeError(error)}`, error);
	}

	const body = content.slice(match[0].length);
	if (typeof data !== 'object' || data === null || Array.isArray(data)) {
		return { body, tags: [] };
	}

	const fields = new Map(Object.entries(data));
	const title = fields.get('title');
	return {
		body,
		title: typeof title === 'string' && title.trim() ? title.trim() : undefined,
		tags: toTagList(fields.get('tags')),
	};
};

const firstHeading = (content: string): string | undefined => {
	const match = /^#\s+(.+)$/m.exec(content);
	return match ? match[1].trim() : undefined;
};

/**
 * Plain text and markdown loader
 */
export class TextDocumentLoader implements IDocumentLoader {
	getDocumentType(): DocumentType {
		return 'txt';
	}

	getSupportedExtensions(): string[] {
		return ['.txt'];
	}

	async load(filePath: string): Promise<ILoadedContent> {
		const text = await readUtf8(filePath);
		return { text, tags: [] };
	}
}

export class MarkdownDocumentLoader implements IDocumentLoader {
	getDocumentType(): DocumentType {
		return 'md';
	}

	getSupportedExtensions(): string[] {
		return ['.md', '.markdown'];
	}

	async load(filePath: string): Promise<ILoadedContent> {
		const content = await readUtf8(filePath);
		const { body, title, tags } = parseFrontMatter(filePath, content);
		return {
			text: body,
			title: title ?? firstHeading(body) ?? path.basename(filePath, path.extname(filePath)),
			tags,
		};
	}
}
