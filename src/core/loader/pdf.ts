import fs from 'fs/promises';

import type { DocumentType } from '../../types';
import { UnreadableSourceError, describeError } from '../errors';
import { IDocumentLoader, ILoadedContent } from './types';

type PdfJsModule = typeof import('pdfjs-dist');

let cachedPdfModule: PdfJsModule | null = null;

const ensurePdfJs = async (): Promise<PdfJsModule> => {
	if (!cachedPdfModule) {
		cachedPdfModule = await import('pdfjs-dist');
	}
	return cachedPdfModule;
};

/**
 * PDF document loader using Mozilla's pdfjs-dist.
 * Pages are joined by a blank line; text items ending a line keep their line break.
 */
export class PdfDocumentLoader implements IDocumentLoader {
	getDocumentType(): DocumentType {
		return 'pdf';
	}

	getSupportedExtensions(): string[] {
		return ['.pdf'];
	}

	async load(filePath: string): Promise<ILoadedContent> {
		let data: Uint8Array;
		try {
			data = new Uint8Array(await fs.readFile(filePath));
		} catch (error) {
			throw new UnreadableSourceError(filePath, describeError(error), error);
		}

		const pdfjs = await ensurePdfJs();
		try {
			const pdfDocument = await pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;
			try {
				const pageTexts: string[] = [];
				for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
					const page = await pdfDocument.getPage(pageNum);
					const textContent = await page.getTextContent();
					let pageText = '';
					for (const item of textContent.items) {
						if (!('str' in item)) continue;
						pageText += item.str + (item.hasEOL ? '\n' : ' ');
					}
					pageTexts.push(pageText.trim());
				}
				return { text: pageTexts.join('\n\n'), tags: [] };
			} finally {
				await pdfDocument.destroy();
			}
		} catch (error) {
			throw new UnreadableSourceError(filePath, `failed to parse PDF: ${describeError(error)}`, error);
		}
	}
}
