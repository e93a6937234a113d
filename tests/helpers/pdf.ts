const escapePdfString = (text: string): string => text.replace(/[\\()]/g, (char) => `\\${char}`);

/**
 * Builds a minimal PDF with one line of Helvetica text per page.
 */
export const buildPdf = (pages: string[]): Buffer => {
	const fontId = 3 + pages.length * 2;
	const kids = pages.map((_, i) => `${3 + i * 2} 0 R`).join(' ');
	const objects: string[] = ['<< /Type /Catalog /Pages 2 0 R >>', `<< /Type /Pages /Kids [${kids}] /Count ${pages.length} >>`];

	for (const [i, text] of pages.entries()) {
		const stream = `BT /F1 12 Tf 72 712 Td (${escapePdfString(text)}) Tj ET`;
		objects.push(`<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents ${4 + i * 2} 0 R /Resources << /Font << /F1 ${fontId} 0 R >> >> >>`);
		objects.push(`<< /Length ${Buffer.byteLength(stream, 'latin1')} >>\nstream\n${stream}\nendstream`);
	}
	objects.push('<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>');

	let body = '%PDF-1.4\n';
	const offsets: number[] = [];
	objects.forEach((object, i) => {
		offsets.push(Buffer.byteLength(body, 'latin1'));
		body += `${i + 1} 0 obj\n${object}\nendobj\n`;
	});

	const xrefOffset = Buffer.byteLength(body, 'latin1');
	const entries = offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
	body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n${entries}`;
	body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

	return Buffer.from(body, 'latin1');
};
