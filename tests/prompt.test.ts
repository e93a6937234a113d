import { NO_CONTEXT, assemblePrompt, sourcesOf } from '../src/core/rag/prompt';
import { ContextOverflowError } from '../src/core/errors';
import { IRetrievalHit } from '../src/types';

const INSTRUCTIONS = 'Answer from context.';

const hit = (id: string, documentId: string, text: string, similarity = 0.9): IRetrievalHit => ({
	chunk: {
		id,
		documentId,
		source: `${documentId}.md`,
		title: `Title ${documentId}`,
		tags: [],
		type: 'md',
		ordinal: 0,
		text,
		start: 0,
		end: text.length,
		contentHash: `hash-${documentId}`,
	},
	similarity,
	score: similarity,
});

describe('assemblePrompt', () => {
	it('lays out instructions, numbered passages and the question', () => {
		const prompt = assemblePrompt('  What resonates? ', [hit('c1', 'a', 'Rings resonate. ')], { instructions: `${INSTRUCTIONS}\n`, maxContextChars: 1000 });

		expect(prompt.system).toBe(INSTRUCTIONS);
		expect(prompt.user).toBe('Context:\n[1] Title a (a.md)\nRings resonate.\n\nQuestion: What resonates?');
		expect(prompt.length).toBe(prompt.system.length + prompt.user.length);
		expect(prompt.dropped).toEqual([]);
	});

	it('gives one marker per source document in order of first appearance', () => {
		const prompt = assemblePrompt('Q?', [hit('a1', 'a', 'One.'), hit('b1', 'b', 'Two.'), hit('a2', 'a', 'Three.'), hit('c1', 'c', 'Four.')], {
			instructions: INSTRUCTIONS,
			maxContextChars: 1000,
		});

		expect(prompt.passages.map((passage) => [passage.chunkId, passage.marker])).toEqual([
			['a1', '[1]'],
			['b1', '[2]'],
			['a2', '[1]'],
			['c1', '[3]'],
		]);
		expect(sourcesOf(prompt)).toEqual([
			{ marker: '[1]', documentId: 'a', source: 'a.md', title: 'Title a' },
			{ marker: '[2]', documentId: 'b', source: 'b.md', title: 'Title b' },
			{ marker: '[3]', documentId: 'c', source: 'c.md', title: 'Title c' },
		]);
	});

	it('drops the lowest-ranked passages whole to fit the budget', () => {
		const hits = [
			hit('h1', 'a', 'Ring resonators filter one wavelength.', 0.9),
			hit('h2', 'b', 'Microheaters shift the resonance.', 0.8),
			hit('h3', 'c', 'Thermal crosstalk couples neighbouring rings.', 0.7),
			hit('h4', 'd', 'Lasers sit off the package in external sources.', 0.6),
			hit('h5', 'e', 'Fibre attach dominates packaging cost.', 0.5),
		];
		const budget = assemblePrompt('Q?', hits.slice(0, 3), { instructions: INSTRUCTIONS, maxContextChars: 10_000 }).length;

		const trimmed = assemblePrompt('Q?', hits, { instructions: INSTRUCTIONS, maxContextChars: budget });

		expect(trimmed.passages.map((passage) => passage.chunkId)).toEqual(['h1', 'h2', 'h3']);
		expect(trimmed.dropped).toEqual(['h4', 'h5']);
		expect(trimmed.length).toBe(budget);
		for (const passage of trimmed.passages) {
			expect(trimmed.user).toContain(`${passage.marker} ${passage.title} (${passage.source})\n${passage.text}`);
		}
		expect(trimmed.user).not.toContain('Lasers');
		expect(trimmed.user).not.toContain('Fibre');
	});

	it('still builds a prompt without passages', () => {
		const prompt = assemblePrompt('Q?', [], { instructions: INSTRUCTIONS, maxContextChars: 1000 });

		expect(prompt.user).toBe(`Context:\n${NO_CONTEXT}\n\nQuestion: Q?`);
		expect(prompt.passages).toEqual([]);
		expect(sourcesOf(prompt)).toEqual([]);
	});

	it('drops every passage when only the question fits', () => {
		const base = assemblePrompt('Q?', [], { instructions: INSTRUCTIONS, maxContextChars: 1000 });

		const prompt = assemblePrompt('Q?', [hit('h1', 'a', 'A passage far longer than the placeholder it would replace in the context.')], {
			instructions: INSTRUCTIONS,
			maxContextChars: base.length,
		});

		expect(prompt.passages).toEqual([]);
		expect(prompt.dropped).toEqual(['h1']);
	});

	it('fails when the instructions and question alone exceed the budget', () => {
		const instructions = 'x'.repeat(100);
		const required = instructions.length + `Context:\n${NO_CONTEXT}\n\nQuestion: Q?`.length;

		expect(() => assemblePrompt('Q?', [], { instructions, maxContextChars: 50 })).toThrow(ContextOverflowError);
		try {
			assemblePrompt('Q?', [], { instructions, maxContextChars: 50 });
		} catch (error) {
			expect(error).toMatchObject({ required, budget: 50 });
		}
	});
});
