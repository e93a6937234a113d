import fs from 'fs';
import os from 'os';
import path from 'path';

import { createLuxWeb } from '../src/luxweb';
import { IndexMismatchError } from '../src/core/errors';
import { ConfigManager, parseConfig } from '../src/utils/config';
import { RecordingLogger } from './helpers/fakes';

describe('createLuxWeb', () => {
	let directory: string;

	beforeEach(() => {
		directory = fs.mkdtempSync(path.join(os.tmpdir(), 'luxweb-app-'));
	});

	afterEach(() => {
		fs.rmSync(directory, { recursive: true, force: true });
	});

	const config = (dimensions: number) =>
		parseConfig({
			corpus: { path: path.join(directory, 'corpus') },
			embedding: { dimensions },
			index: { path: path.join(directory, 'index', 'kb.sqlite') },
		});

	it('opens an empty index pinned to the configured model', async () => {
		const logger = new RecordingLogger();
		const app = await createLuxWeb({ config: config(8), env: ConfigManager.fromEnv({ EMBEDDING_MODEL: 'all-minilm' }), logger });

		expect(app.index.size).toBe(0);
		expect(app.index.dimensions).toBe(8);
		expect(app.index.embeddingModel).toBe('all-minilm');
		expect(fs.existsSync(path.join(directory, 'index', 'kb.sqlite'))).toBe(true);

		await app.close();
	});

	it('refuses an index built for another model unless rebuilt', async () => {
		const logger = new RecordingLogger();
		const first = await createLuxWeb({ config: config(8), env: ConfigManager.fromEnv({ EMBEDDING_MODEL: 'all-minilm' }), logger });
		await first.close();

		const other = ConfigManager.fromEnv({ EMBEDDING_MODEL: 'nomic-embed-text' });
		await expect(createLuxWeb({ config: config(8), env: other, logger })).rejects.toBeInstanceOf(IndexMismatchError);

		const rebuilt = await createLuxWeb({ config: config(8), env: other, logger, rebuild: true });
		expect(rebuilt.index.embeddingModel).toBe('nomic-embed-text');
		await rebuilt.close();
	});
});
