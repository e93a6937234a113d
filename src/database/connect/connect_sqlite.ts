import fs from 'fs';
import path from 'path';
import { DataSource } from 'typeorm';

import { ILogger } from '../../types';
import { IndexCorruptError, describeError } from '../../core/errors';
import { IndexEntryRecord, IndexHeaderRecord } from '../entities';

export const MEMORY_DATABASE = ':memory:';

export const createIndexDataSource = (databasePath: string): DataSource => {
	return new DataSource({
		type: 'better-sqlite3',
		database: databasePath,
		synchronize: true,
		logging: false,
		entities: [IndexHeaderRecord, IndexEntryRecord],
	});
};

/**
 * Opens (creating when missing) the SQLite file holding the vector index.
 * @throws {IndexCorruptError} If the file exists but is not a usable index database
 */
export const connectIndexDatabase = async (databasePath: string, logger: ILogger): Promise<DataSource> => {
	if (databasePath !== MEMORY_DATABASE) {
		fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
	}

	const dataSource = createIndexDataSource(databasePath);
	try {
		await dataSource.initialize();
	} catch (error) {
		logger.error(`[DATABASE] Error opening index database ${databasePath}: ${describeError(error)}`);
		if (dataSource.isInitialized) {
			await dataSource.destroy();
		}
		throw new IndexCorruptError(`Cannot open index database ${databasePath}: ${describeError(error)}`, error);
	}

	logger.success(`[DATABASE] Opened index database ${databasePath}`);
	return dataSource;
};
