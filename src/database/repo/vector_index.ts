import { z } from 'zod';
import { DataSource, In, Repository } from 'typeorm';

import { IIndexDescriptor, IIndexEntryMetadata, IIndexHeader, IIndexStore, ILogger, IStoredEntry } from '../../types';
import { IndexCorruptError, describeError } from '../../core/errors';
import { INDEX_FORMAT_VERSION } from '../../core/index/format';
import { isFiniteVector } from '../../utils/vector';
import { INDEX_HEADER_ID, IndexEntryRecord, IndexHeaderRecord } from '../entities';

/** Rows per statement, well under SQLite's bound-parameter limit */
const WRITE_BATCH = 100;

const MetadataSchema = z.object({
	documentId: z.string(),
	source: z.string(),
	title: z.string(),
	tags: z.array(z.string()),
	type: z.enum(['txt', 'md', 'pdf']),
	ordinal: z.number().int().nonnegative(),
	text: z.string(),
	start: z.number().int().nonnegative(),
	end: z.number().int().nonnegative(),
	contentHash: z.string(),
});

const MetricSchema = z.enum(['cosine', 'dot']);

const batches = <T>(items: readonly T[], size: number): T[][] => {
	const result: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		result.push(items.slice(i, i + size));
	}
	return result;
};

/**
 * SQLite-backed index store. The header row lives in its own table so a
 * runtime can check the vector space before touching any entry.
 */
export class VectorIndexRepository implements IIndexStore {
	private headerRepo: Repository<IndexHeaderRecord>;
	private entryRepo: Repository<IndexEntryRecord>;
	private dataSource: DataSource;

	constructor(
		dataSource: DataSource,
		private readonly logger: ILogger
	) {
		this.dataSource = dataSource;
		this.headerRepo = dataSource.getRepository(IndexHeaderRecord);
		this.entryRepo = dataSource.getRepository(IndexEntryRecord);
	}

	/**
	 * @returns The persisted header, or null for a fresh database
	 * @throws {IndexCorruptError} If the header row cannot be read or holds invalid values
	 */
	readHeader = async (): Promise<IIndexHeader | null> => {
		let record: IndexHeaderRecord | null;
		try {
			record = await this.headerRepo.findOneBy({ id: INDEX_HEADER_ID });
		} catch (error) {
			throw new IndexCorruptError(`Cannot read index header: ${describeError(error)}`, error);
		}
		if (!record) return null;

		const metric = MetricSchema.safeParse(record.metric);
		if (!metric.success || !Number.isInteger(record.dimensions) || record.dimensions <= 0 || !record.embeddingModel) {
			throw new IndexCorruptError('Index header holds invalid values');
		}

		return {
			embeddingModel: record.embeddingModel,
			dimensions: record.dimensions,
			metric: metric.data,
			formatVersion: record.formatVersion,
			createdAt: record.createdAt,
			updatedAt: record.updatedAt,
		};
	};

	writeHeader = async (descriptor: IIndexDescriptor): Promise<IIndexHeader> => {
		const record = this.headerRepo.create({
			id: INDEX_HEADER_ID,
			embeddingModel: descriptor.embeddingModel,
			dimensions: descriptor.dimensions,
			metric: descriptor.metric,
			formatVersion: INDEX_FORMAT_VERSION,
		});
		const saved = await this.headerRepo.save(record);
		this.logger.info(`[INDEX_REPO] Pinned index header: ${descriptor.embeddingModel}, ${descriptor.dimensions} dimensions, ${descriptor.metric}`);
		return {
			...descriptor,
			formatVersion: saved.formatVersion,
			createdAt: saved.createdAt,
			updatedAt: saved.updatedAt,
		};
	};

	/**
	 * Reads every entry, ordered by insertion sequence
	 * @throws {IndexCorruptError} On the first row that does not decode to a valid entry
	 */
	loadEntries = async (dimensions: number): Promise<IStoredEntry[]> => {
		let records: IndexEntryRecord[];
		try {
			records = await this.entryRepo.find({ order: { seq: 'ASC' } });
		} catch (error) {
			throw new IndexCorruptError(`Cannot read index entries: ${describeError(error)}`, error);
		}

		const entries = records.map((record) => this.decode(record, dimensions));
		this.logger.debug(`[INDEX_REPO] Loaded ${entries.length} entries`);
		return entries;
	};

	/**
	 * Writes upserts and deletes in one transaction
	 */
	commit = async (upserts: IStoredEntry[], deletes: string[]): Promise<void> => {
		await this.dataSource.transaction(async (manager) => {
			for (const ids of batches(deletes, WRITE_BATCH)) {
				await manager.delete(IndexEntryRecord, { chunkId: In(ids) });
			}
			for (const group of batches(upserts, WRITE_BATCH)) {
				const records = group.map((entry) =>
					manager.create(IndexEntryRecord, {
						chunkId: entry.chunkId,
						seq: entry.seq,
						documentId: entry.metadata.documentId,
						vector: JSON.stringify(entry.vector),
						metadata: JSON.stringify(entry.metadata),
					})
				);
				await manager.upsert(IndexEntryRecord, records, ['chunkId']);
			}
		});
	};

	clear = async (): Promise<void> => {
		await this.dataSource.transaction(async (manager) => {
			await manager.clear(IndexEntryRecord);
			await manager.clear(IndexHeaderRecord);
		});
		this.logger.warn('[INDEX_REPO] Cleared index header and entries');
	};

	close = async (): Promise<void> => {
		if (this.dataSource.isInitialized) {
			await this.dataSource.destroy();
		}
	};

	private decode = (record: IndexEntryRecord, dimensions: number): IStoredEntry => {
		let vector: unknown;
		let metadata: unknown;
		try {
			vector = JSON.parse(record.vector);
			metadata = JSON.parse(record.metadata);
		} catch (error) {
			throw new IndexCorruptError(`Entry ${record.chunkId} is not valid JSON`, error);
		}

		if (!isFiniteVector(vector) || vector.length !== dimensions) {
			throw new IndexCorruptError(`Entry ${record.chunkId} does not hold a ${dimensions}-dimensional vector`);
		}

		const parsed = MetadataSchema.safeParse(metadata);
		if (!parsed.success || parsed.data.documentId !== record.documentId) {
			throw new IndexCorruptError(`Entry ${record.chunkId} has invalid metadata`);
		}

		const entryMetadata: IIndexEntryMetadata = parsed.data;
		return { chunkId: record.chunkId, seq: record.seq, vector, metadata: entryMetadata };
	};
}
