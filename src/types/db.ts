import { IIndexEntry } from './ai';
import { SimilarityMetric } from './config';

export interface IIndexDescriptor {
	embeddingModel: string;
	dimensions: number;
	metric: SimilarityMetric;
}

export interface IIndexHeader extends IIndexDescriptor {
	formatVersion: number;
	createdAt: Date;
	updatedAt: Date;
}

export interface IStoredEntry extends IIndexEntry {
	/** Insertion order, kept when an entry is overwritten */
	seq: number;
}

/**
 * Durable backing of the vector index. Implementations must apply each
 * `commit` atomically.
 */
export interface IIndexStore {
	readHeader(): Promise<IIndexHeader | null>;
	writeHeader(descriptor: IIndexDescriptor): Promise<IIndexHeader>;
	/** All entries ordered by `seq`; throws `IndexCorruptError` on unreadable rows */
	loadEntries(dimensions: number): Promise<IStoredEntry[]>;
	commit(upserts: IStoredEntry[], deletes: string[]): Promise<void>;
	clear(): Promise<void>;
	close(): Promise<void>;
}
