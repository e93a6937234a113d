import { IIndexDescriptor, IIndexEntry, IIndexHeader, IIndexStore, ILogger, ISearchFilters, IStoredEntry, RetrievalResult, SimilarityMetric } from '../../types';
import { WriteLock } from '../../utils/concurrency';
import { isFiniteVector, norm, similarity } from '../../utils/vector';
import { DimensionMismatchError, IndexCorruptError, IndexMismatchError } from '../errors';
import { INDEX_FORMAT_VERSION } from './format';

interface ISnapshotEntry extends IStoredEntry {
	norm: number;
}

/**
 * Immutable view of the index. Writers build a new snapshot and swap it in;
 * readers keep whichever snapshot they started with.
 */
export interface IIndexSnapshot {
	readonly version: number;
	/** Ordered by insertion sequence */
	readonly entries: readonly ISnapshotEntry[];
	readonly byId: ReadonlyMap<string, ISnapshotEntry>;
	readonly nextSeq: number;
}

export interface IOpenIndexOptions {
	/** Drop every entry and re-pin the header to `descriptor` */
	rebuild?: boolean;
}

export interface IReplaceResult {
	added: number;
	updated: number;
	removed: number;
}

const buildSnapshot = (version: number, entries: ISnapshotEntry[]): IIndexSnapshot => {
	const ordered = [...entries].sort((a, b) => a.seq - b.seq);
	const byId = new Map(ordered.map((entry) => [entry.chunkId, entry] as const));
	const nextSeq = ordered.length > 0 ? ordered[ordered.length - 1].seq + 1 : 0;
	return { version, entries: ordered, byId, nextSeq };
};

const matchesFilters = (entry: IStoredEntry, filters?: ISearchFilters): boolean => {
	if (!filters) return true;
	const { metadata } = entry;
	if (filters.documentIds && filters.documentIds.length > 0 && !filters.documentIds.includes(metadata.documentId)) {
		return false;
	}
	if (filters.sources && filters.sources.length > 0 && !filters.sources.includes(metadata.source)) {
		return false;
	}
	if (filters.tags && filters.tags.length > 0) {
		const wanted = filters.tags.map((tag) => tag.toLowerCase());
		if (!metadata.tags.some((tag) => wanted.includes(tag))) {
			return false;
		}
	}
	return true;
};

/**
 * Vector index over a durable store. Searches are brute force over an
 * in-memory snapshot; writes are serialised, committed to the store in one
 * transaction and only then published as a new snapshot.
 */
export class VectorIndex {
	private current: IIndexSnapshot;
	private readonly lock = new WriteLock();

	private constructor(
		private readonly store: IIndexStore,
		private header: IIndexHeader,
		entries: IStoredEntry[],
		private readonly logger: ILogger
	) {
		this.current = buildSnapshot(0, entries.map((entry) => ({ ...entry, norm: norm(entry.vector) })));
	}

	/**
	 * Opens the index held by `store`, pinning `descriptor` on a fresh store.
	 * @throws {IndexMismatchError} If the store was built for another model, dimensionality or metric
	 * @throws {IndexCorruptError} If the header or any entry cannot be read
	 */
	public static async open(store: IIndexStore, descriptor: IIndexDescriptor, logger: ILogger, options: IOpenIndexOptions = {}): Promise<VectorIndex> {
		if (options.rebuild) {
			await store.clear();
			const header = await store.writeHeader(descriptor);
			logger.warn(`[INDEX] Rebuilding index for ${descriptor.embeddingModel}`);
			return new VectorIndex(store, header, [], logger);
		}

		let header = await store.readHeader();
		if (!header) {
			const orphans = await store.loadEntries(descriptor.dimensions);
			if (orphans.length > 0) {
				throw new IndexCorruptError(`Index holds ${orphans.length} entries but no header`);
			}
			header = await store.writeHeader(descriptor);
		} else {
			VectorIndex.verifyHeader(header, descriptor);
		}

		const entries = await store.loadEntries(header.dimensions);
		logger.info(`[INDEX] Loaded ${entries.length} entries (${header.embeddingModel}, ${header.dimensions} dimensions, ${header.metric})`);
		return new VectorIndex(store, header, entries, logger);
	}

	private static verifyHeader(header: IIndexHeader, descriptor: IIndexDescriptor): void {
		if (header.formatVersion !== INDEX_FORMAT_VERSION) {
			throw new IndexMismatchError('formatVersion', INDEX_FORMAT_VERSION, header.formatVersion);
		}
		if (header.embeddingModel !== descriptor.embeddingModel) {
			throw new IndexMismatchError('embeddingModel', descriptor.embeddingModel, header.embeddingModel);
		}
		if (header.dimensions !== descriptor.dimensions) {
			throw new IndexMismatchError('dimensions', descriptor.dimensions, header.dimensions);
		}
		if (header.metric !== descriptor.metric) {
			throw new IndexMismatchError('metric', descriptor.metric, header.metric);
		}
	}

	public get dimensions(): number {
		return this.header.dimensions;
	}

	public get metric(): SimilarityMetric {
		return this.header.metric;
	}

	public get embeddingModel(): string {
		return this.header.embeddingModel;
	}

	public get version(): number {
		return this.current.version;
	}

	public get size(): number {
		return this.current.entries.length;
	}

	public snapshot = (): IIndexSnapshot => this.current;

	public has = (chunkId: string): boolean => this.current.byId.has(chunkId);

	public documentEntries = (documentId: string): IStoredEntry[] => {
		return this.current.entries.filter((entry) => entry.metadata.documentId === documentId);
	};

	/**
	 * Indexed documents keyed by id, with the source each was read from
	 */
	public documents = (): Map<string, string> => {
		const documents = new Map<string, string>();
		for (const entry of this.current.entries) {
			documents.set(entry.metadata.documentId, entry.metadata.source);
		}
		return documents;
	};

	/**
	 * Inserts or overwrites entries. The batch is all-or-nothing: one entry with
	 * the wrong dimensionality rejects it before anything is written.
	 * @throws {DimensionMismatchError}
	 */
	public upsert = async (entries: IIndexEntry[]): Promise<void> => {
		this.validate(entries);
		if (entries.length === 0) return;
		await this.lock.run(() => this.apply(entries, []));
	};

	/**
	 * @returns How many of the ids were present
	 */
	public delete = async (chunkIds: string[]): Promise<number> => {
		return this.lock.run(async () => {
			const present = [...new Set(chunkIds)].filter((id) => this.current.byId.has(id));
			if (present.length > 0) {
				await this.apply([], present);
			}
			return present.length;
		});
	};

	/**
	 * Makes `entries` the complete set of chunks of `documentId`, removing the
	 * ones a previous version of the document had and this one does not.
	 * @throws {DimensionMismatchError}
	 */
	public replaceDocument = async (documentId: string, entries: IIndexEntry[]): Promise<IReplaceResult> => {
		this.validate(entries);
		const foreign = entries.find((entry) => entry.metadata.documentId !== documentId);
		if (foreign) {
			throw new RangeError(`Entry ${foreign.chunkId} belongs to document ${foreign.metadata.documentId}, not ${documentId}`);
		}

		return this.lock.run(async () => {
			const incoming = new Set(entries.map((entry) => entry.chunkId));
			const stale = this.current.entries.filter((entry) => entry.metadata.documentId === documentId && !incoming.has(entry.chunkId)).map((entry) => entry.chunkId);
			const updated = entries.filter((entry) => this.current.byId.has(entry.chunkId)).length;

			if (entries.length > 0 || stale.length > 0) {
				await this.apply(entries, stale);
			}
			return { added: incoming.size - updated, updated, removed: stale.length };
		});
	};

	/**
	 * Removes every entry and re-pins the current header.
	 */
	public clear = async (): Promise<void> => {
		await this.lock.run(async () => {
			await this.store.clear();
			this.header = await this.store.writeHeader({ embeddingModel: this.header.embeddingModel, dimensions: this.header.dimensions, metric: this.header.metric });
			this.current = buildSnapshot(this.current.version + 1, []);
		});
	};

	/**
	 * Top `k` entries by similarity to `vector`, ties broken by insertion order.
	 * @throws {DimensionMismatchError} If the query vector has the wrong dimensionality
	 */
	public search = (vector: number[], k: number, filters?: ISearchFilters): RetrievalResult => {
		if (!isFiniteVector(vector) || vector.length !== this.header.dimensions) {
			throw new DimensionMismatchError(this.header.dimensions, Array.isArray(vector) ? vector.length : 0, 'Query vector');
		}
		if (k <= 0) return [];

		const snapshot = this.current;
		const queryNorm = norm(vector);
		const scored: Array<{ entry: ISnapshotEntry; score: number }> = [];
		for (const entry of snapshot.entries) {
			if (!matchesFilters(entry, filters)) continue;
			scored.push({ entry, score: similarity(this.header.metric, vector, entry.vector, queryNorm, entry.norm) });
		}

		scored.sort((a, b) => b.score - a.score || a.entry.seq - b.entry.seq);

		return scored.slice(0, k).map(({ entry, score }) => ({
			chunk: { id: entry.chunkId, ...entry.metadata },
			similarity: score,
			score,
		}));
	};

	public close = async (): Promise<void> => {
		await this.lock.run(() => this.store.close());
	};

	private validate = (entries: IIndexEntry[]): void => {
		for (const entry of entries) {
			if (!isFiniteVector(entry.vector) || entry.vector.length !== this.header.dimensions) {
				throw new DimensionMismatchError(this.header.dimensions, Array.isArray(entry.vector) ? entry.vector.length : 0, `Entry ${entry.chunkId}`);
			}
		}
	};

	/**
	 * Commits to the store, then publishes the next snapshot. Must run under the write lock.
	 */
	private apply = async (entries: IIndexEntry[], deletes: string[]): Promise<void> => {
		const base = this.current;
		const deduplicated = new Map<string, IIndexEntry>();
		for (const entry of entries) {
			deduplicated.set(entry.chunkId, entry);
		}

		let nextSeq = base.nextSeq;
		const upserts: ISnapshotEntry[] = [...deduplicated.values()].map((entry) => {
			const existing = base.byId.get(entry.chunkId);
			return {
				chunkId: entry.chunkId,
				seq: existing ? existing.seq : nextSeq++,
				vector: [...entry.vector],
				metadata: { ...entry.metadata, tags: [...entry.metadata.tags] },
				norm: norm(entry.vector),
			};
		});

		await this.store.commit(
			upserts.map(({ norm: _norm, ...stored }) => stored),
			deletes
		);

		const removed = new Set(deletes);
		const replaced = new Set(upserts.map((entry) => entry.chunkId));
		const kept = base.entries.filter((entry) => !removed.has(entry.chunkId) && !replaced.has(entry.chunkId));
		this.current = buildSnapshot(base.version + 1, [...kept, ...upserts]);
		this.logger.debug(`[INDEX] v${this.current.version}: ${upserts.length} upserted, ${deletes.length} deleted, ${this.current.entries.length} total`);
	};
}
