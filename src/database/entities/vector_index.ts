import 'reflect-metadata';
import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

export const INDEX_HEADER_ID = 'primary';

/**
 * Single-row table pinning the vector space the entries were written in.
 */
@Entity('index_header')
export class IndexHeaderRecord {
	@PrimaryColumn({ type: 'varchar', length: 16 })
	id!: string;

	@Column({ type: 'varchar', nullable: false })
	embeddingModel!: string;

	@Column({ type: 'integer', nullable: false })
	dimensions!: number;

	@Column({ type: 'varchar', length: 16, nullable: false })
	metric!: string;

	@Column({ type: 'integer', nullable: false })
	formatVersion!: number;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}

@Entity('index_entries')
export class IndexEntryRecord {
	@PrimaryColumn({ type: 'varchar', length: 64 })
	chunkId!: string;

	@Column({ type: 'integer', nullable: false })
	@Index()
	seq!: number;

	@Column({ type: 'varchar', nullable: false })
	@Index()
	documentId!: string;

	/** JSON array of numbers */
	@Column({ type: 'text', nullable: false })
	vector!: string;

	/** JSON snapshot of the chunk and its document */
	@Column({ type: 'text', nullable: false })
	metadata!: string;
}
