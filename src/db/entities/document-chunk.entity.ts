import { Column, Entity, PrimaryGeneratedColumn, Unique } from "typeorm";

/**
 * Document Chunk Entity
 *
 * Text chunks produced during ingestion, numbered job-wide in upload order.
 * The embedding is kept here as well as in Qdrant so the training data builder
 * can read gold chunks back without a vector lookup.
 */
@Entity({ name: "document_chunks" })
@Unique(["job_id", "sequence"])
export class DocumentChunk {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: "int" })
    job_id!: number;

    @Column({ type: "int" })
    sequence!: number;

    @Column({
        type: "varchar",
        length: 255
    })
    filename!: string;

    @Column({ type: "text" })
    content!: string;

    @Column({
        type: "jsonb",
        nullable: true
    })
    embedding!: number[] | null;
}
