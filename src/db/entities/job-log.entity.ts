import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, Index } from "typeorm";

/**
 * Job Log Entity
 *
 * Append-only activity trail for a job (uploads, state transitions, skipped
 * files and chunks). Rows are never updated.
 */
@Entity({ name: "job_logs" })
@Index(["job_id", "timestamp"])
export class JobLog {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: "int" })
    job_id!: number;

    @Column({
        type: "varchar",
        length: 50
    })
    event_type!: string; // job_created, upload_received, finetune_running, ...

    @Column({ type: "text" })
    message!: string;

    @CreateDateColumn({ type: "timestamp" })
    timestamp!: Date;
}
