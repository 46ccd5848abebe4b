import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn } from "typeorm";
import type { FineTuneMode, FineTuneStatus, JobStatus } from "../../types/job";

/**
 * Job Entity
 *
 * One row per uploaded batch of documents. Carries two independent lifecycles:
 *
 * Ingestion:  processing → completed | failed
 * Fine-tune:  not_run → queued → running → succeeded | failed
 *
 * Only the job state machine writes `status` and the `fine_tune_*` columns.
 * `fine_tuned_model_id` is set exactly when `fine_tune_status` is "succeeded".
 */
@Entity({ name: "jobs" })
export class Job {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({
        type: "varchar",
        length: 255
    })
    job_name!: string;

    @Column({
        type: "varchar",
        length: 20,
        default: "processing"
    })
    status!: JobStatus;

    @Column({
        type: "int",
        default: 0
    })
    file_count!: number; // Files received at upload

    @Column({
        type: "int",
        default: 0
    })
    document_count!: number; // Files that produced at least one indexed chunk

    @CreateDateColumn({ type: "timestamp" })
    created_at!: Date;

    @UpdateDateColumn({ type: "timestamp" })
    updated_at!: Date;

    @Column({
        type: "timestamp",
        nullable: true
    })
    completed_at!: Date | null;

    @Column({
        type: "text",
        nullable: true
    })
    error_details!: string | null; // Why ingestion failed

    @Column({
        type: "varchar",
        length: 20,
        default: "not_run"
    })
    fine_tune_status!: FineTuneStatus;

    @Column({
        type: "varchar",
        length: 10,
        nullable: true
    })
    fine_tune_mode!: FineTuneMode | null;

    @Column({
        type: "varchar",
        length: 100,
        nullable: true
    })
    fine_tune_base_model!: string | null;

    @Column({
        type: "varchar",
        length: 100,
        nullable: true
    })
    fine_tune_handle!: string | null; // Provider-side tuning job id

    @Column({
        type: "text",
        nullable: true
    })
    fine_tune_error!: string | null;

    @Column({
        type: "varchar",
        length: 255,
        nullable: true
    })
    fine_tuned_model_id!: string | null;
}
