import { DataSource, Repository } from "typeorm";
import { Job } from "./entities/job.entity";
import { JobLog } from "./entities/job-log.entity";
import { DocumentChunk } from "./entities/document-chunk.entity";
import type { ChunkRecord, FineTuneStatus, JobLogRecord, JobPatch, JobRecord, JobStatus } from "../types/job";

/**
 * State a compare-and-set write expects to find before it applies.
 */
export interface JobCondition {
    status?: JobStatus;
    fine_tune_status?: FineTuneStatus;
}

/**
 * Record Store
 *
 * Persistence contract for jobs, their activity log and their chunks.
 * Job rows are only changed through `compareAndSetJob`, which applies the
 * patch when the stored row still matches `expected` and returns null otherwise.
 */
export interface IRecordStore {
    createJob(jobName: string, fileCount: number): Promise<JobRecord>;
    getJob(jobId: number): Promise<JobRecord | null>;
    listJobs(): Promise<JobRecord[]>;
    compareAndSetJob(jobId: number, expected: JobCondition, patch: JobPatch): Promise<JobRecord | null>;
    appendLog(jobId: number, eventType: string, message: string): Promise<JobLogRecord>;
    listLogs(jobId: number): Promise<JobLogRecord[]>;
    saveChunks(jobId: number, chunks: ChunkRecord[]): Promise<void>;
    listChunks(jobId: number): Promise<ChunkRecord[]>;
}

export class TypeOrmRecordStore implements IRecordStore {
    private jobs: Repository<Job>;
    private logs: Repository<JobLog>;
    private chunks: Repository<DocumentChunk>;

    constructor(private dataSource: DataSource) {
        this.jobs = dataSource.getRepository(Job);
        this.logs = dataSource.getRepository(JobLog);
        this.chunks = dataSource.getRepository(DocumentChunk);
    }

    async createJob(jobName: string, fileCount: number): Promise<JobRecord> {
        const job = this.jobs.create({
            job_name: jobName,
            status: 'processing',
            file_count: fileCount,
            document_count: 0,
            completed_at: null,
            error_details: null,
            fine_tune_status: 'not_run',
            fine_tune_mode: null,
            fine_tune_base_model: null,
            fine_tune_handle: null,
            fine_tune_error: null,
            fine_tuned_model_id: null
        });
        return this.jobs.save(job);
    }

    async getJob(jobId: number): Promise<JobRecord | null> {
        return this.jobs.findOneBy({ id: jobId });
    }

    async listJobs(): Promise<JobRecord[]> {
        return this.jobs.find({ order: { created_at: 'DESC', id: 'DESC' } });
    }

    async compareAndSetJob(jobId: number, expected: JobCondition, patch: JobPatch): Promise<JobRecord | null> {
        const result = await this.jobs.update({ id: jobId, ...expected }, patch);
        if (!result.affected) {
            return null;
        }
        return this.getJob(jobId);
    }

    async appendLog(jobId: number, eventType: string, message: string): Promise<JobLogRecord> {
        const entry = this.logs.create({
            job_id: jobId,
            event_type: eventType,
            message
        });
        return this.logs.save(entry);
    }

    async listLogs(jobId: number): Promise<JobLogRecord[]> {
        return this.logs.find({
            where: { job_id: jobId },
            order: { timestamp: 'ASC', id: 'ASC' }
        });
    }

    async saveChunks(jobId: number, chunks: ChunkRecord[]): Promise<void> {
        await this.dataSource.transaction(async (manager) => {
            await manager.delete(DocumentChunk, { job_id: jobId });
            if (chunks.length > 0) {
                await manager.insert(DocumentChunk, chunks.map(chunk => ({ ...chunk, job_id: jobId })));
            }
        });
    }

    async listChunks(jobId: number): Promise<ChunkRecord[]> {
        const rows = await this.chunks.find({
            where: { job_id: jobId },
            order: { sequence: 'ASC' }
        });
        return rows.map(row => ({
            job_id: row.job_id,
            sequence: row.sequence,
            filename: row.filename,
            content: row.content,
            embedding: row.embedding
        }));
    }
}
