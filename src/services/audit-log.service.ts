import type { ILogger } from '../config/logger';
import type { IRecordStore } from '../db/record-store';
import type { JobLogRecord } from '../types/job';
import { errorMessage, NotFoundError } from '../utils/errors';

export const JOB_EVENTS = {
    JOB_CREATED: 'job_created',
    UPLOAD_RECEIVED: 'upload_received',
    INGESTION_STARTED: 'ingestion_started',
    FILE_PROCESSING_FAILED: 'file_processing_failed',
    CHUNK_EMBEDDING_FAILED: 'chunk_embedding_failed',
    INGESTION_COMPLETED: 'ingestion_completed',
    INGESTION_FAILED: 'ingestion_failed',
    FINETUNE_QUEUED: 'finetune_queued',
    FINETUNE_RUNNING: 'finetune_running',
    FINETUNE_SUCCEEDED: 'finetune_succeeded',
    FINETUNE_FAILED: 'finetune_failed',
    FINETUNE_POLL_FAILED: 'finetune_poll_failed'
} as const;

export type JobEvent = typeof JOB_EVENTS[keyof typeof JOB_EVENTS];

export interface IAuditLog {
    record(jobId: number, eventType: JobEvent, message: string): Promise<void>;
    list(jobId: number): Promise<JobLogRecord[]>;
}

/**
 * Audit Log Service
 *
 * Append-only job activity trail. A failed append is logged and swallowed so
 * that the operation being recorded still completes.
 */
export class AuditLogService implements IAuditLog {
    constructor(
        private store: IRecordStore,
        private logger: ILogger
    ) { }

    async record(jobId: number, eventType: JobEvent, message: string): Promise<void> {
        try {
            await this.store.appendLog(jobId, eventType, message);
        } catch (error: unknown) {
            this.logger.error({
                jobId,
                eventType,
                error: errorMessage(error)
            }, 'Failed to append job log entry');
        }
    }

    async list(jobId: number): Promise<JobLogRecord[]> {
        const job = await this.store.getJob(jobId);
        if (!job) {
            throw new NotFoundError(`Job ${jobId} not found`);
        }
        return this.store.listLogs(jobId);
    }
}
