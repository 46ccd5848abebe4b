import type { ILogger } from '../config/logger';
import type { IRecordStore, JobCondition } from '../db/record-store';
import type { FineTuneMode, FineTuneStatus, JobPatch, JobRecord, JobStatus } from '../types/job';
import { IllegalTransitionError, JobStateSnapshot, NotFoundError } from '../utils/errors';
import { IAuditLog, JOB_EVENTS, JobEvent } from './audit-log.service';

const INGESTION_EDGES: Record<JobStatus, JobStatus[]> = {
    processing: ['completed', 'failed'],
    completed: [],
    failed: []
};

const FINE_TUNE_EDGES: Record<FineTuneStatus, FineTuneStatus[]> = {
    not_run: ['queued'],
    queued: ['running', 'failed'],
    running: ['succeeded', 'failed'],
    succeeded: [],
    failed: []
};

export function snapshotOf(job: JobRecord): JobStateSnapshot {
    return { status: job.status, fineTuneStatus: job.fine_tune_status };
}

export function isLegalIngestionEdge(from: JobStatus, to: JobStatus): boolean {
    return INGESTION_EDGES[from].includes(to);
}

export function isLegalFineTuneEdge(from: FineTuneStatus, to: FineTuneStatus): boolean {
    return FINE_TUNE_EDGES[from].includes(to);
}

interface Transition {
    expected: JobCondition;
    patch: JobPatch;
    event: JobEvent;
    message: string;
    description: string;
}

/**
 * Job State Machine
 *
 * Sole writer of `status` and the fine-tune columns. Every transition is a
 * compare-and-set against the record store, so of two concurrent identical
 * requests exactly one applies and the other gets IllegalTransition with the
 * state it lost to.
 */
export class JobStateMachine {
    constructor(
        private store: IRecordStore,
        private auditLog: IAuditLog,
        private logger: ILogger
    ) { }

    async createJob(jobName: string, fileCount: number): Promise<JobRecord> {
        const job = await this.store.createJob(jobName, fileCount);
        await this.auditLog.record(job.id, JOB_EVENTS.JOB_CREATED, `Job "${jobName}" created with ${fileCount} file(s)`);

        this.logger.info({ jobId: job.id, jobName, fileCount }, 'Job created');
        return job;
    }

    async getJob(jobId: number): Promise<JobRecord> {
        const job = await this.store.getJob(jobId);
        if (!job) {
            throw new NotFoundError(`Job ${jobId} not found`);
        }
        return job;
    }

    async completeIngestion(jobId: number, documentCount: number): Promise<JobRecord> {
        return this.transitionIngestion(jobId, 'completed', {
            document_count: documentCount,
            completed_at: new Date(),
            error_details: null
        }, JOB_EVENTS.INGESTION_COMPLETED, `Ingestion completed: ${documentCount} document(s) indexed`);
    }

    async failIngestion(jobId: number, reason: string): Promise<JobRecord> {
        return this.transitionIngestion(jobId, 'failed', {
            error_details: reason
        }, JOB_EVENTS.INGESTION_FAILED, `Ingestion failed: ${reason}`);
    }

    /**
     * not_run → queued. Only valid once ingestion has completed.
     */
    async queueFineTune(jobId: number, mode: FineTuneMode, baseModel: string): Promise<JobRecord> {
        return this.apply(jobId, {
            expected: { status: 'completed', fine_tune_status: 'not_run' },
            patch: {
                fine_tune_status: 'queued',
                fine_tune_mode: mode,
                fine_tune_base_model: baseModel,
                fine_tune_error: null
            },
            event: JOB_EVENTS.FINETUNE_QUEUED,
            message: `Fine-tune queued (mode=${mode}, base model=${baseModel})`,
            description: 'fine-tune not_run → queued'
        });
    }

    async markFineTuneRunning(jobId: number, handle: string): Promise<JobRecord> {
        return this.transitionFineTune(jobId, 'queued', 'running', {
            fine_tune_handle: handle
        }, JOB_EVENTS.FINETUNE_RUNNING, `Fine-tune submitted (handle=${handle})`);
    }

    async markFineTuneSucceeded(jobId: number, modelId: string): Promise<JobRecord> {
        return this.transitionFineTune(jobId, 'running', 'succeeded', {
            fine_tuned_model_id: modelId,
            fine_tune_error: null
        }, JOB_EVENTS.FINETUNE_SUCCEEDED, `Fine-tune succeeded (model=${modelId})`);
    }

    async markFineTuneFailed(jobId: number, from: 'queued' | 'running', reason: string): Promise<JobRecord> {
        return this.transitionFineTune(jobId, from, 'failed', {
            fine_tune_error: reason
        }, JOB_EVENTS.FINETUNE_FAILED, `Fine-tune failed: ${reason}`);
    }

    private async transitionIngestion(
        jobId: number,
        to: JobStatus,
        patch: JobPatch,
        event: JobEvent,
        message: string
    ): Promise<JobRecord> {
        const from: JobStatus = 'processing';
        if (!isLegalIngestionEdge(from, to)) {
            throw new Error(`Unsupported ingestion edge ${from} → ${to}`);
        }

        return this.apply(jobId, {
            expected: { status: from },
            patch: { ...patch, status: to },
            event,
            message,
            description: `ingestion ${from} → ${to}`
        });
    }

    private async transitionFineTune(
        jobId: number,
        from: FineTuneStatus,
        to: FineTuneStatus,
        patch: JobPatch,
        event: JobEvent,
        message: string
    ): Promise<JobRecord> {
        if (!isLegalFineTuneEdge(from, to)) {
            throw new Error(`Unsupported fine-tune edge ${from} → ${to}`);
        }

        return this.apply(jobId, {
            expected: { fine_tune_status: from },
            patch: { ...patch, fine_tune_status: to },
            event,
            message,
            description: `fine-tune ${from} → ${to}`
        });
    }

    private async apply(jobId: number, transition: Transition): Promise<JobRecord> {
        const updated = await this.store.compareAndSetJob(jobId, transition.expected, transition.patch);

        if (!updated) {
            const current = await this.getJob(jobId);
            const state = snapshotOf(current);

            this.logger.warn({
                jobId,
                transition: transition.description,
                currentState: state
            }, 'Job transition rejected');

            throw new IllegalTransitionError(
                `Cannot apply ${transition.description} to job ${jobId} (status=${state.status}, fine_tune_status=${state.fineTuneStatus})`,
                state
            );
        }

        JobStateMachine.assertInvariants(updated);

        await this.auditLog.record(jobId, transition.event, transition.message);

        this.logger.info({
            jobId,
            transition: transition.description,
            status: updated.status,
            fineTuneStatus: updated.fine_tune_status
        }, 'Job transition applied');

        return updated;
    }

    /**
     * fine_tuned_model_id is set exactly when fine_tune_status is succeeded.
     */
    static assertInvariants(job: JobRecord): void {
        const succeeded = job.fine_tune_status === 'succeeded';
        const hasModel = job.fine_tuned_model_id !== null;
        if (succeeded !== hasModel) {
            throw new Error(
                `Job ${job.id} violates the fine-tuned model invariant (fine_tune_status=${job.fine_tune_status}, fine_tuned_model_id=${job.fine_tuned_model_id ?? 'null'})`
            );
        }
    }
}
