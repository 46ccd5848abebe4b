import type { ILogger } from '../config/logger';
import type { IRecordStore } from '../db/record-store';
import type { ITaskQueue } from '../queue/task-queue';
import type { IModelCapability, TuningPollResult } from '../types/capabilities';
import { FINE_TUNE_MODES, FineTuneMode, FineTuneStartResult, FineTuneState, JobRecord } from '../types/job';
import { errorMessage, IllegalTransitionError, ValidationError } from '../utils/errors';
import { IAuditLog, JOB_EVENTS } from './audit-log.service';
import { JobStateMachine, snapshotOf } from './job-state-machine.service';
import { toJsonl, TrainingDataService } from './training-data.service';

export interface FineTuneOptions {
    model?: string;
    mode?: string;
}

export interface FineTuneSettings {
    defaultBaseModel: string;
    pollIntervalMs: number;
}

export function isFineTuneMode(value: string): value is FineTuneMode {
    return FINE_TUNE_MODES.some(mode => mode === value);
}

export function toFineTuneState(job: JobRecord): FineTuneState {
    return {
        jobId: job.id,
        status: job.fine_tune_status,
        mode: job.fine_tune_mode,
        baseModel: job.fine_tune_base_model,
        handle: job.fine_tune_handle,
        fineTunedModelId: job.fine_tuned_model_id,
        error: job.fine_tune_error
    };
}

/**
 * Fine-Tune Orchestrator
 *
 * start: not_run → queued, then a `finetune-submit` task builds the dataset and
 * submits it (queued → running). `status` polls the provider while running and
 * applies the outcome; `pollUntilSettled` keeps rescheduling itself until then.
 */
export class FineTuneService {
    constructor(
        private stateMachine: JobStateMachine,
        private store: IRecordStore,
        private trainingData: TrainingDataService,
        private model: IModelCapability,
        private taskQueue: ITaskQueue,
        private auditLog: IAuditLog,
        private logger: ILogger,
        private settings: FineTuneSettings
    ) { }

    async start(jobId: number, options: FineTuneOptions = {}): Promise<FineTuneStartResult> {
        const mode = options.mode ?? 'plain';
        if (!isFineTuneMode(mode)) {
            throw new ValidationError(`Unknown fine-tune mode '${mode}', expected one of ${FINE_TUNE_MODES.join(', ')}`);
        }
        if (options.model !== undefined && options.model.trim().length === 0) {
            throw new ValidationError('model must not be empty');
        }
        const baseModel = options.model?.trim() ?? this.settings.defaultBaseModel;

        const job = await this.stateMachine.getJob(jobId);
        if (job.status !== 'completed') {
            throw new IllegalTransitionError(
                `Job ${jobId} ingestion is ${job.status}; fine-tuning requires a completed job`,
                snapshotOf(job)
            );
        }
        if (job.fine_tune_status === 'queued' || job.fine_tune_status === 'running') {
            return { jobId, status: job.fine_tune_status, alreadyActive: true };
        }

        try {
            await this.stateMachine.queueFineTune(jobId, mode, baseModel);
        } catch (error: unknown) {
            const current = error instanceof IllegalTransitionError ? error.currentState.fineTuneStatus : null;
            if (current === 'queued' || current === 'running') {
                return { jobId, status: current, alreadyActive: true };
            }
            throw error;
        }

        try {
            const task = await this.taskQueue.submit({ name: 'finetune-submit', payload: { jobId } });
            this.logger.info({ jobId, mode, baseModel, taskId: task.id }, 'Fine-tune submission queued');
        } catch (error: unknown) {
            await this.stateMachine.markFineTuneFailed(jobId, 'queued', `Could not queue submission: ${errorMessage(error)}`);
            throw error;
        }

        return { jobId, status: 'queued', alreadyActive: false };
    }

    /**
     * Background step: build the dataset and hand it to the provider.
     */
    async submit(jobId: number): Promise<FineTuneState> {
        const job = await this.stateMachine.getJob(jobId);
        if (job.fine_tune_status !== 'queued') {
            this.logger.warn({ jobId, fineTuneStatus: job.fine_tune_status }, 'Fine-tune submission skipped');
            return toFineTuneState(job);
        }

        let running: JobRecord;
        try {
            const chunks = await this.store.listChunks(jobId);
            const examples = await this.trainingData.build(jobId, job.fine_tune_mode ?? 'plain', chunks);
            const handle = await this.model.fineTune(
                toJsonl(examples),
                job.fine_tune_base_model ?? this.settings.defaultBaseModel
            );
            running = await this.stateMachine.markFineTuneRunning(jobId, handle);
        } catch (error: unknown) {
            if (error instanceof IllegalTransitionError) {
                throw error;
            }
            this.logger.error({ jobId, error: errorMessage(error) }, 'Fine-tune submission failed');
            return toFineTuneState(await this.stateMachine.markFineTuneFailed(jobId, 'queued', errorMessage(error)));
        }

        await this.schedulePoll(jobId);
        return toFineTuneState(running);
    }

    /**
     * Current fine-tune state, refreshed from the provider while running.
     */
    async status(jobId: number): Promise<FineTuneState> {
        const job = await this.stateMachine.getJob(jobId);
        if (job.fine_tune_status !== 'running' || job.fine_tune_handle === null) {
            return toFineTuneState(job);
        }

        let result: TuningPollResult;
        try {
            result = await this.model.poll(job.fine_tune_handle);
        } catch (error: unknown) {
            this.logger.warn({ jobId, handle: job.fine_tune_handle, error: errorMessage(error) }, 'Fine-tune poll failed');
            await this.auditLog.record(jobId, JOB_EVENTS.FINETUNE_POLL_FAILED, `Status check failed: ${errorMessage(error)}`);
            return toFineTuneState(job);
        }

        try {
            switch (result.status) {
                case 'succeeded':
                    if (!result.modelId) {
                        return toFineTuneState(await this.stateMachine.markFineTuneFailed(
                            jobId, 'running', 'Provider reported success without a model id'
                        ));
                    }
                    return toFineTuneState(await this.stateMachine.markFineTuneSucceeded(jobId, result.modelId));
                case 'failed':
                    return toFineTuneState(await this.stateMachine.markFineTuneFailed(
                        jobId, 'running', result.error ?? 'Fine-tune failed'
                    ));
                default:
                    return toFineTuneState(job);
            }
        } catch (error: unknown) {
            if (error instanceof IllegalTransitionError) {
                // another poller settled it first
                return toFineTuneState(await this.stateMachine.getJob(jobId));
            }
            throw error;
        }
    }

    async pollUntilSettled(jobId: number): Promise<FineTuneState> {
        const state = await this.status(jobId);
        if (state.status === 'running') {
            await this.schedulePoll(jobId);
        }
        return state;
    }

    private async schedulePoll(jobId: number): Promise<void> {
        if (this.settings.pollIntervalMs <= 0) {
            return;
        }

        try {
            await this.taskQueue.submit({ name: 'finetune-poll', payload: { jobId } }, { delayMs: this.settings.pollIntervalMs });
        } catch (error: unknown) {
            this.logger.error({ jobId, error: errorMessage(error) }, 'Could not schedule fine-tune poll');
        }
    }
}
