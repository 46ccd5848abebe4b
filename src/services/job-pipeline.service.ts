import { env } from '../config/env';
import { logger as appLogger, ILogger } from '../config/logger';
import type { IRecordStore } from '../db/record-store';
import type { ITaskQueue, TaskHandle, TaskStatus } from '../queue/task-queue';
import type { IBlobStore, IModelCapability } from '../types/capabilities';
import type { EvaluationResult } from '../types/evaluation';
import type { FineTuneStartResult, FineTuneState, JobLogRecord, JobRecord, UploadedDocument } from '../types/job';
import { NotFoundError } from '../utils/errors';
import { CoreResult, toResult } from '../utils/result.util';
import { AuditLogService } from './audit-log.service';
import { EvaluateOptions, EvaluationService } from './evaluation.service';
import { FineTuneOptions, FineTuneService } from './fine-tune.service';
import { ChatAnswer, GenerationRouter } from './generation-router.service';
import { IngestionService } from './ingestion.service';
import { JobStateMachine } from './job-state-machine.service';
import { ITextExtractor, TextExtractorService } from './text-extractor.service';
import { TrainingDataService } from './training-data.service';
import type { IVectorIndex } from './vector-index.service';

export interface PipelineSettings {
    chunkMaxChars: number;
    retrievalTopK: number;
    defaultChatModel: string;
    defaultFineTuneModel: string;
    raftDistractors: number;
    fineTuneMaxChunks: number;
    fineTunePollIntervalMs: number;
}

export interface PipelineDependencies {
    store: IRecordStore;
    blobStore: IBlobStore;
    model: IModelCapability;
    vectorIndex: IVectorIndex;
    taskQueue: ITaskQueue;
    textExtractor?: ITextExtractor;
    logger?: ILogger;
    settings?: Partial<PipelineSettings>;
}

export function settingsFromEnv(): PipelineSettings {
    return {
        chunkMaxChars: env.CHUNK_MAX_CHARS,
        retrievalTopK: env.RETRIEVAL_TOP_K,
        defaultChatModel: env.DEFAULT_CHAT_MODEL,
        defaultFineTuneModel: env.DEFAULT_FINETUNE_MODEL,
        raftDistractors: env.RAFT_DISTRACTORS,
        fineTuneMaxChunks: env.FINETUNE_MAX_CHUNKS,
        fineTunePollIntervalMs: env.FINETUNE_POLL_INTERVAL_MS
    };
}

/**
 * Job Pipeline Service
 *
 * Consumer-facing contract. Wires the pipeline components around the injected
 * collaborators; every public operation returns a CoreResult and never throws.
 */
export class JobPipelineService {
    readonly auditLog: AuditLogService;
    readonly stateMachine: JobStateMachine;
    readonly ingestion: IngestionService;
    readonly router: GenerationRouter;
    readonly fineTune: FineTuneService;
    readonly evaluation: EvaluationService;

    private readonly store: IRecordStore;
    private readonly taskQueue: ITaskQueue;
    private readonly logger: ILogger;

    constructor(deps: PipelineDependencies) {
        const settings: PipelineSettings = { ...settingsFromEnv(), ...deps.settings };
        const logger = deps.logger ?? appLogger;

        this.store = deps.store;
        this.taskQueue = deps.taskQueue;
        this.logger = logger;

        this.auditLog = new AuditLogService(deps.store, logger);
        this.stateMachine = new JobStateMachine(deps.store, this.auditLog, logger);
        this.ingestion = new IngestionService(
            this.stateMachine,
            deps.store,
            deps.blobStore,
            deps.textExtractor ?? new TextExtractorService(),
            deps.model,
            deps.vectorIndex,
            deps.taskQueue,
            this.auditLog,
            logger,
            settings.chunkMaxChars
        );
        this.router = new GenerationRouter(this.stateMachine, deps.model, deps.vectorIndex, logger, {
            defaultChatModel: settings.defaultChatModel,
            topK: settings.retrievalTopK
        });
        const trainingData = new TrainingDataService(deps.model, deps.vectorIndex, logger, {
            generationModel: settings.defaultChatModel,
            maxChunks: settings.fineTuneMaxChunks,
            distractors: settings.raftDistractors
        });
        this.fineTune = new FineTuneService(
            this.stateMachine,
            deps.store,
            trainingData,
            deps.model,
            deps.taskQueue,
            this.auditLog,
            logger,
            {
                defaultBaseModel: settings.defaultFineTuneModel,
                pollIntervalMs: settings.fineTunePollIntervalMs
            }
        );
        this.evaluation = new EvaluationService(this.router, this.stateMachine, deps.model, deps.taskQueue, logger);
    }

    async createJob(jobName: string, documents: UploadedDocument[]): Promise<CoreResult<JobRecord>> {
        return toResult('createJob', this.logger, () => this.ingestion.createJob(jobName, documents));
    }

    async getJob(jobId: number): Promise<CoreResult<JobRecord>> {
        return toResult('getJob', this.logger, () => this.stateMachine.getJob(jobId));
    }

    async listJobs(): Promise<CoreResult<JobRecord[]>> {
        return toResult('listJobs', this.logger, () => this.store.listJobs());
    }

    async getLogs(jobId: number): Promise<CoreResult<JobLogRecord[]>> {
        return toResult('getLogs', this.logger, () => this.auditLog.list(jobId));
    }

    async startFinetune(jobId: number, options: FineTuneOptions = {}): Promise<CoreResult<FineTuneStartResult>> {
        return toResult('startFinetune', this.logger, () => this.fineTune.start(jobId, options));
    }

    async getFinetuneStatus(jobId: number): Promise<CoreResult<FineTuneState>> {
        return toResult('getFinetuneStatus', this.logger, () => this.fineTune.status(jobId));
    }

    async chat(jobId: number, message: string, mode: string = 'rag'): Promise<CoreResult<ChatAnswer>> {
        return toResult('chat', this.logger, () => this.router.generate(jobId, message, mode));
    }

    async evaluate(jobId: number, options: EvaluateOptions = {}): Promise<CoreResult<EvaluationResult>> {
        return toResult('evaluate', this.logger, () => this.evaluation.evaluate(jobId, options));
    }

    async startEvaluation(jobId: number, options: EvaluateOptions = {}): Promise<CoreResult<TaskHandle>> {
        return toResult('startEvaluation', this.logger, () => this.evaluation.startEvaluation(jobId, options));
    }

    async getTask(taskId: string): Promise<CoreResult<TaskStatus>> {
        return toResult('getTask', this.logger, async () => {
            const task = await this.taskQueue.get(taskId);
            if (!task) {
                throw new NotFoundError(`Task ${taskId} not found`);
            }
            return task;
        });
    }
}
