import { Queue, Worker, QueueEvents, Job } from 'bullmq';
import { Redis } from 'ioredis';
import { env } from '../config/env';
import { logger, ILogger } from '../config/logger';
import { ITaskQueue, SubmitOptions, TaskHandle, TaskProcessor, TaskRequest, taskRequestSchema, TaskState, TaskStatus } from './task-queue';

export const PIPELINE_QUEUE = 'pipeline';

/**
 * Queue Configuration
 *
 * BullMQ-backed task queue for ingestion, fine-tune submission and polling,
 * and background evaluation. Tasks run once (`attempts: 1`); transient
 * failures are retried inside the capability adapters instead.
 */
export class BullTaskQueue implements ITaskQueue {
    private redis: Redis;
    private queue: Queue;
    private worker: Worker | null = null;
    private queueEvents: QueueEvents;

    constructor(
        redisUrl: string,
        private concurrency: number,
        private logger: ILogger
    ) {
        // Redis connection
        this.redis = new Redis(redisUrl, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        this.queue = new Queue(PIPELINE_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: { age: 24 * 3600, count: 1000 },
                removeOnFail: { age: 7 * 24 * 3600 },
                attempts: 1,
            },
        });

        // Queue events for monitoring
        this.queueEvents = new QueueEvents(PIPELINE_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    /**
     * Factory method for production use
     */
    static create(): BullTaskQueue {
        return new BullTaskQueue(env.REDIS_URL, env.TASK_CONCURRENCY, logger);
    }

    async submit(request: TaskRequest, options: SubmitOptions = {}): Promise<TaskHandle> {
        const job = await this.queue.add(request.name, request.payload, {
            delay: options.delayMs ?? 0
        });

        if (!job.id) {
            throw new Error(`Queue did not assign an id to task ${request.name}`);
        }

        return { id: job.id, name: request.name };
    }

    async get(taskId: string): Promise<TaskStatus | null> {
        const job = await this.queue.getJob(taskId);
        if (!job) {
            return null;
        }

        const status = BullTaskQueue.toTaskState(await job.getState());

        return {
            id: taskId,
            name: job.name,
            status,
            result: status === 'completed' ? job.returnvalue : undefined,
            error: status === 'failed' ? job.failedReason : undefined
        };
    }

    /**
     * Start the pipeline worker
     */
    start(processor: TaskProcessor): void {
        this.worker = new Worker(PIPELINE_QUEUE, async (job: Job) => {
            const request = taskRequestSchema.parse({ name: job.name, payload: job.data });
            return processor(request);
        }, {
            connection: this.redis,
            concurrency: this.concurrency,
        });

        this.worker.on('completed', (job) => {
            this.logger.info({
                taskId: job.id,
                taskName: job.name,
                duration: (job.processedOn ?? job.timestamp) - job.timestamp
            }, 'Pipeline task completed');
        });

        this.worker.on('failed', (job, err) => {
            this.logger.error({
                taskId: job?.id,
                taskName: job?.name,
                error: err.message
            }, 'Pipeline task failed');
        });

        this.worker.on('stalled', (jobId) => {
            this.logger.warn({ taskId: jobId }, 'Pipeline task stalled');
        });
    }

    static toTaskState(state: string): TaskState {
        switch (state) {
            case 'completed':
                return 'completed';
            case 'failed':
                return 'failed';
            case 'active':
                return 'running';
            default:
                return 'pending';
        }
    }

    /**
     * Setup queue event listeners
     */
    private setupEventListeners() {
        this.queueEvents.on('waiting', ({ jobId }) => {
            this.logger.debug({ taskId: jobId }, 'Task waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            this.logger.debug({ taskId: jobId }, 'Task started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            this.logger.error({ taskId: jobId, failedReason }, 'Task failed');
        });
    }

    /**
     * Close all connections
     */
    async close() {
        await this.worker?.close();
        await this.queue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}
