import { z } from 'zod';
import { logger as appLogger, ILogger } from '../config/logger';
import { CHAT_MODES } from '../types/job';
import { errorMessage } from '../utils/errors';

const jobPayload = z.object({ jobId: z.number().int().positive() });

export const taskRequestSchema = z.discriminatedUnion('name', [
    z.object({
        name: z.literal('ingest'),
        payload: jobPayload.extend({
            files: z.array(z.object({
                filename: z.string().min(1),
                contentType: z.string().optional()
            }))
        })
    }),
    z.object({ name: z.literal('finetune-submit'), payload: jobPayload }),
    z.object({ name: z.literal('finetune-poll'), payload: jobPayload }),
    z.object({
        name: z.literal('evaluate'),
        payload: jobPayload.extend({
            mode: z.enum(CHAT_MODES),
            questions: z.array(z.object({
                question: z.string(),
                reference: z.string().optional()
            })).optional()
        })
    })
]);

export type TaskRequest = z.infer<typeof taskRequestSchema>;
export type TaskName = TaskRequest['name'];

export type TaskState = 'pending' | 'running' | 'completed' | 'failed';

export interface TaskHandle {
    id: string;
    name: TaskName;
}

export interface TaskStatus {
    id: string;
    name: string;
    status: TaskState;
    result?: unknown;
    error?: string;
}

export interface SubmitOptions {
    delayMs?: number;
}

export type TaskProcessor = (request: TaskRequest) => Promise<unknown>;

/**
 * Background task queue. Producers submit named tasks; a single processor
 * registered through `start` executes them.
 */
export interface ITaskQueue {
    submit(request: TaskRequest, options?: SubmitOptions): Promise<TaskHandle>;
    get(taskId: string): Promise<TaskStatus | null>;
    start(processor: TaskProcessor): void;
    close(): Promise<void>;
}

/**
 * In-process task queue. Tasks run on the event loop after `delayMs`. Status
 * is kept in memory; only the `maxSettled` most recently settled tasks are
 * retained, mirroring `removeOnComplete` on the BullMQ side.
 */
export class InlineTaskQueue implements ITaskQueue {
    private processor: TaskProcessor | null = null;
    private tasks = new Map<string, TaskStatus>();
    private waiting = new Map<string, { request: TaskRequest; delayMs: number }>();
    private timers = new Set<NodeJS.Timeout>();
    private inFlight = new Set<Promise<void>>();
    private settled: string[] = [];
    private nextId = 1;

    constructor(
        private logger: ILogger = appLogger,
        private maxSettled: number = 1000
    ) { }

    start(processor: TaskProcessor): void {
        this.processor = processor;
        for (const [id, { request, delayMs }] of this.waiting) {
            this.schedule(id, request, delayMs);
        }
        this.waiting.clear();
    }

    async submit(request: TaskRequest, options: SubmitOptions = {}): Promise<TaskHandle> {
        const id = `inline-${this.nextId++}`;
        const delayMs = options.delayMs ?? 0;

        this.tasks.set(id, { id, name: request.name, status: 'pending' });

        if (this.processor) {
            this.schedule(id, request, delayMs);
        } else {
            this.waiting.set(id, { request, delayMs });
        }

        this.logger.debug({ taskId: id, taskName: request.name, delayMs }, 'Task submitted');
        return { id, name: request.name };
    }

    async get(taskId: string): Promise<TaskStatus | null> {
        const task = this.tasks.get(taskId);
        return task ? { ...task } : null;
    }

    /**
     * Resolves once no task is scheduled or running.
     */
    async drain(): Promise<void> {
        while (this.timers.size > 0 || this.inFlight.size > 0) {
            if (this.inFlight.size > 0) {
                await Promise.all(this.inFlight);
            } else {
                await new Promise(resolve => setTimeout(resolve, 1));
            }
        }
    }

    async close(): Promise<void> {
        for (const timer of this.timers) {
            clearTimeout(timer);
        }
        this.timers.clear();
        await Promise.all(this.inFlight);
    }

    private schedule(id: string, request: TaskRequest, delayMs: number): void {
        const timer = setTimeout(() => {
            this.timers.delete(timer);
            const running = this.run(id, request).finally(() => {
                this.inFlight.delete(running);
            });
            this.inFlight.add(running);
        }, delayMs);
        this.timers.add(timer);
    }

    private async run(id: string, request: TaskRequest): Promise<void> {
        const processor = this.processor;
        if (!processor) {
            return;
        }

        this.tasks.set(id, { id, name: request.name, status: 'running' });

        try {
            const result = await processor(request);
            this.tasks.set(id, { id, name: request.name, status: 'completed', result });
            this.logger.debug({ taskId: id, taskName: request.name }, 'Task completed');
        } catch (error: unknown) {
            this.tasks.set(id, { id, name: request.name, status: 'failed', error: errorMessage(error) });
            this.logger.error({ taskId: id, taskName: request.name, error: errorMessage(error) }, 'Task failed');
        }

        this.settled.push(id);
        while (this.settled.length > this.maxSettled) {
            const evicted = this.settled.shift();
            if (evicted !== undefined) {
                this.tasks.delete(evicted);
            }
        }
    }
}
