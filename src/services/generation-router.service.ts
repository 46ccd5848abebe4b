import type { ILogger } from '../config/logger';
import type { IModelCapability } from '../types/capabilities';
import { CHAT_MODES, ChatMode, JobRecord } from '../types/job';
import { IllegalTransitionError, ValidationError } from '../utils/errors';
import { snapshotOf } from './job-state-machine.service';
import type { IVectorIndex, SearchHit } from './vector-index.service';

export interface SourceRef {
    sequence: number;
    filename: string;
    score: number;
}

export interface ChatAnswer {
    answer: string;
    mode: ChatMode;
    model: string;
    sources: SourceRef[];
}

export interface RouterSettings {
    defaultChatModel: string;
    topK: number;
}

interface GenerationPlan {
    model: string;
    prompt: string;
    sources: SearchHit[];
}

type ModeHandler = (job: JobRecord, message: string) => Promise<GenerationPlan>;

export function isChatMode(value: string): value is ChatMode {
    return CHAT_MODES.some(mode => mode === value);
}

export function buildContextPrompt(contexts: string[], message: string): string {
    return `Based on the following context, answer the question:\n\nContext:\n${contexts.join('\n')}\n\nQuestion: ${message}`;
}

/**
 * Generation Strategy Router
 *
 * rag: retrieval + context prompt on the default chat model.
 * raft: retrieval + context prompt on the job's fine-tuned model.
 * fine_tuned_only: the raw message on the job's fine-tuned model.
 *
 * The job is read once per request and every check uses that snapshot.
 */
export class GenerationRouter {
    private readonly handlers: Record<ChatMode, ModeHandler>;

    constructor(
        private jobs: { getJob(jobId: number): Promise<JobRecord> },
        private model: IModelCapability,
        private vectorIndex: IVectorIndex,
        private logger: ILogger,
        private settings: RouterSettings
    ) {
        this.handlers = {
            rag: async (job, message) => {
                const sources = await this.retrieve(job.id, message);
                return {
                    model: this.settings.defaultChatModel,
                    prompt: buildContextPrompt(sources.map(hit => hit.content), message),
                    sources
                };
            },
            raft: async (job, message) => {
                const sources = await this.retrieve(job.id, message);
                return {
                    model: GenerationRouter.fineTunedModel(job),
                    prompt: buildContextPrompt(sources.map(hit => hit.content), message),
                    sources
                };
            },
            fine_tuned_only: async (job, message) => ({
                model: GenerationRouter.fineTunedModel(job),
                prompt: message,
                sources: []
            })
        };
    }

    async generate(jobId: number, message: string, mode: string): Promise<ChatAnswer> {
        if (message.trim().length === 0) {
            throw new ValidationError('message must not be empty');
        }
        if (!isChatMode(mode)) {
            throw new ValidationError(`Unknown chat mode '${mode}', expected one of ${CHAT_MODES.join(', ')}`);
        }

        const job = await this.jobs.getJob(jobId);
        GenerationRouter.assertModeAvailable(job, mode);

        const plan = await this.handlers[mode](job, message);
        const answer = await this.model.generate(plan.prompt, plan.model);

        this.logger.info({
            jobId,
            mode,
            model: plan.model,
            sourceCount: plan.sources.length
        }, 'Chat answer generated');

        return {
            answer,
            mode,
            model: plan.model,
            sources: plan.sources.map(hit => ({
                sequence: hit.sequence,
                filename: hit.filename,
                score: hit.score
            }))
        };
    }

    /**
     * Every mode needs a completed ingestion; raft and fine_tuned_only also need
     * a succeeded fine-tune.
     */
    static assertModeAvailable(job: JobRecord, mode: ChatMode): void {
        if (job.status !== 'completed') {
            throw new IllegalTransitionError(
                `Job ${job.id} ingestion is ${job.status}; ${mode} chat requires a completed job`,
                snapshotOf(job)
            );
        }
        if (mode !== 'rag' && job.fine_tune_status !== 'succeeded') {
            throw new IllegalTransitionError(
                `Job ${job.id} fine-tune is ${job.fine_tune_status}; ${mode} chat requires a succeeded fine-tune`,
                snapshotOf(job)
            );
        }
    }

    private async retrieve(jobId: number, message: string): Promise<SearchHit[]> {
        const embedding = await this.model.embed(message);
        return this.vectorIndex.search(jobId, embedding, this.settings.topK);
    }

    private static fineTunedModel(job: JobRecord): string {
        if (job.fine_tuned_model_id === null) {
            throw new Error(`Job ${job.id} has no fine-tuned model despite status ${job.fine_tune_status}`);
        }
        return job.fine_tuned_model_id;
    }
}

