import OpenAI, { toFile } from 'openai';
import { z } from 'zod';
import { env } from '../config/env';
import { logger, ILogger } from '../config/logger';
import { RetryUtil, IRetryUtil, RetryOptions } from '../utils/retry.util';
import { CapabilityError, CapabilityName, errorMessage, PipelineError } from '../utils/errors';
import type { IModelCapability, TuningPollResult } from '../types/capabilities';
import type { MetricName, MetricScores } from '../types/evaluation';

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string };

type UploadFile = Awaited<ReturnType<typeof toFile>>;

// Interfaces for better testability
export interface IOpenAIClient {
    embeddings: {
        create: (params: {
            model: string;
            input: string[];
            encoding_format: 'float';
        }) => Promise<{
            data: Array<{ embedding: number[] }>;
        }>;
    };
    chat: {
        completions: {
            create: (params: {
                model: string;
                messages: ChatMessage[];
                temperature: number;
                max_tokens: number;
                response_format?: { type: 'json_object' };
            }) => Promise<{
                choices: Array<{ message: { content: string | null } }>;
                usage?: { total_tokens: number };
            }>;
        };
    };
    files: {
        create: (params: { file: UploadFile; purpose: 'fine-tune' }) => Promise<{ id: string }>;
    };
    fineTuning: {
        jobs: {
            create: (params: { training_file: string; model: string }) => Promise<{ id: string; status: string }>;
            retrieve: (fineTuningJobId: string) => Promise<{
                id: string;
                status: string;
                fine_tuned_model: string | null;
                error: { message: string } | null;
            }>;
        };
    };
}

export interface OpenAIServiceSettings {
    embeddingModel: string;
    judgeModel: string;
    temperature: number;
    maxTokens: number;
    retry: RetryOptions;
}

const DEFAULT_SETTINGS: OpenAIServiceSettings = {
    embeddingModel: 'text-embedding-3-small',
    judgeModel: 'gpt-4o-mini',
    temperature: 0.1,
    maxTokens: 2000,
    retry: { maxAttempts: 3, baseDelay: 1000, maxDelay: 5000 }
};

const score = z.number().transform(value => Math.max(1, Math.min(10, Math.round(value))));

const judgeSchema = z.object({
    relevancy: score,
    faithfulness: score,
    completeness: score,
    clarity: score,
    correctness: score,
    oracle_agreement: score.optional()
});

/**
 * OpenAI Service with Dependency Injection
 *
 * Production model capability: embeddings, chat completions, answer judging
 * and fine-tuning jobs. Each call retries transient failures and surfaces the
 * final failure as a CapabilityError.
 */
export class OpenAIService implements IModelCapability {
    private readonly settings: OpenAIServiceSettings;

    constructor(
        private client: IOpenAIClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        settings: Partial<OpenAIServiceSettings> = {}
    ) {
        this.settings = { ...DEFAULT_SETTINGS, ...settings };
    }

    /**
     * Factory method for production use
     */
    static create(): OpenAIService {
        const client = new OpenAI({
            apiKey: env.OPENAI_API_KEY
        });

        return new OpenAIService(client, RetryUtil, logger, {
            embeddingModel: env.EMBEDDING_MODEL,
            judgeModel: env.JUDGE_MODEL,
            temperature: env.LLM_TEMPERATURE
        });
    }

    async embed(text: string): Promise<number[]> {
        return this.call('embed', 'OpenAI embedding generation', async () => {
            const response = await this.client.embeddings.create({
                model: this.settings.embeddingModel,
                input: [text],
                encoding_format: 'float'
            });

            const embedding = response.data[0]?.embedding;
            if (!embedding || embedding.length === 0) {
                throw new Error('No embedding returned from OpenAI');
            }

            this.logger.debug({
                model: this.settings.embeddingModel,
                dimension: embedding.length
            }, 'OpenAI embedding generated');

            return embedding;
        });
    }

    async generate(prompt: string, model: string): Promise<string> {
        return this.call('generate', 'OpenAI completion generation', () =>
            this.complete(model, [{ role: 'user', content: prompt }])
        );
    }

    async judge(question: string, answer: string, reference?: string): Promise<MetricScores> {
        const messages: ChatMessage[] = [
            { role: 'system', content: 'You are a strict grader of question answering systems. Reply with a JSON object only.' },
            { role: 'user', content: this.buildJudgePrompt(question, answer, reference) }
        ];

        return this.call('judge', 'OpenAI answer judging', async () => {
            const content = await this.complete(this.settings.judgeModel, messages, true, 0);
            const parsed = judgeSchema.parse(JSON.parse(content));

            const scores: MetricScores = {
                relevancy: parsed.relevancy,
                faithfulness: parsed.faithfulness,
                completeness: parsed.completeness,
                clarity: parsed.clarity,
                correctness: parsed.correctness
            };

            if (reference !== undefined) {
                if (parsed.oracle_agreement === undefined) {
                    throw new Error('Judge response is missing oracle_agreement');
                }
                scores.oracle_agreement = parsed.oracle_agreement;
            }

            return scores;
        });
    }

    async fineTune(datasetJsonl: string, baseModel: string): Promise<string> {
        return this.call('fine_tune', 'OpenAI fine-tune submission', async () => {
            const file = await toFile(Buffer.from(datasetJsonl, 'utf-8'), 'training.jsonl');
            const uploaded = await this.client.files.create({ file, purpose: 'fine-tune' });
            const job = await this.client.fineTuning.jobs.create({
                training_file: uploaded.id,
                model: baseModel
            });

            this.logger.info({
                trainingFile: uploaded.id,
                tuningJobId: job.id,
                baseModel
            }, 'OpenAI fine-tune job created');

            return job.id;
        });
    }

    async poll(handle: string): Promise<TuningPollResult> {
        return this.call('poll', 'OpenAI fine-tune status', async () => {
            const job = await this.client.fineTuning.jobs.retrieve(handle);

            switch (job.status) {
                case 'validating_files':
                case 'queued':
                    return { status: 'queued' };
                case 'running':
                    return { status: 'running' };
                case 'succeeded':
                    if (!job.fine_tuned_model) {
                        return { status: 'failed', error: 'Fine-tune succeeded without a model id' };
                    }
                    return { status: 'succeeded', modelId: job.fine_tuned_model };
                case 'failed':
                case 'cancelled':
                    return { status: 'failed', error: job.error?.message ?? `Fine-tune ${job.status}` };
                default:
                    throw new Error(`Unknown fine-tune status '${job.status}'`);
            }
        });
    }

    private async complete(
        model: string,
        messages: ChatMessage[],
        json: boolean = false,
        temperature: number = this.settings.temperature
    ): Promise<string> {
        const response = await this.client.chat.completions.create({
            model,
            messages,
            temperature,
            max_tokens: this.settings.maxTokens,
            response_format: json ? { type: 'json_object' } : undefined
        });

        const content = response.choices[0]?.message?.content;
        if (!content) {
            throw new Error('No content returned from OpenAI');
        }

        this.logger.debug({
            model,
            tokensUsed: response.usage?.total_tokens ?? 0,
            contentLength: content.length
        }, 'OpenAI completion generated');

        return content;
    }

    private buildJudgePrompt(question: string, answer: string, reference?: string): string {
        const metrics: MetricName[] = ['relevancy', 'faithfulness', 'completeness', 'clarity', 'correctness'];
        if (reference !== undefined) {
            metrics.push('oracle_agreement');
        }

        const lines = [
            `Rate the answer to the question on a 1-10 scale for each of: ${metrics.join(', ')}.`,
            reference !== undefined
                ? 'oracle_agreement measures how closely the answer agrees with the reference answer.'
                : 'There is no reference answer; judge correctness on general knowledge.',
            '',
            `Question: ${question}`,
            `Answer: ${answer}`
        ];
        if (reference !== undefined) {
            lines.push(`Reference answer: ${reference}`);
        }
        lines.push('', `Return a JSON object with exactly these integer keys: ${metrics.join(', ')}.`);

        return lines.join('\n');
    }

    private async call<T>(capability: CapabilityName, operationName: string, operation: () => Promise<T>): Promise<T> {
        try {
            return await this.retryUtil.executeWithRetry(operation, {
                ...this.settings.retry,
                operationName
            });
        } catch (error: unknown) {
            if (error instanceof PipelineError) {
                throw error;
            }
            this.logger.error({ capability, error: errorMessage(error) }, `${operationName} failed`);
            throw new CapabilityError(`${operationName} failed: ${errorMessage(error)}`, capability);
        }
    }
}

// Singleton instance
let openaiService: OpenAIService | null = null;

export function getOpenAIService(): OpenAIService {
    if (!openaiService) {
        openaiService = OpenAIService.create();
    }
    return openaiService;
}
