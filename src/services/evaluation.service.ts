import { z } from 'zod';
import type { ILogger } from '../config/logger';
import defaultQuestionData from '../data/evaluation-questions.json';
import type { ITaskQueue, TaskHandle } from '../queue/task-queue';
import type { IModelCapability } from '../types/capabilities';
import {
    EvaluationQuestion,
    EvaluationResult,
    METRIC_NAMES,
    MetricAggregate,
    MetricName,
    MetricScores,
    QuestionEvaluation
} from '../types/evaluation';
import type { ChatMode, JobRecord } from '../types/job';
import { CapabilityError, CapabilityName, errorMessage, PipelineError, ValidationError } from '../utils/errors';
import { GenerationRouter, isChatMode } from './generation-router.service';

export interface EvaluateOptions {
    mode?: string;
    questions?: EvaluationQuestion[];
}

const questionSchema = z.object({
    question: z.string().trim().min(1),
    reference: z.string().optional()
});

export const DEFAULT_QUESTIONS: EvaluationQuestion[] = z.array(questionSchema).min(1).parse(defaultQuestionData);

function perMetric<T>(compute: (metric: MetricName) => T): Record<MetricName, T> {
    return {
        relevancy: compute('relevancy'),
        faithfulness: compute('faithfulness'),
        completeness: compute('completeness'),
        clarity: compute('clarity'),
        correctness: compute('correctness'),
        oracle_agreement: compute('oracle_agreement')
    };
}

/**
 * Mean per metric over the questions that reported it.
 */
export function aggregateScores(questions: QuestionEvaluation[]): Pick<EvaluationResult, 'aggregate' | 'reportedBy'> {
    const reported = perMetric(metric => questions
        .map(question => question.scores[metric])
        .filter((value): value is number => value !== undefined));

    return {
        aggregate: perMetric((metric): MetricAggregate => {
            const values = reported[metric];
            return values.length === 0
                ? 'unavailable'
                : values.reduce((sum, value) => sum + value, 0) / values.length;
        }),
        reportedBy: perMetric(metric => reported[metric].length)
    };
}

/**
 * Evaluation Engine
 *
 * Answers each question through the generation router in the requested mode,
 * has the judge score it and averages the scores per metric. Results are
 * returned, never stored.
 */
export class EvaluationService {
    constructor(
        private router: GenerationRouter,
        private jobs: { getJob(jobId: number): Promise<JobRecord> },
        private model: IModelCapability,
        private taskQueue: ITaskQueue,
        private logger: ILogger,
        private defaultQuestions: EvaluationQuestion[] = DEFAULT_QUESTIONS
    ) { }

    async evaluate(jobId: number, options: EvaluateOptions = {}): Promise<EvaluationResult> {
        const { mode, questions } = await this.prepare(jobId, options);

        const evaluated: QuestionEvaluation[] = [];
        for (const item of questions) {
            const answer = await this.capability('generate', async () =>
                (await this.router.generate(jobId, item.question, mode)).answer
            );
            const judged = await this.capability('judge', () =>
                this.model.judge(item.question, answer, item.reference)
            );

            evaluated.push({
                question: item.question,
                reference: item.reference ?? null,
                answer,
                scores: EvaluationService.reportedScores(judged, item.reference !== undefined)
            });
        }

        const result: EvaluationResult = {
            jobId,
            mode,
            questions: evaluated,
            ...aggregateScores(evaluated)
        };

        this.logger.info({
            jobId,
            mode,
            questionCount: evaluated.length,
            aggregate: result.aggregate
        }, 'Evaluation completed');

        return result;
    }

    /**
     * Runs the same checks as `evaluate`, then hands the run to the task queue.
     */
    async startEvaluation(jobId: number, options: EvaluateOptions = {}): Promise<TaskHandle> {
        const { mode } = await this.prepare(jobId, options);

        const task = await this.taskQueue.submit({
            name: 'evaluate',
            payload: { jobId, mode, questions: options.questions }
        });

        this.logger.info({ jobId, mode, taskId: task.id }, 'Evaluation task submitted');
        return task;
    }

    private async prepare(jobId: number, options: EvaluateOptions): Promise<{ mode: ChatMode; questions: EvaluationQuestion[] }> {
        const mode = options.mode ?? 'rag';
        if (!isChatMode(mode)) {
            throw new ValidationError(`Unknown evaluation mode '${mode}'`);
        }

        let questions = this.defaultQuestions;
        if (options.questions !== undefined) {
            const parsed = z.array(questionSchema).min(1).safeParse(options.questions);
            if (!parsed.success) {
                throw new ValidationError('questions must be a non-empty list of {question, reference?} with non-empty questions');
            }
            questions = parsed.data;
        }

        const job = await this.jobs.getJob(jobId);
        GenerationRouter.assertModeAvailable(job, mode);

        return { mode, questions };
    }

    private async capability<T>(capability: CapabilityName, operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (error: unknown) {
            if (error instanceof PipelineError) {
                throw error;
            }
            throw new CapabilityError(`Evaluation ${capability} step failed: ${errorMessage(error)}`, capability);
        }
    }

    private static reportedScores(scores: MetricScores, hasReference: boolean): MetricScores {
        const reported: MetricScores = {};
        for (const metric of METRIC_NAMES) {
            const value = scores[metric];
            if (value === undefined || (metric === 'oracle_agreement' && !hasReference)) {
                continue;
            }
            reported[metric] = value;
        }
        return reported;
    }
}
