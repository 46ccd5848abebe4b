import type { ChatMode } from './job';

/**
 * Evaluation payloads returned by the evaluation engine. Nothing here is
 * persisted; every run is computed from scratch.
 */

export const METRIC_NAMES = [
    'relevancy',
    'faithfulness',
    'completeness',
    'clarity',
    'correctness',
    'oracle_agreement'
] as const;

export type MetricName = typeof METRIC_NAMES[number];

// Judge output; oracle_agreement is only present when the question has a reference.
export type MetricScores = Partial<Record<MetricName, number>>;

export interface EvaluationQuestion {
    question: string;
    reference?: string;
}

export interface QuestionEvaluation {
    question: string;
    reference: string | null;
    answer: string;
    scores: MetricScores;
}

export type MetricAggregate = number | 'unavailable';

export interface EvaluationResult {
    jobId: number;
    mode: ChatMode;
    questions: QuestionEvaluation[];
    aggregate: Record<MetricName, MetricAggregate>;
    reportedBy: Record<MetricName, number>;
}
