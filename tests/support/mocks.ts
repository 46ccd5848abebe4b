import { vi } from 'vitest';
import type { ILogger } from '../../src/config/logger';
import type { IModelCapability, TuningPollResult } from '../../src/types/capabilities';
import type { MetricScores } from '../../src/types/evaluation';
import type { IRetryUtil } from '../../src/utils/retry.util';

export function createMockLogger() {
    return {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    } satisfies ILogger;
}

// Runs the operation once, no backoff
export function createPassthroughRetry(): IRetryUtil {
    return {
        async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
            return operation();
        }
    };
}

/**
 * 26-dimensional letter histogram; texts sharing letters land close together
 * under cosine similarity.
 */
export function letterEmbedding(text: string): number[] {
    const vector = new Array<number>(26).fill(0);
    for (const char of text.toLowerCase()) {
        const index = char.charCodeAt(0) - 97;
        if (index >= 0 && index < 26) {
            vector[index] += 1;
        }
    }
    return vector;
}

export const JUDGE_SCORES: MetricScores = {
    relevancy: 8,
    faithfulness: 7,
    completeness: 6,
    clarity: 9,
    correctness: 8
};

export class FakeModelCapability implements IModelCapability {
    embed = vi.fn(async (text: string): Promise<number[]> => letterEmbedding(text));
    generate = vi.fn(async (_prompt: string, model: string): Promise<string> => `answer from ${model}`);
    judge = vi.fn(async (_question: string, _answer: string, reference?: string): Promise<MetricScores> =>
        reference === undefined ? { ...JUDGE_SCORES } : { ...JUDGE_SCORES, oracle_agreement: 5 }
    );
    fineTune = vi.fn(async (_datasetJsonl: string, _baseModel: string): Promise<string> => 'ftjob-test');
    poll = vi.fn(async (_handle: string): Promise<TuningPollResult> => ({ status: 'running' }));
}
