import type { MetricScores } from './evaluation';

export type TuningStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export interface TuningPollResult {
    status: TuningStatus;
    modelId?: string;
    error?: string;
}

/**
 * Model capability consumed by the pipeline: embeddings, generation, judging
 * and fine-tuning. Implementations retry transient failures themselves and
 * throw CapabilityError once they give up.
 */
export interface IModelCapability {
    embed(text: string): Promise<number[]>;
    generate(prompt: string, model: string): Promise<string>;
    judge(question: string, answer: string, reference?: string): Promise<MetricScores>;
    fineTune(datasetJsonl: string, baseModel: string): Promise<string>;
    poll(handle: string): Promise<TuningPollResult>;
}

export interface IBlobStore {
    put(jobId: number, filename: string, bytes: Buffer): Promise<void>;
    get(jobId: number, filename: string): Promise<Buffer>;
}
