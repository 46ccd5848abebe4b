import { z } from 'zod';
import type { ILogger } from '../config/logger';
import type { IModelCapability } from '../types/capabilities';
import type { ChunkRecord, FineTuneMode } from '../types/job';
import { errorMessage, ValidationError } from '../utils/errors';
import type { IVectorIndex } from './vector-index.service';

export const TRAINING_SYSTEM_PROMPT = 'You are a factual assistant that provides accurate answers.';
export const RAFT_SYSTEM_PROMPT =
    'You are a factual assistant. Answer the question using only the relevant document below; some documents are distractors.';

const FALLBACK_ANSWER_CHARS = 500;

export interface TrainingMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface TrainingExample {
    messages: [TrainingMessage, TrainingMessage, TrainingMessage];
}

export interface QuestionAnswerPair {
    question: string;
    answer: string;
}

export interface TrainingDataSettings {
    generationModel: string;
    maxChunks: number;
    distractors: number;
}

const synthesisSchema = z.object({
    examples: z.array(z.object({
        question: z.string().trim().min(1),
        answer: z.string().trim().min(1)
    })).min(1)
});

export function stripCodeFences(text: string): string {
    const trimmed = text.trim();
    if (!trimmed.startsWith('```')) {
        return trimmed;
    }
    const lines = trimmed.split('\n').slice(1);
    if (lines.length > 0 && lines[lines.length - 1].trim() === '```') {
        lines.pop();
    }
    return lines.join('\n');
}

export function fallbackPair(chunk: Pick<ChunkRecord, 'filename' | 'content'>): QuestionAnswerPair {
    return {
        question: `What does the document ${chunk.filename} say?`,
        answer: chunk.content.slice(0, FALLBACK_ANSWER_CHARS)
    };
}

/**
 * Places the gold document among the distractors at index
 * `sequence mod (distractors + 1)`.
 */
export function arrangeDocuments(gold: string, goldSequence: number, distractors: string[]): string[] {
    const position = goldSequence % (distractors.length + 1);
    const documents = [...distractors];
    documents.splice(position, 0, gold);
    return documents;
}

export function toJsonl(examples: TrainingExample[]): string {
    return examples.map(example => JSON.stringify(example)).join('\n');
}

/**
 * Training Data Service
 *
 * Builds chat-format fine-tuning datasets from a job's chunks, either plain
 * question/answer pairs or RAFT records with distractor documents.
 */
export class TrainingDataService {
    constructor(
        private model: IModelCapability,
        private vectorIndex: IVectorIndex,
        private logger: ILogger,
        private settings: TrainingDataSettings
    ) { }

    async build(jobId: number, mode: FineTuneMode, chunks: ChunkRecord[]): Promise<TrainingExample[]> {
        const selected = [...chunks]
            .sort((a, b) => a.sequence - b.sequence)
            .slice(0, this.settings.maxChunks);

        const examples: TrainingExample[] = [];

        for (const chunk of selected) {
            const pairs = await this.synthesize(jobId, chunk);

            if (mode === 'plain') {
                for (const pair of pairs) {
                    examples.push({
                        messages: [
                            { role: 'system', content: TRAINING_SYSTEM_PROMPT },
                            { role: 'user', content: pair.question },
                            { role: 'assistant', content: pair.answer }
                        ]
                    });
                }
                continue;
            }

            const distractors = await this.findDistractors(jobId, chunk);
            const documents = arrangeDocuments(chunk.content, chunk.sequence, distractors);
            const context = documents.map((document, index) => `[${index + 1}] ${document}`).join('\n');

            for (const pair of pairs) {
                examples.push({
                    messages: [
                        { role: 'system', content: RAFT_SYSTEM_PROMPT },
                        { role: 'user', content: `Documents:\n${context}\n\nQuestion: ${pair.question}` },
                        { role: 'assistant', content: pair.answer }
                    ]
                });
            }
        }

        if (examples.length === 0) {
            throw new ValidationError(`Job ${jobId} has no chunks to build a training dataset from`);
        }

        this.logger.info({
            jobId,
            mode,
            chunkCount: selected.length,
            exampleCount: examples.length
        }, 'Training dataset built');

        return examples;
    }

    async synthesize(jobId: number, chunk: ChunkRecord): Promise<QuestionAnswerPair[]> {
        const prompt = [
            'Generate question and answer pairs for fine-tuning a factual assistant on the text below.',
            'Each question must be answerable from the text alone and each answer must be concise and factual.',
            'Reply with a JSON object of the form {"examples":[{"question":"...","answer":"..."}]} and nothing else.',
            '',
            'Text:',
            chunk.content
        ].join('\n');

        try {
            const raw = await this.model.generate(prompt, this.settings.generationModel);
            return synthesisSchema.parse(JSON.parse(stripCodeFences(raw))).examples;
        } catch (error: unknown) {
            this.logger.warn({
                jobId,
                sequence: chunk.sequence,
                error: errorMessage(error)
            }, 'Question synthesis failed, using fallback pair');
            return [fallbackPair(chunk)];
        }
    }

    private async findDistractors(jobId: number, chunk: ChunkRecord): Promise<string[]> {
        if (this.settings.distractors === 0 || !chunk.embedding || chunk.embedding.length === 0) {
            return [];
        }

        const hits = await this.vectorIndex.search(jobId, chunk.embedding, this.settings.distractors + 1);
        return hits
            .filter(hit => hit.sequence !== chunk.sequence)
            .slice(0, this.settings.distractors)
            .map(hit => hit.content);
    }
}
