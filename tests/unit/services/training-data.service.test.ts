import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    arrangeDocuments,
    fallbackPair,
    RAFT_SYSTEM_PROMPT,
    stripCodeFences,
    toJsonl,
    TRAINING_SYSTEM_PROMPT,
    TrainingDataService
} from '../../../src/services/training-data.service';
import type { IVectorIndex, SearchHit } from '../../../src/services/vector-index.service';
import type { ChunkRecord } from '../../../src/types/job';
import { createMockLogger, FakeModelCapability } from '../../support/mocks';

function chunk(sequence: number, content: string): ChunkRecord {
    return { job_id: 3, sequence, filename: 'handbook.txt', content, embedding: [1, 0] };
}

function hit(sequence: number, content: string, score: number): SearchHit {
    return { sequence, filename: 'handbook.txt', content, score };
}

function createVectorIndexStub() {
    return {
        index: vi.fn<IVectorIndex['index']>(),
        search: vi.fn<IVectorIndex['search']>(),
        drop: vi.fn<IVectorIndex['drop']>()
    } satisfies IVectorIndex;
}

const SYNTHESIZED = '```json\n{"examples":[{"question":"How long do refunds take?","answer":"Five business days."}]}\n```';

describe('Training Data Service - Dependency Injection Tests', () => {
    let model: FakeModelCapability;
    let vectorIndex: ReturnType<typeof createVectorIndexStub>;
    let mockLogger: ReturnType<typeof createMockLogger>;
    let service: TrainingDataService;

    beforeEach(() => {
        model = new FakeModelCapability();
        vectorIndex = createVectorIndexStub();
        mockLogger = createMockLogger();
        service = new TrainingDataService(model, vectorIndex, mockLogger, {
            generationModel: 'gen-model',
            maxChunks: 2,
            distractors: 1
        });
    });

    describe('helpers', () => {
        it('should strip a fenced code block', () => {
            expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
            expect(stripCodeFences('  {"a":1} ')).toBe('{"a":1}');
        });

        it('should fall back to a question about the file', () => {
            const pair = fallbackPair({ filename: 'long.txt', content: 'x'.repeat(600) });

            expect(pair.question).toBe('What does the document long.txt say?');
            expect(pair.answer).toHaveLength(500);
        });

        it('should place the gold document by sequence', () => {
            expect(arrangeDocuments('G', 0, ['d1', 'd2'])).toEqual(['G', 'd1', 'd2']);
            expect(arrangeDocuments('G', 4, ['d1', 'd2'])).toEqual(['d1', 'G', 'd2']);
            expect(arrangeDocuments('G', 5, ['d1', 'd2'])).toEqual(['d1', 'd2', 'G']);
            expect(arrangeDocuments('G', 7, [])).toEqual(['G']);
        });

        it('should write one JSON record per line', () => {
            const jsonl = toJsonl([
                { messages: [{ role: 'system', content: 's' }, { role: 'user', content: 'u' }, { role: 'assistant', content: 'a' }] },
                { messages: [{ role: 'system', content: 's' }, { role: 'user', content: 'u2' }, { role: 'assistant', content: 'a2' }] }
            ]);

            expect(jsonl.split('\n')).toHaveLength(2);
            expect(JSON.parse(jsonl.split('\n')[1])).toEqual({
                messages: [{ role: 'system', content: 's' }, { role: 'user', content: 'u2' }, { role: 'assistant', content: 'a2' }]
            });
        });
    });

    describe('build', () => {
        it('should produce plain chat examples from synthesized pairs', async () => {
            model.generate.mockResolvedValue(SYNTHESIZED);

            const examples = await service.build(3, 'plain', [chunk(0, 'Refunds take five business days.')]);

            expect(examples).toEqual([{
                messages: [
                    { role: 'system', content: TRAINING_SYSTEM_PROMPT },
                    { role: 'user', content: 'How long do refunds take?' },
                    { role: 'assistant', content: 'Five business days.' }
                ]
            }]);
            expect(model.generate).toHaveBeenCalledWith(expect.stringContaining('Refunds take five business days.'), 'gen-model');
        });

        it('should use at most maxChunks chunks in sequence order', async () => {
            const examples = await service.build(3, 'plain', [chunk(7, 'seventh'), chunk(2, 'second'), chunk(5, 'fifth')]);

            expect(examples.map(example => example.messages[2].content)).toEqual(['second', 'fifth']);
        });

        it('should fall back when the synthesized reply is not valid JSON', async () => {
            model.generate.mockResolvedValue('Sure! Here are some questions.');

            const examples = await service.build(3, 'plain', [chunk(0, 'Vacation needs approval.')]);

            expect(examples[0].messages[1].content).toBe('What does the document handbook.txt say?');
            expect(examples[0].messages[2].content).toBe('Vacation needs approval.');
            expect(mockLogger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ jobId: 3, sequence: 0 }),
                'Question synthesis failed, using fallback pair'
            );
        });

        it('should mix distractors into raft examples', async () => {
            model.generate.mockResolvedValue(SYNTHESIZED);
            vectorIndex.search.mockResolvedValue([
                hit(1, 'Refunds take five business days.', 1),
                hit(0, 'Vacation needs approval.', 0.4)
            ]);

            const examples = await service.build(3, 'raft', [chunk(1, 'Refunds take five business days.')]);

            expect(vectorIndex.search).toHaveBeenCalledWith(3, [1, 0], 2);
            expect(examples).toEqual([{
                messages: [
                    { role: 'system', content: RAFT_SYSTEM_PROMPT },
                    {
                        role: 'user',
                        content: 'Documents:\n[1] Vacation needs approval.\n[2] Refunds take five business days.\n\nQuestion: How long do refunds take?'
                    },
                    { role: 'assistant', content: 'Five business days.' }
                ]
            }]);
        });

        it('should reject a job without chunks', async () => {
            await expect(service.build(3, 'plain', [])).rejects.toThrow(
                'Job 3 has no chunks to build a training dataset from'
            );
        });
    });
});
