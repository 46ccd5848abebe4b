import { describe, it, expect, beforeEach, vi } from 'vitest';
import { buildContextPrompt, isChatMode } from '../../../src/services/generation-router.service';
import type { SearchHit } from '../../../src/services/vector-index.service';
import { createTestPipeline, textDocument } from '../../support/test-pipeline';

const HITS: SearchHit[] = [
    { sequence: 1, filename: 'refunds.txt', content: 'Refunds take five days.', score: 0.9 },
    { sequence: 4, filename: 'vacation.txt', content: 'Vacation needs approval.', score: 0.7 }
];

describe('Generation Router - Pipeline Tests', () => {
    let harness: ReturnType<typeof createTestPipeline>;
    let jobId: number;

    beforeEach(async () => {
        harness = createTestPipeline();
        const created = await harness.pipeline.createJob('Handbook', [
            textDocument('refunds.txt', 'Refunds take five days.'),
            textDocument('vacation.txt', 'Vacation needs approval.')
        ]);
        jobId = created.data?.id ?? 0;
        await harness.taskQueue.drain();
    });

    async function markFineTuned(modelId: string) {
        await harness.store.compareAndSetJob(jobId, {}, {
            fine_tune_status: 'succeeded',
            fine_tune_mode: 'plain',
            fine_tuned_model_id: modelId
        });
    }

    it('should recognise the chat modes', () => {
        expect(isChatMode('rag')).toBe(true);
        expect(isChatMode('fine_tuned_only')).toBe(true);
        expect(isChatMode('RAG')).toBe(false);
    });

    it('should build the context prompt', () => {
        expect(buildContextPrompt(['a', 'b'], 'Q?')).toBe(
            'Based on the following context, answer the question:\n\nContext:\na\nb\n\nQuestion: Q?'
        );
    });

    describe('rag', () => {
        it('should answer from retrieved context on the default chat model', async () => {
            vi.spyOn(harness.vectorIndex, 'search').mockResolvedValue(HITS);

            const result = await harness.pipeline.chat(jobId, 'How long do refunds take?');

            expect(result.data).toEqual({
                answer: 'answer from chat-model',
                mode: 'rag',
                model: 'chat-model',
                sources: [
                    { sequence: 1, filename: 'refunds.txt', score: 0.9 },
                    { sequence: 4, filename: 'vacation.txt', score: 0.7 }
                ]
            });
            expect(harness.model.generate).toHaveBeenCalledWith(
                'Based on the following context, answer the question:\n\nContext:\nRefunds take five days.\nVacation needs approval.\n\nQuestion: How long do refunds take?',
                'chat-model'
            );
        });

        it('should retrieve the top k chunks for the message embedding', async () => {
            const searchSpy = vi.spyOn(harness.vectorIndex, 'search');

            const result = await harness.pipeline.chat(jobId, 'refunds');

            expect(harness.model.embed).toHaveBeenLastCalledWith('refunds');
            expect(searchSpy).toHaveBeenCalledWith(jobId, expect.any(Array), 2);
            expect(result.data?.sources).toHaveLength(2);
        });

        it('should report a job whose index is gone', async () => {
            await harness.vectorIndex.drop(jobId);

            const result = await harness.pipeline.chat(jobId, 'refunds');

            expect(result.error).toEqual({
                kind: 'NotIndexed',
                message: `No retrieval index has been built for job ${jobId}`
            });
        });
    });

    describe('fine-tuned modes', () => {
        it('should require a succeeded fine-tune', async () => {
            const result = await harness.pipeline.chat(jobId, 'refunds', 'raft');

            expect(result.error).toEqual({
                kind: 'IllegalTransition',
                message: `Job ${jobId} fine-tune is not_run; raft chat requires a succeeded fine-tune`,
                currentState: { status: 'completed', fineTuneStatus: 'not_run' }
            });
            expect(harness.model.generate).not.toHaveBeenCalled();
        });

        it('should send the raw message to the fine-tuned model in fine_tuned_only', async () => {
            await markFineTuned('ft:model-1');
            const searchSpy = vi.spyOn(harness.vectorIndex, 'search');

            const result = await harness.pipeline.chat(jobId, 'What is the refund policy?', 'fine_tuned_only');

            expect(result.data).toEqual({
                answer: 'answer from ft:model-1',
                mode: 'fine_tuned_only',
                model: 'ft:model-1',
                sources: []
            });
            expect(harness.model.generate).toHaveBeenCalledWith('What is the refund policy?', 'ft:model-1');
            expect(searchSpy).not.toHaveBeenCalled();
        });

        it('should combine retrieval with the fine-tuned model in raft', async () => {
            await markFineTuned('ft:model-1');
            vi.spyOn(harness.vectorIndex, 'search').mockResolvedValue(HITS);

            const result = await harness.pipeline.chat(jobId, 'Q?', 'raft');

            expect(result.data?.model).toBe('ft:model-1');
            expect(harness.model.generate).toHaveBeenCalledWith(buildContextPrompt([HITS[0].content, HITS[1].content], 'Q?'), 'ft:model-1');
        });
    });

    describe('rejections', () => {
        it('should refuse chat before ingestion completes', async () => {
            const created = await harness.pipeline.createJob('Later', [textDocument('a.txt', 'text')]);
            const pendingId = created.data?.id ?? 0;

            const result = await harness.pipeline.chat(pendingId, 'anything');

            expect(result.error).toMatchObject({
                kind: 'IllegalTransition',
                message: `Job ${pendingId} ingestion is processing; rag chat requires a completed job`
            });
            await harness.taskQueue.drain();
        });

        it('should reject an unknown mode', async () => {
            const result = await harness.pipeline.chat(jobId, 'hi', 'poetry');

            expect(result.error).toEqual({
                kind: 'ValidationError',
                message: "Unknown chat mode 'poetry', expected one of rag, raft, fine_tuned_only"
            });
        });

        it('should reject an empty message', async () => {
            const result = await harness.pipeline.chat(jobId, '  ');

            expect(result.error).toEqual({ kind: 'ValidationError', message: 'message must not be empty' });
        });

        it('should report a missing job', async () => {
            const result = await harness.pipeline.chat(999, 'hi');

            expect(result.error).toEqual({ kind: 'NotFound', message: 'Job 999 not found' });
        });

        it('should fold generation failures into a failed result', async () => {
            vi.spyOn(harness.vectorIndex, 'search').mockResolvedValue(HITS);
            harness.model.generate.mockRejectedValueOnce(new Error('upstream 503'));

            const result = await harness.pipeline.chat(jobId, 'refunds');

            expect(result.error).toEqual({ kind: 'Internal', message: 'upstream 503' });
        });
    });
});
