import { InlineTaskQueue } from '../../src/queue/task-queue';
import { JobPipelineService, PipelineSettings } from '../../src/services/job-pipeline.service';
import { TextExtractorService } from '../../src/services/text-extractor.service';
import { VectorIndexService } from '../../src/services/vector-index.service';
import type { UploadedDocument } from '../../src/types/job';
import { PipelineWorker } from '../../src/workers/pipeline-worker';
import { InMemoryBlobStore } from './in-memory-blob-store';
import { InMemoryQdrantClient } from './in-memory-qdrant';
import { InMemoryRecordStore } from './in-memory-record-store';
import { createMockLogger, createPassthroughRetry, FakeModelCapability } from './mocks';

export const TEST_SETTINGS: PipelineSettings = {
    chunkMaxChars: 40,
    retrievalTopK: 2,
    defaultChatModel: 'chat-model',
    defaultFineTuneModel: 'base-model',
    raftDistractors: 1,
    fineTuneMaxChunks: 10,
    fineTunePollIntervalMs: 0
};

/**
 * Full pipeline over in-process stand-ins. Unless `startWorker` is false, a
 * worker consumes the inline task queue.
 */
export function createTestPipeline(settings: Partial<PipelineSettings> = {}, startWorker: boolean = true) {
    const store = new InMemoryRecordStore();
    const blobStore = new InMemoryBlobStore();
    const model = new FakeModelCapability();
    const qdrant = new InMemoryQdrantClient();
    const logger = createMockLogger();
    const taskQueue = new InlineTaskQueue(logger);
    const vectorIndex = new VectorIndexService(qdrant, createPassthroughRetry(), logger, 'test_chunks', 4);

    const pipeline = new JobPipelineService({
        store,
        blobStore,
        model,
        vectorIndex,
        taskQueue,
        textExtractor: new TextExtractorService(async bytes => `pdf text ${bytes.toString('utf-8')}`),
        logger,
        settings: { ...TEST_SETTINGS, ...settings }
    });

    const worker = new PipelineWorker(pipeline, logger);
    if (startWorker) {
        taskQueue.start(request => worker.process(request));
    }

    return { pipeline, worker, store, blobStore, model, qdrant, logger, taskQueue, vectorIndex };
}

export function textDocument(filename: string, text: string): UploadedDocument {
    return { filename, content: Buffer.from(text, 'utf-8'), contentType: 'text/plain' };
}
