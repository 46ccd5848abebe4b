import "reflect-metadata";
import { AppDataSource } from "./db/data-source";
import { TypeOrmRecordStore } from "./db/record-store";
import { env } from "./config/env";
import { logger } from "./config/logger";
import { createApp } from "./app";
import { BullTaskQueue } from "./queue/queue-config";
import { InlineTaskQueue, ITaskQueue } from "./queue/task-queue";
import { LocalBlobStore } from "./services/blob-store.service";
import { JobPipelineService } from "./services/job-pipeline.service";
import { getOpenAIService } from "./services/openai.service";
import { getVectorIndexService } from "./services/vector-index.service";
import { PipelineWorker } from "./workers/pipeline-worker";
import { errorMessage } from "./utils/errors";

function createTaskQueue(): ITaskQueue {
    return env.TASK_BACKEND === 'inline' ? new InlineTaskQueue(logger) : BullTaskQueue.create();
}

// Initialize database and start server
async function startServer() {
    await AppDataSource.initialize();
    await AppDataSource.runMigrations();
    logger.info({}, "Database connection established");

    const taskQueue = createTaskQueue();
    const pipeline = new JobPipelineService({
        store: new TypeOrmRecordStore(AppDataSource),
        blobStore: LocalBlobStore.create(),
        model: getOpenAIService(),
        vectorIndex: getVectorIndexService(),
        taskQueue,
        logger
    });

    const worker = new PipelineWorker(pipeline, logger);
    taskQueue.start(request => worker.process(request));
    logger.info({ backend: env.TASK_BACKEND, concurrency: env.TASK_CONCURRENCY }, "Task worker started");

    const server = createApp(pipeline).listen(env.PORT, () => {
        logger.info({ port: env.PORT }, `Server running at http://localhost:${env.PORT}`);
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close();
        taskQueue.close()
            .then(() => AppDataSource.destroy())
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error({ error: errorMessage(error) }, "Shutdown failed");
                process.exit(1);
            });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, "Failed to start server");
    process.exit(1);
});
