import type { ILogger } from '../config/logger';
import type { TaskRequest } from '../queue/task-queue';
import type { EvaluationService } from '../services/evaluation.service';
import type { FineTuneService } from '../services/fine-tune.service';
import type { IngestionService } from '../services/ingestion.service';
import { errorMessage } from '../utils/errors';

export interface PipelineWorkerServices {
    ingestion: IngestionService;
    fineTune: FineTuneService;
    evaluation: EvaluationService;
}

/**
 * Pipeline Worker
 *
 * Executes background tasks pulled from the task queue. The return value is
 * stored as the task result; a thrown error marks the task failed.
 */
export class PipelineWorker {
    constructor(
        private services: PipelineWorkerServices,
        private logger: ILogger
    ) { }

    async process(request: TaskRequest): Promise<unknown> {
        const { jobId } = request.payload;

        this.logger.info({ jobId, taskName: request.name }, 'Starting pipeline task');

        try {
            switch (request.name) {
                case 'ingest': {
                    const job = await this.services.ingestion.run(jobId, request.payload.files);
                    return {
                        jobId,
                        status: job.status,
                        documentCount: job.document_count,
                        errorDetails: job.error_details
                    };
                }
                case 'finetune-submit':
                    return await this.services.fineTune.submit(jobId);
                case 'finetune-poll':
                    return await this.services.fineTune.pollUntilSettled(jobId);
                case 'evaluate':
                    return await this.services.evaluation.evaluate(jobId, {
                        mode: request.payload.mode,
                        questions: request.payload.questions
                    });
            }
        } catch (error: unknown) {
            this.logger.error({
                jobId,
                taskName: request.name,
                error: errorMessage(error)
            }, 'Pipeline task failed');
            throw error;
        }
    }
}
