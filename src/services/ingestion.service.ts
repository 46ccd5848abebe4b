import type { ILogger } from '../config/logger';
import type { IRecordStore } from '../db/record-store';
import type { ITaskQueue } from '../queue/task-queue';
import type { IBlobStore, IModelCapability } from '../types/capabilities';
import type { ChunkRecord, JobRecord, UploadedDocument } from '../types/job';
import { chunkText } from '../utils/chunking';
import { errorMessage, IllegalTransitionError, ValidationError } from '../utils/errors';
import { IAuditLog, JOB_EVENTS } from './audit-log.service';
import { JobStateMachine } from './job-state-machine.service';
import type { ITextExtractor } from './text-extractor.service';
import type { IVectorIndex } from './vector-index.service';

export interface IngestFile {
    filename: string;
    contentType?: string;
}

/**
 * Document Ingestion Service
 *
 * Upload side: validate, create the job, store blobs, queue an `ingest` task.
 * Task side: decode, chunk, embed, index, then complete or fail the job.
 */
export class IngestionService {
    constructor(
        private stateMachine: JobStateMachine,
        private store: IRecordStore,
        private blobStore: IBlobStore,
        private textExtractor: ITextExtractor,
        private model: IModelCapability,
        private vectorIndex: IVectorIndex,
        private taskQueue: ITaskQueue,
        private auditLog: IAuditLog,
        private logger: ILogger,
        private chunkMaxChars: number = 2000
    ) { }

    async createJob(jobName: string, documents: UploadedDocument[]): Promise<JobRecord> {
        const name = jobName.trim();
        if (name.length === 0) {
            throw new ValidationError('job_name must not be empty');
        }
        if (documents.length === 0) {
            throw new ValidationError('At least one document is required');
        }

        const seen = new Set<string>();
        for (const document of documents) {
            if (document.filename.trim().length === 0) {
                throw new ValidationError('Every document needs a filename');
            }
            if (seen.has(document.filename)) {
                throw new ValidationError(`Duplicate filename: ${document.filename}`);
            }
            seen.add(document.filename);
        }

        const job = await this.stateMachine.createJob(name, documents.length);

        try {
            for (const document of documents) {
                await this.blobStore.put(job.id, document.filename, document.content);
                await this.auditLog.record(
                    job.id,
                    JOB_EVENTS.UPLOAD_RECEIVED,
                    `Received ${document.filename} (${document.content.length} bytes)`
                );
            }

            const files: IngestFile[] = documents.map(document => ({
                filename: document.filename,
                contentType: document.contentType
            }));
            const task = await this.taskQueue.submit({ name: 'ingest', payload: { jobId: job.id, files } });

            this.logger.info({
                jobId: job.id,
                fileCount: documents.length,
                taskId: task.id
            }, 'Ingestion task submitted');
        } catch (error: unknown) {
            await this.stateMachine.failIngestion(job.id, `Upload could not be stored: ${errorMessage(error)}`);
            throw error;
        }

        return job;
    }

    /**
     * Never leaves the job in `processing`: every path ends in completed or failed.
     */
    async run(jobId: number, files: IngestFile[]): Promise<JobRecord> {
        const job = await this.stateMachine.getJob(jobId);
        if (job.status !== 'processing') {
            this.logger.warn({ jobId, status: job.status }, 'Ingestion skipped, job already settled');
            return job;
        }

        await this.auditLog.record(jobId, JOB_EVENTS.INGESTION_STARTED, `Ingesting ${files.length} file(s)`);

        try {
            const { chunks, chunkCount } = await this.embedFiles(jobId, files);

            if (chunks.length === 0) {
                const reason = chunkCount === 0
                    ? 'No extractable text in any uploaded document'
                    : `All ${chunkCount} chunk(s) failed to embed`;
                return await this.stateMachine.failIngestion(jobId, reason);
            }

            await this.store.saveChunks(jobId, chunks);
            await this.vectorIndex.index(jobId, chunks.map(chunk => ({
                sequence: chunk.sequence,
                filename: chunk.filename,
                content: chunk.content,
                embedding: chunk.embedding ?? []
            })));

            const documentCount = new Set(chunks.map(chunk => chunk.filename)).size;

            this.logger.info({
                jobId,
                chunkCount,
                embeddedChunks: chunks.length,
                documentCount
            }, 'Ingestion finished');

            return await this.stateMachine.completeIngestion(jobId, documentCount);
        } catch (error: unknown) {
            if (error instanceof IllegalTransitionError) {
                throw error;
            }

            this.logger.error({ jobId, error: errorMessage(error) }, 'Ingestion failed');
            return this.stateMachine.failIngestion(jobId, errorMessage(error));
        }
    }

    private async embedFiles(jobId: number, files: IngestFile[]): Promise<{ chunks: ChunkRecord[]; chunkCount: number }> {
        const chunks: ChunkRecord[] = [];
        let sequence = 0;

        for (const file of files) {
            let pieces: string[];
            try {
                const bytes = await this.blobStore.get(jobId, file.filename);
                const text = await this.textExtractor.extract(file.filename, bytes, file.contentType);
                pieces = chunkText(text, this.chunkMaxChars);
            } catch (error: unknown) {
                await this.auditLog.record(jobId, JOB_EVENTS.FILE_PROCESSING_FAILED, `${file.filename}: ${errorMessage(error)}`);
                continue;
            }

            if (pieces.length === 0) {
                await this.auditLog.record(jobId, JOB_EVENTS.FILE_PROCESSING_FAILED, `${file.filename}: no extractable text`);
                continue;
            }

            for (const content of pieces) {
                const current = sequence++;
                try {
                    const embedding = await this.model.embed(content);
                    chunks.push({ job_id: jobId, sequence: current, filename: file.filename, content, embedding });
                } catch (error: unknown) {
                    await this.auditLog.record(
                        jobId,
                        JOB_EVENTS.CHUNK_EMBEDDING_FAILED,
                        `${file.filename} chunk ${current}: ${errorMessage(error)}`
                    );
                }
            }
        }

        return { chunks, chunkCount: sequence };
    }
}
