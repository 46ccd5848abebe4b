import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import { env } from '../config/env';
import { logger, ILogger } from '../config/logger';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';
import { CapabilityError, errorMessage, NotIndexedError, PipelineError, ValidationError } from '../utils/errors';

// Interfaces for better testability
export interface QdrantPoint {
    id: number;
    vector: number[];
    payload: Record<string, unknown>;
}

export interface QdrantScoredPoint {
    id: string | number;
    score: number;
    payload?: Record<string, unknown> | null;
}

export interface IQdrantClient {
    collectionExists(collectionName: string): Promise<{ exists: boolean }>;
    createCollection(collectionName: string, config: { vectors: { size: number; distance: 'Cosine' } }): Promise<unknown>;
    deleteCollection(collectionName: string): Promise<unknown>;
    upsert(collectionName: string, data: { wait: boolean; points: QdrantPoint[] }): Promise<unknown>;
    search(collectionName: string, params: { vector: number[]; limit: number; with_payload: boolean }): Promise<QdrantScoredPoint[]>;
}

export interface IndexableChunk {
    sequence: number;
    filename: string;
    content: string;
    embedding: number[];
}

export interface SearchHit {
    sequence: number;
    filename: string;
    content: string;
    score: number;
}

export interface IVectorIndex {
    index(jobId: number, chunks: IndexableChunk[]): Promise<void>;
    search(jobId: number, queryEmbedding: number[], k: number): Promise<SearchHit[]>;
    drop(jobId: number): Promise<void>;
}

const payloadSchema = z.object({
    sequence: z.number().int(),
    filename: z.string(),
    content: z.string()
});

const RETRY = { maxAttempts: 3, baseDelay: 1000, maxDelay: 5000 };

/**
 * Vector Index Service with Dependency Injection
 *
 * One Qdrant collection per job, named `<prefix>_<jobId>`. Point ids are chunk
 * sequence numbers. Indexing replaces the whole collection; an empty chunk set
 * leaves the job without a collection.
 */
export class VectorIndexService implements IVectorIndex {
    constructor(
        private client: IQdrantClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private collectionPrefix: string = 'job_chunks',
        private overfetch: number = 8
    ) { }

    /**
     * Factory method for production use
     */
    static create(): VectorIndexService {
        const client = new QdrantClient({
            url: env.VECTOR_DB_URL,
            timeout: 30000
        });

        return new VectorIndexService(
            client,
            RetryUtil,
            logger,
            env.VECTOR_COLLECTION_PREFIX,
            env.VECTOR_SEARCH_OVERFETCH
        );
    }

    collectionName(jobId: number): string {
        return `${this.collectionPrefix}_${jobId}`;
    }

    /**
     * Replace the job's index with exactly `chunks`.
     */
    async index(jobId: number, chunks: IndexableChunk[]): Promise<void> {
        const dimension = chunks[0]?.embedding.length ?? 0;
        for (const chunk of chunks) {
            if (chunk.embedding.length === 0 || chunk.embedding.length !== dimension) {
                throw new ValidationError(
                    `Embedding for chunk ${chunk.sequence} has dimension ${chunk.embedding.length}, expected ${dimension}`
                );
            }
        }

        const collection = this.collectionName(jobId);

        await this.call('Qdrant rebuild collection', async () => {
            const { exists } = await this.client.collectionExists(collection);
            if (exists) {
                await this.client.deleteCollection(collection);
            }

            if (chunks.length === 0) {
                return;
            }

            await this.client.createCollection(collection, {
                vectors: { size: dimension, distance: 'Cosine' }
            });

            await this.client.upsert(collection, {
                wait: true,
                points: chunks.map(chunk => ({
                    id: chunk.sequence,
                    vector: chunk.embedding,
                    payload: {
                        job_id: jobId,
                        sequence: chunk.sequence,
                        filename: chunk.filename,
                        content: chunk.content
                    }
                }))
            });
        });

        this.logger.info({
            jobId,
            collection,
            pointsCount: chunks.length,
            dimension
        }, 'Vector index rebuilt');
    }

    /**
     * Top-k cosine search, ordered by score and then by sequence.
     *
     * Fetches `k + overfetch` candidates and doubles the window while the
     * last candidate still ties the score at the cut, so every point sharing
     * that score is seen before the lowest sequences are kept.
     */
    async search(jobId: number, queryEmbedding: number[], k: number): Promise<SearchHit[]> {
        if (!Number.isInteger(k) || k < 1) {
            throw new ValidationError(`k must be a positive integer, got ${k}`);
        }

        const collection = this.collectionName(jobId);
        let limit = k + this.overfetch;
        let hits: SearchHit[] = [];

        for (;;) {
            const points = await this.call('Qdrant vector search', async () => {
                const { exists } = await this.client.collectionExists(collection);
                if (!exists) {
                    throw new NotIndexedError(jobId);
                }

                return this.client.search(collection, {
                    vector: queryEmbedding,
                    limit,
                    with_payload: true
                });
            });

            hits = points.map((point): SearchHit => {
                const payload = payloadSchema.parse(point.payload ?? {});
                return {
                    sequence: payload.sequence,
                    filename: payload.filename,
                    content: payload.content,
                    score: point.score
                };
            });

            hits.sort((a, b) => b.score - a.score || a.sequence - b.sequence);

            const exhausted = hits.length < limit;
            const cut = hits[k - 1];
            const last = hits[hits.length - 1];
            if (exhausted || cut === undefined || last === undefined || last.score < cut.score) {
                break;
            }
            limit *= 2;
        }

        this.logger.debug({
            jobId,
            collection,
            candidates: hits.length,
            k
        }, 'Vector search completed');

        return hits.slice(0, k);
    }

    async drop(jobId: number): Promise<void> {
        const collection = this.collectionName(jobId);

        await this.call('Qdrant drop collection', async () => {
            const { exists } = await this.client.collectionExists(collection);
            if (exists) {
                await this.client.deleteCollection(collection);
            }
        });

        this.logger.info({ jobId, collection }, 'Vector index dropped');
    }

    private async call<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
        try {
            return await this.retryUtil.executeWithRetry(operation, { ...RETRY, operationName });
        } catch (error: unknown) {
            if (error instanceof PipelineError) {
                throw error;
            }
            throw new CapabilityError(`${operationName} failed: ${errorMessage(error)}`, 'vector_index');
        }
    }
}

// Singleton instance
let vectorIndexService: VectorIndexService | null = null;

export function getVectorIndexService(): VectorIndexService {
    if (!vectorIndexService) {
        vectorIndexService = VectorIndexService.create();
    }
    return vectorIndexService;
}
