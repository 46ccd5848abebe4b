import type { IQdrantClient, QdrantPoint, QdrantScoredPoint } from '../../src/services/vector-index.service';

export function cosine(a: number[], b: number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Qdrant stand-in: collections of points with exact cosine search.
 */
export class InMemoryQdrantClient implements IQdrantClient {
    collections = new Map<string, { size: number; points: Map<number, QdrantPoint> }>();

    async collectionExists(collectionName: string): Promise<{ exists: boolean }> {
        return { exists: this.collections.has(collectionName) };
    }

    async createCollection(collectionName: string, config: { vectors: { size: number; distance: 'Cosine' } }): Promise<boolean> {
        if (this.collections.has(collectionName)) {
            throw new Error(`Collection ${collectionName} already exists`);
        }
        this.collections.set(collectionName, { size: config.vectors.size, points: new Map() });
        return true;
    }

    async deleteCollection(collectionName: string): Promise<boolean> {
        return this.collections.delete(collectionName);
    }

    async upsert(collectionName: string, data: { wait: boolean; points: QdrantPoint[] }): Promise<{ status: string }> {
        const collection = this.require(collectionName);
        for (const point of data.points) {
            if (point.vector.length !== collection.size) {
                throw new Error(`Vector dimension error: expected ${collection.size}, got ${point.vector.length}`);
            }
            collection.points.set(point.id, point);
        }
        return { status: 'completed' };
    }

    async search(collectionName: string, params: { vector: number[]; limit: number; with_payload: boolean }): Promise<QdrantScoredPoint[]> {
        const collection = this.require(collectionName);
        return [...collection.points.values()]
            .map(point => ({
                id: point.id,
                score: cosine(point.vector, params.vector),
                payload: params.with_payload ? point.payload : null
            }))
            .sort((a, b) => b.score - a.score)
            .slice(0, params.limit);
    }

    private require(collectionName: string) {
        const collection = this.collections.get(collectionName);
        if (!collection) {
            throw new Error(`Not found: Collection \`${collectionName}\` doesn't exist!`);
        }
        return collection;
    }
}
