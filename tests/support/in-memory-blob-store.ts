import type { IBlobStore } from '../../src/types/capabilities';

export class InMemoryBlobStore implements IBlobStore {
    blobs = new Map<string, Buffer>();

    async put(jobId: number, filename: string, bytes: Buffer): Promise<void> {
        this.blobs.set(`${jobId}/${filename}`, Buffer.from(bytes));
    }

    async get(jobId: number, filename: string): Promise<Buffer> {
        const blob = this.blobs.get(`${jobId}/${filename}`);
        if (!blob) {
            throw new Error(`No blob stored for ${jobId}/${filename}`);
        }
        return Buffer.from(blob);
    }
}
