import fs from 'fs/promises';
import path from 'path';
import { env } from '../config/env';
import { logger, ILogger } from '../config/logger';
import { CapabilityError, errorMessage } from '../utils/errors';
import type { IBlobStore } from '../types/capabilities';

/**
 * Local Blob Store
 *
 * Keeps uploaded bytes on disk under `<root>/<jobId>/<key>`. The key is the
 * percent-encoded filename, so path separators never reach the filesystem and
 * distinct filenames always get distinct keys.
 */
export class LocalBlobStore implements IBlobStore {
    constructor(
        private rootDir: string,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): LocalBlobStore {
        return new LocalBlobStore(path.resolve(env.STORAGE_DIR), logger);
    }

    async put(jobId: number, filename: string, bytes: Buffer): Promise<void> {
        try {
            const target = this.pathFor(jobId, filename);
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, bytes);
        } catch (error: unknown) {
            throw new CapabilityError(`Blob write failed for ${filename}: ${errorMessage(error)}`, 'blob_store');
        }

        this.logger.debug({ jobId, filename, size: bytes.length }, 'Blob stored');
    }

    async get(jobId: number, filename: string): Promise<Buffer> {
        try {
            return await fs.readFile(this.pathFor(jobId, filename));
        } catch (error: unknown) {
            throw new CapabilityError(`Blob read failed for ${filename}: ${errorMessage(error)}`, 'blob_store');
        }
    }

    private pathFor(jobId: number, filename: string): string {
        return path.join(this.rootDir, String(jobId), LocalBlobStore.storageKey(filename));
    }

    static storageKey(filename: string): string {
        const encoded = encodeURIComponent(filename);
        // '.' and '..' survive encoding but name directories
        return encoded === '.' || encoded === '..' ? encoded.replace(/\./g, '%2E') : encoded;
    }
}
