import type { FineTuneStatus, JobStatus } from '../types/job';

export type ErrorKind =
    | 'ValidationError'
    | 'NotFound'
    | 'IllegalTransition'
    | 'CapabilityError'
    | 'NotIndexed'
    | 'Internal';

export interface JobStateSnapshot {
    status: JobStatus;
    fineTuneStatus: FineTuneStatus;
}

export class PipelineError extends Error {
    constructor(message: string, public readonly kind: ErrorKind) {
        super(message);
        this.name = 'PipelineError';
    }
}

export class ValidationError extends PipelineError {
    constructor(message: string) {
        super(message, 'ValidationError');
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends PipelineError {
    constructor(message: string) {
        super(message, 'NotFound');
        this.name = 'NotFoundError';
    }
}

export class IllegalTransitionError extends PipelineError {
    constructor(message: string, public readonly currentState: JobStateSnapshot) {
        super(message, 'IllegalTransition');
        this.name = 'IllegalTransitionError';
    }
}

export type CapabilityName = 'embed' | 'generate' | 'judge' | 'fine_tune' | 'poll' | 'vector_index' | 'blob_store';

export class CapabilityError extends PipelineError {
    constructor(message: string, public readonly capability: CapabilityName) {
        super(message, 'CapabilityError');
        this.name = 'CapabilityError';
    }
}

export class NotIndexedError extends PipelineError {
    constructor(jobId: number) {
        super(`No retrieval index has been built for job ${jobId}`, 'NotIndexed');
        this.name = 'NotIndexedError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === 'string' ? error : 'Unknown error';
}
