import type { ILogger } from '../config/logger';
import { errorMessage, ErrorKind, IllegalTransitionError, JobStateSnapshot, PipelineError } from './errors';

export interface CoreFailure {
    kind: ErrorKind;
    message: string;
    currentState?: JobStateSnapshot;
}

/**
 * Uniform outcome of every consumer-facing operation.
 */
export type CoreResult<T> =
    | { success: true; data: T; error: null }
    | { success: false; data: null; error: CoreFailure };

export function ok<T>(data: T): CoreResult<T> {
    return { success: true, data, error: null };
}

export function fail<T>(error: CoreFailure): CoreResult<T> {
    return { success: false, data: null, error };
}

export function toFailure(error: unknown): CoreFailure {
    if (error instanceof IllegalTransitionError) {
        return { kind: error.kind, message: error.message, currentState: error.currentState };
    }
    if (error instanceof PipelineError) {
        return { kind: error.kind, message: error.message };
    }
    return { kind: 'Internal', message: errorMessage(error) };
}

/**
 * Run an operation and fold any thrown error into a failure result.
 */
export async function toResult<T>(
    operationName: string,
    logger: ILogger,
    operation: () => Promise<T>
): Promise<CoreResult<T>> {
    try {
        return ok(await operation());
    } catch (error: unknown) {
        const failure = toFailure(error);
        if (failure.kind === 'Internal' || failure.kind === 'CapabilityError') {
            logger.error({ operation: operationName, kind: failure.kind, error: failure.message }, `${operationName} failed`);
        } else {
            logger.warn({ operation: operationName, kind: failure.kind, error: failure.message }, `${operationName} rejected`);
        }
        return fail(failure);
    }
}
