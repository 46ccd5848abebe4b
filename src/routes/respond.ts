import { ZodError } from "zod";
import { ErrorKind } from "../utils/errors";
import { CoreResult, fail } from "../utils/result.util";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
    ValidationError: 400,
    NotFound: 404,
    IllegalTransition: 409,
    NotIndexed: 409,
    CapabilityError: 502,
    Internal: 500
};

export interface JsonResponder {
    status(code: number): { json(body: unknown): unknown };
}

export function statusFor(kind: ErrorKind): number {
    return STATUS_BY_KIND[kind];
}

/**
 * Writes a result triple, mapping failure kinds to HTTP status codes.
 */
export function sendResult<T>(res: JsonResponder, result: CoreResult<T>, successStatus: number = 200): void {
    if (result.success) {
        res.status(successStatus).json(result);
        return;
    }
    res.status(statusFor(result.error.kind)).json(result);
}

export function sendValidationError(res: JsonResponder, message: string): void {
    sendResult(res, fail({ kind: 'ValidationError', message }));
}

export function describeZodError(error: ZodError): string {
    return error.errors
        .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
        .join('; ');
}
