import pino from 'pino';
import { env } from './env';

/**
 * Logger Interface
 *
 * Contract every service receives through its constructor. Structured fields
 * go first, the message last.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

const pretty = env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test';

/**
 * Logger Configuration
 *
 * JSON logger for the job pipeline. Pretty-printed while developing,
 * plain JSON lines in production and under test.
 */
export const logger = pino({
    level: env.LOG_LEVEL,
    transport: pretty
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                singleLine: false
            }
        }
        : undefined,
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
