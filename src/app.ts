import express, { NextFunction, Request, Response } from "express";
import { logger } from "./config/logger";
import { createJobRoutes } from "./routes/jobs";
import { createTaskRoutes } from "./routes/tasks";
import { JobPipelineService } from "./services/job-pipeline.service";
import { errorMessage } from "./utils/errors";
import { fail } from "./utils/result.util";
import { sendResult } from "./routes/respond";

export function createApp(pipeline: JobPipelineService) {
    const app = express();

    // Middleware
    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/jobs", createJobRoutes(pipeline));
    app.use("/tasks", createTaskRoutes(pipeline));

    // Health check
    app.get("/health", (_req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Malformed JSON bodies and anything else that escapes a route
    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const isSyntaxError = error instanceof SyntaxError;
        logger.warn({ error: errorMessage(error) }, 'Request failed before reaching the pipeline');
        sendResult(res, fail({
            kind: isSyntaxError ? 'ValidationError' : 'Internal',
            message: isSyntaxError ? 'Malformed JSON body' : errorMessage(error)
        }));
    });

    return app;
}
