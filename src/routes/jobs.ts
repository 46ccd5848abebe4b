import { Router, Request, Response, NextFunction } from "express";
import multer from "multer";
import { z } from "zod";
import { env } from "../config/env";
import { JobPipelineService } from "../services/job-pipeline.service";
import { errorMessage } from "../utils/errors";
import { describeZodError, sendResult, sendValidationError } from "./respond";

const jobIdSchema = z.coerce.number().int().positive();

const createJobSchema = z.object({
    job_name: z.string({ required_error: "job_name is required" })
});

const finetuneSchema = z.object({
    model: z.string().optional(),
    mode: z.string().optional()
});

const chatSchema = z.object({
    message: z.string({ required_error: "message is required" }),
    mode: z.string().optional().default('rag')
});

const evaluateSchema = z.object({
    mode: z.string().optional(),
    questions: z.array(z.object({
        question: z.string(),
        reference: z.string().optional()
    })).optional()
});

function parseJobId(req: Request, res: Response): number | null {
    const parsed = jobIdSchema.safeParse(req.params.id);
    if (!parsed.success) {
        sendValidationError(res, `Invalid job id '${req.params.id}'`);
        return null;
    }
    return parsed.data;
}

export function createJobRoutes(pipeline: JobPipelineService): Router {
    const router = Router();

    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: env.UPLOAD_MAX_FILE_BYTES,
        }
    });

    // Multer errors (size limit, unexpected field) are client errors
    const receiveFiles = (req: Request, res: Response, next: NextFunction) => {
        upload.array('files')(req, res, (error: unknown) => {
            if (error) {
                sendValidationError(res, `Upload rejected: ${errorMessage(error)}`);
                return;
            }
            next();
        });
    };

    /**
     * POST /jobs
     *
     * Multipart upload: `job_name` field plus one or more `files`.
     * Returns the created job (status "processing"); ingestion runs in the background.
     */
    router.post('/', receiveFiles, async (req: Request, res: Response) => {
        const body = createJobSchema.safeParse(req.body);
        if (!body.success) {
            return sendValidationError(res, describeZodError(body.error));
        }

        const files = Array.isArray(req.files) ? req.files : [];
        const result = await pipeline.createJob(body.data.job_name, files.map(file => ({
            filename: file.originalname,
            content: file.buffer,
            contentType: file.mimetype
        })));

        sendResult(res, result, 201);
    });

    router.get('/', async (_req: Request, res: Response) => {
        sendResult(res, await pipeline.listJobs());
    });

    router.get('/:id', async (req: Request, res: Response) => {
        const jobId = parseJobId(req, res);
        if (jobId === null) return;

        sendResult(res, await pipeline.getJob(jobId));
    });

    router.get('/:id/logs', async (req: Request, res: Response) => {
        const jobId = parseJobId(req, res);
        if (jobId === null) return;

        sendResult(res, await pipeline.getLogs(jobId));
    });

    /**
     * POST /jobs/:id/finetune
     *
     * Body: { model?: string, mode?: "plain" | "raft" }
     */
    router.post('/:id/finetune', async (req: Request, res: Response) => {
        const jobId = parseJobId(req, res);
        if (jobId === null) return;

        const body = finetuneSchema.safeParse(req.body ?? {});
        if (!body.success) {
            return sendValidationError(res, describeZodError(body.error));
        }

        const result = await pipeline.startFinetune(jobId, body.data);
        sendResult(res, result, result.success && !result.data.alreadyActive ? 202 : 200);
    });

    router.get('/:id/finetune', async (req: Request, res: Response) => {
        const jobId = parseJobId(req, res);
        if (jobId === null) return;

        sendResult(res, await pipeline.getFinetuneStatus(jobId));
    });

    /**
     * POST /jobs/:id/chat
     *
     * Body: { message: string, mode?: "rag" | "raft" | "fine_tuned_only" }
     */
    router.post('/:id/chat', async (req: Request, res: Response) => {
        const jobId = parseJobId(req, res);
        if (jobId === null) return;

        const body = chatSchema.safeParse(req.body);
        if (!body.success) {
            return sendValidationError(res, describeZodError(body.error));
        }

        sendResult(res, await pipeline.chat(jobId, body.data.message, body.data.mode));
    });

    /**
     * POST /jobs/:id/evaluate[?async=true]
     *
     * Body: { mode?: string, questions?: [{ question, reference? }] }
     * Synchronous by default; with async=true returns a task handle to poll at /tasks/:id.
     */
    router.post('/:id/evaluate', async (req: Request, res: Response) => {
        const jobId = parseJobId(req, res);
        if (jobId === null) return;

        const body = evaluateSchema.safeParse(req.body ?? {});
        if (!body.success) {
            return sendValidationError(res, describeZodError(body.error));
        }

        if (req.query.async === 'true') {
            return sendResult(res, await pipeline.startEvaluation(jobId, body.data), 202);
        }
        sendResult(res, await pipeline.evaluate(jobId, body.data));
    });

    return router;
}
