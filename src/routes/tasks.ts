import { Router, Request, Response } from "express";
import { JobPipelineService } from "../services/job-pipeline.service";
import { sendResult } from "./respond";

export function createTaskRoutes(pipeline: JobPipelineService): Router {
    const router = Router();

    /**
     * GET /tasks/:id
     *
     * Status of a background task; `result` holds the evaluation once completed.
     */
    router.get('/:id', async (req: Request, res: Response) => {
        sendResult(res, await pipeline.getTask(req.params.id));
    });

    return router;
}
