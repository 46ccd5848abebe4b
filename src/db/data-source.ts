import "reflect-metadata";
import path from "path";
import { DataSource } from "typeorm";
import { env } from "../config/env";
import { Job } from "./entities/job.entity";
import { JobLog } from "./entities/job-log.entity";
import { DocumentChunk } from "./entities/document-chunk.entity";

export const AppDataSource = new DataSource({
    type: "postgres",
    url: env.DATABASE_URL,
    synchronize: false,
    logging: env.NODE_ENV === 'development',
    entities: [Job, JobLog, DocumentChunk],
    migrations: [path.join(__dirname, 'migrations', '*.{ts,js}')],
});
