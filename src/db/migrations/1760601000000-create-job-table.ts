import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateJobTable1760601000000 implements MigrationInterface {
    name = 'CreateJobTable1760601000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "jobs" ("id" SERIAL NOT NULL, "job_name" character varying(255) NOT NULL, "status" character varying(20) NOT NULL DEFAULT 'processing', "file_count" integer NOT NULL DEFAULT '0', "document_count" integer NOT NULL DEFAULT '0', "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), "completed_at" TIMESTAMP, "error_details" text, CONSTRAINT "PK_jobs_id" PRIMARY KEY ("id"))`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "jobs"`);
    }

}
