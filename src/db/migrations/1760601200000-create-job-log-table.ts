import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateJobLogTable1760601200000 implements MigrationInterface {
    name = 'CreateJobLogTable1760601200000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "job_logs" ("id" SERIAL NOT NULL, "job_id" integer NOT NULL, "event_type" character varying(50) NOT NULL, "message" text NOT NULL, "timestamp" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_job_logs_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_job_logs_job_id_timestamp" ON "job_logs" ("job_id", "timestamp")`);
        await queryRunner.query(`ALTER TABLE "job_logs" ADD CONSTRAINT "FK_job_logs_job_id" FOREIGN KEY ("job_id") REFERENCES "jobs"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "job_logs" DROP CONSTRAINT "FK_job_logs_job_id"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_job_logs_job_id_timestamp"`);
        await queryRunner.query(`DROP TABLE "job_logs"`);
    }

}
