import { MigrationInterface, QueryRunner } from "typeorm";

export class AddFineTuneColumnsOnJobTable1760601100000 implements MigrationInterface {
    name = 'AddFineTuneColumnsOnJobTable1760601100000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "jobs" ADD "fine_tune_status" character varying(20) NOT NULL DEFAULT 'not_run'`);
        await queryRunner.query(`ALTER TABLE "jobs" ADD "fine_tune_mode" character varying(10)`);
        await queryRunner.query(`ALTER TABLE "jobs" ADD "fine_tune_base_model" character varying(100)`);
        await queryRunner.query(`ALTER TABLE "jobs" ADD "fine_tune_handle" character varying(100)`);
        await queryRunner.query(`ALTER TABLE "jobs" ADD "fine_tune_error" text`);
        await queryRunner.query(`ALTER TABLE "jobs" ADD "fine_tuned_model_id" character varying(255)`);
        await queryRunner.query(`ALTER TABLE "jobs" ADD CONSTRAINT "CHK_jobs_fine_tuned_model" CHECK (("fine_tune_status" = 'succeeded') = ("fine_tuned_model_id" IS NOT NULL))`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "jobs" DROP CONSTRAINT "CHK_jobs_fine_tuned_model"`);
        await queryRunner.query(`ALTER TABLE "jobs" DROP COLUMN "fine_tuned_model_id"`);
        await queryRunner.query(`ALTER TABLE "jobs" DROP COLUMN "fine_tune_error"`);
        await queryRunner.query(`ALTER TABLE "jobs" DROP COLUMN "fine_tune_handle"`);
        await queryRunner.query(`ALTER TABLE "jobs" DROP COLUMN "fine_tune_base_model"`);
        await queryRunner.query(`ALTER TABLE "jobs" DROP COLUMN "fine_tune_mode"`);
        await queryRunner.query(`ALTER TABLE "jobs" DROP COLUMN "fine_tune_status"`);
    }

}
