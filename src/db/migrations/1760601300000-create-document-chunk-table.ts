import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateDocumentChunkTable1760601300000 implements MigrationInterface {
    name = 'CreateDocumentChunkTable1760601300000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "document_chunks" ("id" SERIAL NOT NULL, "job_id" integer NOT NULL, "sequence" integer NOT NULL, "filename" character varying(255) NOT NULL, "content" text NOT NULL, "embedding" jsonb, CONSTRAINT "UQ_document_chunks_job_id_sequence" UNIQUE ("job_id", "sequence"), CONSTRAINT "PK_document_chunks_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "document_chunks" ADD CONSTRAINT "FK_document_chunks_job_id" FOREIGN KEY ("job_id") REFERENCES "jobs"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "document_chunks" DROP CONSTRAINT "FK_document_chunks_job_id"`);
        await queryRunner.query(`DROP TABLE "document_chunks"`);
    }

}
