/**
 * Job domain types shared by the record store, the state machine and the
 * consumer-facing contract.
 */

export const JOB_STATUSES = ['processing', 'completed', 'failed'] as const;
export type JobStatus = typeof JOB_STATUSES[number];

export const FINE_TUNE_STATUSES = ['not_run', 'queued', 'running', 'succeeded', 'failed'] as const;
export type FineTuneStatus = typeof FINE_TUNE_STATUSES[number];

export const FINE_TUNE_MODES = ['plain', 'raft'] as const;
export type FineTuneMode = typeof FINE_TUNE_MODES[number];

export const CHAT_MODES = ['rag', 'raft', 'fine_tuned_only'] as const;
export type ChatMode = typeof CHAT_MODES[number];

export interface JobRecord {
    id: number;
    job_name: string;
    status: JobStatus;
    file_count: number;
    document_count: number;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
    error_details: string | null;
    fine_tune_status: FineTuneStatus;
    fine_tune_mode: FineTuneMode | null;
    fine_tune_base_model: string | null;
    fine_tune_handle: string | null;
    fine_tune_error: string | null;
    fine_tuned_model_id: string | null;
}

export type JobPatch = Partial<Omit<JobRecord, 'id' | 'created_at'>>;

export interface JobLogRecord {
    id: number;
    job_id: number;
    event_type: string;
    message: string;
    timestamp: Date;
}

export interface ChunkRecord {
    job_id: number;
    sequence: number;
    filename: string;
    content: string;
    embedding: number[] | null;
}

export interface UploadedDocument {
    filename: string;
    content: Buffer;
    contentType?: string;
}

export interface FineTuneState {
    jobId: number;
    status: FineTuneStatus;
    mode: FineTuneMode | null;
    baseModel: string | null;
    handle: string | null;
    fineTunedModelId: string | null;
    error: string | null;
}

export interface FineTuneStartResult {
    jobId: number;
    status: FineTuneStatus;
    alreadyActive: boolean;
}
