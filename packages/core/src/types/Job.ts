export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled', 'warning'] as const;

export type JobStatus = typeof JOB_STATUSES[number];

export type TerminalStatus = Exclude<JobStatus, 'pending' | 'running'>;

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ['completed', 'failed', 'cancelled', 'warning'];

export function isTerminalStatus(status: JobStatus): status is TerminalStatus {
    return status !== 'pending' && status !== 'running';
}

export type JobParams = Record<string, string>;

export interface JobRecord {
    id: string;
    status: JobStatus;
    scraperType?: string;
    operationType?: string;
    queue?: string;
    workerId?: string;
    createdAt?: string;
    startedAt?: string;
    completedAt?: string;
    resultData?: string;
    errorMessage?: string;
    warningMessage?: string;
    challengeUrl?: string;
    // Everything that is not a lifecycle field, scraper_type and operation_type included
    params: JobParams;
}

export type JobFields = Partial<Omit<JobRecord, 'id' | 'params' | 'scraperType' | 'operationType'>>;

export interface NewJob {
    id?: string;
    scraperType: string;
    operationType: string;
    params?: JobParams;
}
