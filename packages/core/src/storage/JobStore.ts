import { JobFields, JobRecord } from "../types/Job";

export interface JobStore {
    // Connection lifecycle
    connect(): Promise<void>;
    disconnect(): Promise<void>;

    // Producer side: the record is written before the id becomes visible on the queue.
    // Resolves false, writing nothing, when a record with that id already exists.
    enqueue(record: JobRecord, queue: string): Promise<boolean>;
    cancel(jobId: string): Promise<boolean>;

    // Claim protocol
    claim(workerId: string, queues: readonly string[], timeoutSeconds: number): Promise<string | null>;
    acknowledge(workerId: string, jobId: string): Promise<void>;
    deadLetter(jobId: string, fields: JobFields): Promise<void>;

    // Job data access
    getJob(jobId: string): Promise<JobRecord | null>;
    updateJob(jobId: string, fields: JobFields): Promise<boolean>;

    // Recovery
    requeueFromLedger(workerId: string): Promise<string | null>;
    ledger(workerId: string): Promise<string[]>;

    // Admission control
    isWorkerForbidden(workerId: string): Promise<boolean>;
    setWorkerForbidden(workerId: string, forbidden: boolean): Promise<void>;

    // Introspection
    pending(queue: string): Promise<string[]>;
    deadLetters(): Promise<string[]>;
}
