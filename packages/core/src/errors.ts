/**
 * The backing store could not be reached or rejected a command.
 * The worker backs off and leaves any claimed job in its ledger.
 */
export class StoreUnavailableError extends Error {
    constructor(operation: string, options?: { cause?: unknown }) {
        const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
        super(`Store operation '${operation}' failed: ${reason}`, options);
        this.name = 'StoreUnavailableError';
    }
}

export class InvalidJobRecordError extends Error {
    readonly jobId: string;

    constructor(jobId: string, reason: string) {
        super(`Job ${jobId} has an invalid record: ${reason}`);
        this.name = 'InvalidJobRecordError';
        this.jobId = jobId;
    }
}

export class DuplicateJobError extends Error {
    readonly jobId: string;

    constructor(jobId: string) {
        super(`Job ${jobId} already exists`);
        this.name = 'DuplicateJobError';
        this.jobId = jobId;
    }
}

export class ExecutorTableError extends Error {
    readonly problems: string[];

    constructor(problems: string[]) {
        super(`Executor table does not match the operation catalog: ${problems.join('; ')}`);
        this.name = 'ExecutorTableError';
        this.problems = problems;
    }
}
