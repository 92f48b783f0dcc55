import { JobParams } from "./Job";

export type ExecutionOutcome =
    | { status: 'success'; payload: unknown }
    | { status: 'warning'; payload: unknown; note: string }
    | { status: 'failed'; error: string }
    | { status: 'captcha_required'; challengeUrl: string };

/**
 * Runs one job. Domain failures come back as a `failed` or `captcha_required`
 * outcome; a thrown error is treated as a worker fault and dead-lettered.
 */
export type Executor = (jobId: string, params: JobParams) => Promise<ExecutionOutcome>;
