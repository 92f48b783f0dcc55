import { EventEmitter } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";

import { ClassifyOptions, toTerminalFields } from "./classify";
import { StoreUnavailableError } from "./errors";
import Metrics, { MetricsSnapshot } from "./metrics/metrics";
import { recoverInterruptedJobs } from "./recovery";
import { JobStore } from "./storage/JobStore";
import { DEFAULT_QUEUE } from "./storage/keys";
import { getMemoryStore } from "./storage/StoreRegistry";
import { isTerminalStatus, JobStatus, TerminalStatus } from "./types/Job";
import { Executor } from "./types/Outcome";
import { DropReason, WorkerEventMap } from "./types/WorkerEvents";
import defaultLogger, { Logger } from "./utils/logger";

export const CANCELLED_BEFORE_EXECUTION = 'Job was cancelled before execution.';

export interface WorkerOptions {
    workerId: string;
    execute: Executor;
    /** Queue names this worker may claim from, tried round-robin. */
    queues?: string[];
    store?: JobStore;
    logger?: Logger;
    /** Seconds a claim blocks waiting for a job; 0 blocks until one arrives. */
    claimTimeoutSeconds?: number;
    forbiddenBackoffMs?: number;
    errorBackoffMs?: number;
    /** Re-queue anything left in this worker's ledger after every committed job. */
    sweepLedgerAfterJob?: boolean;
    classify?: ClassifyOptions;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class Worker extends EventEmitter {
    private store: JobStore;
    private workerId: string;
    private queues: string[];
    private execute: Executor;
    private logger: Logger;
    private claimTimeoutSeconds: number;
    private forbiddenBackoffMs: number;
    private errorBackoffMs: number;
    private sweepLedgerAfterJob: boolean;
    private classifyOptions: ClassifyOptions;
    private metrics: Metrics;

    private isRunning: boolean = false;
    private isStopping: boolean = false;
    private isBusy: boolean = false;
    private loop: Promise<void> | null = null;
    private abortController: AbortController = new AbortController();
    private nextQueue: number = 0;

    constructor(options: WorkerOptions) {
        super();
        if (!options.workerId) {
            throw new Error("Worker requires a workerId");
        }
        this.workerId = options.workerId;
        this.execute = options.execute;
        this.queues = options.queues && options.queues.length > 0 ? [...options.queues] : [DEFAULT_QUEUE];
        this.store = options.store ?? getMemoryStore();
        this.logger = (options.logger ?? defaultLogger).child({ workerId: options.workerId });
        this.claimTimeoutSeconds = options.claimTimeoutSeconds ?? 0;
        this.forbiddenBackoffMs = options.forbiddenBackoffMs ?? 30000;
        this.errorBackoffMs = options.errorBackoffMs ?? 5000;
        this.sweepLedgerAfterJob = options.sweepLedgerAfterJob ?? true;
        this.classifyOptions = options.classify ?? {};
        this.metrics = new Metrics();
    }

    /** Connects, re-queues jobs a previous run of this identity left behind, then starts claiming. */
    async start(): Promise<void> {
        if (this.isRunning) return;

        await this.store.connect();

        this.abortController = new AbortController();
        this.isStopping = false;
        this.isRunning = true;
        this.notify('worker:started', { workerId: this.workerId, queues: [...this.queues] });

        const recovered = await recoverInterruptedJobs(this.store, this.workerId, this.logger);
        if (recovered.length > 0) {
            this.metrics.incrementJobsRecovered(recovered.length);
            this.notify('worker:recovered', { workerId: this.workerId, jobIds: recovered });
        }

        this.logger.info(`Worker started. Listening for jobs on ${this.queues.join(', ')}...`);
        this.loop = this.runLoop();
    }

    /**
     * Stops claiming and waits up to `gracefulTimeoutMs` for an in-flight job.
     * A job still running after that is abandoned in the ledger for the next start to recover.
     */
    async stop(gracefulTimeoutMs: number = 5000): Promise<void> {
        if (!this.isRunning) return;
        this.isRunning = false;
        this.isStopping = true;
        this.abortController.abort();

        const start = Date.now();
        while (this.isBusy && Date.now() - start < gracefulTimeoutMs) {
            await sleep(50);
        }

        await this.store.disconnect();

        if (!this.isBusy && this.loop) {
            await this.loop;
        }
        this.loop = null;

        this.logger.info('Worker stopped.');
        this.notify('worker:stopped', { workerId: this.workerId });
    }

    /**
     * One pass of the loop: admission check, claim, then process the claimed job.
     * Resolves with the claimed id, or null when nothing was claimed.
     */
    async processNext(): Promise<string | null> {
        let jobId: string | null = null;
        try {
            if (await this.store.isWorkerForbidden(this.workerId)) {
                this.logger.warn(`Worker ${this.workerId} is forbidden from accepting jobs. Sleeping for ${this.forbiddenBackoffMs}ms.`);
                this.notify('worker:forbidden', { workerId: this.workerId });
                await this.pause(this.forbiddenBackoffMs);
                return null;
            }

            jobId = await this.store.claim(this.workerId, this.claimOrder(), this.claimTimeoutSeconds);
        } catch (error) {
            if (this.isStopping) return null;

            this.logger.error(`Store error while waiting for jobs: ${describeError(error)}. Will retry in ${this.errorBackoffMs}ms.`);
            this.notify('worker:error', { workerId: this.workerId, error });
            await this.pause(this.errorBackoffMs);
            return null;
        }

        if (jobId === null) {
            this.notify('worker:idle', { workerId: this.workerId });
            return null;
        }

        await this.process(jobId);
        return jobId;
    }

    getMetrics(): MetricsSnapshot {
        return this.metrics.getSnapshot();
    }

    isActive(): boolean {
        return this.isRunning;
    }

    private async runLoop(): Promise<void> {
        while (this.isRunning) {
            await this.processNext();
        }
    }

    private async process(jobId: string): Promise<void> {
        this.isBusy = true;
        const startTime = Date.now();
        this.metrics.incrementJobsClaimed();
        this.notify('job:claimed', { jobId, workerId: this.workerId });
        this.logger.info(`Received job ${jobId}`, { jobId });

        try {
            let status: TerminalStatus | null;
            try {
                status = await this.handle(jobId);
            } catch (error) {
                await this.handleFailure(jobId, error);
                return;
            }

            // Committed and acknowledged; nothing past this point may touch the record
            if (status !== null) {
                this.finish(jobId, status, startTime);
                if (this.sweepLedgerAfterJob) {
                    await this.sweepLedger();
                }
            }
        } finally {
            this.isBusy = false;
        }
    }

    private async handleFailure(jobId: string, error: unknown): Promise<void> {
        if (error instanceof StoreUnavailableError) {
            // The claim stays in the ledger and is re-queued by the next sweep or restart
            this.logger.error(`Store error while processing job ${jobId}: ${error.message}. Will retry in ${this.errorBackoffMs}ms.`, { jobId });
            this.notify('worker:error', { workerId: this.workerId, error, jobId });
        } else {
            this.logger.error(`An unhandled exception occurred while processing job ${jobId}: ${describeError(error)}`, {
                jobId,
                stack: error instanceof Error ? error.stack : undefined,
            });
            await this.moveToDeadLetter(jobId, error);
        }
        await this.pause(this.errorBackoffMs);
    }

    private async sweepLedger(): Promise<void> {
        let recovered: string[];
        try {
            recovered = await recoverInterruptedJobs(this.store, this.workerId, this.logger);
        } catch (error) {
            this.logger.error(`Could not sweep the processing ledger: ${describeError(error)}. Will retry in ${this.errorBackoffMs}ms.`);
            this.notify('worker:error', { workerId: this.workerId, error });
            await this.pause(this.errorBackoffMs);
            return;
        }

        if (recovered.length > 0) {
            this.metrics.incrementJobsRecovered(recovered.length);
            this.notify('worker:recovered', { workerId: this.workerId, jobIds: recovered });
        }
    }

    /**
     * Runs the job state machine up to the acknowledge.
     * Resolves with the committed terminal status, or null when the claim was dropped.
     */
    private async handle(jobId: string): Promise<TerminalStatus | null> {
        const record = await this.store.getJob(jobId);
        if (!record) {
            this.logger.error(`Could not find job data for ${jobId}. Skipping.`, { jobId });
            await this.drop(jobId, 'missing');
            return null;
        }

        if (record.status === 'cancelled') {
            this.logger.info(`Job ${jobId} was cancelled before execution. Marking as cancelled.`, { jobId });
            const now = new Date().toISOString();
            const written = await this.store.updateJob(jobId, {
                status: 'cancelled',
                workerId: this.workerId,
                startedAt: now,
                completedAt: now,
                errorMessage: CANCELLED_BEFORE_EXECUTION,
            });
            if (!written) {
                return this.dropPurged(jobId);
            }
            await this.store.acknowledge(this.workerId, jobId);
            return 'cancelled';
        }

        if (isTerminalStatus(record.status)) {
            this.logger.warn(`Job ${jobId} has status '${record.status}' but was in queue. Skipping.`, { jobId });
            await this.drop(jobId, 'stale', record.status);
            return null;
        }

        const marked = await this.store.updateJob(jobId, {
            status: 'running',
            workerId: this.workerId,
            startedAt: new Date().toISOString(),
        });
        if (!marked) {
            return this.dropPurged(jobId);
        }

        this.logger.info(`Executing job ${jobId}: ${record.scraperType} - ${record.operationType}`, {
            jobId,
            scraperType: record.scraperType,
            operationType: record.operationType,
        });
        const outcome = await this.execute(jobId, { ...record.params });

        const fields = toTerminalFields(outcome, new Date().toISOString(), this.classifyOptions);
        const committed = await this.store.updateJob(jobId, fields);
        if (!committed) {
            return this.dropPurged(jobId);
        }
        this.logger.info(`Finished job ${jobId} with status: ${fields.status}`, { jobId, status: fields.status });

        await this.store.acknowledge(this.workerId, jobId);
        return fields.status;
    }

    private async moveToDeadLetter(jobId: string, error: unknown): Promise<void> {
        const errorMessage = `Unhandled worker exception: ${describeError(error)}`;
        this.logger.warn(`Moving job ${jobId} to dead-letter queue.`, { jobId });

        try {
            await this.store.deadLetter(jobId, {
                status: 'failed',
                errorMessage,
                completedAt: new Date().toISOString(),
            });
            await this.store.acknowledge(this.workerId, jobId);
        } catch (deadLetterError) {
            // Left in the ledger on purpose so a restart retries it
            this.logger.error(`Could not move job ${jobId} to dead-letter queue: ${describeError(deadLetterError)}`, { jobId });
            this.notify('worker:error', { workerId: this.workerId, error: deadLetterError, jobId });
            return;
        }

        this.metrics.incrementJobsDeadLettered();
        this.metrics.recordOutcome('failed');
        this.notify('job:dead-lettered', { jobId, error: errorMessage });
    }

    private async dropPurged(jobId: string): Promise<null> {
        this.logger.error(`Job ${jobId} disappeared from the store while claimed. Dropping the claim.`, { jobId });
        await this.drop(jobId, 'purged');
        return null;
    }

    private async drop(jobId: string, reason: DropReason, status?: JobStatus): Promise<void> {
        await this.store.acknowledge(this.workerId, jobId);
        this.metrics.incrementJobsDropped();
        this.notify('job:dropped', { jobId, reason, status });
    }

    private finish(jobId: string, status: TerminalStatus, startTime: number): void {
        const duration = Date.now() - startTime;
        this.metrics.recordOutcome(status);
        this.metrics.recordProcessingTime(duration);
        this.notify('job:finished', { jobId, status, duration });
    }

    private claimOrder(): string[] {
        if (this.queues.length <= 1) return [...this.queues];

        const start = this.nextQueue;
        this.nextQueue = (this.nextQueue + 1) % this.queues.length;
        return [...this.queues.slice(start), ...this.queues.slice(0, start)];
    }

    private async pause(ms: number): Promise<void> {
        if (ms <= 0) return;
        try {
            await sleep(ms, undefined, { signal: this.abortController.signal });
        } catch (error) {
            if (!this.abortController.signal.aborted) throw error;
        }
    }

    // Listener faults are logged; they never reach the job state machine
    private notify<K extends keyof WorkerEventMap>(event: K, payload: WorkerEventMap[K]): void {
        try {
            this.emit(event, payload);
        } catch (error) {
            this.logger.error(`Listener for '${event}' threw: ${describeError(error)}`, {
                stack: error instanceof Error ? error.stack : undefined,
            });
        }
    }
}
