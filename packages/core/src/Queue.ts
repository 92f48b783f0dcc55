import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";

import { DuplicateJobError } from "./errors";
import { RESERVED_FIELDS } from "./storage/codec";
import { JobStore } from "./storage/JobStore";
import { DEFAULT_QUEUE } from "./storage/keys";
import { getMemoryStore } from "./storage/StoreRegistry";
import { JobRecord, NewJob } from "./types/Job";

export interface QueueOptions {
    store?: JobStore;
}

export interface AddOptions {
    /** Queue name; `queueName(scraper, operation)` for a per-operation queue. */
    queue?: string;
}

/**
 * Producer and admin side of the protocol: enqueues jobs, cancels pending
 * ones and flags workers that must stop claiming.
 */
export class Queue extends EventEmitter {
    private store: JobStore;
    private isConnected: boolean = false;

    constructor(options: QueueOptions = {}) {
        super();
        this.store = options.store ?? getMemoryStore();
    }

    async connect(): Promise<void> {
        if (this.isConnected) return;
        await this.store.connect();
        this.isConnected = true;
        this.emit('queue:connected');
    }

    async disconnect(): Promise<void> {
        if (!this.isConnected) return;
        await this.store.disconnect();
        this.isConnected = false;
        this.emit('queue:disconnected');
    }

    /** Rejects with DuplicateJobError when `job.id` names a record that already exists. */
    async add(job: NewJob, options: AddOptions = {}): Promise<JobRecord> {
        if (!this.isConnected) await this.connect();

        const params = job.params ?? {};
        const reserved = Object.keys(params).filter((name) => RESERVED_FIELDS.has(name));
        if (reserved.length > 0) {
            throw new Error(`Job parameters may not use reserved field(s): ${reserved.join(', ')}`);
        }

        const queue = options.queue ?? DEFAULT_QUEUE;
        const record: JobRecord = {
            id: job.id ?? randomUUID(),
            status: 'pending',
            scraperType: job.scraperType,
            operationType: job.operationType,
            queue,
            createdAt: new Date().toISOString(),
            params: {
                ...params,
                scraper_type: job.scraperType,
                operation_type: job.operationType,
            },
        };

        if (!(await this.store.enqueue(record, queue))) {
            throw new DuplicateJobError(record.id);
        }
        this.emit('job:added', record);
        return record;
    }

    /** Marks a pending job cancelled. Jobs already claimed or finished are left untouched. */
    async cancel(jobId: string): Promise<boolean> {
        if (!this.isConnected) await this.connect();

        const cancelled = await this.store.cancel(jobId);
        if (cancelled) {
            this.emit('job:cancelled', { jobId });
        }
        return cancelled;
    }

    async forbidWorker(workerId: string): Promise<void> {
        if (!this.isConnected) await this.connect();
        await this.store.setWorkerForbidden(workerId, true);
    }

    async allowWorker(workerId: string): Promise<void> {
        if (!this.isConnected) await this.connect();
        await this.store.setWorkerForbidden(workerId, false);
    }

    async getJob(jobId: string): Promise<JobRecord | null> {
        return this.store.getJob(jobId);
    }

    async getSize(queue: string = DEFAULT_QUEUE): Promise<number> {
        return (await this.store.pending(queue)).length;
    }

    async getDeadLetters(): Promise<string[]> {
        return this.store.deadLetters();
    }

    /** The underlying store (useful for advanced usage) */
    getStore(): JobStore {
        return this.store;
    }
}
