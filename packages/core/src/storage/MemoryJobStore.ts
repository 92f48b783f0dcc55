import { JobFields, JobRecord } from "../types/Job";
import { JobStore } from "./JobStore";
import { parseJob, serializeFields, serializeJob } from "./codec";
import { DEFAULT_QUEUE } from "./keys";

interface WaitingClaimer {
    workerId: string;
    queues: readonly string[];
    resolve: (jobId: string | null) => void;
}

/**
 * In-process JobStore with the same layout and semantics as the Redis one.
 * Every operation runs to completion on the event loop, which makes each
 * move between lists atomic.
 */
export class MemoryJobStore implements JobStore {
    private jobs: Map<string, Record<string, string>> = new Map(); // jobId -> stored hash
    private queues: Map<string, string[]> = new Map(); // queue name -> job ids, oldest first
    private ledgers: Map<string, string[]> = new Map(); // workerId -> claimed job ids, oldest first
    private deadLetterIds: string[] = [];
    private forbiddenWorkers: Set<string> = new Set();

    private waitingClaimers: WaitingClaimer[] = [];

    async connect(): Promise<void> {

    }

    async disconnect(): Promise<void> {
        // Release blocked claimers; stored data survives so a restarted worker can recover
        const waiting = this.waitingClaimers;
        this.waitingClaimers = [];
        for (const claimer of waiting) {
            claimer.resolve(null);
        }
    }

    async enqueue(record: JobRecord, queue: string): Promise<boolean> {
        if (this.jobs.has(record.id)) return false;

        this.jobs.set(record.id, serializeJob({ ...record, queue }));
        this.push(queue, record.id);
        return true;
    }

    async cancel(jobId: string): Promise<boolean> {
        const hash = this.jobs.get(jobId);
        if (!hash) return false;

        const status = hash['status'] ?? 'pending';
        if (status !== 'pending') return false;

        hash['status'] = 'cancelled';
        return true;
    }

    async claim(workerId: string, queues: readonly string[], timeoutSeconds: number): Promise<string | null> {
        for (const queue of queues) {
            const jobId = this.queueOf(queue).shift();
            if (jobId !== undefined) {
                this.ledgerOf(workerId).push(jobId);
                return jobId;
            }
        }

        return new Promise<string | null>((resolve) => {
            let timeoutId: NodeJS.Timeout | undefined;

            const claimer: WaitingClaimer = {
                workerId,
                queues,
                resolve: (jobId) => {
                    if (timeoutId) clearTimeout(timeoutId);
                    resolve(jobId);
                },
            };

            if (timeoutSeconds > 0) {
                timeoutId = setTimeout(() => {
                    const index = this.waitingClaimers.indexOf(claimer);
                    if (index !== -1) {
                        this.waitingClaimers.splice(index, 1);
                    }
                    resolve(null);
                }, timeoutSeconds * 1000);
            }

            this.waitingClaimers.push(claimer);
        });
    }

    async acknowledge(workerId: string, jobId: string): Promise<void> {
        const ledger = this.ledgerOf(workerId);
        const index = ledger.indexOf(jobId);
        if (index !== -1) {
            ledger.splice(index, 1);
        }
    }

    async deadLetter(jobId: string, fields: JobFields): Promise<void> {
        const hash = this.jobs.get(jobId) ?? {};
        this.jobs.set(jobId, { ...hash, ...serializeFields(fields) });
        this.deadLetterIds.push(jobId);
    }

    async getJob(jobId: string): Promise<JobRecord | null> {
        const hash = this.jobs.get(jobId);
        return hash ? parseJob(jobId, { ...hash }) : null;
    }

    async updateJob(jobId: string, fields: JobFields): Promise<boolean> {
        const hash = this.jobs.get(jobId);
        if (!hash) return false;

        Object.assign(hash, serializeFields(fields));
        return true;
    }

    async requeueFromLedger(workerId: string): Promise<string | null> {
        const jobId = this.ledgerOf(workerId).shift();
        if (jobId === undefined) return null;

        const queue = this.jobs.get(jobId)?.['queue'] || DEFAULT_QUEUE;
        this.push(queue, jobId);
        return jobId;
    }

    async ledger(workerId: string): Promise<string[]> {
        return [...this.ledgerOf(workerId)];
    }

    async isWorkerForbidden(workerId: string): Promise<boolean> {
        return this.forbiddenWorkers.has(workerId);
    }

    async setWorkerForbidden(workerId: string, forbidden: boolean): Promise<void> {
        if (forbidden) {
            this.forbiddenWorkers.add(workerId);
        } else {
            this.forbiddenWorkers.delete(workerId);
        }
    }

    async pending(queue: string): Promise<string[]> {
        return [...this.queueOf(queue)];
    }

    async deadLetters(): Promise<string[]> {
        return [...this.deadLetterIds];
    }

    /** Pushes an id onto a queue without touching its record. */
    pushRaw(queue: string, jobId: string): void {
        this.push(queue, jobId);
    }

    getStats(): { pending: number; processing: number; deadLettered: number; total: number } {
        let pending = 0;
        for (const ids of this.queues.values()) pending += ids.length;
        let processing = 0;
        for (const ids of this.ledgers.values()) processing += ids.length;

        return {
            pending,
            processing,
            deadLettered: this.deadLetterIds.length,
            total: this.jobs.size,
        };
    }

    private push(queue: string, jobId: string): void {
        // A blocked claimer authorised for this queue takes the id straight into its ledger
        const index = this.waitingClaimers.findIndex((claimer) => claimer.queues.includes(queue));
        if (index !== -1) {
            const [claimer] = this.waitingClaimers.splice(index, 1);
            this.ledgerOf(claimer.workerId).push(jobId);
            claimer.resolve(jobId);
            return;
        }
        this.queueOf(queue).push(jobId);
    }

    private queueOf(queue: string): string[] {
        let ids = this.queues.get(queue);
        if (!ids) {
            ids = [];
            this.queues.set(queue, ids);
        }
        return ids;
    }

    private ledgerOf(workerId: string): string[] {
        let ids = this.ledgers.get(workerId);
        if (!ids) {
            ids = [];
            this.ledgers.set(workerId, ids);
        }
        return ids;
    }
}
