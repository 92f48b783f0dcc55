import Redis from "ioredis";
import {
    DEFAULT_QUEUE,
    JobFields,
    JobRecord,
    JobStore,
    KeySpace,
    parseJob,
    serializeFields,
    serializeJob,
    StoreUnavailableError,
} from "scrapeq";
import { setTimeout as sleep } from "node:timers/promises";
import path from "path";
import fs from "fs";

export interface RedisJobStoreOptions {
    url?: string;
    password?: string;
    /** Prepended to every key, for sharing one Redis between deployments. */
    keyPrefix?: string;
    /** How often a claim over several queues polls while they are all empty. */
    claimPollIntervalMs?: number;
    /** Pre-built connections; the blocking one may be the same client in tests. */
    client?: Redis;
    blockingClient?: Redis;
}

type TransactionResult = [error: Error | null, result: unknown][] | null;

export class RedisJobStore implements JobStore {
    private client: Redis;
    private blockingClient: Redis;
    private keys: KeySpace;
    private claimPollIntervalMs: number;

    constructor(options: RedisJobStoreOptions = {}) {
        const url = options.url ?? 'redis://localhost:6379/0';
        const redisOptions = {
            password: options.password,
            maxRetriesPerRequest: null,
            lazyConnect: true,
        };
        this.client = options.client ?? new Redis(url, redisOptions);
        this.blockingClient = options.blockingClient ?? options.client ?? new Redis(url, redisOptions);
        this.keys = new KeySpace(options.keyPrefix);
        this.claimPollIntervalMs = options.claimPollIntervalMs ?? 500;
    }

    private enqueueJobLua = fs.readFileSync(path.join(__dirname, 'lua-scripts', 'enqueue-job.lua'), 'utf-8');
    private updateJobLua = fs.readFileSync(path.join(__dirname, 'lua-scripts', 'update-job.lua'), 'utf-8');
    private cancelJobLua = fs.readFileSync(path.join(__dirname, 'lua-scripts', 'cancel-job.lua'), 'utf-8');

    async connect(): Promise<void> {
        await this.run('connect', async () => {
            await this.client.ping();
            if (this.blockingClient !== this.client) {
                await this.blockingClient.ping();
            }
        });
    }

    async disconnect(): Promise<void> {
        // A claim may be blocked on the second connection; drop it instead of queueing QUIT behind it
        if (this.blockingClient !== this.client) {
            this.blockingClient.disconnect();
        }
        await this.client.quit();
    }

    async enqueue(record: JobRecord, queue: string): Promise<boolean> {
        const pairs = Object.entries(serializeJob({ ...record, queue })).flat();

        return this.run('enqueue', async () => {
            const result = await this.client.eval(
                this.enqueueJobLua, 2, this.keys.job(record.id), this.keys.queue(queue), record.id, ...pairs,
            );
            return Number(result) === 1;
        });
    }

    async cancel(jobId: string): Promise<boolean> {
        return this.run('cancel', async () => {
            const result = await this.client.eval(this.cancelJobLua, 1, this.keys.job(jobId));
            return Number(result) === 1;
        });
    }

    async claim(workerId: string, queues: readonly string[], timeoutSeconds: number): Promise<string | null> {
        if (queues.length === 0) return null;

        return this.run('claim', async () => {
            const ledger = this.keys.ledger(workerId);

            if (queues.length === 1) {
                return this.blockingClient.brpoplpush(this.keys.queue(queues[0]), ledger, timeoutSeconds);
            }

            // Each RPOPLPUSH is atomic; no blocking variant spans several lists, so poll
            const deadline = timeoutSeconds > 0 ? Date.now() + timeoutSeconds * 1000 : Infinity;
            while (true) {
                for (const queue of queues) {
                    const jobId = await this.client.rpoplpush(this.keys.queue(queue), ledger);
                    if (jobId) return jobId;
                }
                if (Date.now() >= deadline) return null;
                await sleep(this.claimPollIntervalMs);
            }
        });
    }

    async acknowledge(workerId: string, jobId: string): Promise<void> {
        await this.run('acknowledge', async () => {
            await this.client.lrem(this.keys.ledger(workerId), 1, jobId);
        });
    }

    async deadLetter(jobId: string, fields: JobFields): Promise<void> {
        await this.run('deadLetter', async () => {
            const results = await this.client.multi()
                .hset(this.keys.job(jobId), serializeFields(fields))
                .lpush(this.keys.deadLetter, jobId)
                .exec();
            this.assertTransaction(results);
        });
    }

    async getJob(jobId: string): Promise<JobRecord | null> {
        const hash = await this.run('getJob', () => this.client.hgetall(this.keys.job(jobId)));
        return parseJob(jobId, hash);
    }

    async updateJob(jobId: string, fields: JobFields): Promise<boolean> {
        const pairs = Object.entries(serializeFields(fields)).flat();

        return this.run('updateJob', async () => {
            const result = await this.client.eval(this.updateJobLua, 1, this.keys.job(jobId), ...pairs);
            return Number(result) === 1;
        });
    }

    async requeueFromLedger(workerId: string): Promise<string | null> {
        return this.run('requeueFromLedger', async () => {
            const ledger = this.keys.ledger(workerId);

            // Oldest claim sits at the tail; only this worker writes its ledger
            const jobId = await this.client.lindex(ledger, -1);
            if (jobId === null) return null;

            const queue = await this.client.hget(this.keys.job(jobId), 'queue');
            return this.client.rpoplpush(ledger, this.keys.queue(queue || DEFAULT_QUEUE));
        });
    }

    async ledger(workerId: string): Promise<string[]> {
        return this.run('ledger', () => this.readList(this.keys.ledger(workerId)));
    }

    async isWorkerForbidden(workerId: string): Promise<boolean> {
        return this.run('isWorkerForbidden', async () => {
            return (await this.client.sismember(this.keys.forbiddenWorkers, workerId)) === 1;
        });
    }

    async setWorkerForbidden(workerId: string, forbidden: boolean): Promise<void> {
        await this.run('setWorkerForbidden', async () => {
            if (forbidden) {
                await this.client.sadd(this.keys.forbiddenWorkers, workerId);
            } else {
                await this.client.srem(this.keys.forbiddenWorkers, workerId);
            }
        });
    }

    async pending(queue: string): Promise<string[]> {
        return this.run('pending', () => this.readList(this.keys.queue(queue)));
    }

    async deadLetters(): Promise<string[]> {
        return this.run('deadLetters', () => this.readList(this.keys.deadLetter));
    }

    // Lists grow at the head, so the oldest entry is last
    private async readList(key: string): Promise<string[]> {
        const ids = await this.client.lrange(key, 0, -1);
        return ids.reverse();
    }

    private assertTransaction(results: TransactionResult): void {
        if (results === null) {
            throw new Error('Transaction was aborted');
        }
        for (const [error] of results) {
            if (error) throw error;
        }
    }

    private async run<R>(operation: string, command: () => Promise<R>): Promise<R> {
        try {
            return await command();
        } catch (error) {
            throw new StoreUnavailableError(operation, { cause: error });
        }
    }
}
