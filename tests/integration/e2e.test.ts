import type { Redis as RedisClient } from 'ioredis';
import Redis from 'ioredis-mock';
import { Queue, recoverInterruptedJobs, Worker } from 'scrapeq';
import { RedisJobStore } from 'scrapeq-redis';
import { ScrapeRun } from '../../src/browser/BrowserServiceClient';
import { createScraperExecutor, ScrapeRunner } from '../../src/scrapers/executors';
import { silentLogger } from '../utils/helpers';

describe('End-to-end over the Redis store', () => {
  let redis: RedisClient;
  let store: RedisJobStore;
  let queue: Queue;
  let runs: ScrapeRun[];

  const runner: ScrapeRunner = {
    run: async (request) => {
      runs.push(request);
      if (request.params.target_id === 'explode') {
        throw new Error('socket hang up');
      }
      return { status: 'success', payload: { target_id: request.params.target_id, visits: 120 } };
    },
  };

  const createWorker = (workerId: string) =>
    new Worker({
      workerId,
      execute: createScraperExecutor(runner),
      store,
      logger: silentLogger,
      claimTimeoutSeconds: 1,
      errorBackoffMs: 0,
    });

  beforeEach(async () => {
    redis = new Redis();
    await redis.flushall();
    store = new RedisJobStore({ client: redis, blockingClient: redis });
    queue = new Queue({ store });
    runs = [];
  });

  it('should complete a job with a non-empty result', async () => {
    await queue.add({ id: 'j1', scraperType: 'gis', operationType: 'statistics', params: { target_id: '123' } });
    const worker = createWorker('worker-w');

    expect(await worker.processNext()).toBe('j1');

    const job = await queue.getJob('j1');
    expect(job?.status).toBe('completed');
    expect(job?.resultData).toBe('{"target_id":"123","visits":120}');
    expect(await store.ledger('worker-w')).toEqual([]);
    expect(runs).toEqual([
      {
        jobId: 'j1',
        scraperType: 'gis',
        operationType: 'statistics',
        params: { target_id: '123', scraper_type: 'gis', operation_type: 'statistics' },
      },
    ]);
  });

  it('should dead-letter a job whose execution throws', async () => {
    await queue.add({ id: 'j2', scraperType: 'gis', operationType: 'statistics', params: { target_id: 'explode' } });
    const worker = createWorker('worker-w');

    await worker.processNext();

    const job = await queue.getJob('j2');
    expect(job?.status).toBe('failed');
    expect(job?.errorMessage).toBe('Unhandled worker exception: socket hang up');
    expect(await queue.getDeadLetters()).toEqual(['j2']);
    expect(await store.ledger('worker-w')).toEqual([]);
  });

  it('should recover a job left behind by a crashed worker', async () => {
    await queue.add({ id: 'j3', scraperType: 'yandex', operationType: 'reviews', params: { target_id: '77' } });
    expect(await store.claim('worker-w', ['default'], 1)).toBe('j3');

    const recovered = await recoverInterruptedJobs(store, 'worker-w', silentLogger);

    expect(recovered).toEqual(['j3']);
    expect(await store.ledger('worker-w')).toEqual([]);
    expect(await store.pending('default')).toEqual(['j3']);

    const worker = createWorker('worker-w');
    expect(await worker.processNext()).toBe('j3');
    expect((await queue.getJob('j3'))?.status).toBe('completed');
  });

  it('should finalize a job cancelled while pending without executing it', async () => {
    await queue.add({ id: 'j4', scraperType: 'gis', operationType: 'reviews', params: { target_id: '5' } });
    expect(await queue.cancel('j4')).toBe(true);
    const worker = createWorker('worker-w');

    await worker.processNext();

    expect(runs).toEqual([]);
    const job = await queue.getJob('j4');
    expect(job?.status).toBe('cancelled');
    expect(job?.errorMessage).toBe('Job was cancelled before execution.');
    expect(await store.ledger('worker-w')).toEqual([]);
  });

  it('should fail a job missing its required params', async () => {
    await queue.add({ id: 'j5', scraperType: 'gis', operationType: 'complain', params: { target_id: '5' } });
    const worker = createWorker('worker-w');

    await worker.processNext();

    const job = await queue.getJob('j5');
    expect(job?.status).toBe('failed');
    expect(job?.errorMessage).toBe('Missing required parameter(s): review_id, reason_text');
    expect(runs).toEqual([]);
  });

  it('should give every job to exactly one worker', async () => {
    for (let i = 0; i < 6; i++) {
      await queue.add({ id: `job-${i}`, scraperType: 'gis', operationType: 'statistics', params: { target_id: `${i}` } });
    }
    const first = createWorker('worker-1');
    const second = createWorker('worker-2');

    for (let round = 0; round < 3; round++) {
      await Promise.all([first.processNext(), second.processNext()]);
    }

    const executed = runs.map((run) => run.jobId).sort();
    expect(executed).toEqual(['job-0', 'job-1', 'job-2', 'job-3', 'job-4', 'job-5']);
    expect(await store.pending('default')).toEqual([]);
    expect(first.getMetrics().jobsCompleted + second.getMetrics().jobsCompleted).toBe(6);
  });

  it('should keep every dead-lettered record failed with an error message', async () => {
    await queue.add({ id: 'a', scraperType: 'gis', operationType: 'statistics', params: { target_id: 'explode' } });
    await queue.add({ id: 'b', scraperType: 'gis', operationType: 'statistics', params: { target_id: '1' } });
    await queue.add({ id: 'c', scraperType: 'gis', operationType: 'statistics', params: { target_id: 'explode' } });
    const worker = createWorker('worker-w');

    for (let i = 0; i < 3; i++) {
      await worker.processNext();
    }

    const deadLetters = await queue.getDeadLetters();
    expect(deadLetters).toEqual(['a', 'c']);
    for (const jobId of deadLetters) {
      const job = await queue.getJob(jobId);
      expect(job?.status).toBe('failed');
      expect(job?.errorMessage).toBe('Unhandled worker exception: socket hang up');
    }
  });
});
