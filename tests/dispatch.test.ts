import { catalogQueues, createDispatcher, Executor, ExecutorTableError, validateExecutorTable } from 'scrapeq';

const CATALOG = {
  alpha: ['fetch', 'count'],
  beta: ['fetch'],
} as const;

const succeed = (payload: unknown): Executor => async () => ({ status: 'success', payload });

describe('dispatch', () => {
  it('should list one queue per catalog entry', () => {
    expect(catalogQueues(CATALOG)).toEqual(['alpha:fetch', 'alpha:count', 'beta:fetch']);
  });

  it('should route a job to the executor for its pair', async () => {
    const execute = createDispatcher(CATALOG, {
      alpha: { fetch: succeed('alpha-fetch'), count: succeed('alpha-count') },
      beta: { fetch: succeed('beta-fetch') },
    });

    const outcome = await execute('job-1', { scraper_type: 'alpha', operation_type: 'count' });

    expect(outcome).toEqual({ status: 'success', payload: 'alpha-count' });
  });

  it('should pass the job id and params through', async () => {
    const fetch = jest.fn<ReturnType<Executor>, Parameters<Executor>>(async () => ({ status: 'success', payload: 1 }));
    const execute = createDispatcher(CATALOG, {
      alpha: { fetch, count: succeed(null) },
      beta: { fetch: succeed(null) },
    });

    await execute('job-7', { scraper_type: 'alpha', operation_type: 'fetch', target_id: 't' });

    expect(fetch).toHaveBeenCalledWith('job-7', { scraper_type: 'alpha', operation_type: 'fetch', target_id: 't' });
  });

  it('should fail an unknown pair without throwing', async () => {
    const execute = createDispatcher(CATALOG, {
      alpha: { fetch: succeed(null), count: succeed(null) },
      beta: { fetch: succeed(null) },
    });

    await expect(execute('job-1', { scraper_type: 'beta', operation_type: 'count' })).resolves.toEqual({
      status: 'failed',
      error: 'Unknown job type: beta/count',
    });
  });

  it('should fail a job without a scraper or operation type', async () => {
    const execute = createDispatcher(CATALOG, {
      alpha: { fetch: succeed(null), count: succeed(null) },
      beta: { fetch: succeed(null) },
    });

    await expect(execute('job-1', { scraper_type: 'alpha' })).resolves.toEqual({
      status: 'failed',
      error: 'Job job-1 must define scraper_type and operation_type',
    });
  });

  it('should reject a table that misses or adds entries', () => {
    const table = {
      alpha: { fetch: succeed(null) },
      beta: { fetch: succeed(null), extra: succeed(null) },
    };

    expect(() => validateExecutorTable(CATALOG, table)).toThrow(ExecutorTableError);
    expect(() => validateExecutorTable(CATALOG, table)).toThrow(
      'Executor table does not match the operation catalog: missing executor for alpha/count; unexpected executor for beta/extra',
    );
  });
});
