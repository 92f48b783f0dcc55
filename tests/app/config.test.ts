import { ConfigError, loadConfig, parseQueueList } from '../../src/config';

describe('loadConfig', () => {
  const baseEnv = { BROWSER_SERVICE_API_KEY: 'test-secret' };

  it('should apply defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      redis: { url: 'redis://localhost:6379/0', password: undefined, keyPrefix: '' },
      queues: ['default'],
      claimTimeoutSeconds: 0,
      workerIdFile: '.worker_id',
      forbiddenBackoffMs: 30000,
      errorBackoffMs: 5000,
      shutdownGraceMs: 5000,
      browserService: { url: 'http://localhost:3001', apiKey: 'test-secret', timeoutMs: 300000 },
      log: { level: 'info', format: 'json' },
    });
  });

  it('should coerce numeric settings', () => {
    const config = loadConfig({ ...baseEnv, QUEUE_TIMEOUT: '5', ERROR_BACKOFF_MS: '250' });

    expect(config.claimTimeoutSeconds).toBe(5);
    expect(config.errorBackoffMs).toBe(250);
  });

  it('should require the browser service key', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('BROWSER_SERVICE_API_KEY');
  });

  it('should report every invalid value', () => {
    const attempt = () => loadConfig({ ...baseEnv, QUEUE_TIMEOUT: '-1', LOG_FORMAT: 'xml' });
    expect(attempt).toThrow(ConfigError);

    let issues: string[] = [];
    try {
      attempt();
    } catch (error) {
      if (error instanceof ConfigError) issues = error.issues;
    }
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^QUEUE_TIMEOUT: /);
    expect(issues[1]).toMatch(/^LOG_FORMAT: /);
  });
});

describe('parseQueueList', () => {
  it('should accept the default queue and catalog queues', () => {
    expect(parseQueueList('gis:statistics, yandex:reviews ,default')).toEqual([
      'gis:statistics',
      'yandex:reviews',
      'default',
    ]);
  });

  it('should drop duplicates', () => {
    expect(parseQueueList('gis:reviews,gis:reviews')).toEqual(['gis:reviews']);
  });

  it('should reject unknown queues', () => {
    expect(() => parseQueueList('gis:statistics,yandex:post_picture')).toThrow(
      "WORKER_QUEUES: unknown queue 'yandex:post_picture'",
    );
  });

  it('should reject an empty list', () => {
    expect(() => parseQueueList(' , ')).toThrow('WORKER_QUEUES: at least one queue is required');
  });
});
