import { Metrics } from 'scrapeq';

describe('Metrics', () => {
  let metrics: Metrics;

  beforeEach(() => {
    metrics = new Metrics();
  });

  it('should count outcomes by status', () => {
    metrics.recordOutcome('completed');
    metrics.recordOutcome('completed');
    metrics.recordOutcome('warning');
    metrics.recordOutcome('failed');
    metrics.recordOutcome('cancelled');

    const snapshot = metrics.getSnapshot();
    expect(snapshot.jobsCompleted).toBe(2);
    expect(snapshot.jobsWarning).toBe(1);
    expect(snapshot.jobsFailed).toBe(1);
    expect(snapshot.jobsCancelled).toBe(1);
    expect(snapshot.successRate).toBe(75);
  });

  it('should summarise processing times', () => {
    [10, 20, 30, 40].forEach((ms) => metrics.recordProcessingTime(ms));

    const snapshot = metrics.getSnapshot();
    expect(snapshot.avgProcessingTime).toBe(25);
    expect(snapshot.minProcessingTime).toBe(10);
    expect(snapshot.maxProcessingTime).toBe(40);
    expect(snapshot.p50ProcessingTime).toBe(20);
    expect(snapshot.p95ProcessingTime).toBe(40);
  });

  it('should report zeros before anything ran', () => {
    const snapshot = metrics.getSnapshot();
    expect(snapshot.minProcessingTime).toBe(0);
    expect(snapshot.p99ProcessingTime).toBe(0);
    expect(snapshot.successRate).toBe(0);
  });

  it('should reset every counter', () => {
    metrics.incrementJobsClaimed();
    metrics.incrementJobsRecovered(3);
    metrics.incrementJobsDeadLettered();
    metrics.recordProcessingTime(5);

    metrics.reset();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.jobsClaimed).toBe(0);
    expect(snapshot.jobsRecovered).toBe(0);
    expect(snapshot.jobsDeadLettered).toBe(0);
    expect(snapshot.avgProcessingTime).toBe(0);
  });
});
