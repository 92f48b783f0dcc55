import { TerminalStatus } from "../types/Job";

export interface MetricsSnapshot {
  jobsClaimed: number;
  jobsCompleted: number;
  jobsWarning: number;
  jobsFailed: number;
  jobsCancelled: number;
  jobsDropped: number;
  jobsDeadLettered: number;
  jobsRecovered: number;

  avgProcessingTime: number;
  maxProcessingTime: number;
  minProcessingTime: number;

  p50ProcessingTime: number;
  p95ProcessingTime: number;
  p99ProcessingTime: number;

  successRate: number; // percentage of executed jobs that completed or warned
  uptimeMs: number;
}

export class Metrics {
  private jobsClaimed: number = 0
  private jobsCompleted: number = 0
  private jobsWarning: number = 0
  private jobsFailed: number = 0
  private jobsCancelled: number = 0
  private jobsDropped: number = 0
  private jobsDeadLettered: number = 0
  private jobsRecovered: number = 0

  private readonly maxSamples: number = 1000;
  private processingTimes: number[] = []

  private totalProcessingTime: number = 0;
  private processedCount: number = 0;
  private maxProcessingTime: number = 0;
  private minProcessingTime: number = Infinity;

  private readonly startTime: number = Date.now();

  incrementJobsClaimed(): void {
    this.jobsClaimed++
  }

  recordOutcome(status: TerminalStatus): void {
    switch (status) {
      case 'completed':
        this.jobsCompleted++
        break
      case 'warning':
        this.jobsWarning++
        break
      case 'failed':
        this.jobsFailed++
        break
      case 'cancelled':
        this.jobsCancelled++
        break
    }
  }

  incrementJobsDropped(): void {
    this.jobsDropped++
  }

  incrementJobsDeadLettered(): void {
    this.jobsDeadLettered++
  }

  incrementJobsRecovered(count: number = 1): void {
    this.jobsRecovered += count
  }

  recordProcessingTime(durationMs: number): void {
    if (this.processingTimes.length >= this.maxSamples) {
      this.processingTimes.shift()
    }
    this.processingTimes.push(durationMs)

    this.totalProcessingTime += durationMs
    this.processedCount++
    this.maxProcessingTime = Math.max(this.maxProcessingTime, durationMs)
    this.minProcessingTime = Math.min(this.minProcessingTime, durationMs)
  }

  calculatePercentile(percentile: number): number {
    if (this.processingTimes.length === 0) return 0;

    const sorted = [...this.processingTimes].sort((a, b) => a - b);
    const index = Math.ceil((percentile / 100) * sorted.length) - 1;
    return sorted[Math.max(index, 0)];
  }

  getSnapshot(): MetricsSnapshot {
    const executed = this.jobsCompleted + this.jobsWarning + this.jobsFailed;

    return {
      jobsClaimed: this.jobsClaimed,
      jobsCompleted: this.jobsCompleted,
      jobsWarning: this.jobsWarning,
      jobsFailed: this.jobsFailed,
      jobsCancelled: this.jobsCancelled,
      jobsDropped: this.jobsDropped,
      jobsDeadLettered: this.jobsDeadLettered,
      jobsRecovered: this.jobsRecovered,

      avgProcessingTime: this.processedCount > 0 ? this.totalProcessingTime / this.processedCount : 0,
      maxProcessingTime: this.maxProcessingTime,
      minProcessingTime: this.minProcessingTime === Infinity ? 0 : this.minProcessingTime,

      p50ProcessingTime: this.calculatePercentile(50),
      p95ProcessingTime: this.calculatePercentile(95),
      p99ProcessingTime: this.calculatePercentile(99),

      successRate: executed > 0 ? ((this.jobsCompleted + this.jobsWarning) / executed) * 100 : 0,
      uptimeMs: Date.now() - this.startTime
    }
  }

  reset(): void {
    this.jobsClaimed = 0
    this.jobsCompleted = 0
    this.jobsWarning = 0
    this.jobsFailed = 0
    this.jobsCancelled = 0
    this.jobsDropped = 0
    this.jobsDeadLettered = 0
    this.jobsRecovered = 0

    this.processingTimes = []
    this.totalProcessingTime = 0;
    this.processedCount = 0;
    this.maxProcessingTime = 0;
    this.minProcessingTime = Infinity;
  }
}

export default Metrics;
