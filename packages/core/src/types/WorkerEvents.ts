import { JobStatus, TerminalStatus } from "./Job";

export type DropReason = 'missing' | 'stale' | 'purged';

interface JobLifeCycleEvents {
  'job:claimed': { jobId: string; workerId: string };
  'job:finished': { jobId: string; status: TerminalStatus; duration: number };
  'job:dropped': { jobId: string; reason: DropReason; status?: JobStatus };
  'job:dead-lettered': { jobId: string; error: string };
}

interface WorkerStateEvents {
  'worker:started': { workerId: string; queues: string[] };
  'worker:recovered': { workerId: string; jobIds: string[] };
  'worker:forbidden': { workerId: string };
  'worker:idle': { workerId: string };
  'worker:error': { workerId: string; error: unknown; jobId?: string };
  'worker:stopped': { workerId: string };
}

export type WorkerEventMap = JobLifeCycleEvents & WorkerStateEvents;
