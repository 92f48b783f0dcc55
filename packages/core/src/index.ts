// Core
export { Queue } from "./Queue";
export type { QueueOptions, AddOptions } from "./Queue";
export { Worker, CANCELLED_BEFORE_EXECUTION } from "./Worker";
export type { WorkerOptions } from "./Worker";
export { recoverInterruptedJobs } from "./recovery";

// Types
export { JOB_STATUSES, TERMINAL_STATUSES, isTerminalStatus } from "./types/Job";
export type { JobStatus, TerminalStatus, JobRecord, JobFields, JobParams, NewJob } from "./types/Job";
export type { ExecutionOutcome, Executor } from "./types/Outcome";
export type { WorkerEventMap, DropReason } from "./types/WorkerEvents";

// Outcome classification and dispatch
export { isDegeneratePayload, toTerminalFields, DEFAULT_SENTINELS, DEFAULT_IDENTITY_KEYS, EMPTY_RESULT_NOTE } from "./classify";
export type { ClassifyOptions, TerminalFields } from "./classify";
export { createDispatcher, validateExecutorTable, catalogQueues } from "./dispatch";
export type { OperationCatalog, ExecutorTable } from "./dispatch";

// Storage (for implementing custom stores)
export type { JobStore } from "./storage/JobStore";
export { MemoryJobStore } from "./storage/MemoryJobStore";
export { getMemoryStore, clearMemoryStoreRegistry } from "./storage/StoreRegistry";
export { KeySpace, DEFAULT_QUEUE, queueName } from "./storage/keys";
export { parseJob, serializeJob, serializeFields, RESERVED_FIELDS, SCRAPER_TYPE_FIELD, OPERATION_TYPE_FIELD } from "./storage/codec";

// Errors
export { StoreUnavailableError, InvalidJobRecordError, DuplicateJobError, ExecutorTableError } from "./errors";

// Logging and metrics
export { createLogger, flushLogger, logger } from "./utils/logger";
export type { Logger, LoggerOptions } from "./utils/logger";
export { Metrics } from "./metrics/metrics";
export type { MetricsSnapshot } from "./metrics/metrics";
