import { z } from "zod";
import { InvalidJobRecordError } from "../errors";
import { JOB_STATUSES, JobFields, JobParams, JobRecord } from "../types/Job";

// Jobs are stored as flat string maps; these are the protocol's field names.
const FIELD_KEYS = [
    'status',
    'queue',
    'workerId',
    'createdAt',
    'startedAt',
    'completedAt',
    'resultData',
    'errorMessage',
    'warningMessage',
    'challengeUrl',
] as const satisfies readonly (keyof JobFields)[];

type FieldKey = typeof FIELD_KEYS[number];

const FIELD_NAMES: Record<FieldKey, string> = {
    status: 'status',
    queue: 'queue',
    workerId: 'worker_id',
    createdAt: 'created_at',
    startedAt: 'started_at',
    completedAt: 'completed_at',
    resultData: 'result_data',
    errorMessage: 'error_message',
    warningMessage: 'warning_message',
    challengeUrl: 'challenge_url',
};

export const SCRAPER_TYPE_FIELD = 'scraper_type';
export const OPERATION_TYPE_FIELD = 'operation_type';

/** Field names a job's parameters may not use. */
export const RESERVED_FIELDS: ReadonlySet<string> = new Set(['id', ...Object.values(FIELD_NAMES)]);

const statusSchema = z.enum(JOB_STATUSES);

function field(hash: Record<string, string>, name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(hash, name) ? hash[name] : undefined;
}

export function serializeFields(fields: JobFields): Record<string, string> {
    const hash: Record<string, string> = {};
    for (const key of FIELD_KEYS) {
        const value = fields[key];
        if (value !== undefined) {
            hash[FIELD_NAMES[key]] = value;
        }
    }
    return hash;
}

export function serializeJob(record: JobRecord): Record<string, string> {
    const hash: Record<string, string> = { ...record.params, id: record.id };
    if (record.scraperType !== undefined) hash[SCRAPER_TYPE_FIELD] = record.scraperType;
    if (record.operationType !== undefined) hash[OPERATION_TYPE_FIELD] = record.operationType;
    return { ...hash, ...serializeFields(record) };
}

/**
 * Parses a stored hash. An empty hash means the record does not exist.
 * A record without a status is treated as pending.
 */
export function parseJob(jobId: string, hash: Record<string, string>): JobRecord | null {
    if (Object.keys(hash).length === 0) return null;

    const status = statusSchema.safeParse(field(hash, 'status') ?? 'pending');
    if (!status.success) {
        throw new InvalidJobRecordError(jobId, `unknown status '${field(hash, 'status')}'`);
    }

    const params: JobParams = {};
    for (const [name, value] of Object.entries(hash)) {
        if (!RESERVED_FIELDS.has(name)) {
            params[name] = value;
        }
    }

    return {
        id: jobId,
        status: status.data,
        scraperType: field(hash, SCRAPER_TYPE_FIELD),
        operationType: field(hash, OPERATION_TYPE_FIELD),
        queue: field(hash, FIELD_NAMES.queue),
        workerId: field(hash, FIELD_NAMES.workerId),
        createdAt: field(hash, FIELD_NAMES.createdAt),
        startedAt: field(hash, FIELD_NAMES.startedAt),
        completedAt: field(hash, FIELD_NAMES.completedAt),
        resultData: field(hash, FIELD_NAMES.resultData),
        errorMessage: field(hash, FIELD_NAMES.errorMessage),
        warningMessage: field(hash, FIELD_NAMES.warningMessage),
        challengeUrl: field(hash, FIELD_NAMES.challengeUrl),
        params,
    };
}
