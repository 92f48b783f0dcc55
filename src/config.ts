import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_QUEUE, catalogQueues } from "scrapeq";
import { SCRAPER_OPERATIONS } from "./scrapers/catalog";

/**
 * Environment schema for the worker process.
 * Numbers arrive as strings and are coerced; everything except the
 * browser-service key has a default.
 */
const EnvSchema = z.object({
    // ─── Store ────────────────────────────────────────────────
    REDIS_URL: z.string().url({ message: "REDIS_URL must be a valid URL" }).default("redis://localhost:6379/0"),
    REDIS_PASSWORD: z.string().optional(),
    REDIS_KEY_PREFIX: z.string().default(""),

    // ─── Worker loop ────────────────────────────────────────────────
    QUEUE_TIMEOUT: z.coerce.number().int().min(0).default(0),
    WORKER_QUEUES: z.string().default(DEFAULT_QUEUE),
    WORKER_ID_FILE: z.string().min(1).default(".worker_id"),
    FORBIDDEN_BACKOFF_MS: z.coerce.number().int().min(0).default(30000),
    ERROR_BACKOFF_MS: z.coerce.number().int().min(0).default(5000),
    SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(5000),

    // ─── Browser service ────────────────────────────────────────────────
    BROWSER_SERVICE_URL: z.string().url({ message: "BROWSER_SERVICE_URL must be a valid URL" }).default("http://localhost:3001"),
    BROWSER_SERVICE_API_KEY: z.string().min(1, "BROWSER_SERVICE_API_KEY is required"),
    BROWSER_SERVICE_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),

    // ─── Logging ────────────────────────────────────────────────
    LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
    LOG_FORMAT: z.enum(["json", "simple"]).default("json"),
});

export interface WorkerConfig {
    redis: { url: string; password?: string; keyPrefix: string };
    queues: string[];
    claimTimeoutSeconds: number;
    workerIdFile: string;
    forbiddenBackoffMs: number;
    errorBackoffMs: number;
    shutdownGraceMs: number;
    browserService: { url: string; apiKey: string; timeoutMs: number };
    log: { level: string; format: "json" | "simple" };
}

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid worker configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

/** Splits WORKER_QUEUES and rejects names that no scraper operation defines. */
export function parseQueueList(value: string): string[] {
    const known = new Set([DEFAULT_QUEUE, ...catalogQueues(SCRAPER_OPERATIONS)]);
    const queues = [...new Set(value.split(",").map((name) => name.trim()).filter((name) => name.length > 0))];

    if (queues.length === 0) {
        throw new ConfigError(["WORKER_QUEUES: at least one queue is required"]);
    }

    const unknown = queues.filter((name) => !known.has(name));
    if (unknown.length > 0) {
        throw new ConfigError(unknown.map((name) => `WORKER_QUEUES: unknown queue '${name}'`));
    }

    return queues;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
    }

    const values = parsed.data;
    return {
        redis: {
            url: values.REDIS_URL,
            password: values.REDIS_PASSWORD,
            keyPrefix: values.REDIS_KEY_PREFIX,
        },
        queues: parseQueueList(values.WORKER_QUEUES),
        claimTimeoutSeconds: values.QUEUE_TIMEOUT,
        workerIdFile: values.WORKER_ID_FILE,
        forbiddenBackoffMs: values.FORBIDDEN_BACKOFF_MS,
        errorBackoffMs: values.ERROR_BACKOFF_MS,
        shutdownGraceMs: values.SHUTDOWN_GRACE_MS,
        browserService: {
            url: values.BROWSER_SERVICE_URL,
            apiKey: values.BROWSER_SERVICE_API_KEY,
            timeoutMs: values.BROWSER_SERVICE_TIMEOUT_MS,
        },
        log: {
            level: values.LOG_LEVEL,
            format: values.LOG_FORMAT,
        },
    };
}

/** Loads `.env` (or ENV_FILE) into process.env when present, then validates it. */
export function loadConfigFromEnvironment(): WorkerConfig {
    dotenv.config({ path: process.env.ENV_FILE || ".env" });
    return loadConfig(process.env);
}
