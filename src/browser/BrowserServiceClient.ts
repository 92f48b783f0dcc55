import { Dispatcher, Pool } from "undici";
import { z } from "zod";
import { ExecutionOutcome, JobParams, Logger } from "scrapeq";

export interface BrowserServiceOptions {
    url: string;
    apiKey: string;
    timeoutMs?: number;
    logger: Logger;
    /** Replaces the connection pool, e.g. with a MockAgent in tests. */
    dispatcher?: Dispatcher;
}

export interface ScrapeRun {
    jobId: string;
    scraperType: string;
    operationType: string;
    params: JobParams;
}

export class BrowserServiceError extends Error {
    readonly statusCode: number;

    constructor(message: string, statusCode: number) {
        super(message);
        this.name = "BrowserServiceError";
        this.statusCode = statusCode;
    }
}

const ReplySchema = z.discriminatedUnion("status", [
    z.object({ status: z.literal("success"), payload: z.unknown() }),
    z.object({ status: z.literal("warning"), payload: z.unknown(), note: z.string() }),
    z.object({ status: z.literal("failed"), error: z.string() }),
    z.object({ status: z.literal("captcha_required"), challenge_url: z.string() }),
]);

const ErrorBodySchema = z
    .object({ error: z.string().optional(), message: z.string().optional() })
    .passthrough();

/**
 * Talks to the remote browser service that drives the actual scraping.
 * One pooled keep-alive connection set per worker process.
 */
export class BrowserServiceClient {
    private readonly dispatcher: Dispatcher;
    private readonly origin: string;
    private readonly ownsPool: boolean;
    private readonly apiKey: string;
    private readonly timeoutMs: number;
    private readonly logger: Logger;

    constructor(options: BrowserServiceOptions) {
        if (!options.apiKey) {
            throw new Error("BrowserServiceClient requires an apiKey");
        }
        this.apiKey = options.apiKey;
        this.timeoutMs = options.timeoutMs ?? 300000;
        this.logger = options.logger;
        this.origin = new URL(options.url).origin;

        if (options.dispatcher) {
            this.dispatcher = options.dispatcher;
            this.ownsPool = false;
        } else {
            this.dispatcher = new Pool(this.origin, {
                connections: 10,
                pipelining: 0,
                keepAliveTimeout: 10000,
                keepAliveMaxTimeout: 10000,
            });
            this.ownsPool = true;
        }
    }

    async run(request: ScrapeRun): Promise<ExecutionOutcome> {
        const startTime = Date.now();

        this.logger.info(`Requesting ${request.scraperType}/${request.operationType} from browser service`, {
            jobId: request.jobId,
        });

        const { statusCode, body } = await this.dispatcher.request({
            origin: this.origin,
            path: "/scrape/run",
            method: "POST",
            headers: {
                "content-type": "application/json",
                "x-api-key": this.apiKey,
            },
            body: JSON.stringify({
                job_id: request.jobId,
                scraper_type: request.scraperType,
                operation_type: request.operationType,
                params: request.params,
            }),
            headersTimeout: this.timeoutMs,
            bodyTimeout: this.timeoutMs,
        });

        const text = await body.text();
        const duration = Date.now() - startTime;

        if (statusCode >= 400) {
            const message = this.errorMessage(text) ?? `HTTP Error ${statusCode}`;
            this.logger.warn(`Browser service rejected the request: ${message}`, { jobId: request.jobId, statusCode, duration });
            return { status: "failed", error: message };
        }

        const reply = ReplySchema.safeParse(this.parseJson(text, statusCode));
        if (!reply.success) {
            throw new BrowserServiceError(
                `Malformed browser service reply: ${reply.error.issues.map((issue) => issue.message).join(", ")}`,
                statusCode,
            );
        }

        this.logger.info(`Browser service replied ${reply.data.status} in ${duration}ms`, { jobId: request.jobId });

        switch (reply.data.status) {
            case "success":
                return { status: "success", payload: reply.data.payload };
            case "warning":
                return { status: "warning", payload: reply.data.payload, note: reply.data.note };
            case "failed":
                return { status: "failed", error: reply.data.error };
            case "captcha_required":
                return { status: "captcha_required", challengeUrl: reply.data.challenge_url };
        }
    }

    async close(): Promise<void> {
        if (this.ownsPool) {
            await this.dispatcher.close();
        }
    }

    private parseJson(text: string, statusCode: number): unknown {
        try {
            return JSON.parse(text);
        } catch {
            throw new BrowserServiceError("Browser service reply is not valid JSON", statusCode);
        }
    }

    private errorMessage(text: string): string | undefined {
        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch {
            return text.trim() || undefined;
        }
        const result = ErrorBodySchema.safeParse(parsed);
        if (!result.success) return undefined;
        return result.data.error || result.data.message || undefined;
    }
}
