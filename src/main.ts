import { createLogger, flushLogger, Logger, Worker } from "scrapeq";
import { RedisJobStore } from "scrapeq-redis";
import { BrowserServiceClient } from "./browser/BrowserServiceClient";
import { loadConfigFromEnvironment, WorkerConfig } from "./config";
import { loadWorkerIdentity } from "./identity";
import { createScraperExecutor } from "./scrapers/executors";

export interface RunningWorker {
    worker: Worker;
    logger: Logger;
    shutdown(signal: string): Promise<void>;
}

export async function startWorker(config: WorkerConfig): Promise<RunningWorker> {
    const workerId = await loadWorkerIdentity(config.workerIdFile);
    const logger = createLogger({
        level: config.log.level,
        format: config.log.format,
        defaultMeta: { workerId },
    });

    const browser = new BrowserServiceClient({
        url: config.browserService.url,
        apiKey: config.browserService.apiKey,
        timeoutMs: config.browserService.timeoutMs,
        logger,
    });
    const store = new RedisJobStore({
        url: config.redis.url,
        password: config.redis.password,
        keyPrefix: config.redis.keyPrefix,
    });

    const worker = new Worker({
        workerId,
        execute: createScraperExecutor(browser),
        queues: config.queues,
        store,
        logger,
        claimTimeoutSeconds: config.claimTimeoutSeconds,
        forbiddenBackoffMs: config.forbiddenBackoffMs,
        errorBackoffMs: config.errorBackoffMs,
    });

    await worker.start();

    let stopping: Promise<void> | null = null;
    const shutdown = (signal: string): Promise<void> => {
        if (!stopping) {
            stopping = (async () => {
                logger.info(`Received ${signal}. Shutting down gracefully...`);
                await worker.stop(config.shutdownGraceMs);
                await browser.close();
                logger.info("Worker metrics at shutdown", { metrics: worker.getMetrics() });
            })();
        }
        return stopping;
    };

    return { worker, logger, shutdown };
}

async function main(): Promise<void> {
    const config = loadConfigFromEnvironment();
    const { logger, shutdown } = await startWorker(config);

    for (const signal of ["SIGTERM", "SIGINT"] as const) {
        process.once(signal, () => {
            shutdown(signal)
                .then(() => flushLogger(logger))
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    console.error("Shutdown failed:", error);
                    process.exit(1);
                });
        });
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error("Worker failed to start:", error);
        process.exit(1);
    });
}
