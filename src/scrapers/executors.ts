import { createDispatcher, Executor, ExecutorTable } from "scrapeq";
import { ScrapeRun } from "../browser/BrowserServiceClient";
import { OperationType, requiredParams, SCRAPER_OPERATIONS, ScraperType } from "./catalog";

/** The part of the browser-service client the executors need. */
export interface ScrapeRunner {
    run(request: ScrapeRun): ReturnType<Executor>;
}

function operation<S extends ScraperType>(runner: ScrapeRunner, scraperType: S, operationType: OperationType<S>): Executor {
    const required = requiredParams(scraperType, operationType);

    return async (jobId, params) => {
        const missing = required.filter((name) => !params[name]);
        if (missing.length > 0) {
            return { status: "failed", error: `Missing required parameter(s): ${missing.join(", ")}` };
        }
        return runner.run({ jobId, scraperType, operationType, params });
    };
}

export function buildExecutorTable(runner: ScrapeRunner) {
    return {
        yandex: {
            statistics: operation(runner, "yandex", "statistics"),
            competitors: operation(runner, "yandex", "competitors"),
            reviews: operation(runner, "yandex", "reviews"),
        },
        gis: {
            statistics: operation(runner, "gis", "statistics"),
            reviews: operation(runner, "gis", "reviews"),
            reviews_summary: operation(runner, "gis", "reviews_summary"),
            send_answer: operation(runner, "gis", "send_answer"),
            complain: operation(runner, "gis", "complain"),
            post_picture: operation(runner, "gis", "post_picture"),
        },
    } satisfies ExecutorTable<typeof SCRAPER_OPERATIONS>;
}

export function createScraperExecutor(runner: ScrapeRunner): Executor {
    return createDispatcher(SCRAPER_OPERATIONS, buildExecutorTable(runner));
}
