import { ExecutorTableError } from "./errors";
import { OPERATION_TYPE_FIELD, SCRAPER_TYPE_FIELD } from "./storage/codec";
import { queueName } from "./storage/keys";
import { Executor } from "./types/Outcome";

/** Scraper type -> the operations it supports. */
export type OperationCatalog = Readonly<Record<string, readonly string[]>>;

/** One executor per (scraper, operation) pair of a catalog; missing pairs fail to compile. */
export type ExecutorTable<C extends OperationCatalog> = {
    readonly [S in keyof C]: { readonly [O in C[S][number]]: Executor };
};

type ExecutorRows = Readonly<Record<string, Readonly<Record<string, Executor>> | undefined>>;

/** Every `<scraper>:<operation>` queue name a catalog defines. */
export function catalogQueues(catalog: OperationCatalog): string[] {
    return Object.entries(catalog).flatMap(([scraper, operations]) =>
        operations.map((operation) => queueName(scraper, operation)),
    );
}

export function validateExecutorTable(catalog: OperationCatalog, table: ExecutorRows): void {
    const problems: string[] = [];

    for (const [scraper, operations] of Object.entries(catalog)) {
        const row = table[scraper];
        for (const operation of operations) {
            if (typeof row?.[operation] !== 'function') {
                problems.push(`missing executor for ${scraper}/${operation}`);
            }
        }
    }

    for (const [scraper, row] of Object.entries(table)) {
        const known = catalog[scraper];
        for (const operation of Object.keys(row ?? {})) {
            if (!known?.includes(operation)) {
                problems.push(`unexpected executor for ${scraper}/${operation}`);
            }
        }
    }

    if (problems.length > 0) {
        throw new ExecutorTableError(problems);
    }
}

/**
 * Builds the Executor the worker runs: looks up the job's scraper_type and
 * operation_type in a table checked against the catalog up front.
 */
export function createDispatcher(catalog: OperationCatalog, table: ExecutorRows): Executor {
    validateExecutorTable(catalog, table);

    const executors = new Map<string, Executor>();
    for (const [scraper, operations] of Object.entries(catalog)) {
        const row = table[scraper];
        for (const operation of operations) {
            const executor = row?.[operation];
            if (executor) {
                executors.set(queueName(scraper, operation), executor);
            }
        }
    }

    return async (jobId, params) => {
        const scraperType = params[SCRAPER_TYPE_FIELD];
        const operationType = params[OPERATION_TYPE_FIELD];

        if (!scraperType || !operationType) {
            return { status: 'failed', error: `Job ${jobId} must define ${SCRAPER_TYPE_FIELD} and ${OPERATION_TYPE_FIELD}` };
        }

        const executor = executors.get(queueName(scraperType, operationType));
        if (!executor) {
            return { status: 'failed', error: `Unknown job type: ${scraperType}/${operationType}` };
        }

        return executor(jobId, params);
    };
}
