import { JobStore } from "./storage/JobStore";
import { Logger } from "./utils/logger";

/**
 * Moves every job id left in a worker's processing ledger back onto its
 * pending queue, one atomic move at a time, until the ledger is empty.
 * Job status is not inspected: the worker loop drops terminal records and
 * finalizes cancelled ones when it claims them again.
 */
export async function recoverInterruptedJobs(store: JobStore, workerId: string, logger: Logger): Promise<string[]> {
    const interrupted = await store.ledger(workerId);
    if (interrupted.length === 0) {
        logger.info('No interrupted jobs to recover.', { workerId });
        return [];
    }

    logger.warn(`Found ${interrupted.length} interrupted job(s). Re-queueing...`, { workerId });

    const recovered: string[] = [];
    let jobId: string | null;
    while ((jobId = await store.requeueFromLedger(workerId)) !== null) {
        recovered.push(jobId);
        logger.info(`Re-queued job ${jobId}.`, { workerId, jobId });
    }

    logger.warn('Recovery complete.', { workerId, recovered: recovered.length });
    return recovered;
}
