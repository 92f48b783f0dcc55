import { randomUUID } from "node:crypto";
import fs from "fs";
import path from "path";

export function generateWorkerId(): string {
    return `worker-${randomUUID()}`;
}

/**
 * Returns the identity stored in `file`, creating and persisting a new one
 * on first start. A stable identity lets a restarted worker find its own
 * processing ledger.
 */
export async function loadWorkerIdentity(file: string): Promise<string> {
    try {
        const stored = (await fs.promises.readFile(file, "utf-8")).trim();
        if (stored) return stored;
    } catch (error) {
        if (!isMissingFile(error)) throw error;
    }

    const workerId = generateWorkerId();
    await fs.promises.mkdir(path.dirname(path.resolve(file)), { recursive: true });
    await fs.promises.writeFile(file, `${workerId}\n`, "utf-8");
    return workerId;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
