import { MemoryJobStore } from "./MemoryJobStore";

const memoryStoreRegistry = new Map<string, MemoryJobStore>();

/**
 * Get or create the in-process store for a namespace, so a Queue and a Worker
 * built without an explicit store share state.
 * For Redis, pass a RedisJobStore to the Queue/Worker constructors instead.
 */
export function getMemoryStore(namespace: string = 'default'): MemoryJobStore {
    let store = memoryStoreRegistry.get(namespace);
    if (!store) {
        store = new MemoryJobStore();
        memoryStoreRegistry.set(namespace, store);
    }
    return store;
}

export function clearMemoryStoreRegistry(): void {
    memoryStoreRegistry.clear();
}
