import { EventEmitter } from 'node:events';
import { createLogger, WorkerEventMap } from 'scrapeq';

export const silentLogger = createLogger({ silent: true });

export function waitForEvent<K extends keyof WorkerEventMap>(
  emitter: EventEmitter,
  event: K,
  predicate: (payload: WorkerEventMap[K]) => boolean = () => true,
  timeoutMs = 2000,
): Promise<WorkerEventMap[K]> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      emitter.off(event, listener);
      reject(new Error(`Timed out waiting for ${event}`));
    }, timeoutMs);

    const listener = (payload: WorkerEventMap[K]) => {
      if (!predicate(payload)) return;
      clearTimeout(timer);
      emitter.off(event, listener);
      resolve(payload);
    };

    emitter.on(event, listener);
  });
}
