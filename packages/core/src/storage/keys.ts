export const DEFAULT_QUEUE = 'default';

/** Name of the queue dedicated to one scraper operation, e.g. `gis:statistics`. */
export function queueName(scraperType: string, operationType: string): string {
    return `${scraperType}:${operationType}`;
}

export class KeySpace {
    private prefix: string;

    constructor(prefix: string = '') {
        this.prefix = prefix;
    }

    queue(name: string): string {
        return name === DEFAULT_QUEUE
            ? `${this.prefix}jobs:queue`
            : `${this.prefix}jobs:queue:${name}`;
    }

    job(id: string): string {
        return `${this.prefix}job:${id}`;
    }

    ledger(workerId: string): string {
        return `${this.prefix}jobs:processing:${workerId}`;
    }

    get deadLetter(): string {
        return `${this.prefix}jobs:dead-letter`;
    }

    get forbiddenWorkers(): string {
        return `${this.prefix}forbidden:workers`;
    }
}
