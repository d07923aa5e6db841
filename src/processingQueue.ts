import logger from './logger.js';

type Task = (callback: (err: Error | null) => void) => void;

/**
 * Runs queued tasks one at a time, in submission order.
 */
export class ProcessingQueue {
    queue: Task[];
    processing: boolean;

    constructor() {
        this.queue = [];
        this.processing = false;
    }

    push(f: Task = cb => cb(null)): void {
        this.queue.push(f);
        if (!this.processing) {
            this.processing = true;
            this.execute();
        }
    }

    /**
     * Queues an async task and settles with its outcome once it has had its turn.
     */
    run<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.push(done => {
                task().then(
                    result => {
                        resolve(result);
                        done(null);
                    },
                    (err: unknown) => {
                        reject(err);
                        done(err instanceof Error ? err : new Error(String(err)));
                    }
                );
            });
        });
    }

    get length(): number {
        return this.queue.length;
    }

    private execute(): void {
        const first = this.queue.shift();
        if (first) {
            first(err => {
                if (err) {
                    logger.debug(`[processing-queue] Task failed: ${err.message}`);
                }
                if (this.queue.length > 0) {
                    this.execute();
                } else {
                    this.processing = false;
                }
            });
        } else {
            this.processing = false;
        }
    }
}

export default ProcessingQueue;
