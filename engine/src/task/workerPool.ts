import { logger } from '../core/logger.js';

export type JobHandler = (signal: AbortSignal) => Promise<void>;

interface JobEntry {
    id: number;
    handler: JobHandler;
    controller: AbortController;
}

/**
 * Counting-permit pool: every job is accepted at once, but at most
 * `concurrency` handlers run at the same time. A handler holds its permit
 * until the promise it returned settles.
 */
export class WorkerPool {
    readonly concurrency: number;
    private running = 0;
    private queue: JobEntry[] = [];
    private nextId = 0;
    private active = new Map<number, JobEntry>();
    private waiters: Array<() => void> = [];
    private lock = false;

    constructor(concurrency: number) {
        this.concurrency = Math.max(1, Math.trunc(concurrency));
    }

    enqueue(handler: JobHandler) {
        const entry: JobEntry = {
            id: ++this.nextId,
            handler,
            controller: new AbortController()
        };
        this.queue.push(entry);
        this.pump();
        return entry.id;
    }

    /**
     * Aborts every queued and running job. Queued handlers are still invoked,
     * with an aborted signal, so each accepted job settles exactly once.
     */
    cancelAll(reason?: unknown) {
        for (const entry of this.queue) {
            entry.controller.abort(reason);
        }
        for (const entry of this.active.values()) {
            entry.controller.abort(reason);
        }
        this.pump();
    }

    runningCount() {
        return this.running;
    }

    isIdle() {
        return this.running === 0 && this.queue.length === 0;
    }

    /** Resolves once no job is queued or running. */
    drained(): Promise<void> {
        if (this.isIdle()) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.waiters.push(resolve);
        });
    }

    private pump() {
        if (this.lock) return;
        this.lock = true;
        try {
            while (this.queue.length > 0) {
                const head = this.queue[0];
                // aborted jobs bypass the permit limit: they only observe the abort and return
                if (!head.controller.signal.aborted && this.running >= this.concurrency) {
                    break;
                }
                this.queue.shift();
                this.start(head);
            }
        } finally {
            this.lock = false;
        }
        if (this.isIdle()) {
            this.settleDrain();
        }
    }

    private start(entry: JobEntry) {
        this.running += 1;
        this.active.set(entry.id, entry);
        logger.debug('pool: permit granted', { job: entry.id, running: this.running });
        let pending: Promise<void>;
        try {
            pending = entry.handler(entry.controller.signal);
        } catch (error) {
            pending = Promise.reject(error);
        }
        void pending
            .catch((error: unknown) => {
                logger.error(`pool: job ${entry.id} failed`, error);
            })
            .finally(() => {
                this.active.delete(entry.id);
                this.running -= 1;
                logger.debug('pool: permit released', { job: entry.id, running: this.running });
                this.pump();
            });
    }

    private settleDrain() {
        const waiters = this.waiters;
        this.waiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}
