export interface Sender<T> {
    send(value: T): boolean;
    /** Drops this sender; the channel closes once every sender is dropped. */
    close(): void;
}

/**
 * Unbounded multi-producer, single-consumer queue. Values from one sender are
 * delivered in the order they were sent; the consumer's iteration ends after
 * the last sender is dropped and the queue is empty.
 */
export class EventChannel<T> implements AsyncIterable<T> {
    private readonly queue: Array<{ value: T }> = [];
    private senders = 0;
    private closed = false;
    private consumed = false;
    private wake: (() => void) | undefined;

    sender(): Sender<T> {
        if (this.closed) {
            throw new Error('channel is closed');
        }
        this.senders += 1;
        let open = true;
        return {
            send: (value: T) => {
                if (!open || this.closed) return false;
                this.queue.push({ value });
                this.notify();
                return true;
            },
            close: () => {
                if (!open) return;
                open = false;
                this.senders -= 1;
                if (this.senders === 0) {
                    this.closed = true;
                    this.notify();
                }
            }
        };
    }

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
        if (this.consumed) {
            throw new Error('channel already has a consumer');
        }
        this.consumed = true;
        while (true) {
            const next = this.queue.shift();
            if (next) {
                yield next.value;
                continue;
            }
            if (this.closed) return;
            await new Promise<void>((resolve) => {
                this.wake = resolve;
            });
        }
    }

    private notify() {
        const wake = this.wake;
        this.wake = undefined;
        wake?.();
    }
}
