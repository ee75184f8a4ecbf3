export interface AtomicInterface {
    acquire(): Promise<() => void>;
    runExclusive<T>(fn: () => Promise<T>): Promise<T>;
    isLocked(): boolean;
}

//
// Counting semaphore; concurrency 1 makes it a mutex.
// Waiters are served in FIFO order, each releaser only counts once.
export class Atomic implements AtomicInterface {

    private _queue: Array<(releaser: () => void) => void> = [];
    private _value: number;

    constructor(concurrency: number = 1) {
        if (concurrency < 1) {
            throw new Error(`Atomic: concurrency must be >= 1 (got ${concurrency})`);
        }
        this._value = concurrency;
    }

    isLocked(): boolean {
        return this._value <= 0;
    }

    acquire(): Promise<() => void> {
        const ticket = new Promise<() => void>((r) => this._queue.push(r));
        if (!this.isLocked()) this._dispatch();
        return ticket;
    }

    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }

    private _dispatch(): void {
        const nextConsumer = this._queue.shift();
        if (!nextConsumer) return;

        this._value--;
        let released = false;
        nextConsumer(() => {
            if (released) return;
            released = true;
            this._value++;
            this._dispatch();
        });
    }
}
