/**
 * Promise-chained mutual exclusion for compound store + scheduler operations.
 * Waiters run strictly in arrival order; a holder must always release.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private waiting = 0;

    /**
     * Resolves once every earlier holder has released
     * @returns Function to release the lock (safe to call twice)
     */
    acquire(): Promise<() => void> {
        const previous = this.tail;
        let releaseNext: () => void = () => undefined;
        this.tail = new Promise<void>((resolve) => {
            releaseNext = resolve;
        });
        this.waiting++;

        return previous.then(() => {
            let released = false;
            return () => {
                if (released) return;
                released = true;
                this.waiting--;
                releaseNext();
            };
        });
    }

    /**
     * Executes an operation while holding the lock
     * Ensures the lock is released even if the operation throws
     */
    async runExclusive<T>(operation: () => T | Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await operation();
        } finally {
            release();
        }
    }

    /** True while a holder or waiter exists */
    isLocked(): boolean {
        return this.waiting > 0;
    }
}
