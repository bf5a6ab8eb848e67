export class AsyncLock {
    private locked = false;
    private waiters: Array<() => void> = [];

    async inLock<T>(fn: () => Promise<T> | T): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    private release(): void {
        const next = this.waiters.shift();
        if (next) {
            // Ownership passes straight to the next waiter; `locked` stays true.
            next();
            return;
        }
        this.locked = false;
    }
}
