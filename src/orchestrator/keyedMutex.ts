/**
 * Serializes async work per key. Work for different keys runs concurrently.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    get size() {
        return this.tails.size;
    }

    isLocked(key: string) {
        return this.tails.has(key);
    }

    async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const prev = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => {};
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = prev.then(() => current);
        this.tails.set(key, tail);
        try {
            await prev;
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    // Resolves once every operation queued so far has finished
    async drain() {
        await Promise.all(Array.from(this.tails.values()));
    }
}
