/**
 * Minimal concurrency limiter: at most `concurrency` tasks run at once, the
 * rest wait in FIFO order.
 */
export function pLimit(concurrency: number) {
    const queue: (() => void)[] = [];
    let activeCount = 0;
    const limit = Math.max(1, Math.floor(concurrency));

    // A finishing task hands its slot straight to the next waiter.
    const next = () => {
        const resume = queue.shift();
        if (resume) resume();
        else activeCount--;
    };

    return async <T>(fn: () => Promise<T>): Promise<T> => {
        if (activeCount >= limit) {
            await new Promise<void>(resolve => queue.push(resolve));
        } else {
            activeCount++;
        }
        try {
            return await fn();
        } finally {
            next();
        }
    };
}
