/**
 * Promise-chain mutex. Callers queue in arrival order; a rejected critical
 * section releases the lock for the next caller.
 */
export class AsyncMutex {
    private chain: Promise<void> = Promise.resolve()
    private pending = 0

    runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        this.pending++
        const run = this.chain.then(fn, fn)
        this.chain = run.then(
            () => {
                this.pending--
            },
            () => {
                this.pending--
            }
        )
        return run
    }

    isLocked(): boolean {
        return this.pending > 0
    }
}
