/** Fixed-capacity FIFO of the most recent items; the oldest is evicted first. */
export class SessionWindow<T> {
    private items: T[] = []

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Session window capacity must be a positive integer, got ${capacity}`)
        }
    }

    push(item: T): void {
        this.items.push(item)
        if (this.items.length > this.capacity) {
            this.items.splice(0, this.items.length - this.capacity)
        }
    }

    seed(items: readonly T[]): void {
        this.items = items.slice(-this.capacity)
    }

    recent(count: number): T[] {
        return count > 0 ? this.items.slice(-count) : []
    }

    toArray(): T[] {
        return [...this.items]
    }

    clear(): void {
        this.items = []
    }

    get size(): number {
        return this.items.length
    }
}
