/**
 * Unbounded multi-producer, single-consumer async queue.
 *
 * Producers never wait: `push` appends and returns immediately. The single
 * consumer iterates with `for await`, which yields items in push order and
 * finishes once the queue is closed and drained.
 */
export class LineQueue<T> {
    private readonly items: Array<{ value: T }> = []
    private waiter: ((item: IteratorResult<T>) => void) | null = null
    private closed = false

    /**
     * Enqueues an item. Returns false once the queue is closed; the item is dropped.
     */
    push(item: T): boolean {
        if (this.closed) return false

        if (this.waiter) {
            const wake = this.waiter
            this.waiter = null
            wake({ value: item, done: false })
            return true
        }

        this.items.push({ value: item })
        return true
    }

    /**
     * Stops accepting items. Items already queued are still delivered.
     */
    close(): void {
        if (this.closed) return
        this.closed = true

        if (this.waiter) {
            const wake = this.waiter
            this.waiter = null
            wake({ value: undefined, done: true })
        }
    }

    isClosed(): boolean {
        return this.closed
    }

    size(): number {
        return this.items.length
    }

    private next(): Promise<IteratorResult<T>> {
        const entry = this.items.shift()
        if (entry) {
            return Promise.resolve({ value: entry.value, done: false })
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true })
        }
        if (this.waiter) {
            return Promise.reject(new Error('LineQueue supports a single consumer'))
        }
        return new Promise((resolve) => {
            this.waiter = resolve
        })
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return { next: () => this.next() }
    }
}
