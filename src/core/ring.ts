/**
 * RingBuffer — fixed-capacity history that evicts its oldest entry on push.
 *
 * Used for the rolling demand and order windows kept by each ordering policy.
 */
export class RingBuffer<T> implements Iterable<T> {
    public readonly capacity: number;

    private readonly items: T[] = [];
    /** Index of the oldest entry once the buffer has wrapped. */
    private start = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    get size(): number {
        return this.items.length;
    }

    /**
     * Append a value. Returns the evicted value when the buffer was full.
     */
    push(value: T): T | undefined {
        if (this.items.length < this.capacity) {
            this.items.push(value);
            return undefined;
        }
        const evicted = this.items[this.start];
        this.items[this.start] = value;
        this.start = (this.start + 1) % this.capacity;
        return evicted;
    }

    /** Most recently pushed value, or undefined when empty. */
    last(): T | undefined {
        if (this.items.length === 0) return undefined;
        return this.items[(this.start + this.items.length - 1) % this.items.length];
    }

    /** Oldest first. */
    toArray(): T[] {
        return [...this];
    }

    *[Symbol.iterator](): IterableIterator<T> {
        for (let i = 0; i < this.items.length; i++) {
            yield this.items[(this.start + i) % this.items.length];
        }
    }
}
