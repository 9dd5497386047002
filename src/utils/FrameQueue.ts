import { OutOfRangeError } from '../errors';

/**
 * A growable circular FIFO queue.
 *
 * Provides O(1) push and shift without the O(n) cost of Array#shift.
 * Unlike a fixed ring it never overwrites: when full it doubles its storage,
 * so no enqueued frame is ever lost.
 */
export class FrameQueue<T> {
    private buffer: (T | undefined)[];
    private readPtr: number = 0;
    private writePtr: number = 0;
    private count: number = 0;

    constructor(initialCapacity: number = 64) {
        if (!Number.isInteger(initialCapacity) || initialCapacity <= 0) {
            throw new OutOfRangeError('FrameQueue capacity must be a positive integer');
        }
        this.buffer = new Array(initialCapacity);
    }

    /**
     * Adds an item to the tail.
     */
    public push(item: T): void {
        if (this.count === this.buffer.length) {
            this.grow();
        }
        this.buffer[this.writePtr] = item;
        this.writePtr = (this.writePtr + 1) % this.buffer.length;
        this.count++;
    }

    /**
     * Removes and returns the oldest item, or undefined if empty.
     */
    public shift(): T | undefined {
        if (this.count === 0) return undefined;

        const item = this.buffer[this.readPtr];
        this.buffer[this.readPtr] = undefined; // GC help
        this.readPtr = (this.readPtr + 1) % this.buffer.length;
        this.count--;

        return item;
    }

    public peek(): T | undefined {
        return this.count === 0 ? undefined : this.buffer[this.readPtr];
    }

    public get length(): number {
        return this.count;
    }

    public get isEmpty(): boolean {
        return this.count === 0;
    }

    public clear(): void {
        this.readPtr = 0;
        this.writePtr = 0;
        this.count = 0;
        this.buffer.fill(undefined);
    }

    public toArray(): T[] {
        const res: T[] = [];
        let ptr = this.readPtr;
        for (let i = 0; i < this.count; i++) {
            const item = this.buffer[ptr];
            if (item !== undefined) res.push(item);
            ptr = (ptr + 1) % this.buffer.length;
        }
        return res;
    }

    private grow(): void {
        const next: (T | undefined)[] = new Array(this.buffer.length * 2);
        for (let i = 0; i < this.count; i++) {
            next[i] = this.buffer[(this.readPtr + i) % this.buffer.length];
        }
        this.buffer = next;
        this.readPtr = 0;
        this.writePtr = this.count;
    }
}
