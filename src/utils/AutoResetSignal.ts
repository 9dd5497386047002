/**
 * An auto-resetting wake-up signal shared by one producer and one consumer.
 *
 * `set()` releases exactly one waiter. With nobody waiting, the signal stays
 * set until the next `wait()`, which then returns immediately and resets it.
 * Repeated sets without a wait collapse into one.
 */
export class AutoResetSignal {
    private signaled = false;
    private waiters: Array<() => void> = [];

    constructor(initialState: boolean = false) {
        this.signaled = initialState;
    }

    public get isSet(): boolean {
        return this.signaled;
    }

    public get waiting(): number {
        return this.waiters.length;
    }

    public set(): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter();
        } else {
            this.signaled = true;
        }
    }

    public reset(): void {
        this.signaled = false;
    }

    public wait(): Promise<void> {
        if (this.signaled) {
            this.signaled = false;
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.waiters.push(resolve);
        });
    }
}
