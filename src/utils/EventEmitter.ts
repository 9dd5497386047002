import { logger } from './Logger';

/**
 * A tiny, type-safe event emitter with ordered observer lists.
 *
 * - Event names and argument tuples are checked at compile time.
 * - Listeners run synchronously in registration order.
 * - An exception in one listener is logged and does not stop the others.
 * - `on()` returns an unsubscribe function.
 *
 * @example
 * ```typescript
 * interface MyEvents { frame: [Uint8Array]; closed: [] }
 * const emitter = new EventEmitter<MyEvents>();
 * const unsub = emitter.on('frame', (bytes) => console.log(bytes.length));
 * emitter.emit('frame', new Uint8Array(4));
 * unsub();
 * ```
 */
export class EventEmitter<T extends { [K in keyof T]: unknown[] }> {
    private listeners: { [K in keyof T]?: Set<(...args: T[K]) => void> } = {};

    /**
     * Subscribe to an event.
     * @returns Unsubscribe function
     */
    on<K extends keyof T>(event: K, handler: (...args: T[K]) => void): () => void {
        let handlers = this.listeners[event];
        if (!handlers) {
            handlers = new Set();
            this.listeners[event] = handlers;
        }
        handlers.add(handler);
        return () => this.off(event, handler);
    }

    /**
     * Unsubscribe from an event.
     */
    off<K extends keyof T>(event: K, handler: (...args: T[K]) => void): void {
        this.listeners[event]?.delete(handler);
    }

    /**
     * Emit an event.
     */
    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                logger.error(`Error in listener for ${String(event)}:`, err);
            }
        }
    }

    /**
     * Subscribe to an event once.
     */
    once<K extends keyof T>(event: K, handler: (...args: T[K]) => void): () => void {
        const wrapper = (...args: T[K]) => {
            this.off(event, wrapper);
            handler(...args);
        };
        return this.on(event, wrapper);
    }

    listenerCount<K extends keyof T>(event: K): number {
        return this.listeners[event]?.size ?? 0;
    }

    /**
     * Remove all listeners.
     */
    removeAllListeners(): void {
        this.listeners = {};
    }
}
