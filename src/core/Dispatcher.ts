/**
 * @file Dispatcher.ts
 * @brief Turns queued frames into typed packets, off the receive path.
 *
 * The dispatcher borrows its transport's queue and signal. Its consume loop
 * drains every queued frame through the packet factory, emits `packet` for
 * each, then parks on the signal until the transport queues more or closes.
 */

import { AlreadyRunningError, ClosedConnectionError, toError } from '../errors';
import type { Packet, PacketFactory } from '../packet/Packet';
import type { Transport } from '../transport/Transport';
import type { Endpoint } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger as rootLogger } from '../utils/Logger';

export interface DispatcherEvents<P extends Packet> {
    /** A packet was decoded from the wire. */
    packet: [P];
    /** The underlying transport closed. Fires once. */
    closed: [];
    /** A frame could not be turned into a packet. */
    error: [Error];
}

export interface DispatcherOptions {
    logger?: Logger;
}

export class Dispatcher<P extends Packet> extends EventEmitter<DispatcherEvents<P>> {
    protected readonly logger: Logger;

    private enabled = false;
    /** True from spawn until the loop has passed its final exit check. */
    private consuming = false;
    private idle: Promise<void> = Promise.resolve();

    constructor(
        readonly transport: Transport,
        readonly factory: PacketFactory<P>,
        options: DispatcherOptions = {}
    ) {
        super();
        this.logger = options.logger ?? rootLogger.child('dispatcher');
        transport.on('closed', () => this.emit('closed'));
    }

    get isEnabled(): boolean {
        return this.enabled;
    }

    get isConsuming(): boolean {
        return this.consuming;
    }

    get isAlive(): boolean {
        return this.transport.isAlive;
    }

    /**
     * Starts the transport's receive loop and the consume loop.
     */
    start(): void {
        this.transport.start();
        this.startConsume();
    }

    /**
     * Starts the consume loop only.
     *
     * @throws {ClosedConnectionError} If the transport has been closed.
     * @throws {AlreadyRunningError} If the consume loop is already running.
     */
    startConsume(): void {
        if (!this.transport.isAlive) {
            throw new ClosedConnectionError('The transport is not alive');
        }
        if (this.consuming) {
            if (this.enabled) {
                throw new AlreadyRunningError('The consume loop is already running');
            }
            this.enabled = true;
            return;
        }

        this.enabled = true;
        this.consuming = true;
        this.idle = this.consumeLoop();
    }

    /**
     * Asks the consume loop to exit. A loop parked on the signal leaves at the
     * next frame or on close.
     */
    endConsume(): void {
        this.enabled = false;
    }

    /** Stops both the consume loop and the transport's receive loop. */
    endPublishConsume(): void {
        this.endConsume();
        this.transport.stop();
    }

    /** Resolves once the consume loop has exited. */
    whenIdle(): Promise<void> {
        return this.idle;
    }

    closeConnection(): void {
        this.transport.closeConnection();
    }

    sendPack(packet: Packet | Uint8Array, destination: Endpoint | null = null): boolean {
        return this.transport.sendPack(packet, destination);
    }

    /** A blank outgoing packet of this dispatcher's variant. */
    createPacket(): P {
        return this.factory.create();
    }

    /**
     * Called once per decoded packet, in arrival order. Subclasses route first
     * and then call through.
     */
    protected onPacket(packet: P): void {
        this.emit('packet', packet);
    }

    private async consumeLoop(): Promise<void> {
        const signal = this.transport.signal;

        try {
            // A handler run by the final drain may restart the transport.
            do {
                while (this.transport.isEnabled && this.enabled) {
                    this.drain();
                    await signal.wait();
                }
                this.drain();
            } while (this.transport.isEnabled && this.enabled);
        } finally {
            this.consuming = false;
        }
    }

    private drain(): void {
        const queue = this.transport.queue;
        for (let frame = queue.shift(); frame !== undefined; frame = queue.shift()) {
            try {
                this.onPacket(this.factory.fromBytes(frame.bytes, frame.sender));
            } catch (err) {
                const error = toError(err);
                this.logger.warn('Dropping frame:', error.message);
                this.emit('error', error);
            }
        }
    }
}
