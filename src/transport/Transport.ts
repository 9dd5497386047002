/**
 * Base class for everything that moves whole frames on and off the wire.
 *
 * A transport owns the queue and wake-up signal shared with its dispatcher.
 * Its receive loop reads one frame per iteration, appends it to the queue and
 * sets the signal. The dispatcher drains the queue on its own loop, so raw I/O
 * never waits on packet handling.
 *
 * Lifecycle: created (alive, not enabled) → started → stopped → closed.
 * `closeConnection()` is terminal and idempotent.
 */

import { parseConfig, TransportConfigSchema } from '../config';
import { AlreadyRunningError, ClosedConnectionError, OutOfRangeError, toError } from '../errors';
import type { Packet } from '../packet/Packet';
import type { Endpoint, InboundFrame, TransportState } from '../types';
import { AutoResetSignal } from '../utils/AutoResetSignal';
import { EventEmitter } from '../utils/EventEmitter';
import { FrameQueue } from '../utils/FrameQueue';
import { Logger, LogLevel, logger as rootLogger } from '../utils/Logger';

export interface TransportEvents {
    closed: [];
}

export interface TransportOptions {
    /**
     * Size of every frame read from or written to the wire.
     * @default 1500
     */
    frameSize?: number;

    /** Lower the log level to DEBUG. */
    debug?: boolean;

    logger?: Logger;
}

export abstract class Transport extends EventEmitter<TransportEvents> {
    /** Frames waiting for the dispatcher, in arrival order. */
    readonly queue = new FrameQueue<InboundFrame>();

    /** Set once per enqueued frame and once more on close. */
    readonly signal = new AutoResetSignal();

    readonly frameSize: number;

    protected readonly logger: Logger;

    private alive = true;
    private enabled = false;
    /** True from spawn until the loop has passed its final exit check. */
    private receiving = false;
    private idle: Promise<void> = Promise.resolve();

    constructor(options: TransportOptions, tag: string) {
        super();
        const config = parseConfig(
            TransportConfigSchema,
            { frameSize: options.frameSize, debug: options.debug },
            'transport options'
        );
        this.frameSize = config.frameSize;
        this.logger = options.logger ?? rootLogger.child(tag);
        if (config.debug) {
            this.logger.setLogLevel(LogLevel.DEBUG);
        }
    }

    get isAlive(): boolean {
        return this.alive;
    }

    get isEnabled(): boolean {
        return this.enabled;
    }

    /** True while the receive loop exists, even if it is winding down. */
    get isReceiving(): boolean {
        return this.receiving;
    }

    get state(): TransportState {
        if (!this.alive) return 'closed';
        if (this.enabled) return 'started';
        return this.receiving ? 'stopped' : 'created';
    }

    /**
     * Starts the receive loop.
     *
     * A loop that was stopped but is still parked on its pending read is
     * re-enabled rather than duplicated.
     *
     * @throws {ClosedConnectionError} If the connection has been closed.
     * @throws {AlreadyRunningError} If the receive loop is already running.
     */
    start(): void {
        if (!this.alive) {
            throw new ClosedConnectionError('The transport is not alive');
        }
        if (this.receiving) {
            if (this.enabled) {
                throw new AlreadyRunningError('The transport receive loop is already running');
            }
            this.enabled = true;
            return;
        }

        this.enabled = true;
        this.receiving = true;
        this.idle = this.receiveLoop();
    }

    /**
     * Asks the receive loop to exit at its next iteration boundary.
     */
    stop(): void {
        this.enabled = false;
    }

    /**
     * Resolves once the receive loop has exited (immediately if none runs).
     */
    whenIdle(): Promise<void> {
        return this.idle;
    }

    /**
     * Writes one frame. Best effort: nothing is sent unless the transport is
     * started, and an I/O failure closes the connection instead of throwing.
     *
     * @returns Whether the write was issued.
     * @throws {OutOfRangeError} If the frame is not exactly `frameSize` bytes.
     */
    sendPack(packet: Packet | Uint8Array, destination: Endpoint | null = null): boolean {
        const bytes = packet instanceof Uint8Array ? packet : packet.buffer.bytes;
        if (bytes.length !== this.frameSize) {
            throw new OutOfRangeError(
                `Frame of ${bytes.length} bytes does not match the transport frame size ${this.frameSize}`
            );
        }
        if (!this.enabled) {
            this.logger.debug('Dropping outgoing frame: transport not started');
            return false;
        }
        try {
            return this.writeFrame(bytes, destination);
        } catch (err) {
            this.handleSendFailure(err);
            return false;
        }
    }

    /**
     * Tears the connection down: stops the loop, releases the socket, wakes a
     * parked dispatcher and emits `closed`. Later calls do nothing.
     */
    closeConnection(): void {
        if (!this.alive) return;

        this.enabled = false;
        this.alive = false;
        try {
            this.release();
        } catch (err) {
            this.logger.warn('Error while releasing transport:', err);
        }
        this.signal.set();
        this.logger.conn('Connection closed');
        this.emit('closed');
    }

    protected handleSendFailure(err: unknown): void {
        this.logger.warn('Send failed, closing connection:', toError(err).message);
        this.closeConnection();
    }

    /**
     * Resolves with the next frame, or null once the peer is gone.
     * Rejections are treated as a broken connection.
     */
    protected abstract readFrame(): Promise<InboundFrame | null>;

    /**
     * Issues the write. Asynchronous failures go to `handleSendFailure`.
     */
    protected abstract writeFrame(bytes: Uint8Array, destination: Endpoint | null): boolean;

    /** Releases the underlying socket or stream. Called once. */
    protected abstract release(): void;

    private async receiveLoop(): Promise<void> {
        try {
            while (this.enabled) {
                const frame = await this.readFrame();
                if (frame === null) {
                    if (this.alive) {
                        this.logger.info('Connection closed by peer');
                        this.closeConnection();
                    }
                    return;
                }
                this.queue.push(frame);
                this.signal.set();
            }
        } catch (err) {
            if (this.alive) {
                this.logger.warn('Receive failed:', toError(err).message);
            }
            this.closeConnection();
        } finally {
            this.receiving = false;
        }
    }
}
