import * as dgram from 'dgram';
import { DatagramTransportConfigSchema, parseConfig } from '../config';
import { ClosedConnectionError, ConfigurationError } from '../errors';
import type { Packet } from '../packet/Packet';
import type { Endpoint, InboundFrame } from '../types';
import { FrameQueue } from '../utils/FrameQueue';
import { Transport, TransportOptions } from './Transport';

/**
 * The subset of `dgram.Socket` this transport relies on. Tests substitute an
 * in-process fake.
 */
export interface DatagramSocket {
    send(
        msg: Uint8Array,
        port: number,
        address: string,
        callback: (error: Error | null, bytes: number) => void
    ): void;
    bind(port: number, address: string | undefined, callback: () => void): unknown;
    close(): unknown;
    address(): { address: string; port: number; family: string };
    on(event: 'message', listener: (msg: Buffer, rinfo: dgram.RemoteInfo) => void): unknown;
    on(event: 'error', listener: (err: Error) => void): unknown;
    on(event: 'close', listener: () => void): unknown;
}

export interface DatagramTransportOptions extends TransportOptions {
    /** @default 'udp4' */
    type?: 'udp4' | 'udp6';

    /** Destination used when `sendPack` is called without one. */
    remote?: Endpoint;

    /** Supply a pre-built socket instead of creating one. */
    socket?: DatagramSocket;

    /**
     * Datagrams held while no read is pending (before `start()`, or while the
     * receive loop is stopped). Arrivals beyond this are dropped.
     * @default 256
     */
    backlog?: number;
}

/**
 * Connectionless transport over UDP. Each datagram is one frame.
 *
 * Datagrams shorter than the frame size are zero-padded; longer ones are
 * dropped. Every inbound frame carries its sender endpoint. Datagrams that
 * arrive with no read pending wait in a backlog of bounded size.
 */
export class DatagramTransport extends Transport {
    private readonly socket: DatagramSocket;
    private readonly inbox = new FrameQueue<InboundFrame>();
    private pendingRead: ((frame: InboundFrame | null) => void) | null = null;
    private socketClosed = false;
    private remote: Endpoint | null;
    private readonly backlog: number;

    constructor(options: DatagramTransportOptions = {}) {
        const config = parseConfig(
            DatagramTransportConfigSchema,
            {
                frameSize: options.frameSize,
                debug: options.debug,
                type: options.type,
                remote: options.remote,
                backlog: options.backlog,
            },
            'datagram transport options'
        );
        super({ frameSize: config.frameSize, debug: config.debug, logger: options.logger }, 'udp');

        this.remote = config.remote ?? null;
        this.backlog = config.backlog;
        this.socket = options.socket ?? dgram.createSocket(config.type);

        this.socket.on('message', (msg, rinfo) => this.onDatagram(msg, rinfo));
        this.socket.on('error', (err) => {
            if (this.isAlive) {
                this.logger.warn('Socket error:', err.message);
                this.closeConnection();
            }
        });
        this.socket.on('close', () => {
            this.socketClosed = true;
            this.flushPendingRead(null);
        });
    }

    /**
     * Binds the local port. Pass 0 for an ephemeral port.
     */
    bind(port: number = 0, address?: string): Promise<Endpoint> {
        if (!this.isAlive) {
            return Promise.reject(new ClosedConnectionError('The transport is not alive'));
        }
        return new Promise((resolve) => {
            this.socket.bind(port, address, () => {
                const local = this.localEndpoint;
                this.logger.info(`Bound to ${local.address}:${local.port}`);
                resolve(local);
            });
        });
    }

    get localEndpoint(): Endpoint {
        const info = this.socket.address();
        return {
            address: info.address,
            port: info.port,
            family: info.family === 'IPv6' ? 'IPv6' : 'IPv4',
        };
    }

    get remoteEndpoint(): Endpoint | null {
        return this.remote;
    }

    set remoteEndpoint(endpoint: Endpoint | null) {
        this.remote = endpoint;
    }

    /**
     * @throws {ConfigurationError} If there is neither a destination nor a default remote endpoint.
     */
    override sendPack(packet: Packet | Uint8Array, destination: Endpoint | null = null): boolean {
        if (destination === null && this.remote === null) {
            throw new ConfigurationError('No destination given and no default remote endpoint configured');
        }
        return super.sendPack(packet, destination);
    }

    protected readFrame(): Promise<InboundFrame | null> {
        const next = this.inbox.shift();
        if (next !== undefined) return Promise.resolve(next);
        if (this.socketClosed) return Promise.resolve(null);
        return new Promise((resolve) => {
            this.pendingRead = resolve;
        });
    }

    protected writeFrame(bytes: Uint8Array, destination: Endpoint | null): boolean {
        const target = destination ?? this.remote;
        if (target === null) {
            throw new ClosedConnectionError('Datagram has no destination');
        }
        if (this.socketClosed) {
            throw new ClosedConnectionError('Socket is closed');
        }
        this.socket.send(bytes, target.port, target.address, (err) => {
            if (err) this.handleSendFailure(err);
        });
        return true;
    }

    protected release(): void {
        this.flushPendingRead(null);
        if (!this.socketClosed) {
            this.socketClosed = true;
            this.socket.close();
        }
    }

    private onDatagram(msg: Uint8Array, rinfo: dgram.RemoteInfo): void {
        if (msg.length > this.frameSize) {
            this.logger.warn(
                `Dropping ${msg.length}-byte datagram from ${rinfo.address}:${rinfo.port}: exceeds frame size ${this.frameSize}`
            );
            return;
        }

        const bytes = new Uint8Array(this.frameSize);
        bytes.set(msg);
        const frame: InboundFrame = {
            bytes,
            sender: {
                address: rinfo.address,
                port: rinfo.port,
                family: rinfo.family === 'IPv6' ? 'IPv6' : 'IPv4',
            },
        };

        if (this.pendingRead !== null) {
            this.flushPendingRead(frame);
        } else if (this.inbox.length < this.backlog) {
            this.inbox.push(frame);
        } else {
            this.logger.warn(`Dropping datagram from ${rinfo.address}:${rinfo.port}: backlog of ${this.backlog} is full`);
        }
    }

    private flushPendingRead(frame: InboundFrame | null): void {
        const resolve = this.pendingRead;
        this.pendingRead = null;
        resolve?.(frame);
    }
}
