import { EventEmitter } from 'events';
import * as net from 'net';
import { Duplex } from 'stream';
import type { RemoteInfo } from 'dgram';
import type { DatagramSocket } from '../src/transport/DatagramTransport';
import { Transport } from '../src/transport/Transport';
import type { TransportOptions } from '../src/transport/Transport';
import type { Endpoint, InboundFrame } from '../src/types';
import type { ServerFactory, StreamServer } from '../src/transport/TcpListener';

// =============================================================================
// Loopback streams
// =============================================================================

/**
 * One end of an in-memory byte pipe. Bytes written here are readable on the
 * peer; ending or destroying one end ends the peer's readable side.
 */
export class LoopbackStream extends Duplex {
    peer: LoopbackStream | null = null;
    readonly written: Uint8Array[] = [];

    override _read(): void {
        // Data is pushed by the peer.
    }

    override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.written.push(new Uint8Array(chunk));
        this.peer?.deliver(chunk);
        callback();
    }

    override _final(callback: (error?: Error | null) => void): void {
        this.peer?.deliver(null);
        callback();
    }

    override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
        this.peer?.deliver(null);
        callback(error);
    }

    /** Makes bytes readable on this end, as if the peer had sent them. */
    deliver(chunk: Uint8Array | null): void {
        if (this.destroyed || this.readableEnded) return;
        this.push(chunk);
    }
}

export function createStreamPair(): [LoopbackStream, LoopbackStream] {
    const a = new LoopbackStream();
    const b = new LoopbackStream();
    a.peer = b;
    b.peer = a;
    return [a, b];
}

/**
 * A writable end whose writes always fail.
 */
export class BrokenStream extends Duplex {
    override _read(): void {
        // Never produces data.
    }

    override _write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        callback(new Error('EPIPE: broken pipe'));
    }
}

// =============================================================================
// Datagram sockets
// =============================================================================

export interface SentDatagram {
    bytes: Uint8Array;
    port: number;
    address: string;
}

/**
 * In-process stand-in for a `dgram` socket.
 */
export class FakeDatagramSocket extends EventEmitter implements DatagramSocket {
    readonly sent: SentDatagram[] = [];
    closed = false;
    failSends = false;
    private boundPort = 0;
    private boundAddress = '0.0.0.0';

    send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null, bytes: number) => void): void {
        this.sent.push({ bytes: new Uint8Array(msg), port, address });
        const error = this.failSends ? new Error('ENETUNREACH') : null;
        setImmediate(() => callback(error, error ? 0 : msg.length));
    }

    bind(port: number, address: string | undefined, callback: () => void): this {
        this.boundPort = port === 0 ? 41234 : port;
        this.boundAddress = address ?? '0.0.0.0';
        setImmediate(callback);
        return this;
    }

    close(): this {
        this.closed = true;
        setImmediate(() => this.emit('close'));
        return this;
    }

    address(): { address: string; port: number; family: string } {
        return { address: this.boundAddress, port: this.boundPort, family: 'IPv4' };
    }

    /** Simulates a datagram arriving from `address:port`. */
    receive(bytes: Uint8Array, address: string = '10.0.0.2', port: number = 5000): void {
        const rinfo: RemoteInfo = { address, port, family: 'IPv4', size: bytes.length };
        this.emit('message', Buffer.from(bytes), rinfo);
    }
}

// =============================================================================
// Stream servers
// =============================================================================

/**
 * In-process stand-in for `net.Server`. Connections are injected by hand.
 */
export class FakeServer extends EventEmitter implements StreamServer {
    listening = false;
    closed = false;
    private port = 0;
    private host = '';
    private onConnection: ((socket: net.Socket) => void) | null = null;

    readonly factory: ServerFactory = (onConnection) => {
        this.onConnection = onConnection;
        return this;
    };

    listen(port: number, host: string, callback: () => void): this {
        this.port = port === 0 ? 40123 : port;
        this.host = host;
        this.listening = true;
        setImmediate(callback);
        return this;
    }

    close(callback?: (err?: Error) => void): this {
        this.listening = false;
        this.closed = true;
        setImmediate(() => callback?.());
        return this;
    }

    address(): net.AddressInfo {
        return { address: this.host, port: this.port, family: 'IPv4' };
    }

    /** Hands an unconnected socket to the listener as a new connection. */
    accept(): net.Socket {
        const socket = new net.Socket();
        this.onConnection?.(socket);
        return socket;
    }
}

// =============================================================================
// Manual transport
// =============================================================================

export interface SentFrame {
    bytes: Uint8Array;
    destination: Endpoint | null;
}

/**
 * A transport driven by hand: `inject` plays the wire, `sent` records writes.
 */
export class ManualTransport extends Transport {
    readonly sent: SentFrame[] = [];
    released = 0;
    private readonly inbox: InboundFrame[] = [];
    private pending: ((frame: InboundFrame | null) => void) | null = null;

    constructor(options: TransportOptions = {}) {
        super(options, 'manual');
    }

    inject(bytes: Uint8Array, sender: Endpoint | null = null): void {
        const inbound = { bytes, sender };
        const pending = this.pending;
        if (pending) {
            this.pending = null;
            pending(inbound);
        } else {
            this.inbox.push(inbound);
        }
    }

    /** Simulates the peer hanging up. */
    hangUp(): void {
        const pending = this.pending;
        this.pending = null;
        pending?.(null);
    }

    protected readFrame(): Promise<InboundFrame | null> {
        const next = this.inbox.shift();
        if (next) return Promise.resolve(next);
        return new Promise((resolve) => {
            this.pending = resolve;
        });
    }

    protected writeFrame(bytes: Uint8Array, destination: Endpoint | null): boolean {
        this.sent.push({ bytes: new Uint8Array(bytes), destination });
        return true;
    }

    protected release(): void {
        this.released++;
        this.hangUp();
    }
}

// =============================================================================
// Frames
// =============================================================================

/** A zeroed frame with `id` in byte 0 and `fill` after it. */
export function frame(size: number, id: number, ...fill: number[]): Uint8Array {
    const bytes = new Uint8Array(size);
    bytes[0] = id;
    bytes.set(fill, 1);
    return bytes;
}
