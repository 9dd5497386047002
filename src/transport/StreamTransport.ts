import * as net from 'net';
import type { Duplex } from 'stream';
import { ClosedConnectionError, FormatError, toError } from '../errors';
import type { Endpoint, InboundFrame } from '../types';
import { Transport, TransportOptions } from './Transport';

/**
 * Connection-oriented transport over any byte stream (normally a TCP socket).
 *
 * The stream carries fixed-size frames back to back with no length prefix:
 * every read consumes exactly `frameSize` bytes. A trailing partial frame at
 * end of stream is discarded.
 */
export class StreamTransport extends Transport {
    private readonly stream: Duplex;

    constructor(stream: Duplex, options: TransportOptions = {}) {
        super(options, 'tcp');
        this.stream = stream;

        // Keeps stray socket errors from becoming uncaught exceptions.
        this.stream.on('error', (err: Error) => {
            if (this.isAlive) {
                this.logger.warn('Stream error:', err.message);
                this.closeConnection();
            }
        });
    }

    /**
     * Opens a TCP connection and wraps it. The receive loop is not started.
     */
    static connect(host: string, port: number, options: TransportOptions = {}): Promise<StreamTransport> {
        return new Promise((resolve, reject) => {
            const socket = net.connect({ host, port });
            const onError = (err: Error) => {
                socket.destroy();
                reject(err);
            };
            socket.once('error', onError);
            socket.once('connect', () => {
                socket.off('error', onError);
                socket.setNoDelay(true);
                resolve(new StreamTransport(socket, options));
            });
        });
    }

    /** Peer address when the stream is a socket, otherwise null. */
    get remoteEndpoint(): Endpoint | null {
        if (!(this.stream instanceof net.Socket)) return null;
        const { remoteAddress, remotePort, remoteFamily } = this.stream;
        if (remoteAddress === undefined || remotePort === undefined) return null;
        return {
            address: remoteAddress,
            port: remotePort,
            family: remoteFamily === 'IPv6' ? 'IPv6' : 'IPv4',
        };
    }

    protected readFrame(): Promise<InboundFrame | null> {
        const stream = this.stream;
        const frameSize = this.frameSize;

        return new Promise((resolve, reject) => {
            const cleanup = () => {
                stream.off('readable', onReadable);
                stream.off('end', onEnd);
                stream.off('close', onEnd);
                stream.off('error', onError);
            };

            const tryRead = (): boolean => {
                const chunk: unknown = stream.read(frameSize);
                if (chunk === null) return false;
                cleanup();
                if (!(chunk instanceof Uint8Array)) {
                    reject(new FormatError('Stream produced a non-binary chunk'));
                    return true;
                }
                if (chunk.length < frameSize) {
                    this.logger.warn(`Discarding truncated frame of ${chunk.length}/${frameSize} bytes`);
                    resolve(null);
                    return true;
                }
                resolve({ bytes: new Uint8Array(chunk), sender: null });
                return true;
            };

            const onReadable = () => {
                tryRead();
            };
            const onEnd = () => {
                cleanup();
                resolve(null);
            };
            const onError = (err: Error) => {
                cleanup();
                reject(err);
            };

            if (stream.destroyed || stream.readableEnded) {
                resolve(null);
                return;
            }
            if (tryRead()) return;

            stream.on('readable', onReadable);
            stream.once('end', onEnd);
            stream.once('close', onEnd);
            stream.once('error', onError);
        });
    }

    protected writeFrame(bytes: Uint8Array): boolean {
        if (this.stream.destroyed || this.stream.writableEnded) {
            throw new ClosedConnectionError('Stream is no longer writable');
        }
        this.stream.write(bytes, (err?: Error | null) => {
            if (err) this.handleSendFailure(toError(err));
        });
        return true;
    }

    protected release(): void {
        this.stream.destroy();
    }
}
