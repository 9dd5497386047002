import * as net from 'net';
import { ListenerConfigSchema, parseConfig } from '../config';
import { AlreadyRunningError, toError } from '../errors';
import type { Endpoint } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, LogLevel, logger as rootLogger } from '../utils/Logger';
import { StreamTransport } from './StreamTransport';

/**
 * The subset of `net.Server` the listener needs.
 */
export interface StreamServer {
    listen(port: number, host: string, callback: () => void): unknown;
    close(callback?: (err?: Error) => void): unknown;
    address(): net.AddressInfo | string | null;
    on(event: 'error', listener: (err: Error) => void): unknown;
}

export type ServerFactory = (onConnection: (socket: net.Socket) => void) => StreamServer;

export interface TcpListenerEvents {
    /** A new peer connected. Its transport is not started yet. */
    connection: [StreamTransport];
    error: [Error];
}

export interface TcpListenerOptions {
    /**
     * Frame size for every accepted connection.
     * @default 1500
     */
    frameSize?: number;
    debug?: boolean;
    logger?: Logger;
    serverFactory?: ServerFactory;
}

const defaultServerFactory: ServerFactory = (onConnection) => net.createServer(onConnection);

/**
 * Accepts TCP connections and hands each one out as a {@link StreamTransport}.
 */
export class TcpListener extends EventEmitter<TcpListenerEvents> {
    private server: StreamServer | null = null;
    private readonly frameSize: number;
    private readonly debug: boolean;
    private readonly logger: Logger;
    private readonly serverFactory: ServerFactory;

    constructor(options: TcpListenerOptions = {}) {
        super();
        const config = parseConfig(
            ListenerConfigSchema,
            { frameSize: options.frameSize, debug: options.debug },
            'listener options'
        );
        this.frameSize = config.frameSize;
        this.debug = config.debug;
        this.logger = options.logger ?? rootLogger.child('listener');
        if (this.debug) {
            this.logger.setLogLevel(LogLevel.DEBUG);
        }
        this.serverFactory = options.serverFactory ?? defaultServerFactory;
    }

    get isListening(): boolean {
        return this.server !== null;
    }

    /**
     * Starts accepting connections.
     *
     * @throws {AlreadyRunningError} If the listener is already running.
     */
    start(port: number, host: string = '0.0.0.0'): Promise<Endpoint> {
        if (this.server !== null) {
            return Promise.reject(new AlreadyRunningError('The listener is already running'));
        }

        const server = this.serverFactory((socket) => this.accept(socket));
        this.server = server;

        return new Promise((resolve, reject) => {
            let listening = false;
            server.on('error', (err) => {
                if (!listening) {
                    this.server = null;
                    reject(err);
                    return;
                }
                this.logger.error('Listener error:', err.message);
                this.emit('error', err);
            });
            server.listen(port, host, () => {
                listening = true;
                const bound = this.endpointOf(server, port, host);
                this.logger.info(`Listening on ${bound.address}:${bound.port}`);
                resolve(bound);
            });
        });
    }

    /**
     * Stops accepting connections. Already accepted transports stay open.
     */
    stop(): Promise<void> {
        const server = this.server;
        if (server === null) return Promise.resolve();
        this.server = null;

        return new Promise((resolve) => {
            server.close((err) => {
                if (err) this.logger.warn('Error while closing listener:', err.message);
                resolve();
            });
        });
    }

    private accept(socket: net.Socket): void {
        socket.setNoDelay(true);
        try {
            const transport = new StreamTransport(socket, {
                frameSize: this.frameSize,
                debug: this.debug,
            });
            this.logger.conn(`Accepted ${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`);
            this.emit('connection', transport);
        } catch (err) {
            socket.destroy();
            this.emit('error', toError(err));
        }
    }

    private endpointOf(server: StreamServer, port: number, host: string): Endpoint {
        const info = server.address();
        if (info === null || typeof info === 'string') {
            return { address: host, port };
        }
        return {
            address: info.address,
            port: info.port,
            family: info.family === 'IPv6' ? 'IPv6' : 'IPv4',
        };
    }
}
