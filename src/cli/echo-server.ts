import { ProtocolRouter } from '../core/ProtocolRouter';
import { ProtocolTable } from '../core/ProtocolTable';
import type { EncryptedPacket } from '../encryption/EncryptedPacket';
import { EncryptedProtocolRouter } from '../encryption/EncryptedProtocolRouter';
import { AesPayloadCipher } from '../encryption/PayloadCipher';
import type { AesPayloadCipherOptions, PayloadCipher } from '../encryption/PayloadCipher';
import { basicPacketFactory } from '../packet/Packet';
import type { BasicPacket } from '../packet/Packet';
import { TcpListener } from '../transport/TcpListener';
import type { ServerFactory } from '../transport/TcpListener';
import type { Transport } from '../transport/Transport';
import type { Endpoint } from '../types';
import { Logger, logger as rootLogger } from '../utils/Logger';

export type EchoRouter = ProtocolRouter<BasicPacket> | EncryptedProtocolRouter;

/**
 * Wraps a transport in a router whose only handler sends every packet back.
 * With a cipher, packets that fail their integrity check are not echoed.
 */
export function createEchoRouter(transport: Transport, cipher: PayloadCipher | null, log: Logger = rootLogger): EchoRouter {
    if (cipher === null) {
        const table = new ProtocolTable<BasicPacket>('echo');
        table.addDefaultHandler((packet, router) => {
            router.sendPack(packet);
        });
        return new ProtocolRouter(transport, basicPacketFactory({ capacity: transport.frameSize }), table);
    }

    const table = new ProtocolTable<EncryptedPacket>('echo');
    table.addDefaultHandler((packet, router) => {
        if (packet.isCorrupted) {
            log.warn(`Not echoing packet ${packet.id}: integrity check failed`);
            return;
        }
        router.sendPack(packet);
    });
    return new EncryptedProtocolRouter(transport, cipher, table);
}

export interface EchoServerOptions {
    port: number;
    host: string;
    frameSize: number;
    cipher: AesPayloadCipherOptions | null;
    debug?: boolean;
    logger?: Logger;
    serverFactory?: ServerFactory;
}

/**
 * TCP server that echoes every packet on every connection.
 */
export class EchoServer {
    private readonly listener: TcpListener;
    private readonly connections = new Set<Transport>();
    private readonly logger: Logger;

    constructor(private readonly options: EchoServerOptions) {
        this.logger = options.logger ?? rootLogger.child('echo');
        this.listener = new TcpListener({
            frameSize: options.frameSize,
            debug: options.debug,
            logger: this.logger,
            serverFactory: options.serverFactory,
        });
        this.listener.on('connection', (transport) => this.accept(transport));
    }

    get connectionCount(): number {
        return this.connections.size;
    }

    start(): Promise<Endpoint> {
        return this.listener.start(this.options.port, this.options.host);
    }

    /** Stops listening and closes every open connection. */
    async stop(): Promise<void> {
        await this.listener.stop();
        for (const transport of Array.from(this.connections)) {
            transport.closeConnection();
        }
    }

    private accept(transport: Transport): void {
        const cipher = this.options.cipher ? new AesPayloadCipher(this.options.cipher) : null;
        const router = createEchoRouter(transport, cipher, this.logger);

        this.connections.add(transport);
        transport.on('closed', () => {
            this.connections.delete(transport);
            this.logger.conn(`Connection closed (${this.connections.size} open)`);
        });
        router.start();
    }
}
