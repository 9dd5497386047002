import { ProtocolRouter } from '../core/ProtocolRouter';
import { ProtocolTable } from '../core/ProtocolTable';
import type { AnyPacket } from '../debug';
import { EncryptedPacket } from '../encryption/EncryptedPacket';
import { EncryptedProtocolRouter } from '../encryption/EncryptedProtocolRouter';
import type { PayloadCipher } from '../encryption/PayloadCipher';
import { ClosedConnectionError, PacketFlowError } from '../errors';
import { basicPacketFactory } from '../packet/Packet';
import type { BasicPacket } from '../packet/Packet';
import { StreamTransport } from '../transport/StreamTransport';
import type { Transport } from '../transport/Transport';

export interface RequestOptions {
    id: number;
    text: string;
    cipher: PayloadCipher | null;
    /** @default 5000 */
    timeoutMs?: number;
}

export interface ReplyResult {
    packet: AnyPacket;
    text: string;
}

/**
 * Sends one packet carrying `text` and resolves with the first packet that
 * comes back. The connection is closed either way.
 */
export async function requestReply(transport: Transport, options: RequestOptions): Promise<ReplyResult> {
    const timeoutMs = options.timeoutMs ?? 5000;
    try {
        if (options.cipher === null) {
            const router = new ProtocolRouter<BasicPacket>(
                transport,
                basicPacketFactory({ capacity: transport.frameSize }),
                new ProtocolTable<BasicPacket>('client')
            );
            const request = router.createPacket();
            request.id = options.id;
            request.buffer.putString(options.text);
            return readReply(await exchange(router, request, timeoutMs));
        }

        const router = new EncryptedProtocolRouter(
            transport,
            options.cipher,
            new ProtocolTable<EncryptedPacket>('client')
        );
        const request = router.createPacket();
        request.id = options.id;
        request.buffer.putString(options.text);
        return readReply(await exchange(router, request, timeoutMs));
    } finally {
        transport.closeConnection();
    }
}

export async function sendOnce(
    host: string,
    port: number,
    frameSize: number,
    options: RequestOptions
): Promise<ReplyResult> {
    const transport = await StreamTransport.connect(host, port, { frameSize });
    return requestReply(transport, options);
}

function exchange<P extends AnyPacket>(router: ProtocolRouter<P>, request: P, timeoutMs: number): Promise<P> {
    return new Promise((resolve, reject) => {
        const cleanup = () => {
            clearTimeout(timer);
            offPacket();
            offClosed();
        };
        const timer = setTimeout(() => {
            cleanup();
            reject(new PacketFlowError(`No reply within ${timeoutMs}ms`, 'TIMEOUT'));
        }, timeoutMs);
        const offPacket = router.on('packet', (packet) => {
            cleanup();
            resolve(packet);
        });
        const offClosed = router.on('closed', () => {
            cleanup();
            reject(new ClosedConnectionError('Connection closed before a reply arrived'));
        });

        router.start();
        if (!router.sendPack(request)) {
            cleanup();
            reject(new ClosedConnectionError('Request could not be sent'));
        }
    });
}

function readReply(packet: AnyPacket): ReplyResult {
    if (packet instanceof EncryptedPacket && packet.isCorrupted) {
        return { packet, text: '' };
    }
    return { packet, text: packet.buffer.getString() };
}
