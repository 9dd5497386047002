import type { DispatcherOptions } from '../core/Dispatcher';
import { ProtocolRouter } from '../core/ProtocolRouter';
import type { ProtocolTable } from '../core/ProtocolTable';
import type { Packet } from '../packet/Packet';
import type { Transport } from '../transport/Transport';
import type { Endpoint } from '../types';
import { EncryptedPacket, encryptedPacketFactory, INTEGRITY_MARKER_OFFSET } from './EncryptedPacket';
import type { PayloadCipher } from './PayloadCipher';

/**
 * A protocol router for {@link EncryptedPacket}s.
 *
 * Outgoing packets flagged as encrypted are sent with everything from the
 * integrity marker onwards run through the cipher; the packet itself is left
 * in clear text. Incoming encrypted packets are decrypted in place before
 * they reach the active table, so handlers can check `isCorrupted`.
 */
export class EncryptedProtocolRouter extends ProtocolRouter<EncryptedPacket> {
    constructor(
        transport: Transport,
        readonly cipher: PayloadCipher,
        initialProtocol: ProtocolTable<EncryptedPacket>,
        options: DispatcherOptions = {}
    ) {
        super(transport, encryptedPacketFactory({ capacity: transport.frameSize }), initialProtocol, options);
    }

    override sendPack(packet: Packet | Uint8Array, destination: Endpoint | null = null): boolean {
        if (packet instanceof EncryptedPacket && packet.isEncrypted) {
            const frame = packet.buffer.bytes;
            const sealed = this.cipher.encrypt(frame, INTEGRITY_MARKER_OFFSET, frame.length - INTEGRITY_MARKER_OFFSET);
            return super.sendPack(sealed, destination);
        }
        return super.sendPack(packet, destination);
    }

    protected override onPacket(packet: EncryptedPacket): void {
        if (packet.isEncrypted) {
            const frame = packet.buffer.bytes;
            this.cipher.decrypt(frame, INTEGRITY_MARKER_OFFSET, frame.length - INTEGRITY_MARKER_OFFSET);
            if (packet.isCorrupted) {
                this.logger.debug(`Packet ${packet.id} failed its integrity check`);
            }
        }
        super.onPacket(packet);
    }
}
