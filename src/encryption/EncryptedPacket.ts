import { DEFAULT_PACKET_SIZE } from '../config';
import { OutOfRangeError } from '../errors';
import type { Packet, PacketFactory } from '../packet/Packet';
import { PacketBuffer } from '../packet/PacketBuffer';

/** Byte 1: whether the region after it is encrypted. */
export const ENCRYPTED_FLAG_OFFSET = 1;

/** Bytes 2..5: the ID echoed as an int32, inside the encrypted region. */
export const INTEGRITY_MARKER_OFFSET = 2;

export const INTEGRITY_MARKER_SIZE = 4;

/** First payload byte of an encrypted packet. */
export const ENCRYPTED_HEADER_SIZE = INTEGRITY_MARKER_OFFSET + INTEGRITY_MARKER_SIZE;

export interface EncryptedPacketOptions {
    /** @default 1500 */
    capacity?: number;
    /** @default true */
    encrypted?: boolean;
}

/**
 * A packet whose payload can travel encrypted.
 *
 * Layout: `[id][flag][marker:int32][payload...]`. The ID and flag stay in
 * clear text; everything from the marker on is what the cipher transforms.
 * After decryption the marker must equal the ID again, otherwise the packet
 * was decrypted with the wrong key or damaged on the way.
 */
export class EncryptedPacket implements Packet {
    readonly kind = 'encrypted' as const;
    readonly buffer: PacketBuffer;

    /**
     * Allocates a new packet, or adopts `source` when given a buffer. A buffer
     * laid out with another header size is re-viewed so its cursors start
     * after the marker.
     */
    constructor(source: PacketBuffer | EncryptedPacketOptions = {}) {
        if (source instanceof PacketBuffer) {
            assertCapacity(source.capacity);
            this.buffer = source.headerSize === ENCRYPTED_HEADER_SIZE
                ? source
                : PacketBuffer.view(source, ENCRYPTED_HEADER_SIZE);
            return;
        }
        const capacity = source.capacity ?? DEFAULT_PACKET_SIZE;
        assertCapacity(capacity);
        this.buffer = PacketBuffer.allocate({ capacity, headerSize: ENCRYPTED_HEADER_SIZE });
        this.isEncrypted = source.encrypted ?? true;
    }

    /**
     * Adopts a received frame. The flag is taken from the frame as-is.
     */
    static fromBytes(bytes: Uint8Array, capacity: number = bytes.length): EncryptedPacket {
        assertCapacity(capacity);
        return new EncryptedPacket(
            PacketBuffer.fromBytes(bytes, { capacity, headerSize: ENCRYPTED_HEADER_SIZE })
        );
    }

    /**
     * Reinterprets another packet's bytes; the buffer is shared.
     */
    static fromPacket(packet: Packet): EncryptedPacket {
        return new EncryptedPacket(PacketBuffer.view(packet.buffer, ENCRYPTED_HEADER_SIZE));
    }

    get id(): number {
        return this.buffer.id;
    }

    /** Writing the ID also rewrites the integrity marker. */
    set id(value: number) {
        this.buffer.id = value;
        this.buffer.putIntAt(INTEGRITY_MARKER_OFFSET, value);
    }

    get isEncrypted(): boolean {
        return this.buffer.getBoolAt(ENCRYPTED_FLAG_OFFSET);
    }

    set isEncrypted(value: boolean) {
        this.buffer.putBoolAt(ENCRYPTED_FLAG_OFFSET, value);
    }

    get integrityMarker(): number {
        return this.buffer.getIntAt(INTEGRITY_MARKER_OFFSET);
    }

    /**
     * True when the packet claims to be encrypted but its marker no longer
     * matches its ID. Detection only: the caller decides what to do.
     */
    get isCorrupted(): boolean {
        return this.isEncrypted && this.integrityMarker !== this.id;
    }
}

export function encryptedPacketFactory(options: { capacity?: number } = {}): PacketFactory<EncryptedPacket> {
    const capacity = options.capacity ?? DEFAULT_PACKET_SIZE;
    assertCapacity(capacity);

    return {
        capacity,
        create: () => new EncryptedPacket({ capacity }),
        fromBytes: (bytes) => EncryptedPacket.fromBytes(bytes, capacity),
        fromPacket: (packet) => EncryptedPacket.fromPacket(packet),
    };
}

function assertCapacity(capacity: number): void {
    if (!Number.isInteger(capacity) || capacity < ENCRYPTED_HEADER_SIZE) {
        throw new OutOfRangeError(
            `Encrypted packets need at least ${ENCRYPTED_HEADER_SIZE} bytes, got ${capacity}`
        );
    }
}
