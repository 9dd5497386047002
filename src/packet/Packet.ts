import { DEFAULT_PACKET_SIZE } from '../config';
import type { Endpoint } from '../types';
import { ID_SIZE, PacketBuffer } from './PacketBuffer';

/**
 * Discriminant carried by every packet variant.
 */
export type PacketKind = 'basic' | 'datagram' | 'encrypted';

/**
 * A typed view over one frame. Every variant wraps a {@link PacketBuffer}
 * envelope holding the ID and cursors.
 */
export interface Packet {
    readonly kind: PacketKind;
    readonly buffer: PacketBuffer;
    id: number;
}

/**
 * Builds packets of one variant. The dispatcher uses `fromBytes` for every
 * received frame; `create` and `fromPacket` serve outgoing traffic and
 * re-interpretation of an existing packet.
 */
export interface PacketFactory<P extends Packet> {
    readonly capacity: number;
    create(): P;
    fromBytes(bytes: Uint8Array, source?: Endpoint | null): P;
    fromPacket(packet: Packet): P;
}

export interface PacketLayoutOptions {
    /**
     * Frame size in bytes.
     * @default 1500
     */
    capacity?: number;

    /**
     * Start cursors at byte 0 instead of after the ID byte.
     * @default false
     */
    ignoreId?: boolean;
}

function headerSizeFor(options: PacketLayoutOptions): number {
    return options.ignoreId ? 0 : ID_SIZE;
}

// ============================================================================
// Basic packets
// ============================================================================

export class BasicPacket implements Packet {
    readonly kind = 'basic' as const;

    constructor(readonly buffer: PacketBuffer = PacketBuffer.allocate()) {}

    get id(): number {
        return this.buffer.id;
    }

    set id(value: number) {
        this.buffer.id = value;
    }
}

export function basicPacketFactory(options: PacketLayoutOptions = {}): PacketFactory<BasicPacket> {
    const capacity = options.capacity ?? DEFAULT_PACKET_SIZE;
    const headerSize = headerSizeFor(options);

    return {
        capacity,
        create: () => new BasicPacket(PacketBuffer.allocate({ capacity, headerSize })),
        fromBytes: (bytes) => new BasicPacket(PacketBuffer.fromBytes(bytes, { capacity, headerSize })),
        fromPacket: (packet) => new BasicPacket(PacketBuffer.view(packet.buffer, headerSize)),
    };
}

// ============================================================================
// Datagram packets
// ============================================================================

/**
 * A packet that remembers which endpoint it came from, so handlers can reply
 * over a connectionless transport.
 */
export class DatagramPacket implements Packet {
    readonly kind = 'datagram' as const;

    constructor(
        readonly buffer: PacketBuffer = PacketBuffer.allocate(),
        readonly source: Endpoint | null = null
    ) {}

    get id(): number {
        return this.buffer.id;
    }

    set id(value: number) {
        this.buffer.id = value;
    }
}

export function datagramPacketFactory(options: PacketLayoutOptions = {}): PacketFactory<DatagramPacket> {
    const capacity = options.capacity ?? DEFAULT_PACKET_SIZE;
    const headerSize = headerSizeFor(options);

    return {
        capacity,
        create: () => new DatagramPacket(PacketBuffer.allocate({ capacity, headerSize })),
        fromBytes: (bytes, source = null) =>
            new DatagramPacket(PacketBuffer.fromBytes(bytes, { capacity, headerSize }), source),
        fromPacket: (packet) =>
            new DatagramPacket(
                PacketBuffer.view(packet.buffer, headerSize),
                packet instanceof DatagramPacket ? packet.source : null
            ),
    };
}
