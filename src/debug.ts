/**
 * @file debug.ts
 * @brief Debug helpers for inspecting frames and packets.
 *
 * @example
 * ```typescript
 * import { describePacket, hexDump } from 'packetflow';
 *
 * router.on('packet', (packet) => {
 *     if (DEBUG_MODE) {
 *         console.log(describePacket(packet));
 *         console.log(hexDump(packet.buffer.bytes.subarray(0, 32)));
 *     }
 * });
 * ```
 */

import type { EncryptedPacket } from './encryption/EncryptedPacket';
import type { BasicPacket, DatagramPacket } from './packet/Packet';

export type AnyPacket = BasicPacket | DatagramPacket | EncryptedPacket;

/**
 * One-line summary of a packet: kind, ID, capacity and cursors, plus the
 * fields specific to its kind.
 */
export function describePacket(packet: AnyPacket): string {
    const { buffer } = packet;
    const parts = [
        `[${packet.kind} #${packet.id}]`,
        `capacity=${formatBytes(buffer.capacity)}`,
        `read=${buffer.readPosition}`,
        `write=${buffer.writePosition}`,
    ];

    switch (packet.kind) {
        case 'datagram':
            parts.push(packet.source ? `from=${packet.source.address}:${packet.source.port}` : 'from=unknown');
            break;
        case 'encrypted':
            parts.push(
                `encrypted=${packet.isEncrypted}`,
                `marker=${packet.integrityMarker}`,
                `corrupted=${packet.isCorrupted}`
            );
            break;
        case 'basic':
            break;
    }

    return parts.join(' ');
}

/**
 * Creates a hex dump of binary data (like xxd/hexdump).
 *
 * @param bytesPerLine - Bytes per line (default: 16)
 */
export function hexDump(data: ArrayBuffer | Uint8Array, bytesPerLine: number = 16): string {
    const bytes = data instanceof ArrayBuffer ? new Uint8Array(data) : data;

    if (bytes.length === 0) return '(empty)';

    const lines: string[] = [];
    for (let i = 0; i < bytes.length; i += bytesPerLine) {
        const slice = bytes.subarray(i, Math.min(i + bytesPerLine, bytes.length));
        const hex = Array.from(slice).map(b => b.toString(16).padStart(2, '0')).join(' ');
        const ascii = bytesToAscii(slice);
        const offset = i.toString(16).padStart(8, '0');
        lines.push(`${offset}  ${hex.padEnd(bytesPerLine * 3 - 1)}  |${ascii}|`);
    }

    return lines.join('\n');
}

/**
 * Converts bytes to ASCII, replacing non-printable characters with dots.
 */
function bytesToAscii(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map(b => (b >= 32 && b <= 126) ? String.fromCharCode(b) : '.')
        .join('');
}

/**
 * Human-readable byte count.
 */
export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
