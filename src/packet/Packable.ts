import type { PacketBuffer } from './PacketBuffer';

/**
 * A value that knows how to write itself into a packet and read itself back.
 *
 * `unpack` must read fields in the same order `pack` wrote them; nothing
 * checks this for you.
 *
 * @example
 * ```typescript
 * class Position implements Packable {
 *     x = 0;
 *     y = 0;
 *     pack(buffer: PacketBuffer) { buffer.putFloat(this.x); buffer.putFloat(this.y); }
 *     unpack(buffer: PacketBuffer) { this.x = buffer.getFloat(); this.y = buffer.getFloat(); }
 * }
 * ```
 */
export interface Packable {
    pack(buffer: PacketBuffer): void;
    unpack(buffer: PacketBuffer): void;
}
