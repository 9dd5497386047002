/**
 * @file PacketBuffer.ts
 * @brief Fixed-capacity packet envelope with cursor-based typed serialization.
 *
 * Byte 0 holds the message ID. Reads and writes advance two independent
 * cursors which start right after the header. Every operation checks
 * `cursor + width <= capacity` before touching bytes or cursors, so a failed
 * call leaves the buffer exactly as it was.
 *
 * Fields are fixed-width little-endian. Strings are an int32 length followed
 * by one ASCII byte per character; writes reject anything above 0x7F.
 *
 * @example
 * ```typescript
 * const buffer = PacketBuffer.allocate();
 * buffer.id = 10;
 * buffer.putInt(5);
 * buffer.putInt(6);
 *
 * buffer.getInt(); // 5
 * buffer.getInt(); // 6
 * ```
 */

import * as flatbuffers from 'flatbuffers';
import { DEFAULT_PACKET_SIZE } from '../config';
import { BoundsError, FormatError, OutOfRangeError } from '../errors';
import type { Packable } from './Packable';

/** Offset of the message ID byte. */
export const ID_OFFSET = 0;

/** Default header size: just the ID byte. */
export const ID_SIZE = 1;

const INT_SIZE = 4;
const FLOAT_SIZE = 4;
const DOUBLE_SIZE = 8;
const BYTE_SIZE = 1;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export interface PacketBufferOptions {
    /**
     * Total size of the buffer in bytes.
     * @default 1500
     */
    capacity?: number;

    /**
     * Where both cursors start. 1 skips the ID byte, 0 treats byte 0 as payload.
     * @default 1
     */
    headerSize?: number;
}

export class PacketBuffer {
    private readonly data: Uint8Array;
    private readonly bb: flatbuffers.ByteBuffer;
    private readCursor: number;
    private writeCursor: number;

    private constructor(
        data: Uint8Array,
        public readonly headerSize: number
    ) {
        if (data.length < 1) {
            throw new OutOfRangeError('A packet needs at least one byte for its ID');
        }
        if (!Number.isInteger(headerSize) || headerSize < 0 || headerSize > data.length) {
            throw new OutOfRangeError(`Header size ${headerSize} does not fit a ${data.length}-byte packet`);
        }
        this.data = data;
        this.bb = new flatbuffers.ByteBuffer(data);
        this.readCursor = headerSize;
        this.writeCursor = headerSize;
    }

    /**
     * Allocates a zeroed buffer.
     */
    static allocate(options: PacketBufferOptions = {}): PacketBuffer {
        const capacity = options.capacity ?? DEFAULT_PACKET_SIZE;
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new OutOfRangeError(`Invalid packet capacity: ${capacity}`);
        }
        return new PacketBuffer(new Uint8Array(capacity), options.headerSize ?? ID_SIZE);
    }

    /**
     * Wraps a received frame. The bytes are adopted, not copied: the caller
     * hands ownership of `bytes` to the returned buffer.
     *
     * @throws {OutOfRangeError} If `bytes.length` differs from the expected capacity.
     */
    static fromBytes(bytes: Uint8Array, options: PacketBufferOptions = {}): PacketBuffer {
        const capacity = options.capacity ?? DEFAULT_PACKET_SIZE;
        if (bytes.length !== capacity) {
            throw new OutOfRangeError(
                `Frame length ${bytes.length} does not match packet capacity ${capacity}`
            );
        }
        return new PacketBuffer(bytes, options.headerSize ?? ID_SIZE);
    }

    /**
     * Creates a second envelope over the same bytes. Cursors are not shared.
     */
    static view(source: PacketBuffer, headerSize: number = source.headerSize): PacketBuffer {
        return new PacketBuffer(source.data, headerSize);
    }

    // ========================================================================
    // Envelope
    // ========================================================================

    get id(): number {
        return this.data[ID_OFFSET] ?? 0;
    }

    set id(value: number) {
        assertByte(value, 'Packet ID');
        this.data[ID_OFFSET] = value;
    }

    /** Total size in bytes. */
    get capacity(): number {
        return this.data.length;
    }

    /** The underlying frame. Mutations are visible to every view. */
    get bytes(): Uint8Array {
        return this.data;
    }

    get readPosition(): number {
        return this.readCursor;
    }

    set readPosition(position: number) {
        this.assertRange(position, 0, 'Read position');
        this.readCursor = position;
    }

    get writePosition(): number {
        return this.writeCursor;
    }

    set writePosition(position: number) {
        this.assertRange(position, 0, 'Write position');
        this.writeCursor = position;
    }

    get remainingRead(): number {
        return this.capacity - this.readCursor;
    }

    get remainingWrite(): number {
        return this.capacity - this.writeCursor;
    }

    resetCursors(): void {
        this.readCursor = this.headerSize;
        this.writeCursor = this.headerSize;
    }

    /**
     * Copies the whole buffer into a new one with default cursors.
     */
    deepCopy(): PacketBuffer {
        return new PacketBuffer(this.data.slice(), this.headerSize);
    }

    // ========================================================================
    // Cursor-based writes
    // ========================================================================

    putInt(value: number): void {
        this.assertWritable(INT_SIZE);
        assertInt32(value);
        this.bb.writeInt32(this.writeCursor, value);
        this.writeCursor += INT_SIZE;
    }

    putFloat(value: number): void {
        this.assertWritable(FLOAT_SIZE);
        this.bb.writeFloat32(this.writeCursor, value);
        this.writeCursor += FLOAT_SIZE;
    }

    putDouble(value: number): void {
        this.assertWritable(DOUBLE_SIZE);
        this.bb.writeFloat64(this.writeCursor, value);
        this.writeCursor += DOUBLE_SIZE;
    }

    putBool(value: boolean): void {
        this.assertWritable(BYTE_SIZE);
        this.bb.writeUint8(this.writeCursor, value ? 1 : 0);
        this.writeCursor += BYTE_SIZE;
    }

    putByte(value: number): void {
        this.assertWritable(BYTE_SIZE);
        assertByte(value, 'Byte value');
        this.bb.writeUint8(this.writeCursor, value);
        this.writeCursor += BYTE_SIZE;
    }

    putChar(value: string): void {
        this.assertWritable(BYTE_SIZE);
        this.bb.writeUint8(this.writeCursor, charCode(value));
        this.writeCursor += BYTE_SIZE;
    }

    putString(value: string): void {
        const width = INT_SIZE + value.length;
        this.assertWritable(width);
        assertAscii(value);
        this.writeStringAt(this.writeCursor, value);
        this.writeCursor += width;
    }

    /**
     * Copies `count` bytes of `source`, starting at `offset`, into the packet.
     */
    putBytes(source: Uint8Array, offset: number = 0, count: number = source.length - offset): void {
        if (!Number.isInteger(offset) || offset < 0 || !Number.isInteger(count) || count < 0 || offset + count > source.length) {
            throw new OutOfRangeError(`Cannot take ${count} bytes at ${offset} from a ${source.length}-byte source`);
        }
        this.assertWritable(count);
        this.data.set(source.subarray(offset, offset + count), this.writeCursor);
        this.writeCursor += count;
    }

    putPackable(packable: Packable): void {
        packable.pack(this);
    }

    // ========================================================================
    // Cursor-based reads
    // ========================================================================

    getInt(): number {
        this.assertReadable(INT_SIZE);
        const value = this.bb.readInt32(this.readCursor);
        this.readCursor += INT_SIZE;
        return value;
    }

    getFloat(): number {
        this.assertReadable(FLOAT_SIZE);
        const value = this.bb.readFloat32(this.readCursor);
        this.readCursor += FLOAT_SIZE;
        return value;
    }

    getDouble(): number {
        this.assertReadable(DOUBLE_SIZE);
        const value = this.bb.readFloat64(this.readCursor);
        this.readCursor += DOUBLE_SIZE;
        return value;
    }

    getBool(): boolean {
        this.assertReadable(BYTE_SIZE);
        const value = this.bb.readUint8(this.readCursor) === 1;
        this.readCursor += BYTE_SIZE;
        return value;
    }

    getByte(): number {
        this.assertReadable(BYTE_SIZE);
        const value = this.bb.readUint8(this.readCursor);
        this.readCursor += BYTE_SIZE;
        return value;
    }

    getChar(): string {
        this.assertReadable(BYTE_SIZE);
        const value = String.fromCharCode(this.bb.readUint8(this.readCursor));
        this.readCursor += BYTE_SIZE;
        return value;
    }

    getString(): string {
        this.assertReadable(INT_SIZE);
        const value = this.readStringAt(this.readCursor);
        this.readCursor += INT_SIZE + value.length;
        return value;
    }

    /**
     * Returns a copy of the next `count` bytes.
     */
    getBytes(count: number): Uint8Array {
        if (!Number.isInteger(count) || count < 0) {
            throw new OutOfRangeError(`Invalid byte count: ${count}`);
        }
        this.assertReadable(count);
        const value = this.data.slice(this.readCursor, this.readCursor + count);
        this.readCursor += count;
        return value;
    }

    getPackable<T extends Packable>(type: new () => T): T {
        const packable = new type();
        packable.unpack(this);
        return packable;
    }

    // ========================================================================
    // Offset-based access (cursors untouched)
    // ========================================================================

    putIntAt(offset: number, value: number): void {
        this.assertRange(offset, INT_SIZE, 'Offset');
        assertInt32(value);
        this.bb.writeInt32(offset, value);
    }

    getIntAt(offset: number): number {
        this.assertRange(offset, INT_SIZE, 'Offset');
        return this.bb.readInt32(offset);
    }

    putFloatAt(offset: number, value: number): void {
        this.assertRange(offset, FLOAT_SIZE, 'Offset');
        this.bb.writeFloat32(offset, value);
    }

    getFloatAt(offset: number): number {
        this.assertRange(offset, FLOAT_SIZE, 'Offset');
        return this.bb.readFloat32(offset);
    }

    putDoubleAt(offset: number, value: number): void {
        this.assertRange(offset, DOUBLE_SIZE, 'Offset');
        this.bb.writeFloat64(offset, value);
    }

    getDoubleAt(offset: number): number {
        this.assertRange(offset, DOUBLE_SIZE, 'Offset');
        return this.bb.readFloat64(offset);
    }

    putBoolAt(offset: number, value: boolean): void {
        this.assertRange(offset, BYTE_SIZE, 'Offset');
        this.bb.writeUint8(offset, value ? 1 : 0);
    }

    getBoolAt(offset: number): boolean {
        this.assertRange(offset, BYTE_SIZE, 'Offset');
        return this.bb.readUint8(offset) === 1;
    }

    putByteAt(offset: number, value: number): void {
        this.assertRange(offset, BYTE_SIZE, 'Offset');
        assertByte(value, 'Byte value');
        this.bb.writeUint8(offset, value);
    }

    getByteAt(offset: number): number {
        this.assertRange(offset, BYTE_SIZE, 'Offset');
        return this.bb.readUint8(offset);
    }

    putCharAt(offset: number, value: string): void {
        this.assertRange(offset, BYTE_SIZE, 'Offset');
        this.bb.writeUint8(offset, charCode(value));
    }

    getCharAt(offset: number): string {
        this.assertRange(offset, BYTE_SIZE, 'Offset');
        return String.fromCharCode(this.bb.readUint8(offset));
    }

    putStringAt(offset: number, value: string): void {
        this.assertRange(offset, INT_SIZE + value.length, 'Offset');
        assertAscii(value);
        this.writeStringAt(offset, value);
    }

    getStringAt(offset: number): string {
        this.assertRange(offset, INT_SIZE, 'Offset');
        return this.readStringAt(offset);
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private writeStringAt(offset: number, value: string): void {
        this.bb.writeInt32(offset, value.length);
        const start = offset + INT_SIZE;
        for (let i = 0; i < value.length; i++) {
            this.data[start + i] = value.charCodeAt(i);
        }
    }

    private readStringAt(offset: number): string {
        const length = this.bb.readInt32(offset);
        const start = offset + INT_SIZE;
        if (length < 0) {
            throw new FormatError(`Negative string length ${length} at offset ${offset}`);
        }
        if (length > this.capacity - start) {
            throw new FormatError(
                `String length ${length} at offset ${offset} exceeds the ${this.capacity - start} remaining bytes`
            );
        }
        let value = '';
        for (let i = start; i < start + length; i++) {
            value += String.fromCharCode(this.data[i] ?? 0);
        }
        return value;
    }

    private assertWritable(width: number): void {
        if (this.writeCursor + width > this.capacity) {
            throw new BoundsError('Write past end of packet', this.writeCursor, width, this.capacity);
        }
    }

    private assertReadable(width: number): void {
        if (this.readCursor + width > this.capacity) {
            throw new BoundsError('Read past end of packet', this.readCursor, width, this.capacity);
        }
    }

    private assertRange(position: number, width: number, label: string): void {
        if (!Number.isInteger(position) || position < 0 || position + width > this.capacity) {
            throw new BoundsError(`${label} out of range`, position, width, this.capacity);
        }
    }
}

function assertByte(value: number, label: string): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
        throw new OutOfRangeError(`${label} must be an integer between 0 and 255, got ${value}`);
    }
}

function assertInt32(value: number): void {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
        throw new OutOfRangeError(`Value ${value} is not a 32-bit integer`);
    }
}

const MAX_ASCII = 0x7f;

function charCode(value: string): number {
    if (value.length !== 1) {
        throw new FormatError(`Expected a single character, got ${value.length}`);
    }
    const code = value.charCodeAt(0);
    if (code > MAX_ASCII) {
        throw new FormatError(`Character U+${code.toString(16).padStart(4, '0')} is outside the ASCII range`);
    }
    return code;
}

function assertAscii(value: string): void {
    for (let i = 0; i < value.length; i++) {
        if (value.charCodeAt(i) > MAX_ASCII) {
            throw new FormatError(`Character at index ${i} is outside the ASCII range`);
        }
    }
}
