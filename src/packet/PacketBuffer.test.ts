/**
 * @file PacketBuffer.test.ts
 * @brief Codec behavior: cursors, widths, bounds and string framing.
 */

import { describe, it, expect } from 'vitest';
import { PacketBuffer } from './PacketBuffer';
import type { Packable } from './Packable';
import { BoundsError, FormatError, OutOfRangeError } from '../errors';

class Vector implements Packable {
    x = 0;
    y = 0;
    label = '';

    pack(buffer: PacketBuffer): void {
        buffer.putFloat(this.x);
        buffer.putFloat(this.y);
        buffer.putString(this.label);
    }

    unpack(buffer: PacketBuffer): void {
        this.x = buffer.getFloat();
        this.y = buffer.getFloat();
        this.label = buffer.getString();
    }
}

describe('PacketBuffer', () => {
    describe('envelope', () => {
        it('allocates 1500 zeroed bytes with cursors after the ID', () => {
            const buffer = PacketBuffer.allocate();
            expect(buffer.capacity).toBe(1500);
            expect(buffer.id).toBe(0);
            expect(buffer.readPosition).toBe(1);
            expect(buffer.writePosition).toBe(1);
            expect(buffer.bytes.every(b => b === 0)).toBe(true);
        });

        it('round-trips ID 10 and two ints in order', () => {
            const buffer = PacketBuffer.allocate();
            buffer.id = 10;
            buffer.putInt(5);
            buffer.putInt(6);

            expect(buffer.id).toBe(10);
            expect(buffer.getInt()).toBe(5);
            expect(buffer.getInt()).toBe(6);
            expect(buffer.writePosition).toBe(9);
            expect(buffer.readPosition).toBe(9);
        });

        it('writes ints little-endian after the ID byte', () => {
            const buffer = PacketBuffer.allocate({ capacity: 8 });
            buffer.id = 7;
            buffer.putInt(0x01020304);
            expect(Array.from(buffer.bytes.subarray(0, 5))).toEqual([7, 4, 3, 2, 1]);
        });

        it('starts cursors at 0 when headerSize is 0', () => {
            const buffer = PacketBuffer.allocate({ capacity: 4, headerSize: 0 });
            buffer.putByte(9);
            expect(buffer.id).toBe(9);
            expect(buffer.writePosition).toBe(1);
        });

        it('rejects IDs outside 0-255', () => {
            const buffer = PacketBuffer.allocate({ capacity: 4 });
            expect(() => { buffer.id = 256; }).toThrow(OutOfRangeError);
            expect(() => { buffer.id = -1; }).toThrow(OutOfRangeError);
            expect(() => { buffer.id = 1.5; }).toThrow(OutOfRangeError);
            expect(buffer.id).toBe(0);
        });

        it('rejects invalid capacities', () => {
            expect(() => PacketBuffer.allocate({ capacity: 0 })).toThrow(OutOfRangeError);
            expect(() => PacketBuffer.allocate({ capacity: 4, headerSize: 5 })).toThrow(OutOfRangeError);
        });
    });

    describe('fromBytes', () => {
        it('adopts the given bytes without copying', () => {
            const bytes = new Uint8Array(16);
            bytes[0] = 3;
            const buffer = PacketBuffer.fromBytes(bytes, { capacity: 16 });
            expect(buffer.id).toBe(3);

            buffer.putByte(42);
            expect(bytes[1]).toBe(42);
        });

        it('throws when the length does not match the capacity', () => {
            expect(() => PacketBuffer.fromBytes(new Uint8Array(10), { capacity: 16 })).toThrow(OutOfRangeError);
            expect(() => PacketBuffer.fromBytes(new Uint8Array(10))).toThrow(
                'Frame length 10 does not match packet capacity 1500'
            );
        });
    });

    describe('view and deepCopy', () => {
        it('view shares bytes but not cursors', () => {
            const original = PacketBuffer.allocate({ capacity: 16 });
            original.putInt(11);

            const view = PacketBuffer.view(original);
            expect(view.writePosition).toBe(1);
            expect(view.getInt()).toBe(11);

            view.putIntAt(1, 12);
            expect(original.getInt()).toBe(12);
        });

        it('deepCopy is independent and resets cursors', () => {
            const original = PacketBuffer.allocate({ capacity: 16 });
            original.id = 4;
            original.putInt(100);

            const copy = original.deepCopy();
            expect(copy.id).toBe(4);
            expect(copy.writePosition).toBe(1);

            copy.putIntAt(1, 200);
            expect(original.getIntAt(1)).toBe(100);
        });
    });

    describe('typed fields', () => {
        it('reads back every primitive with its width', () => {
            const buffer = PacketBuffer.allocate({ capacity: 64 });
            buffer.putInt(-123456);
            buffer.putFloat(1.5);
            buffer.putDouble(Math.PI);
            buffer.putBool(true);
            buffer.putBool(false);
            buffer.putByte(255);
            buffer.putChar('Z');

            // 1 + 4 + 4 + 8 + 1 + 1 + 1 + 1
            expect(buffer.writePosition).toBe(21);

            expect(buffer.getInt()).toBe(-123456);
            expect(buffer.getFloat()).toBe(1.5);
            expect(buffer.getDouble()).toBe(Math.PI);
            expect(buffer.getBool()).toBe(true);
            expect(buffer.getBool()).toBe(false);
            expect(buffer.getByte()).toBe(255);
            expect(buffer.getChar()).toBe('Z');
            expect(buffer.readPosition).toBe(21);
        });

        it('rounds floats to single precision', () => {
            const buffer = PacketBuffer.allocate({ capacity: 8 });
            buffer.putFloat(0.1);
            expect(buffer.getFloat()).toBe(Math.fround(0.1));
        });

        it('rejects non-int32 values and out-of-range bytes', () => {
            const buffer = PacketBuffer.allocate({ capacity: 16 });
            expect(() => buffer.putInt(2 ** 31)).toThrow(OutOfRangeError);
            expect(() => buffer.putInt(1.25)).toThrow(OutOfRangeError);
            expect(() => buffer.putByte(300)).toThrow(OutOfRangeError);
            expect(buffer.writePosition).toBe(1);
        });

        it('rejects chars that are not a single ASCII byte', () => {
            const buffer = PacketBuffer.allocate({ capacity: 16 });
            expect(() => buffer.putChar('ab')).toThrow(FormatError);
            expect(() => buffer.putChar('€')).toThrow(FormatError);
            expect(() => buffer.putChar('é')).toThrow(FormatError);
            expect(() => buffer.putCharAt(2, 'é')).toThrow(FormatError);
            buffer.putChar('~');
            expect(buffer.getChar()).toBe('~');
        });

        it('copies byte ranges in and out', () => {
            const buffer = PacketBuffer.allocate({ capacity: 16 });
            buffer.putBytes(new Uint8Array([9, 8, 7, 6, 5]), 1, 3);
            expect(buffer.writePosition).toBe(4);
            expect(Array.from(buffer.getBytes(3))).toEqual([8, 7, 6]);
            expect(() => buffer.putBytes(new Uint8Array(2), 1, 2)).toThrow(OutOfRangeError);
        });
    });

    describe('strings', () => {
        it('stores an int32 length and one byte per character', () => {
            const buffer = PacketBuffer.allocate({ capacity: 32 });
            buffer.putString('hi');

            expect(Array.from(buffer.bytes.subarray(1, 7))).toEqual([2, 0, 0, 0, 104, 105]);
            expect(buffer.writePosition).toBe(7);
            expect(buffer.getString()).toBe('hi');
            expect(buffer.readPosition).toBe(7);
        });

        it('round-trips an empty string and printable ASCII', () => {
            const buffer = PacketBuffer.allocate({ capacity: 32 });
            buffer.putString('');
            buffer.putString('a~Z 0');
            expect(buffer.getString()).toBe('');
            expect(buffer.getString()).toBe('a~Z 0');
        });

        it('rejects characters outside the ASCII range', () => {
            const buffer = PacketBuffer.allocate({ capacity: 32 });
            expect(() => buffer.putString('中')).toThrow(FormatError);
            expect(() => buffer.putString('café')).toThrow('Character at index 3 is outside the ASCII range');
            expect(() => buffer.putStringAt(1, 'é')).toThrow(FormatError);
            expect(buffer.writePosition).toBe(1);
            expect(Array.from(buffer.bytes.subarray(1, 9))).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
        });

        it('throws FormatError on a negative declared length', () => {
            const buffer = PacketBuffer.allocate({ capacity: 32 });
            buffer.putInt(-1);
            expect(() => buffer.getString()).toThrow(FormatError);
            expect(buffer.readPosition).toBe(1);
        });

        it('throws FormatError when the declared length exceeds the buffer', () => {
            const buffer = PacketBuffer.allocate({ capacity: 16 });
            buffer.putInt(100);
            expect(() => buffer.getString()).toThrow(
                'String length 100 at offset 1 exceeds the 11 remaining bytes'
            );
        });
    });

    describe('bounds', () => {
        it('throws BoundsError before mutating on write overflow', () => {
            const buffer = PacketBuffer.allocate({ capacity: 8 });
            buffer.putInt(1);
            const before = Array.from(buffer.bytes);

            expect(() => buffer.putInt(2)).toThrow(BoundsError);
            expect(buffer.writePosition).toBe(5);
            expect(Array.from(buffer.bytes)).toEqual(before);
        });

        it('reports position, width and capacity', () => {
            const buffer = PacketBuffer.allocate({ capacity: 8 });
            buffer.readPosition = 6;
            try {
                buffer.getDouble();
                expect.unreachable();
            } catch (err) {
                expect(err).toBeInstanceOf(BoundsError);
                if (err instanceof BoundsError) {
                    expect(err.position).toBe(6);
                    expect(err.width).toBe(8);
                    expect(err.capacity).toBe(8);
                    expect(err.code).toBe('BOUNDS_ERROR');
                }
            }
        });

        it('allows filling the buffer exactly', () => {
            const buffer = PacketBuffer.allocate({ capacity: 5 });
            buffer.putInt(1);
            expect(buffer.remainingWrite).toBe(0);
            expect(() => buffer.putBool(true)).toThrow(BoundsError);
        });

        it('validates cursor setters', () => {
            const buffer = PacketBuffer.allocate({ capacity: 8 });
            buffer.writePosition = 8;
            expect(buffer.remainingWrite).toBe(0);
            expect(() => { buffer.writePosition = 9; }).toThrow(BoundsError);
            expect(() => { buffer.readPosition = -1; }).toThrow(BoundsError);
        });

        it('checks offsets for offset-based access', () => {
            const buffer = PacketBuffer.allocate({ capacity: 8 });
            expect(() => buffer.putIntAt(5, 1)).toThrow(BoundsError);
            expect(() => buffer.getByteAt(8)).toThrow(BoundsError);
        });
    });

    describe('offset access', () => {
        it('leaves cursors untouched', () => {
            const buffer = PacketBuffer.allocate({ capacity: 64 });
            buffer.putIntAt(1, 77);
            buffer.putFloatAt(5, 2.5);
            buffer.putDoubleAt(9, -0.25);
            buffer.putBoolAt(17, true);
            buffer.putByteAt(18, 200);
            buffer.putCharAt(19, 'q');
            buffer.putStringAt(20, 'abc');

            expect(buffer.writePosition).toBe(1);
            expect(buffer.getIntAt(1)).toBe(77);
            expect(buffer.getFloatAt(5)).toBe(2.5);
            expect(buffer.getDoubleAt(9)).toBe(-0.25);
            expect(buffer.getBoolAt(17)).toBe(true);
            expect(buffer.getByteAt(18)).toBe(200);
            expect(buffer.getCharAt(19)).toBe('q');
            expect(buffer.getStringAt(20)).toBe('abc');
            expect(buffer.readPosition).toBe(1);
        });
    });

    describe('packables', () => {
        it('packs and unpacks a composite value', () => {
            const buffer = PacketBuffer.allocate({ capacity: 64 });
            const vector = new Vector();
            vector.x = 3;
            vector.y = -4;
            vector.label = 'origin';

            buffer.putPackable(vector);
            const decoded = buffer.getPackable(Vector);

            expect(decoded.x).toBe(3);
            expect(decoded.y).toBe(-4);
            expect(decoded.label).toBe('origin');
            expect(buffer.readPosition).toBe(buffer.writePosition);
        });
    });
});
