import * as crypto from 'crypto';
import { CipherConfigSchema, parseConfig } from '../config';
import type { CipherConfig, CipherMode } from '../config';
import { OutOfRangeError } from '../errors';

/** AES block size in bytes. */
export const AES_BLOCK_SIZE = 16;

/**
 * Transforms a region of a frame. Bytes outside the region are never touched.
 */
export interface PayloadCipher {
    /** Returns a new frame with `[offset, offset + count)` encrypted. */
    encrypt(frame: Uint8Array, offset: number, count: number): Uint8Array;
    /** Decrypts `[offset, offset + count)` in place. */
    decrypt(frame: Uint8Array, offset: number, count: number): void;
}

export interface AesPayloadCipherOptions {
    key: Uint8Array;
    iv: Uint8Array;
    /** @default 'ctr' */
    mode?: CipherMode;
}

/**
 * AES with an explicit key and IV and no padding.
 *
 * `ctr` accepts a region of any length. `cbc` requires a whole number of
 * blocks. The key length (16, 24 or 32 bytes) selects AES-128/192/256.
 */
export class AesPayloadCipher implements PayloadCipher {
    private config: CipherConfig;

    constructor(options: AesPayloadCipherOptions) {
        this.config = AesPayloadCipher.parse(options);
    }

    get mode(): CipherMode {
        return this.config.mode;
    }

    get algorithm(): string {
        return `aes-${this.config.key.length * 8}-${this.config.mode}`;
    }

    /** Swaps key and IV. The mode is kept. */
    rekey(key: Uint8Array, iv: Uint8Array): void {
        this.config = AesPayloadCipher.parse({ key, iv, mode: this.config.mode });
    }

    encrypt(frame: Uint8Array, offset: number, count: number): Uint8Array {
        this.assertRegion(frame, offset, count);
        const out = new Uint8Array(frame);
        const cipher = crypto.createCipheriv(this.algorithm, this.config.key, this.config.iv);
        cipher.setAutoPadding(false);
        out.set(this.run(cipher, frame.subarray(offset, offset + count)), offset);
        return out;
    }

    decrypt(frame: Uint8Array, offset: number, count: number): void {
        this.assertRegion(frame, offset, count);
        const decipher = crypto.createDecipheriv(this.algorithm, this.config.key, this.config.iv);
        decipher.setAutoPadding(false);
        frame.set(this.run(decipher, frame.subarray(offset, offset + count)), offset);
    }

    private run(transform: crypto.Cipher | crypto.Decipher, region: Uint8Array): Uint8Array {
        const head = transform.update(region);
        const tail = transform.final();
        return tail.length === 0 ? head : Buffer.concat([head, tail]);
    }

    private assertRegion(frame: Uint8Array, offset: number, count: number): void {
        if (!Number.isInteger(offset) || !Number.isInteger(count) || offset < 0 || count < 0 || offset + count > frame.length) {
            throw new OutOfRangeError(
                `Cipher region [${offset}, ${offset + count}) is outside a ${frame.length}-byte frame`
            );
        }
        if (this.config.mode === 'cbc' && count % AES_BLOCK_SIZE !== 0) {
            throw new OutOfRangeError(
                `CBC needs a multiple of ${AES_BLOCK_SIZE} bytes, got ${count}; use ctr mode or resize the frame`
            );
        }
    }

    private static parse(options: AesPayloadCipherOptions): CipherConfig {
        const config = parseConfig(CipherConfigSchema, options, 'cipher options');
        return { ...config, key: new Uint8Array(config.key), iv: new Uint8Array(config.iv) };
    }
}
