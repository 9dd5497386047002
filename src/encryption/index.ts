/**
 * @module Encryption
 * @description
 * Payload encryption for fixed-size frames. The ID and encrypted flag travel
 * in clear text; the integrity marker and payload are run through a
 * {@link PayloadCipher}. A marker that no longer matches the ID after
 * decryption marks the packet as corrupted.
 */

export {
    EncryptedPacket,
    encryptedPacketFactory,
    ENCRYPTED_FLAG_OFFSET,
    ENCRYPTED_HEADER_SIZE,
    INTEGRITY_MARKER_OFFSET,
    INTEGRITY_MARKER_SIZE,
} from './EncryptedPacket';
export type { EncryptedPacketOptions } from './EncryptedPacket';
export { AesPayloadCipher, AES_BLOCK_SIZE } from './PayloadCipher';
export type { AesPayloadCipherOptions, PayloadCipher } from './PayloadCipher';
export { EncryptedProtocolRouter } from './EncryptedProtocolRouter';
