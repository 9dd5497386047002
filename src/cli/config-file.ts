/**
 * Loading and merging of `packetflow serve` settings.
 *
 * Precedence: command-line flags, then the YAML file, then schema defaults.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { parseConfig, ServerFileConfigSchema } from '../config';
import type { CipherMode, ServerFileConfig } from '../config';
import { ConfigurationError, toError } from '../errors';
import type { AesPayloadCipherOptions } from '../encryption/PayloadCipher';

export interface ServeFlags {
    port?: number;
    host?: string;
    frameSize?: number;
    key?: string;
    iv?: string;
    mode?: CipherMode;
    debug?: boolean;
}

export interface ServeSettings {
    port: number;
    host: string;
    frameSize: number;
    logLevel: ServerFileConfig['logLevel'];
    cipher: AesPayloadCipherOptions | null;
}

/**
 * Parses a YAML document against the server file schema.
 *
 * @throws {ConfigurationError} On malformed YAML or schema violations.
 */
export function parseServerConfig(content: string, source: string = 'config'): ServerFileConfig {
    let document: unknown;
    try {
        document = yaml.parse(content);
    } catch (err) {
        throw new ConfigurationError(`Invalid ${source}: ${toError(err).message}`);
    }
    return parseConfig(ServerFileConfigSchema, document ?? {}, source);
}

export function loadServerConfig(path: string): ServerFileConfig {
    let content: string;
    try {
        content = fs.readFileSync(path, 'utf8');
    } catch (err) {
        throw new ConfigurationError(`Cannot read ${path}: ${toError(err).message}`);
    }
    return parseServerConfig(content, path);
}

/**
 * Applies flags over a file config (or the schema defaults).
 *
 * @throws {ConfigurationError} If only one of key and IV is given.
 */
export function resolveServeSettings(flags: ServeFlags, file: ServerFileConfig | null = null): ServeSettings {
    const base = file ?? parseConfig(ServerFileConfigSchema, {}, 'defaults');
    const merged = parseConfig(
        ServerFileConfigSchema,
        {
            port: flags.port ?? base.port,
            host: flags.host ?? base.host,
            frameSize: flags.frameSize ?? base.frameSize,
            logLevel: flags.debug ? 'debug' : base.logLevel,
            encryption: mergeEncryption(flags, base.encryption),
        },
        'serve options'
    );

    return {
        port: merged.port,
        host: merged.host,
        frameSize: merged.frameSize,
        logLevel: merged.logLevel,
        cipher: merged.encryption
            ? {
                  key: fromHex(merged.encryption.key),
                  iv: fromHex(merged.encryption.iv),
                  mode: merged.encryption.mode,
              }
            : null,
    };
}

function mergeEncryption(
    flags: ServeFlags,
    file: ServerFileConfig['encryption']
): ServerFileConfig['encryption'] {
    if (flags.key === undefined && flags.iv === undefined) {
        return file && flags.mode ? { ...file, mode: flags.mode } : file;
    }
    if (flags.key === undefined || flags.iv === undefined) {
        throw new ConfigurationError('--key and --iv must be given together');
    }
    return { key: flags.key, iv: flags.iv, mode: flags.mode ?? file?.mode ?? 'ctr' };
}

function fromHex(hex: string): Uint8Array {
    return new Uint8Array(Buffer.from(hex, 'hex'));
}
