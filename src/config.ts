import { z } from 'zod';
import { ConfigurationError } from './errors';

/**
 * Zod schemas for every options object accepted at a public boundary.
 * Options are validated once, at construction, and defaults are filled in here.
 */

/** Default frame capacity in bytes. */
export const DEFAULT_PACKET_SIZE = 1500;

/** Largest payload a single UDP datagram can carry. */
export const MAX_DATAGRAM_SIZE = 65507;

export const MAX_FRAME_SIZE = 65535;

const FrameSizeSchema = z.number().int().min(1).max(MAX_FRAME_SIZE);

const PortSchema = z.number().int().min(0).max(65535);

const HexSchema = z
    .string()
    .regex(/^(?:[0-9a-fA-F]{2})+$/, 'must be an even-length hex string');

const BytesSchema = z.custom<Uint8Array>((value) => value instanceof Uint8Array, {
    message: 'expected a Uint8Array',
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'none']);

export const EndpointSchema = z.object({
    address: z.string().min(1),
    port: PortSchema,
});

export const TransportConfigSchema = z.object({
    frameSize: FrameSizeSchema.default(DEFAULT_PACKET_SIZE),
    debug: z.boolean().default(false),
});

export const DatagramTransportConfigSchema = TransportConfigSchema.extend({
    frameSize: z.number().int().min(1).max(MAX_DATAGRAM_SIZE).default(DEFAULT_PACKET_SIZE),
    type: z.enum(['udp4', 'udp6']).default('udp4'),
    remote: EndpointSchema.optional(),
    backlog: z.number().int().min(0).default(256),
});

export const ListenerConfigSchema = TransportConfigSchema.extend({
    host: z.string().min(1).default('0.0.0.0'),
});

export const CipherModeSchema = z.enum(['ctr', 'cbc']);

export const CipherConfigSchema = z.object({
    key: BytesSchema.refine(
        (key) => key.length === 16 || key.length === 24 || key.length === 32,
        'key must be 16, 24 or 32 bytes'
    ),
    iv: BytesSchema.refine((iv) => iv.length === 16, 'iv must be 16 bytes'),
    mode: CipherModeSchema.default('ctr'),
});

/**
 * Shape of the YAML file read by `packetflow serve --config`.
 */
export const ServerFileConfigSchema = z.object({
    port: PortSchema.default(4000),
    host: z.string().min(1).default('0.0.0.0'),
    frameSize: FrameSizeSchema.default(DEFAULT_PACKET_SIZE),
    logLevel: LogLevelSchema.default('info'),
    encryption: z
        .object({
            key: HexSchema,
            iv: HexSchema,
            mode: CipherModeSchema.default('ctr'),
        })
        .optional(),
});

export type TransportConfig = z.output<typeof TransportConfigSchema>;
export type DatagramTransportConfig = z.output<typeof DatagramTransportConfigSchema>;
export type ListenerConfig = z.output<typeof ListenerConfigSchema>;
export type CipherConfig = z.output<typeof CipherConfigSchema>;
export type CipherMode = z.output<typeof CipherModeSchema>;
export type ServerFileConfig = z.output<typeof ServerFileConfigSchema>;

/**
 * Validates `input` against `schema`, filling defaults.
 *
 * @throws {ConfigurationError} listing every `path: message` issue.
 */
export function parseConfig<Out, In>(
    schema: z.ZodType<Out, z.ZodTypeDef, In>,
    input: unknown,
    label: string
): Out {
    const result = schema.safeParse(input);

    if (!result.success) {
        const issues = result.error.issues
            .map(e => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
            .join(', ');
        throw new ConfigurationError(`Invalid ${label}: ${issues}`);
    }

    return result.data;
}
