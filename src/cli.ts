#!/usr/bin/env node
import cac from 'cac';
import { loadServerConfig, resolveServeSettings } from './cli/config-file';
import { EchoServer } from './cli/echo-server';
import { sendOnce } from './cli/send';
import { CipherModeSchema, DEFAULT_PACKET_SIZE, parseConfig } from './config';
import { describePacket } from './debug';
import { AesPayloadCipher } from './encryption/PayloadCipher';
import { toError } from './errors';
import { logger, parseLogLevel } from './utils/Logger';
import { version } from './version';

const cli = cac('packetflow');

cli
    .command('serve', 'Run a TCP echo server')
    .option('--port <port>', 'Port to listen on (default: 4000)')
    .option('--host <host>', 'Interface to bind (default: 0.0.0.0)')
    .option('--frame-size <bytes>', 'Frame size in bytes (default: 1500)')
    .option('--config <file>', 'YAML config file')
    .option('--key <hex>', 'AES key in hex (16, 24 or 32 bytes)')
    .option('--iv <hex>', 'AES IV in hex (16 bytes)')
    .option('--mode <mode>', 'Cipher mode: ctr or cbc')
    .option('--debug', 'Verbose logging')
    .action(async (options: Record<string, unknown>) => {
        const settings = resolveServeSettings(
            {
                port: optionalNumber(options.port),
                host: optionalString(options.host),
                frameSize: optionalNumber(options.frameSize),
                key: optionalString(options.key),
                iv: optionalString(options.iv),
                mode: options.mode === undefined ? undefined : parseConfig(CipherModeSchema, options.mode, '--mode'),
                debug: options.debug === true,
            },
            typeof options.config === 'string' ? loadServerConfig(options.config) : null
        );
        logger.setLogLevel(parseLogLevel(settings.logLevel));

        const server = new EchoServer({ ...settings, debug: settings.logLevel === 'debug' });
        const bound = await server.start();
        logger.info(
            `Echo server on ${bound.address}:${bound.port} (frame ${settings.frameSize} bytes${settings.cipher ? ', encrypted' : ''})`
        );

        process.once('SIGINT', () => {
            logger.info('Shutting down...');
            server.stop().then(
                () => process.exit(0),
                (err: unknown) => {
                    logger.error('Shutdown failed:', toError(err).message);
                    process.exit(1);
                }
            );
        });
    });

cli
    .command('send <host> <port> <id> [text]', 'Send one packet and print the reply')
    .option('--frame-size <bytes>', 'Frame size in bytes (default: 1500)')
    .option('--key <hex>', 'AES key in hex')
    .option('--iv <hex>', 'AES IV in hex')
    .option('--mode <mode>', 'Cipher mode: ctr or cbc')
    .option('--timeout <ms>', 'Reply timeout in milliseconds (default: 5000)')
    .action(async (host: string, port: string, id: string, text: string | undefined, options: Record<string, unknown>) => {
        const key = optionalString(options.key);
        const iv = optionalString(options.iv);
        const cipher =
            key !== undefined && iv !== undefined
                ? new AesPayloadCipher({
                      key: new Uint8Array(Buffer.from(key, 'hex')),
                      iv: new Uint8Array(Buffer.from(iv, 'hex')),
                      mode: options.mode === undefined ? undefined : parseConfig(CipherModeSchema, options.mode, '--mode'),
                  })
                : null;

        const reply = await sendOnce(host, Number(port), optionalNumber(options.frameSize) ?? DEFAULT_PACKET_SIZE, {
            id: Number(id),
            text: text ?? '',
            cipher,
            timeoutMs: optionalNumber(options.timeout),
        });
        console.log(describePacket(reply.packet));
        console.log(reply.text);
    });

cli.help();
cli.version(version);

run().catch((err: unknown) => {
    logger.error(toError(err).message);
    process.exit(1);
});

async function run(): Promise<void> {
    cli.parse(process.argv, { run: false });
    await cli.runMatchedCommand();
}

function optionalNumber(value: unknown): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
}

function optionalString(value: unknown): string | undefined {
    return value === undefined ? undefined : String(value);
}
