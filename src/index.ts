/**
 * packetflow - fixed-frame packet networking for Node.js
 *
 * Typed packet codec, TCP and UDP transports, and per-ID protocol routing
 * with optional payload encryption.
 *
 * @example
 * ```typescript
 * import { BasicPacket, ProtocolRouter, ProtocolTable, StreamTransport, basicPacketFactory } from 'packetflow';
 *
 * const transport = await StreamTransport.connect('127.0.0.1', 4000);
 * const lobby = new ProtocolTable<BasicPacket>('lobby');
 * lobby.addTrigger(5, (packet) => console.log(packet.buffer.getString()));
 *
 * const router = new ProtocolRouter(transport, basicPacketFactory(), lobby);
 * router.start();
 * ```
 *
 * @packageDocumentation
 */

// Packets
export { PacketBuffer, ID_OFFSET, ID_SIZE } from './packet/PacketBuffer';
export type { PacketBufferOptions } from './packet/PacketBuffer';
export type { Packable } from './packet/Packable';
export { BasicPacket, DatagramPacket, basicPacketFactory, datagramPacketFactory } from './packet/Packet';
export type { Packet, PacketFactory, PacketKind, PacketLayoutOptions } from './packet/Packet';

// Transports
export { Transport } from './transport/Transport';
export type { TransportEvents, TransportOptions } from './transport/Transport';
export { StreamTransport } from './transport/StreamTransport';
export { DatagramTransport } from './transport/DatagramTransport';
export type { DatagramSocket, DatagramTransportOptions } from './transport/DatagramTransport';
export { TcpListener } from './transport/TcpListener';
export type { ServerFactory, StreamServer, TcpListenerEvents, TcpListenerOptions } from './transport/TcpListener';

// Dispatch and routing
export { Dispatcher } from './core/Dispatcher';
export type { DispatcherEvents, DispatcherOptions } from './core/Dispatcher';
export { ProtocolTable, TRIGGER_SLOTS } from './core/ProtocolTable';
export type { PacketHandler, TriggerSlots } from './core/ProtocolTable';
export { ProtocolRouter } from './core/ProtocolRouter';

// Encryption
export * from './encryption';

// Types
export type { Endpoint, InboundFrame, TransportState, DispatchOutcome } from './types';

// Configuration
export {
    DEFAULT_PACKET_SIZE,
    MAX_DATAGRAM_SIZE,
    MAX_FRAME_SIZE,
    TransportConfigSchema,
    DatagramTransportConfigSchema,
    ListenerConfigSchema,
    CipherConfigSchema,
    ServerFileConfigSchema,
    parseConfig,
} from './config';
export type { CipherConfig, CipherMode, ServerFileConfig } from './config';

// Errors
export {
    PacketFlowError,
    BoundsError,
    FormatError,
    OutOfRangeError,
    AlreadyRunningError,
    ClosedConnectionError,
    DuplicateKeyError,
    KeyNotFoundError,
    ConfigurationError,
} from './errors';

// Utilities
export { Logger, LogLevel, logger } from './utils/Logger';
export { EventEmitter } from './utils/EventEmitter';
export { FrameQueue } from './utils/FrameQueue';
export { AutoResetSignal } from './utils/AutoResetSignal';

// Debug Utilities (development only)
export { describePacket, hexDump, formatBytes } from './debug';
export type { AnyPacket } from './debug';

export { version } from './version';
