/**
 * packetflow - Shared Type Definitions
 *
 * Types used across the transport, packet and dispatch layers.
 */

// =============================================================================
// Addressing
// =============================================================================

/** A remote or local network endpoint. */
export interface Endpoint {
    address: string;
    port: number;
    family?: 'IPv4' | 'IPv6';
}

// =============================================================================
// Frames
// =============================================================================

/**
 * One unit captured off the wire, queued between the transport and the
 * dispatcher. `bytes.length` always equals the transport's frame size.
 * `sender` is set for connectionless transports, `null` otherwise.
 */
export interface InboundFrame {
    readonly bytes: Uint8Array;
    readonly sender: Endpoint | null;
}

// =============================================================================
// Lifecycle
// =============================================================================

/** Observable lifecycle of a transport. */
export type TransportState = 'created' | 'started' | 'stopped' | 'closed';

/** Where a packet ended up after going through a protocol table. */
export type DispatchOutcome = 'trigger' | 'default' | 'dropped';
