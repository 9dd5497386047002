import { DuplicateKeyError, KeyNotFoundError } from '../errors';
import type { Packet, PacketFactory } from '../packet/Packet';
import type { Transport } from '../transport/Transport';
import type { DispatchOutcome } from '../types';
import { Dispatcher, DispatcherOptions } from './Dispatcher';
import type { ProtocolTable } from './ProtocolTable';

/**
 * A dispatcher that routes every packet through the active protocol table
 * before emitting `packet`.
 *
 * Tables are registered by name; exactly one is active at a time, and switching
 * keeps the others registered.
 *
 * @example
 * ```typescript
 * const router = new ProtocolRouter(transport, basicPacketFactory(), handshake);
 * router.addProtocol(session);
 * handshake.addTrigger(HELLO, (packet, r) => r.exchangeProtocol('session'));
 * router.start();
 * ```
 */
export class ProtocolRouter<P extends Packet> extends Dispatcher<P> {
    private readonly protocols = new Map<string, ProtocolTable<P>>();
    private active: ProtocolTable<P>;

    constructor(
        transport: Transport,
        factory: PacketFactory<P>,
        initialProtocol: ProtocolTable<P>,
        options: DispatcherOptions = {}
    ) {
        super(transport, factory, options);
        this.protocols.set(initialProtocol.name, initialProtocol);
        this.active = initialProtocol;
    }

    get currentProtocol(): ProtocolTable<P> {
        return this.active;
    }

    get currentProtocolName(): string {
        return this.active.name;
    }

    get protocolNames(): string[] {
        return Array.from(this.protocols.keys());
    }

    /**
     * @throws {DuplicateKeyError} If a table with the same name is registered.
     */
    addProtocol(table: ProtocolTable<P>): void {
        if (this.protocols.has(table.name)) {
            throw new DuplicateKeyError(table.name);
        }
        this.protocols.set(table.name, table);
    }

    hasProtocol(name: string): boolean {
        return this.protocols.has(name);
    }

    getProtocol(name: string): ProtocolTable<P> | undefined {
        return this.protocols.get(name);
    }

    /**
     * Makes the named table the active one. Takes effect from the next packet.
     *
     * @throws {KeyNotFoundError} If no table has that name.
     */
    exchangeProtocol(name: string): void {
        const table = this.protocols.get(name);
        if (table === undefined) {
            throw new KeyNotFoundError(name);
        }
        if (table !== this.active) {
            this.logger.debug(`Protocol ${this.active.name} -> ${name}`);
        }
        this.active = table;
    }

    /**
     * Routes a packet through the active table without emitting `packet`.
     */
    route(packet: P): DispatchOutcome {
        return this.active.dispatch(packet, this);
    }

    protected override onPacket(packet: P): void {
        this.route(packet);
        super.onPacket(packet);
    }
}
