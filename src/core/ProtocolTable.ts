import { OutOfRangeError, toError } from '../errors';
import type { Packet } from '../packet/Packet';
import type { DispatchOutcome } from '../types';
import { Logger, logger as rootLogger } from '../utils/Logger';
import type { ProtocolRouter } from './ProtocolRouter';

/** Number of message IDs a table can bind. */
export const TRIGGER_SLOTS = 256;

/**
 * Reacts to one packet. Receives the router that dispatched it, so a handler
 * can reply or switch protocols.
 */
export type PacketHandler<P extends Packet> = (packet: P, router: ProtocolRouter<P>) => void;

export type TriggerSlots<P extends Packet> = ReadonlyArray<ReadonlyArray<PacketHandler<P>> | null | undefined>;

/**
 * Maps each message ID (0-255) to an ordered list of handlers, with a default
 * list for IDs that have none.
 *
 * @example
 * ```typescript
 * const lobby = new ProtocolTable<BasicPacket>('lobby');
 * lobby.addTrigger(1, (packet, router) => router.exchangeProtocol('game'));
 * lobby.addDefaultHandler((packet) => logger.warn('Unexpected packet', packet.id));
 * ```
 */
export class ProtocolTable<P extends Packet> {
    private slots: Array<PacketHandler<P>[] | null> = new Array(TRIGGER_SLOTS).fill(null);
    private defaults: PacketHandler<P>[] = [];
    private readonly logger: Logger;

    constructor(
        readonly name: string,
        slots?: TriggerSlots<P>,
        logger?: Logger
    ) {
        this.logger = logger ?? rootLogger.child(`protocol:${name}`);
        if (slots) this.setTriggers(slots);
    }

    /** Appends a handler to the list bound to `id`. */
    addTrigger(id: number, handler: PacketHandler<P>): void {
        assertSlot(id);
        const list = this.slots[id];
        if (list) {
            list.push(handler);
        } else {
            this.slots[id] = [handler];
        }
    }

    /** Replaces the whole list bound to `id`. An empty list unbinds it. */
    setTrigger(id: number, handlers: ReadonlyArray<PacketHandler<P>>): void {
        assertSlot(id);
        this.slots[id] = handlers.length > 0 ? [...handlers] : null;
    }

    getTriggers(id: number): ReadonlyArray<PacketHandler<P>> {
        assertSlot(id);
        return this.slots[id] ?? [];
    }

    hasTrigger(id: number): boolean {
        return this.getTriggers(id).length > 0;
    }

    /**
     * Removes one handler from `id`, or the whole binding when no handler is
     * given.
     */
    removeTrigger(id: number, handler?: PacketHandler<P>): void {
        assertSlot(id);
        const list = this.slots[id];
        if (!list) return;
        if (handler === undefined) {
            this.slots[id] = null;
            return;
        }
        const index = list.indexOf(handler);
        if (index !== -1) list.splice(index, 1);
        if (list.length === 0) this.slots[id] = null;
    }

    clearTriggers(): void {
        this.slots = new Array(TRIGGER_SLOTS).fill(null);
    }

    /**
     * Replaces every binding. Index `i` of `slots` binds message ID `i`;
     * missing entries are left unbound.
     *
     * @throws {OutOfRangeError} If more than 256 slots are given.
     */
    setTriggers(slots: TriggerSlots<P>): void {
        if (slots.length > TRIGGER_SLOTS) {
            throw new OutOfRangeError(`A protocol table holds at most ${TRIGGER_SLOTS} triggers, got ${slots.length}`);
        }
        const next: Array<PacketHandler<P>[] | null> = new Array(TRIGGER_SLOTS).fill(null);
        slots.forEach((list, id) => {
            if (list && list.length > 0) next[id] = [...list];
        });
        this.slots = next;
    }

    addDefaultHandler(handler: PacketHandler<P>): void {
        this.defaults.push(handler);
    }

    removeDefaultHandler(handler: PacketHandler<P>): void {
        const index = this.defaults.indexOf(handler);
        if (index !== -1) this.defaults.splice(index, 1);
    }

    get defaultHandlers(): ReadonlyArray<PacketHandler<P>> {
        return this.defaults;
    }

    /**
     * Runs the handlers bound to the packet's ID, or the default handlers when
     * none are bound.
     */
    dispatch(packet: P, router: ProtocolRouter<P>): DispatchOutcome {
        const bound = this.slots[packet.id];
        if (bound && bound.length > 0) {
            this.invoke(bound, packet, router);
            return 'trigger';
        }
        if (this.defaults.length > 0) {
            this.invoke(this.defaults, packet, router);
            return 'default';
        }
        this.logger.debug(`No handler for packet ${packet.id}`);
        return 'dropped';
    }

    private invoke(handlers: ReadonlyArray<PacketHandler<P>>, packet: P, router: ProtocolRouter<P>): void {
        for (const handler of [...handlers]) {
            try {
                handler(packet, router);
            } catch (err) {
                this.logger.error(`Handler for packet ${packet.id} threw:`, toError(err).message);
            }
        }
    }
}

function assertSlot(id: number): void {
    if (!Number.isInteger(id) || id < 0 || id >= TRIGGER_SLOTS) {
        throw new OutOfRangeError(`Message ID must be an integer in 0-255, got ${id}`);
    }
}
