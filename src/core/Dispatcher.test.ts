/**
 * @file Dispatcher.test.ts
 * @brief Queue draining, ordering and lifecycle of the dispatcher.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Dispatcher } from './Dispatcher';
import { AlreadyRunningError, ClosedConnectionError, OutOfRangeError } from '../errors';
import { basicPacketFactory, datagramPacketFactory } from '../packet/Packet';
import type { BasicPacket, DatagramPacket } from '../packet/Packet';
import { ManualTransport, frame } from '../../tests/test-utils';

describe('Dispatcher', () => {
    let transport: ManualTransport;
    let dispatcher: Dispatcher<BasicPacket>;

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => { });
        vi.spyOn(console, 'info').mockImplementation(() => { });
        transport = new ManualTransport({ frameSize: 16 });
        dispatcher = new Dispatcher(transport, basicPacketFactory({ capacity: 16 }));
    });

    afterEach(() => {
        dispatcher.closeConnection();
        vi.restoreAllMocks();
    });

    it('emits packets in arrival order', async () => {
        const ids: number[] = [];
        dispatcher.on('packet', (packet) => ids.push(packet.id));
        dispatcher.start();

        transport.inject(frame(16, 1));
        transport.inject(frame(16, 2));
        transport.inject(frame(16, 3));

        await vi.waitFor(() => expect(ids).toEqual([1, 2, 3]));
    });

    it('dispatches frames that arrived before start', async () => {
        const ids: number[] = [];
        dispatcher.on('packet', (packet) => ids.push(packet.id));
        transport.inject(frame(16, 7));
        transport.inject(frame(16, 8));

        dispatcher.start();

        await vi.waitFor(() => expect(ids).toEqual([7, 8]));
    });

    it('decodes the payload of each frame', async () => {
        const values: number[] = [];
        dispatcher.on('packet', (packet) => values.push(packet.buffer.getByte()));
        dispatcher.start();

        transport.inject(frame(16, 1, 42));

        await vi.waitFor(() => expect(values).toEqual([42]));
    });

    it('surfaces undecodable frames and keeps going', async () => {
        const ids: number[] = [];
        const errors: Error[] = [];
        dispatcher.on('packet', (packet) => ids.push(packet.id));
        dispatcher.on('error', (err) => errors.push(err));
        dispatcher.start();

        transport.inject(new Uint8Array(8));
        transport.inject(frame(16, 5));

        await vi.waitFor(() => expect(ids).toEqual([5]));
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(OutOfRangeError);
    });

    it('drains whatever is queued when the connection closes', async () => {
        const ids: number[] = [];
        dispatcher.on('packet', (packet) => ids.push(packet.id));
        dispatcher.start();

        transport.queue.push({ bytes: frame(16, 9), sender: null });
        transport.closeConnection();

        await dispatcher.whenIdle();
        expect(ids).toEqual([9]);
        expect(dispatcher.isConsuming).toBe(false);
    });

    it('re-emits closed once', () => {
        const onClosed = vi.fn();
        dispatcher.on('closed', onClosed);
        dispatcher.start();

        dispatcher.closeConnection();
        dispatcher.closeConnection();

        expect(onClosed).toHaveBeenCalledTimes(1);
        expect(transport.released).toBe(1);
        expect(dispatcher.isAlive).toBe(false);
    });

    it('closes when the peer hangs up', async () => {
        const onClosed = vi.fn();
        dispatcher.on('closed', onClosed);
        dispatcher.start();

        transport.hangUp();

        await vi.waitFor(() => expect(onClosed).toHaveBeenCalledTimes(1));
        await dispatcher.whenIdle();
    });

    it('refuses to consume twice or after close', () => {
        dispatcher.start();
        expect(() => dispatcher.startConsume()).toThrow(AlreadyRunningError);

        dispatcher.closeConnection();
        expect(() => dispatcher.startConsume()).toThrow(ClosedConnectionError);
        expect(() => dispatcher.start()).toThrow(ClosedConnectionError);
    });

    it('re-enables a parked consume loop', async () => {
        const ids: number[] = [];
        dispatcher.on('packet', (packet) => ids.push(packet.id));
        dispatcher.start();

        dispatcher.endConsume();
        expect(dispatcher.isEnabled).toBe(false);
        expect(dispatcher.isConsuming).toBe(true);

        dispatcher.startConsume();
        expect(dispatcher.isEnabled).toBe(true);

        transport.inject(frame(16, 4));
        await vi.waitFor(() => expect(ids).toEqual([4]));
    });

    it('keeps consuming when a handler restarts the transport during the final drain', async () => {
        const ids: number[] = [];
        dispatcher.on('packet', (packet) => {
            ids.push(packet.id);
            if (packet.id === 1) transport.start();
        });
        dispatcher.start();

        transport.stop();
        transport.inject(frame(16, 1));
        transport.inject(frame(16, 2));

        await vi.waitFor(() => expect(ids).toEqual([1, 2]));
        expect(transport.isReceiving).toBe(true);
        expect(dispatcher.isConsuming).toBe(true);
    });

    it('stops both loops with endPublishConsume', () => {
        dispatcher.start();
        dispatcher.endPublishConsume();

        expect(dispatcher.isEnabled).toBe(false);
        expect(transport.isEnabled).toBe(false);
        expect(transport.state).toBe('stopped');
    });

    it('sends through the transport', () => {
        dispatcher.start();
        const packet = dispatcher.createPacket();
        packet.id = 12;

        expect(dispatcher.sendPack(packet)).toBe(true);
        expect(transport.sent).toHaveLength(1);
        expect(transport.sent[0]?.bytes[0]).toBe(12);
        expect(transport.sent[0]?.bytes.length).toBe(16);
    });

    it('does not send before start', () => {
        expect(dispatcher.sendPack(dispatcher.createPacket())).toBe(false);
        expect(transport.sent).toHaveLength(0);
    });
});

describe('Dispatcher with datagram packets', () => {
    it('puts the sender on each packet', async () => {
        const transport = new ManualTransport({ frameSize: 8 });
        const dispatcher = new Dispatcher<DatagramPacket>(transport, datagramPacketFactory({ capacity: 8 }));
        const sources: Array<string | null> = [];
        dispatcher.on('packet', (packet) => {
            sources.push(packet.source ? `${packet.source.address}:${packet.source.port}` : null);
        });
        dispatcher.start();

        transport.inject(frame(8, 1), { address: '10.0.0.2', port: 5000 });
        transport.inject(frame(8, 2));

        await vi.waitFor(() => expect(sources).toEqual(['10.0.0.2:5000', null]));
        dispatcher.closeConnection();
    });
});
