import { afterEach, describe, expect, it } from 'vitest';
import { Buffer } from 'node:buffer';
import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import { PassThrough } from 'node:stream';

import { StreamReceiver } from '../src/core/receiver/index.ts';
import { StreamStatus } from '../src/config/index.ts';
import { NotConnectedError, StreamError } from '../src/utils/errors.ts';
import { getLogger, MAX_RETAINED_MESSAGES, NoopLogFacility } from '../src/utils/logging/logUtils.ts';
import { MockLogger } from './helpers/mockLogger.ts';
import { float32s, frame, packetInfo, scalingXml, syncFixed, xmlConfig } from './helpers/packetBuilder.ts';

function dataPacket(sequenceNumber: number, values: number[], streamStatus: number = StreamStatus.NORMAL_PACKET): Buffer {
    return frame(
        Buffer.concat([
            packetInfo({ sequenceNumber, streamStatus }),
            syncFixed({ dataType: 10, count: values.length, timestamp: BigInt(sequenceNumber * 10) }, float32s(values)),
        ]),
    );
}

function welcome(text: string): Buffer {
    const buf = Buffer.alloc(64);
    buf.write(text, 'latin1');
    return buf;
}

describe('StreamReceiver on an attached stream', () => {
    it('reads and decodes a packet after leading garbage', async () => {
        const stream = new PassThrough();
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 200 });
        receiver.attach(stream);
        stream.write(Buffer.concat([Buffer.from([1, 2, 3]), dataPacket(4, [0.5, 1.5])]));

        expect(await receiver.readPacket()).toEqual([
            [
                [40, 0.5],
                [41, 1.5],
            ],
        ]);
        expect(receiver.packetInfo?.sequenceNumber).toBe(4);
        expect(receiver.isLastPacket()).toBe(false);
    });

    it('returns null when no packet starts before the timeout', async () => {
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 20 });
        receiver.attach(new PassThrough());
        expect(await receiver.readPacket()).toBeNull();
    });

    it('serializes concurrent reads', async () => {
        const stream = new PassThrough();
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 200 });
        receiver.attach(stream);
        stream.write(Buffer.concat([dataPacket(1, [1]), dataPacket(2, [2])]));

        const [first, second] = await Promise.all([receiver.readPacket(), receiver.readPacket()]);
        expect(first).toEqual([[[10, 1]]]);
        expect(second).toEqual([[[20, 2]]]);
    });

    it('keeps scaling from an earlier packet', async () => {
        const stream = new PassThrough();
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 200 });
        receiver.attach(stream);
        stream.write(frame(xmlConfig(scalingXml([{ factor: 4, offset: 1 }]))));
        stream.write(dataPacket(1, [2]));

        expect(await receiver.readPacket()).toEqual([]);
        expect(await receiver.readPacket()).toEqual([[[10, 9]]]);
        expect(receiver.scalingTable).toEqual([{ factor: 4, offset: 1 }]);
    });

    it('exposes the warnings of the last packet', async () => {
        const stream = new PassThrough();
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 200 });
        receiver.attach(stream);
        stream.write(frame(syncFixed({ dataType: 15, count: 1 }, Buffer.alloc(4))));

        expect(await receiver.readPacket()).toEqual([[]]);
        expect(receiver.lastWarnings.map((w) => w.reason)).toEqual(['unsupported-data-type']);
    });

    it('drains until the last packet', async () => {
        const stream = new PassThrough();
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 200 });
        receiver.attach(stream);
        stream.write(Buffer.concat([dataPacket(1, [1]), dataPacket(2, [2]), dataPacket(3, [3], StreamStatus.LAST_PACKET)]));

        expect(await receiver.drain()).toBe(3);
        expect(receiver.isLastPacket()).toBe(true);
        expect(await receiver.drain()).toBe(0);
    });

    it('forgets the last packet flag when a new stream is attached', async () => {
        const first = new PassThrough();
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 200 });
        receiver.attach(first);
        first.write(dataPacket(1, [1], StreamStatus.LAST_PACKET));
        await receiver.readPacket();
        expect(receiver.isLastPacket()).toBe(true);

        receiver.attach(new PassThrough());
        expect(receiver.isLastPacket()).toBe(false);
        expect(receiver.packetInfo).toBeNull();
    });

    it('gives up draining after the read limit', async () => {
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 10 });
        receiver.attach(new PassThrough());
        await expect(receiver.drain(2)).rejects.toThrow(StreamError);
    });

    it('keeps a bounded log history over a long quiet stream', async () => {
        const logger = getLogger('receiver-long-stream', NoopLogFacility);
        const stream = new PassThrough();
        const receiver = new StreamReceiver({ logger, timeoutMs: 200 });
        receiver.attach(stream);
        const packets = Array.from({ length: 300 }, (_, i) => dataPacket(i, [i]));
        stream.write(Buffer.concat([Buffer.alloc(150, 0x55), ...packets]));

        for (let i = 0; i < packets.length; i++) {
            await receiver.readPacket();
        }
        expect(receiver.packetInfo?.sequenceNumber).toBe(299);
        expect(logger.errorMessages).toHaveLength(MAX_RETAINED_MESSAGES);
        expect(logger.debugMessages).toHaveLength(MAX_RETAINED_MESSAGES);
    });

    it('rejects reads when not connected', async () => {
        const receiver = new StreamReceiver({ logger: new MockLogger() });
        await expect(receiver.readPacket()).rejects.toBeInstanceOf(NotConnectedError);
    });
});

describe('StreamReceiver over TCP', () => {
    let server: Server | null = null;

    function listen(onConnection: (socket: Socket) => void): Promise<number> {
        return new Promise((resolve) => {
            const srv = createServer(onConnection);
            server = srv;
            srv.listen(0, '127.0.0.1', () => {
                const address: AddressInfo | string | null = srv.address();
                resolve(typeof address === 'object' && address !== null ? address.port : 0);
            });
        });
    }

    afterEach(async () => {
        const srv = server;
        server = null;
        if (srv) {
            await new Promise<void>((resolve) => srv.close(() => resolve()));
        }
    });

    it('consumes the welcome message and reads packets', async () => {
        const logger = new MockLogger(true);
        const port = await listen((socket) => {
            socket.write(Buffer.concat([welcome('TEST DEVICE'), dataPacket(7, [2.5])]));
        });
        const receiver = new StreamReceiver({ logger, timeoutMs: 500 });

        expect(await receiver.connect('127.0.0.1', port)).toBe(true);
        expect(logger.debugMessages).toContain('Data stream product name: TEST DEVICE');
        expect(await receiver.readPacket()).toEqual([[[70, 2.5]]]);

        receiver.disconnect();
        expect(receiver.isConnected).toBe(false);
        await expect(receiver.readPacket()).rejects.toBeInstanceOf(NotConnectedError);
    });

    it('starts each connection with an empty scaling table', async () => {
        const factors = [2, 10];
        let connections = 0;
        const port = await listen((socket) => {
            const factor = factors[connections++];
            socket.write(
                Buffer.concat([
                    welcome('TEST DEVICE'),
                    frame(xmlConfig(scalingXml([{ factor, offset: 0 }]))),
                    dataPacket(0, [1]),
                ]),
            );
        });
        const receiver = new StreamReceiver({ logger: new MockLogger(), timeoutMs: 500 });

        expect(await receiver.connect('127.0.0.1', port)).toBe(true);
        expect(await receiver.readPacket()).toEqual([]);
        expect(await receiver.readPacket()).toEqual([[[0, 2]]]);

        expect(await receiver.connect('127.0.0.1', port)).toBe(true);
        expect(receiver.scalingTable).toEqual([]);
        expect(receiver.packetInfo).toBeNull();
        expect(await receiver.readPacket()).toEqual([]);
        expect(await receiver.readPacket()).toEqual([[[0, 10]]]);
        expect(receiver.scalingTable).toEqual([{ factor: 10, offset: 0 }]);
        receiver.disconnect();
    });

    it('fails to connect when the peer closes before the welcome message', async () => {
        const logger = new MockLogger();
        const port = await listen((socket) => socket.end());
        const receiver = new StreamReceiver({ logger, timeoutMs: 500 });

        expect(await receiver.connect('127.0.0.1', port)).toBe(false);
        expect(logger.errorMessages[0]).toMatch(/^Could not read welcome message/);
    });

    it('reports a refused connection', async () => {
        const port = await listen(() => undefined);
        const srv = server;
        server = null;
        await new Promise<void>((resolve) => srv?.close(() => resolve()));

        const logger = new MockLogger();
        const receiver = new StreamReceiver({ logger, timeoutMs: 500 });
        expect(await receiver.connect('127.0.0.1', port)).toBe(false);
        expect(logger.errorMessages[0]).toMatch(new RegExp(`^Connection to 127.0.0.1:${port} failed`));
    });
});
