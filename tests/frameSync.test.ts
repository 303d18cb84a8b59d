import { describe, expect, it } from 'vitest';
import { Buffer } from 'node:buffer';
import seedrandom from 'seedrandom';

import { readFrame } from '../src/core/framing/index.ts';
import { FrameSyncStateMachine } from '../src/core/framing/stateMachine.ts';
import { FrameStates } from '../src/stateMachine/definedStates.ts';
import { FramingError } from '../src/utils/errors.ts';
import { MockLogger } from './helpers/mockLogger.ts';
import { BufferReader, float32s, frame, packetInfo, syncFixed } from './helpers/packetBuilder.ts';

const PAYLOAD = Buffer.concat([packetInfo({ sequenceNumber: 3 }), syncFixed({ dataType: 10, count: 2 }, float32s([1, 2]))]);

function garbage(length: number, seed: string): Buffer {
    const random = seedrandom(seed);
    // 'O' never appears, so the garbage cannot contain a start token
    return Buffer.from(Array.from({ length }, () => {
        const byte = Math.floor(random() * 256);
        return byte === 0x4f ? 0 : byte;
    }));
}

function options(data: Buffer, logger = new MockLogger(), maxResyncBytes = 1024) {
    return { reader: new BufferReader(data), logger, verbose: false, maxResyncBytes };
}

describe('readFrame', () => {
    it('returns the payload of a well formed frame', async () => {
        const payload = await readFrame(options(frame(PAYLOAD)));
        expect(payload).toEqual(PAYLOAD);
    });

    it('decodes a frame after leading garbage identically', async () => {
        const logger = new MockLogger();
        const payload = await readFrame(options(Buffer.concat([garbage(37, 'fixed-seed'), frame(PAYLOAD)]), logger));
        expect(payload).toEqual(PAYLOAD);
        expect(logger.errorMessages).toHaveLength(37);
        expect(logger.warnMessages).toEqual(['Resynchronized after skipping 37 bytes']);
    });

    it('finds a token that starts inside a partial token', async () => {
        const data = Buffer.concat([Buffer.from('OXYGEN<', 'latin1'), frame(PAYLOAD)]);
        expect(await readFrame(options(data))).toEqual(PAYLOAD);
    });

    it('reports no data when nothing arrives', async () => {
        const logger = new MockLogger();
        expect(await readFrame(options(Buffer.alloc(0), logger))).toBeNull();
        expect(logger.warnMessages).toEqual(['No data available yet']);
    });

    it('reports no data when the stream goes quiet while searching', async () => {
        expect(await readFrame(options(garbage(20, 'quiet')))).toBeNull();
    });

    it('fails when the resynchronization budget is exhausted', async () => {
        const data = Buffer.concat([garbage(10, 'budget'), frame(PAYLOAD)]);
        await expect(readFrame(options(data, new MockLogger(), 4))).rejects.toThrow(FramingError);
    });

    it('fails on a truncated size header', async () => {
        const data = frame(PAYLOAD).subarray(0, 10);
        await expect(readFrame(options(data))).rejects.toThrow(FramingError);
    });

    it('fails on a truncated body', async () => {
        const data = frame(PAYLOAD).subarray(0, 30);
        await expect(readFrame(options(data))).rejects.toThrow(/Could not read packet data/);
    });

    it('fails on a size smaller than the header', async () => {
        const data = frame(PAYLOAD);
        data.writeUInt32LE(11, 8);
        await expect(readFrame(options(data))).rejects.toThrow(FramingError);
    });

    it('accepts an empty payload', async () => {
        const payload = await readFrame(options(frame(Buffer.alloc(0))));
        expect(payload).toEqual(Buffer.alloc(0));
    });
});

describe('FrameSyncStateMachine', () => {
    it('ends in PACKET_READY after a complete frame', async () => {
        const machine = new FrameSyncStateMachine(options(frame(PAYLOAD)));
        expect(await machine.run()).toBe(FrameStates.PACKET_READY);
        expect(machine.skippedBytes).toBe(0);
    });

    it('ends in NO_DATA on a timeout while searching', async () => {
        const machine = new FrameSyncStateMachine(options(Buffer.alloc(3)));
        expect(await machine.run()).toBe(FrameStates.NO_DATA);
        expect(machine.payload).toBeNull();
    });

    it('ends in FRAMING_ERROR and logs the failed state', async () => {
        const logger = new MockLogger();
        const machine = new FrameSyncStateMachine(options(frame(PAYLOAD).subarray(0, 20), logger));
        await expect(machine.run()).rejects.toThrow(FramingError);
        expect(machine.currentState).toBe(FrameStates.FRAMING_ERROR);
        expect(logger.errorMessages[0]).toMatch(/^Error occurred during "BODY_READ": Could not read packet data/);
    });

    it('logs transitions when verbose', async () => {
        const logger = new MockLogger(true);
        const machine = new FrameSyncStateMachine({ ...options(frame(PAYLOAD), logger), verbose: true });
        await machine.run();
        expect(logger.debugMessages.filter((m) => m.startsWith('STATE ::'))).toEqual([
            'STATE :: Transitioning from state "SEARCHING_TOKEN" -> "SEARCHING_TOKEN"',
            'STATE :: Transitioning from state "SEARCHING_TOKEN" -> "HEADER_READ"',
            'STATE :: Transitioning from state "HEADER_READ" -> "BODY_READ"',
            'STATE :: Transitioning from state "BODY_READ" -> "PACKET_READY"',
        ]);
    });
});
