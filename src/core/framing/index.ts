// src/core/framing/index.ts

import type { IFrameOptions } from '../../@types/index.ts';
import type { Buffer } from 'node:buffer';
import { FrameSyncStateMachine } from './stateMachine.ts';
import { FrameStates } from '../../stateMachine/definedStates.ts';

/**
 * Reads the next frame from the stream.
 *
 * @param options - Reader, logger and resynchronization budget for this cycle.
 * @return The frame payload without its 12-byte header, or `null` when no frame has started before the read timeout.
 */
export async function readFrame(options: IFrameOptions): Promise<Buffer | null> {
    const stateMachine = new FrameSyncStateMachine(options);
    const finalState = await stateMachine.run();
    if (finalState === FrameStates.NO_DATA) {
        return null;
    }
    if (stateMachine.skippedBytes > 0) {
        options.logger.warn(`Resynchronized after skipping ${stateMachine.skippedBytes} bytes`);
    }
    return stateMachine.payload;
}
