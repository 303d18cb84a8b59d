// src/core/framing/stateMachine.ts

import type { IFrameOptions } from '../../@types/index.ts';
import { Buffer } from 'node:buffer';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { FrameStates } from '../../stateMachine/definedStates.ts';
import { PACKET_HEADER_SIZE, START_TOKEN, TOKEN_SIZE } from '../../config/index.ts';
import { FramingError, ReadTimeoutError } from '../../utils/errors.ts';

/**
 * Reads one frame from the byte stream: finds the start token, reads the size
 * header and then exactly the remaining payload bytes.
 */
export class FrameSyncStateMachine extends AbstractStateMachine<FrameStates, IFrameOptions> {
    private packetSize = 0;
    private discardedBytes = 0;
    private body: Buffer | null = null;

    constructor(options: IFrameOptions) {
        super(FrameStates.SEARCHING_TOKEN, options);
        this.stateTransitions = [
            { state: FrameStates.SEARCHING_TOKEN, handler: this.searchToken },
            { state: FrameStates.HEADER_READ, handler: this.readHeader },
            { state: FrameStates.BODY_READ, handler: this.readBody },
        ];
    }

    get payload(): Buffer | null {
        return this.body;
    }

    /** Bytes dropped before the start token was found. */
    get skippedBytes(): number {
        return this.discardedBytes;
    }

    protected getCompletionState(): FrameStates {
        return FrameStates.PACKET_READY;
    }

    protected getErrorState(): FrameStates {
        return FrameStates.FRAMING_ERROR;
    }

    /**
     * Slides an 8-byte window over the stream one byte at a time until it matches the start token.
     * A timeout here only means no frame has started yet.
     */
    private async searchToken(): Promise<FrameStates | void> {
        const { reader, logger, maxResyncBytes } = this.options;
        let window: Buffer;
        try {
            window = await reader.readExact(TOKEN_SIZE);
            while (!window.equals(START_TOKEN)) {
                logger.error(`Invalid start packet token: ${window.toString('hex')}`);
                if (this.discardedBytes >= maxResyncBytes) {
                    throw new FramingError(`No start token within ${maxResyncBytes} bytes`);
                }
                const next = await reader.readExact(1);
                window = Buffer.concat([window.subarray(1), next]);
                this.discardedBytes++;
            }
        } catch (error) {
            if (error instanceof ReadTimeoutError) {
                logger.warn('No data available yet');
                return FrameStates.NO_DATA;
            }
            throw error;
        }
    }

    private async readHeader(): Promise<void> {
        const sizeField = await this.readFrameBytes(PACKET_HEADER_SIZE - TOKEN_SIZE, 'packet size');
        this.packetSize = sizeField.readUInt32LE(0);
        if (this.packetSize < PACKET_HEADER_SIZE) {
            throw new FramingError(`Packet size ${this.packetSize} is smaller than the ${PACKET_HEADER_SIZE} byte header`);
        }
    }

    private async readBody(): Promise<void> {
        this.body = await this.readFrameBytes(this.packetSize - PACKET_HEADER_SIZE, 'packet data');
        if (this.options.verbose) {
            this.options.logger.debug(`Frame of ${this.packetSize} bytes received`);
        }
    }

    /**
     * Any read failure after the start token was seen leaves a partial frame behind,
     * so it is reported as a framing error.
     */
    private async readFrameBytes(size: number, what: string): Promise<Buffer> {
        try {
            return await this.options.reader.readExact(size);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new FramingError(`Could not read ${what}: ${reason}`, -1, { cause: error });
        }
    }
}
