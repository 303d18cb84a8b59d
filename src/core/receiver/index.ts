// src/core/receiver/index.ts

import type {
    ChannelBlock,
    DecodeWarning,
    ILogger,
    IPacketInfo,
    IReceiverOptions,
    IStreamReceiver,
    ScalingEntry,
} from '../../@types/index.ts';
import type { Readable } from 'node:stream';
import type { Socket } from 'node:net';
import { config, WELCOME_MESSAGE_SIZE } from '../../config/index.ts';
import { NotConnectedError, StreamError } from '../../utils/errors.ts';
import { openConnection } from '../transport/connection.ts';
import { StreamReader } from '../transport/streamReader.ts';
import { readFrame } from '../framing/index.ts';
import { processPacket } from '../dispatch/subPacketDispatcher.ts';
import { isLastPacket } from '../metadata/packetInfo.ts';
import { StreamSession } from '../session.ts';

/**
 * Receives one data stream: connects, reads and decodes packets one at a time.
 * Scaling and packet info are kept across packets for the lifetime of a connection.
 */
export class StreamReceiver implements IStreamReceiver {
    private socket: Socket | null = null;
    private reader: StreamReader | null = null;
    private session = new StreamSession();
    private queue: Promise<void> = Promise.resolve();
    private warnings: DecodeWarning[] = [];

    private readonly logger: ILogger;
    private readonly verbose: boolean;
    private readonly timeoutMs: number;
    private readonly maxResyncBytes: number;

    constructor(options: IReceiverOptions) {
        this.logger = options.logger;
        this.verbose = options.verbose ?? false;
        this.timeoutMs = options.timeoutMs ?? config.connection.timeoutMs;
        this.maxResyncBytes = options.maxResyncBytes ?? config.maxResyncBytes;
    }

    get isConnected(): boolean {
        return this.reader !== null;
    }

    /** Latest packet info received; `null` before the first one. */
    get packetInfo(): IPacketInfo | null {
        return this.session.packetInfo;
    }

    get scalingTable(): readonly ScalingEntry[] {
        return this.session.scalingTable;
    }

    get xmlConfigs(): readonly string[] {
        return this.session.xmlConfigs;
    }

    /** Decode warnings of the most recently decoded packet. */
    get lastWarnings(): readonly DecodeWarning[] {
        return this.warnings;
    }

    /**
     * Connects to the stream port and consumes the welcome message.
     *
     * @return `false` when the connection fails or no welcome message arrives.
     */
    async connect(host: string, port: number): Promise<boolean> {
        this.disconnect();
        this.resetSession();
        let socket: Socket;
        try {
            socket = await openConnection(host, port, this.timeoutMs);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error(`Connection to ${host}:${port} failed: ${reason}`);
            return false;
        }
        this.socket = socket;
        const reader = this.attach(socket);

        try {
            const welcome = await reader.readExact(WELCOME_MESSAGE_SIZE);
            const productName = welcome.toString('latin1').replace(/\0+$/, '').trim();
            this.logger.debug(`Data stream product name: ${productName}`);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error(`Could not read welcome message: ${reason}`);
            this.disconnect();
            return false;
        }
        return true;
    }

    /**
     * Reads packets from an already established byte stream instead of opening a connection.
     * No welcome message is expected.
     */
    attach(stream: Readable): StreamReader {
        this.resetSession();
        this.reader = new StreamReader(stream, this.timeoutMs);
        return this.reader;
    }

    /**
     * Reads and decodes the next packet. Calls are serialized.
     *
     * @return The channel blocks of the packet in stream order, or `null` when no packet started before the timeout.
     */
    readPacket(): Promise<ChannelBlock[] | null> {
        const next = this.queue.then(() => this.readPacketNow());
        this.queue = next.then(
            () => undefined,
            () => undefined,
        );
        return next;
    }

    private resetSession(): void {
        this.session = new StreamSession();
        this.warnings = [];
    }

    isLastPacket(): boolean {
        return this.session.packetInfo !== null && isLastPacket(this.session.packetInfo);
    }

    /**
     * Reads and discards packets until one reports the last-packet status.
     * Call after stopping the stream on the control channel so no bytes are left unread.
     *
     * @param maxReads - Upper bound on read attempts, including ones that found no data.
     * @return Number of packets read.
     */
    async drain(maxReads = Number.POSITIVE_INFINITY): Promise<number> {
        let packets = 0;
        let attempts = 0;
        while (!this.isLastPacket()) {
            if (attempts >= maxReads) {
                throw new StreamError(`Stream did not report its last packet within ${maxReads} reads`);
            }
            attempts++;
            const channels = await this.readPacket();
            if (channels !== null) {
                packets++;
                this.logger.debug(`Draining stream... ${packets} packets`);
            }
        }
        return packets;
    }

    disconnect(): void {
        if (this.socket) {
            this.socket.destroy();
            this.socket = null;
        }
        this.reader = null;
    }

    private async readPacketNow(): Promise<ChannelBlock[] | null> {
        if (!this.reader) {
            throw new NotConnectedError();
        }
        const payload = await readFrame({
            reader: this.reader,
            logger: this.logger,
            verbose: this.verbose,
            maxResyncBytes: this.maxResyncBytes,
        });
        if (payload === null) {
            return null;
        }
        const result = processPacket(payload, this.session, this.logger);
        this.warnings = result.warnings;
        return result.channels;
    }
}
