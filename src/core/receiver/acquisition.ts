// src/core/receiver/acquisition.ts

import type { ChannelData, ILogger, IProgressBar, IStreamControl, IStreamReceiver } from '../../@types/index.ts';
import { StreamError } from '../../utils/errors.ts';

export interface IAcquisitionOptions {
    control: IStreamControl;
    receiver: IStreamReceiver;
    host: string;
    port: number;
    logger: ILogger;
    /** Stop after this many decoded packets */
    packetCount?: number;
    /** Stop once this much time has passed since the stream was started */
    durationMs?: number;
    progressBar?: IProgressBar;
    now?: () => number;
}

/**
 * Runs one acquisition: configures and starts the stream over the control channel,
 * collects decoded rows per channel, then stops, drains and disconnects.
 * Blocks are matched to channel names by their position in the packet.
 *
 * @return Rows per channel name, concatenated in arrival order.
 */
export async function runAcquisition(options: IAcquisitionOptions): Promise<ChannelData> {
    const { control, receiver, host, port, logger, packetCount, durationMs, progressBar } = options;
    const now = options.now ?? Date.now;
    if (packetCount === undefined && durationMs === undefined) {
        throw new StreamError('An acquisition needs a packet count or a duration');
    }

    await control.reset();
    const channelNames = await control.getChannelList();
    if (channelNames.length === 0) {
        throw new StreamError('The device reports no stream channels');
    }
    logger.info(`Stream channels: ${channelNames.join(', ')}`);
    await control.setTcpPort(port);
    await control.init();

    if (!(await receiver.connect(host, port))) {
        throw new StreamError(`Could not connect to data stream at ${host}:${port}`);
    }

    const data: ChannelData = {};
    for (const name of channelNames) {
        data[name] = [];
    }

    let packets = 0;
    try {
        await control.start();
        logger.info('Stream started');
        const startedAt = now();
        while (
            (packetCount === undefined || packets < packetCount) &&
            (durationMs === undefined || now() - startedAt < durationMs)
        ) {
            const blocks = await receiver.readPacket();
            if (blocks === null) continue;
            packets++;
            progressBar?.increment();
            channelNames.forEach((name, idx) => {
                const rows = blocks[idx];
                if (rows && rows.length > 0) {
                    data[name].push(...rows);
                }
            });
            if (blocks.length !== channelNames.length) {
                logger.warn(`Packet carried ${blocks.length} channels, ${channelNames.length} were configured`);
            }
        }
    } finally {
        try {
            await control.stop();
            logger.info('Stream stopping...');
            const drained = await receiver.drain();
            logger.debug(`Drained ${drained} packets after stop`);
        } finally {
            receiver.disconnect();
        }
    }

    logger.success(`${packets} packets received`);
    return data;
}
