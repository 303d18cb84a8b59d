// src/core/dispatch/subPacketDispatcher.ts

import type { ChannelBlock, DecodeWarning, ILogger, IPacketResult } from '../../@types/index.ts';
import type { Buffer } from 'node:buffer';
import { SUB_PACKET_HEADER_SIZE, SubPacketType } from '../../config/index.ts';
import { FramingError } from '../../utils/errors.ts';
import type { StreamSession } from '../session.ts';
import { decodePacketInfo } from '../metadata/packetInfo.ts';
import { parseScalingXml } from '../metadata/scalingXml.ts';
import { decodeAsyncFixed, decodeSyncFixed } from '../samples/channelDecoders.ts';

interface ISubPacketContext {
    view: DataView;
    payload: Buffer;
    /** Start of the sub-record body */
    offset: number;
    /** Body length, header excluded */
    length: number;
    session: StreamSession;
    logger: ILogger;
    channels: ChannelBlock[];
    warnings: DecodeWarning[];
}

type SubPacketOutcome = 'continue' | 'stop';

type SubPacketHandler = (context: ISubPacketContext) => SubPacketOutcome;

function passThrough(name: string): SubPacketHandler {
    return ({ length, logger }) => {
        logger.debug(`Skipping ${name} sub packet of ${length} bytes`);
        return 'continue';
    };
}

const SUB_PACKET_HANDLERS: Record<SubPacketType, SubPacketHandler> = {
    [SubPacketType.PACKET_INFO]: ({ view, offset, length, session, logger }) => {
        session.packetInfo = decodePacketInfo(view, offset, length, logger);
        return 'continue';
    },
    [SubPacketType.XML_CONFIG]: ({ payload, offset, length, session, logger }) => {
        const xml = payload.toString('utf8', offset, offset + length);
        logger.debug(`XML config: ${xml}`);
        session.addXmlConfig(xml, parseScalingXml(xml, logger));
        return 'continue';
    },
    [SubPacketType.SYNC_FIXED]: (context) => {
        const { view, offset, length, session, logger } = context;
        collect(context, decodeSyncFixed(view, offset, length, session, logger));
        return 'continue';
    },
    [SubPacketType.ASYNC_FIXED]: (context) => {
        const { view, offset, length, session, logger } = context;
        collect(context, decodeAsyncFixed(view, offset, length, session, logger));
        return 'continue';
    },
    [SubPacketType.SYNC_VARIABLE]: passThrough('sync variable'),
    [SubPacketType.ASYNC_VARIABLE]: passThrough('async variable'),
    [SubPacketType.PACKET_FOOTER]: () => 'stop',
};

function collect(context: ISubPacketContext, result: { rows: ChannelBlock; warning?: DecodeWarning }): void {
    context.channels.push(result.rows);
    if (result.warning) context.warnings.push(result.warning);
    context.session.nextChannel();
}

function isSubPacketType(type: number): type is SubPacketType {
    return type in SUB_PACKET_HANDLERS;
}

/**
 * Walks the sub-records of one packet payload and decodes them in order.
 * Sub-record sizes must partition the payload exactly; any size that does not is a framing error.
 *
 * @param payload - Packet payload without the 12-byte outer header.
 * @param session - Receives packet info and scaling; its channel index restarts at 0.
 * @return One channel block per sync/async sub-record, in the order they appeared, and the
 *         packet info if this packet carried one.
 */
export function processPacket(payload: Buffer, session: StreamSession, logger: ILogger): IPacketResult {
    const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
    const channels: ChannelBlock[] = [];
    const warnings: DecodeWarning[] = [];
    const previousInfo = session.packetInfo;
    session.beginPacket();

    let pos = 0;
    while (pos < payload.length) {
        if (pos + SUB_PACKET_HEADER_SIZE > payload.length) {
            throw new FramingError(`Truncated sub packet header (${payload.length - pos} bytes left)`, pos);
        }
        const size = view.getUint32(pos, true);
        const type = view.getUint32(pos + 4, true);
        if (size < SUB_PACKET_HEADER_SIZE) {
            throw new FramingError(`Invalid sub packet size ${size}`, pos);
        }
        if (pos + size > payload.length) {
            throw new FramingError(`Sub packet of ${size} bytes exceeds packet payload of ${payload.length} bytes`, pos);
        }

        let outcome: SubPacketOutcome = 'continue';
        if (isSubPacketType(type)) {
            outcome = SUB_PACKET_HANDLERS[type]({
                view,
                payload,
                offset: pos + SUB_PACKET_HEADER_SIZE,
                length: size - SUB_PACKET_HEADER_SIZE,
                session,
                logger,
                channels,
                warnings,
            });
        } else {
            const message = `Unknown sub packet type ${type} (${size} bytes) skipped`;
            logger.warn(message);
            warnings.push({ reason: 'unknown-sub-packet', channelIndex: -1, message });
        }
        pos += size;
        if (outcome === 'stop') break;
    }

    const packetInfo = session.packetInfo !== previousInfo ? session.packetInfo : null;
    return { channels, warnings, packetInfo };
}
