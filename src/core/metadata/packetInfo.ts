// src/core/metadata/packetInfo.ts

import type { ILogger, IPacketInfo } from '../../@types/index.ts';
import { PACKET_INFO_SIZE, PROTOCOL_VERSION, StreamStatus } from '../../config/index.ts';
import { FramingError } from '../../utils/errors.ts';

/**
 * Decodes the six u32 fields of a packet-info sub-record into a new value.
 *
 * @param view - View over the whole packet payload.
 * @param offset - Start of the sub-record body.
 * @param length - Body length available for this sub-record.
 */
export function decodePacketInfo(view: DataView, offset: number, length: number, logger: ILogger): IPacketInfo {
    if (length < PACKET_INFO_SIZE) {
        throw new FramingError(`Packet info needs ${PACKET_INFO_SIZE} bytes, sub packet has ${length}`, offset);
    }
    const packetInfo: IPacketInfo = {
        protocolVersion: view.getUint32(offset, true),
        streamId: view.getUint32(offset + 4, true),
        sequenceNumber: view.getUint32(offset + 8, true),
        streamStatus: view.getUint32(offset + 12, true),
        seed: view.getUint32(offset + 16, true),
        numberOfSubPackets: view.getUint32(offset + 20, true),
    };

    logger.debug('Packet info:');
    logger.debug(`  Version:           ${packetInfo.protocolVersion.toString(16)}`);
    logger.debug(`  Stream ID:         ${packetInfo.streamId}`);
    logger.debug(`  Sequence:          ${packetInfo.sequenceNumber}`);
    logger.debug(`  Stream status:     ${packetInfo.streamStatus.toString(16)}`);
    logger.debug(`  Seed:              ${packetInfo.seed.toString(16)}`);
    logger.debug(`  Sub packets:       ${packetInfo.numberOfSubPackets}`);
    if (packetInfo.protocolVersion !== PROTOCOL_VERSION) {
        logger.debug(`Protocol version ${packetInfo.protocolVersion.toString(16)} differs from ${PROTOCOL_VERSION.toString(16)}`);
    }
    return packetInfo;
}

export function isFirstPacket(packetInfo: IPacketInfo): boolean {
    return (packetInfo.streamStatus & StreamStatus.FIRST_PACKET) !== 0;
}

export function isLastPacket(packetInfo: IPacketInfo): boolean {
    return (packetInfo.streamStatus & StreamStatus.LAST_PACKET) !== 0;
}

export function isErrorPacket(packetInfo: IPacketInfo): boolean {
    return (packetInfo.streamStatus & StreamStatus.ERROR_PACKET) !== 0;
}
