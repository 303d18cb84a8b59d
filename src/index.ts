// src/index.ts

export type * from './@types/index.ts';
export {
    END_TOKEN,
    PROTOCOL_VERSION,
    START_TOKEN,
    StreamStatus,
    SubPacketType,
    config,
} from './config/index.ts';
export { StreamReceiver } from './core/receiver/index.ts';
export { runAcquisition, type IAcquisitionOptions } from './core/receiver/acquisition.ts';
export { StreamSession } from './core/session.ts';
export { readFrame } from './core/framing/index.ts';
export { processPacket } from './core/dispatch/subPacketDispatcher.ts';
export { decodePacketInfo, isErrorPacket, isFirstPacket, isLastPacket } from './core/metadata/packetInfo.ts';
export { parseScalingXml } from './core/metadata/scalingXml.ts';
export { decodeAsyncFixed, decodeSyncFixed, syncTimestamps } from './core/samples/channelDecoders.ts';
export { StreamReader } from './core/transport/streamReader.ts';
export { openConnection } from './core/transport/connection.ts';
export { ConnectionClosedError, FramingError, NotConnectedError, ReadTimeoutError, StreamError } from './utils/errors.ts';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.ts';
