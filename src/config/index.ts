// src/config/index.ts

import { Buffer } from 'node:buffer';

export const PROTOCOL_VERSION = 0x01050000;
export const WELCOME_MESSAGE_SIZE = 64;

export const START_TOKEN = Buffer.from('OXYGEN<<', 'latin1');
export const END_TOKEN = Buffer.from('>>OXYGEN', 'latin1');
export const TOKEN_SIZE = 8;
export const PACKET_HEADER_SIZE = 12;
export const SUB_PACKET_HEADER_SIZE = 8;
export const PACKET_INFO_SIZE = 24;
export const SYNC_FIXED_HEADER_SIZE = 28;
export const ASYNC_FIXED_HEADER_SIZE = 20;
export const ASYNC_TIMESTAMP_SIZE = 8;

export enum SubPacketType {
    PACKET_INFO = 0x00000001,
    XML_CONFIG = 0x00000002,
    SYNC_FIXED = 0x00000003,
    SYNC_VARIABLE = 0x00000004,
    ASYNC_FIXED = 0x00000005,
    ASYNC_VARIABLE = 0x00000006,
    PACKET_FOOTER = 0x00000007,
}

export const StreamStatus = {
    NORMAL_PACKET: 0x00000000,
    FIRST_PACKET: 0x00000001,
    LAST_PACKET: 0x00000002,
    ERROR_PACKET: 0x10000000,
} as const;

export const config = {
    connection: {
        host: '127.0.0.1',
        port: 10003,
        timeoutMs: 5000,
    },
    // Bytes discarded while searching for a start token before giving up on the frame
    maxResyncBytes: 1024 * 1024,
    // Rows printed per channel by the CLI
    previewRows: 10,
};
