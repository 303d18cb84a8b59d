// src/stateMachine/definedStates.ts

export enum FrameStates {
    SEARCHING_TOKEN = 'SEARCHING_TOKEN',
    HEADER_READ = 'HEADER_READ',
    BODY_READ = 'BODY_READ',
    PACKET_READY = 'PACKET_READY',
    NO_DATA = 'NO_DATA',
    FRAMING_ERROR = 'FRAMING_ERROR',
}
