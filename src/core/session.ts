// src/core/session.ts

import type { IPacketInfo, ScalingEntry } from '../@types/index.ts';

export const IDENTITY_SCALING: Readonly<ScalingEntry> = Object.freeze({ factor: 1, offset: 0 });

/**
 * State that outlives a single packet: the scaling table announced by the
 * channel configuration, the latest packet info and the received XML documents.
 * The channel index is only meaningful within the packet being processed.
 */
export class StreamSession {
    readonly scalingTable: ScalingEntry[] = [];
    readonly xmlConfigs: string[] = [];
    packetInfo: IPacketInfo | null = null;
    channelIndex = 0;

    beginPacket(): void {
        this.channelIndex = 0;
    }

    nextChannel(): void {
        this.channelIndex++;
    }

    addXmlConfig(xml: string, entries: ScalingEntry[]): void {
        this.xmlConfigs.push(xml);
        this.scalingTable.push(...entries);
    }

    /**
     * Scaling is matched to channels by position only: the n-th channel of a packet
     * uses the n-th entry of the table.
     */
    scalingForCurrentChannel(): ScalingEntry | undefined {
        return this.scalingTable[this.channelIndex];
    }
}
