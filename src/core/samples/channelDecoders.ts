// src/core/samples/channelDecoders.ts

import type {
    DecodeWarning,
    DecodeWarningReason,
    IAsyncFixedHeader,
    IDataType,
    ILogger,
    ISampleDecodeResult,
    ISyncFixedHeader,
    SampleRow,
} from '../../@types/index.ts';
import { ASYNC_FIXED_HEADER_SIZE, ASYNC_TIMESTAMP_SIZE, config, SYNC_FIXED_HEADER_SIZE } from '../../config/index.ts';
import { FramingError } from '../../utils/errors.ts';
import { IDENTITY_SCALING, type StreamSession } from '../session.ts';
import { describeDataType, lookupDataType } from './dataTypes.ts';
import { readArrayAsync, readArraySync, readSamplesAsync, readSamplesSync } from './sampleReaders.ts';

function skipped(reason: DecodeWarningReason, channelIndex: number, message: string, logger: ILogger): ISampleDecodeResult {
    const warning: DecodeWarning = { reason, channelIndex, message };
    logger.warn(message);
    return { rows: [], warning };
}

/**
 * Checks the header fields that decide whether samples can be decoded at all.
 *
 * @return The element type, or the empty result to emit for this channel.
 */
function selectDataType(
    header: { dataType: number; dimension: number; numberOfSamples: number },
    channelIndex: number,
    logger: ILogger,
): IDataType | ISampleDecodeResult {
    const dataType = lookupDataType(header.dataType);
    if (!dataType) {
        return skipped(
            'unsupported-data-type',
            channelIndex,
            `Data type ${describeDataType(header.dataType)} is not supported (channel ${channelIndex})`,
            logger,
        );
    }
    if (header.dimension < 1) {
        return skipped('invalid-dimension', channelIndex, `Invalid dimension 0 (channel ${channelIndex})`, logger);
    }
    if (header.numberOfSamples === 0) {
        return skipped('no-samples', channelIndex, `No or invalid data received (channel ${channelIndex})`, logger);
    }
    return dataType;
}

function assertFits(needed: number, length: number, offset: number, what: string): void {
    if (needed > length) {
        throw new FramingError(`${what} declares ${needed} bytes but the sub packet body has ${length}`, offset);
    }
}

function logRows(logger: ILogger, rows: SampleRow[]): void {
    if (!logger.verbose) return;
    const preview = rows.slice(0, config.previewRows).map((row) => `[${row.join(', ')}]`);
    logger.debug(`  first rows:       ${preview.join(' ')}`);
}

export function readSyncFixedHeader(view: DataView, offset: number): ISyncFixedHeader {
    return {
        dataType: view.getUint32(offset, true),
        dimension: view.getUint32(offset + 4, true),
        numberOfSamples: view.getUint32(offset + 8, true),
        timestamp: view.getBigUint64(offset + 12, true),
        timebaseFrequency: view.getFloat64(offset + 20, true),
    };
}

export function readAsyncFixedHeader(view: DataView, offset: number): IAsyncFixedHeader {
    return {
        dataType: view.getUint32(offset, true),
        dimension: view.getUint32(offset + 4, true),
        numberOfSamples: view.getUint32(offset + 8, true),
        timebaseFrequency: view.getFloat64(offset + 12, true),
    };
}

/**
 * Sample times of a uniformly clocked channel: `(start + i) / frequency`.
 */
export function syncTimestamps(start: bigint, count: number, frequency: number): number[] {
    const times: number[] = new Array(count);
    for (let i = 0; i < count; i++) {
        times[i] = Number(start + BigInt(i)) / frequency;
    }
    return times;
}

/**
 * Decodes a sync-fixed sub-record body. Scalar channels are scaled with the entry
 * at the session's current channel index; array channels are left unscaled.
 *
 * @param offset - Start of the sub-record body within `view`.
 * @param length - Body length in bytes.
 */
export function decodeSyncFixed(
    view: DataView,
    offset: number,
    length: number,
    session: StreamSession,
    logger: ILogger,
): ISampleDecodeResult {
    assertFits(SYNC_FIXED_HEADER_SIZE, length, offset, 'Sync fixed header');
    const header = readSyncFixedHeader(view, offset);
    const channelIndex = session.channelIndex;

    logger.debug('Sync fixed channel:');
    logger.debug(`  index:             ${channelIndex}`);
    logger.debug(`  data type:         ${header.dataType}`);
    logger.debug(`  dimension:         ${header.dimension}`);
    logger.debug(`  samples:           ${header.numberOfSamples}`);
    logger.debug(`  start timestamp:   ${header.timestamp}`);
    logger.debug(`  frequency:         ${header.timebaseFrequency}`);

    const selected = selectDataType(header, channelIndex, logger);
    if (!('read' in selected)) return selected;
    const dataType = selected;

    const { dimension, numberOfSamples: count } = header;
    assertFits(SYNC_FIXED_HEADER_SIZE + count * dimension * dataType.size, length, offset, 'Sync fixed samples');

    const samplesOffset = offset + SYNC_FIXED_HEADER_SIZE;
    const times = syncTimestamps(header.timestamp, count, header.timebaseFrequency);
    let rows: SampleRow[];
    if (dimension === 1) {
        let scaling = session.scalingForCurrentChannel();
        if (!scaling) {
            logger.debug(`No scaling entry for channel ${channelIndex}, using factor 1 offset 0`);
            scaling = IDENTITY_SCALING;
        }
        const values = readSamplesSync(view, samplesOffset, count, dataType, scaling);
        rows = values.map((value, i) => [times[i], value]);
    } else {
        // array channels are not scaled
        const samples = readArraySync(view, samplesOffset, dimension, count, dataType);
        rows = samples.map((sample, i) => [times[i], ...sample]);
    }
    logRows(logger, rows);
    return { rows };
}

/**
 * Decodes an async-fixed sub-record body. Scalar rows carry `timestamp / frequency`,
 * array rows the raw timestamp ticks. Neither is scaled.
 */
export function decodeAsyncFixed(
    view: DataView,
    offset: number,
    length: number,
    session: StreamSession,
    logger: ILogger,
): ISampleDecodeResult {
    assertFits(ASYNC_FIXED_HEADER_SIZE, length, offset, 'Async fixed header');
    const header = readAsyncFixedHeader(view, offset);
    const channelIndex = session.channelIndex;

    logger.debug('Async fixed channel:');
    logger.debug(`  index:             ${channelIndex}`);
    logger.debug(`  data type:         ${header.dataType}`);
    logger.debug(`  dimension:         ${header.dimension}`);
    logger.debug(`  samples:           ${header.numberOfSamples}`);
    logger.debug(`  frequency:         ${header.timebaseFrequency}`);

    const selected = selectDataType(header, channelIndex, logger);
    if (!('read' in selected)) return selected;
    const dataType = selected;

    const { dimension, numberOfSamples: count } = header;
    const recordSize = ASYNC_TIMESTAMP_SIZE + dimension * dataType.size;
    assertFits(ASYNC_FIXED_HEADER_SIZE + count * recordSize, length, offset, 'Async fixed samples');

    const recordsOffset = offset + ASYNC_FIXED_HEADER_SIZE;
    let rows: SampleRow[];
    if (dimension === 1) {
        rows = readSamplesAsync(view, recordsOffset, count, dataType).map(({ timestamp, value }) => [
            Number(timestamp) / header.timebaseFrequency,
            value,
        ]);
    } else {
        rows = readArrayAsync(view, recordsOffset, dimension, count, dataType);
    }
    logRows(logger, rows);
    return { rows };
}
