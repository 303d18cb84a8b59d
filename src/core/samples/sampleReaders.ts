// src/core/samples/sampleReaders.ts

import type { IDataType, SampleRow, ScalingEntry } from '../../@types/index.ts';
import { ASYNC_TIMESTAMP_SIZE } from '../../config/index.ts';

/**
 * Reads `count` contiguous scalar samples and applies `value * factor + offset`.
 */
export function readSamplesSync(
    view: DataView,
    offset: number,
    count: number,
    dataType: IDataType,
    scaling: ScalingEntry,
): number[] {
    const values: number[] = new Array(count);
    for (let i = 0; i < count; i++) {
        values[i] = dataType.read(view, offset + i * dataType.size) * scaling.factor + scaling.offset;
    }
    return values;
}

/**
 * Reads `count` groups of `dimension` elements. Values are returned as on the wire, unscaled.
 */
export function readArraySync(
    view: DataView,
    offset: number,
    dimension: number,
    count: number,
    dataType: IDataType,
): number[][] {
    const samples: number[][] = [];
    let cur = offset;
    for (let i = 0; i < count; i++) {
        const sample: number[] = [];
        for (let d = 0; d < dimension; d++) {
            sample.push(dataType.read(view, cur));
            cur += dataType.size;
        }
        samples.push(sample);
    }
    return samples;
}

/**
 * Reads `count` packed (u64 timestamp, value) records.
 */
export function readSamplesAsync(
    view: DataView,
    offset: number,
    count: number,
    dataType: IDataType,
): Array<{ timestamp: bigint; value: number }> {
    const recordSize = ASYNC_TIMESTAMP_SIZE + dataType.size;
    const records: Array<{ timestamp: bigint; value: number }> = [];
    for (let i = 0; i < count; i++) {
        const pos = offset + i * recordSize;
        records.push({
            timestamp: view.getBigUint64(pos, true),
            value: dataType.read(view, pos + ASYNC_TIMESTAMP_SIZE),
        });
    }
    return records;
}

/**
 * Reads `count` records of a u64 timestamp followed by `dimension` elements.
 * Rows hold the timestamp in raw ticks.
 */
export function readArrayAsync(
    view: DataView,
    offset: number,
    dimension: number,
    count: number,
    dataType: IDataType,
): SampleRow[] {
    const rows: SampleRow[] = [];
    let cur = offset;
    for (let i = 0; i < count; i++) {
        const row: SampleRow = [Number(view.getBigUint64(cur, true))];
        cur += ASYNC_TIMESTAMP_SIZE;
        for (let d = 0; d < dimension; d++) {
            row.push(dataType.read(view, cur));
            cur += dataType.size;
        }
        rows.push(row);
    }
    return rows;
}
