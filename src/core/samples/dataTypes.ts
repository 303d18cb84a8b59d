// src/core/samples/dataTypes.ts

import type { IDataType } from '../../@types/index.ts';

/**
 * 24-bit integers have no native type: bytes are low, mid, high, and the signed
 * variant sign-extends the high byte.
 */
function readInt24(view: DataView, offset: number): number {
    return view.getInt8(offset + 2) * 0x10000 + view.getUint8(offset + 1) * 0x100 + view.getUint8(offset);
}

function readUint24(view: DataView, offset: number): number {
    return view.getUint8(offset + 2) * 0x10000 + view.getUint8(offset + 1) * 0x100 + view.getUint8(offset);
}

const DATA_TYPES: Record<number, IDataType> = {
    0: { code: 0, name: 'int8', size: 1, read: (view, offset) => view.getInt8(offset) },
    1: { code: 1, name: 'uint8', size: 1, read: (view, offset) => view.getUint8(offset) },
    2: { code: 2, name: 'int16', size: 2, read: (view, offset) => view.getInt16(offset, true) },
    3: { code: 3, name: 'uint16', size: 2, read: (view, offset) => view.getUint16(offset, true) },
    4: { code: 4, name: 'int24', size: 3, read: readInt24 },
    5: { code: 5, name: 'uint24', size: 3, read: readUint24 },
    6: { code: 6, name: 'int32', size: 4, read: (view, offset) => view.getInt32(offset, true) },
    7: { code: 7, name: 'uint32', size: 4, read: (view, offset) => view.getUint32(offset, true) },
    8: { code: 8, name: 'int64', size: 8, read: (view, offset) => Number(view.getBigInt64(offset, true)) },
    9: { code: 9, name: 'uint64', size: 8, read: (view, offset) => Number(view.getBigUint64(offset, true)) },
    10: { code: 10, name: 'float32', size: 4, read: (view, offset) => view.getFloat32(offset, true) },
    11: { code: 11, name: 'float64', size: 8, read: (view, offset) => view.getFloat64(offset, true) },
};

// Known on the wire, but there is no numeric decode path for them
const UNSUPPORTED_NAMES: Record<number, string> = {
    12: 'complex64',
    13: 'complex128',
    14: 'reserved (14)',
    15: 'reserved (15)',
};

/**
 * @return The element type for a wire code, or `null` when samples of this code cannot be decoded.
 */
export function lookupDataType(code: number): IDataType | null {
    return DATA_TYPES[code] ?? null;
}

export function describeDataType(code: number): string {
    return DATA_TYPES[code]?.name ?? UNSUPPORTED_NAMES[code] ?? `unknown (${code})`;
}
