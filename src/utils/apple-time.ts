/**
 * Messages stores timestamps as nanoseconds since 2001-01-01T00:00:00Z.
 * Values are carried as `bigint` so the epoch offset is applied exactly.
 */

/** 2001-01-01T00:00:00Z in Unix milliseconds. */
export const APPLE_EPOCH_MS = 978_307_200_000n;

const NANOS_PER_MS = 1_000_000n;

export type StoreTimestamp = bigint | number;

function toBigInt(value: StoreTimestamp): bigint {
    return typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
}

/** Convert a store timestamp into a UTC `Date` (millisecond precision, truncated). */
export function fromStoreTimestamp(value: StoreTimestamp): Date {
    const ms = toBigInt(value) / NANOS_PER_MS + APPLE_EPOCH_MS;
    return new Date(Number(ms));
}

/** Convert a `Date` into the store's nanosecond timestamp. */
export function toStoreTimestamp(date: Date): bigint {
    return (BigInt(date.getTime()) - APPLE_EPOCH_MS) * NANOS_PER_MS;
}

/**
 * Receipt columns use 0 (or NULL) for "not yet". Returns `null` for those,
 * the converted instant otherwise.
 */
export function fromOptionalStoreTimestamp(value: StoreTimestamp | null | undefined): Date | null {
    if (value === null || value === undefined) return null;
    if (toBigInt(value) === 0n) return null;
    return fromStoreTimestamp(value);
}
