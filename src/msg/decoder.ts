import { logger } from "../config/logger.js";
import { propertyTypeOf } from "./properties.js";
import { UNKNOWN_TIMESTAMP, type Timestamp } from "../types/index.js";

// 1601-01-01T00:00:00Z in Unix milliseconds.
const FILETIME_EPOCH_MS = Date.UTC(1601, 0, 1);
const TICKS_PER_MS = 10_000n;
// Latest representable calendar instant; MAPI's "never" (0x7FFF...) lies past it.
const MAX_TIMESTAMP_MS = Date.UTC(9999, 11, 31, 23, 59, 59, 999);

/**
 * Decode a UTF-16LE property value. An odd trailing byte is dropped, and
 * NUL padding at the end is stripped.
 */
export function decodeUtf16Text(bytes: Buffer): string {
  return bytes.toString("utf16le").replace(/\0+$/, "");
}

function logFiletimeError(error: Error): void {
  logger.warn({ error: error.message }, "Failed to parse FILETIME");
}

/**
 * Convert a Windows FILETIME (100 ns ticks since 1601-01-01 UTC, unsigned
 * little-endian) to a Date. Only the first 8 bytes are read. Returns
 * `"unknown"` when the buffer is too short or the value falls after
 * the year 9999.
 */
export function decodeFiletime(
  bytes: Buffer,
  onError: (error: Error) => void = logFiletimeError
): Timestamp {
  if (bytes.length < 8) {
    onError(new Error(`FILETIME needs 8 bytes, got ${bytes.length}`));
    return UNKNOWN_TIMESTAMP;
  }

  const ticks = bytes.readBigUInt64LE(0);
  const ms = FILETIME_EPOCH_MS + Number(ticks / TICKS_PER_MS);
  if (ms > MAX_TIMESTAMP_MS) {
    onError(new Error(`FILETIME ${ticks} is after 9999-12-31`));
    return UNKNOWN_TIMESTAMP;
  }
  return new Date(ms);
}

export type PropertyValue =
  | { type: "text"; value: string }
  | { type: "time"; value: Timestamp }
  | { type: "binary"; value: Buffer };

/**
 * Decode a property stream by the type encoded in its name. Returns
 * undefined for names that carry no supported type.
 */
export function decodeProperty(
  streamName: string,
  bytes: Buffer,
  onError?: (error: Error) => void
): PropertyValue | undefined {
  switch (propertyTypeOf(streamName)) {
    case "text":
      return { type: "text", value: decodeUtf16Text(bytes) };
    case "time":
      return { type: "time", value: decodeFiletime(bytes, onError) };
    case "binary":
      return { type: "binary", value: bytes };
    default:
      return undefined;
  }
}
