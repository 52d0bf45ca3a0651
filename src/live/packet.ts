/**
 * Binary frame codec for the open-platform push socket.
 *
 * Every frame starts with a 16-byte big-endian header:
 *
 *   0  u32  total length (header + body)
 *   4  u16  header length (always 16 on the wire today)
 *   6  u16  version: 2 = zlib container of nested frames, anything else = raw body
 *   8  u32  operation
 *  12  u32  sequence
 */
import { inflateSync } from "node:zlib";
import { ProtocolError, errorMessage } from "../shared/errors.js";
import { getLogger } from "../shared/logging.js";

export const HEADER_LENGTH = 16;

export const Operation = {
  HEARTBEAT: 2,
  HEARTBEAT_REPLY: 3,
  SEND_EVENT: 5,
  AUTH: 7,
  AUTH_REPLY: 8,
} as const;

export const VERSION_RAW = 1;
export const VERSION_ZLIB = 2;

export interface Frame {
  totalLength: number;
  headerLength: number;
  version: number;
  /** Kept as a plain number so operations this client does not know survive decoding. */
  operation: number;
  sequence: number;
  body: Buffer;
}

export interface DecodeLimits {
  /** Upper bound on the bytes all compressed containers in one message may inflate to, together. */
  maxInflatedBytes: number;
  /** How many compressed containers may be nested inside each other. */
  maxDepth: number;
}

export const DEFAULT_DECODE_LIMITS: DecodeLimits = {
  maxInflatedBytes: 8 * 1024 * 1024,
  maxDepth: 4,
};

export function encodeFrame(operation: number, body: Uint8Array = Buffer.alloc(0)): Buffer {
  const frame = Buffer.alloc(HEADER_LENGTH + body.length);
  frame.writeUInt32BE(HEADER_LENGTH + body.length, 0);
  frame.writeUInt16BE(HEADER_LENGTH, 4);
  frame.writeUInt16BE(VERSION_RAW, 6);
  frame.writeUInt32BE(operation, 8);
  // Client control frames do not need session-unique sequence numbers.
  frame.writeUInt32BE(1, 12);
  frame.set(body, HEADER_LENGTH);
  return frame;
}

/**
 * Decodes every complete frame in `data`, flattening compressed containers.
 * A trailing partial frame or a zero length ends the scan without error. A
 * frame whose header length does not fit its total length is skipped, and the
 * frames around it are still returned.
 */
export function decodeFrames(
  data: Uint8Array,
  limits: DecodeLimits = DEFAULT_DECODE_LIMITS
): Frame[] {
  const out: Frame[] = [];
  decodeInto(toBuffer(data), { limits, inflateBudget: limits.maxInflatedBytes }, 0, out);
  return out;
}

interface DecodeState {
  readonly limits: DecodeLimits;
  /** Inflated bytes still allowed for the rest of this message. */
  inflateBudget: number;
}

function decodeInto(data: Buffer, state: DecodeState, depth: number, out: Frame[]): void {
  let offset = 0;
  while (offset + HEADER_LENGTH <= data.length) {
    const totalLength = data.readUInt32BE(offset);
    if (totalLength === 0 || offset + totalLength > data.length) break;

    const headerLength = data.readUInt16BE(offset + 4);
    if (headerLength < HEADER_LENGTH || headerLength > totalLength) {
      getLogger()
        .child({ module: "live.packet" })
        .warn({ offset, headerLength, totalLength, depth }, "Skipping frame with malformed header length");
      offset += totalLength;
      continue;
    }
    const version = data.readUInt16BE(offset + 6);
    const operation = data.readUInt32BE(offset + 8);
    const sequence = data.readUInt32BE(offset + 12);
    const body = data.subarray(offset + headerLength, offset + totalLength);

    if (version === VERSION_ZLIB) {
      if (depth >= state.limits.maxDepth) {
        throw new ProtocolError(`Compressed frames nested deeper than ${state.limits.maxDepth} levels`);
      }
      decodeInto(inflate(body, state), state, depth + 1, out);
    } else {
      out.push({ totalLength, headerLength, version, operation, sequence, body });
    }

    offset += totalLength;
  }
}

function inflate(body: Buffer, state: DecodeState): Buffer {
  if (state.inflateBudget <= 0) {
    throw new ProtocolError(
      `Compressed frames inflate past ${state.limits.maxInflatedBytes} bytes in one message`
    );
  }
  let inflated: Buffer;
  try {
    inflated = inflateSync(body, { maxOutputLength: state.inflateBudget });
  } catch (err) {
    throw new ProtocolError(`Failed to inflate compressed frame: ${errorMessage(err)}`, { cause: err });
  }
  state.inflateBudget -= inflated.length;
  return inflated;
}

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

export function operationName(operation: number): string {
  switch (operation) {
    case Operation.HEARTBEAT:
      return "HEARTBEAT";
    case Operation.HEARTBEAT_REPLY:
      return "HEARTBEAT_REPLY";
    case Operation.SEND_EVENT:
      return "SEND_EVENT";
    case Operation.AUTH:
      return "AUTH";
    case Operation.AUTH_REPLY:
      return "AUTH_REPLY";
    default:
      return `UNKNOWN(${operation})`;
  }
}
