/**
 * Codec Module - Pure Transformations
 *
 * Frame encoding, line-oriented stream decoding and sequence ids.
 * No I/O: the decoder only owns its byte buffer.
 */
import { type Result, err, ok } from "neverthrow";

import { type CodecError, malformedFrame } from "./errors.js";
import {
  type DataPointMap,
  DataMessageSchema,
  DEFAULT_MAX_FRAME_BYTES,
  type FrameDecoderOptions,
  type FrameEnvelope,
  FrameEnvelopeSchema,
  PROTOCOL_VERSION,
  QueryMessageSchema,
  type RequestCommand,
  WireCommand,
  type WireMessage,
} from "./schema.js";

const LINE_FEED = 0x0a;
const FRAME_TERMINATOR = "\r\n";

// =============================================================================
// Encoding
// =============================================================================

/**
 * Build the `msg` body for a request.
 */
function buildRequestMessage(
  command: RequestCommand,
  dataPoints: DataPointMap,
): Record<string, unknown> {
  switch (command) {
    case "info":
      return {};
    case "query":
      return { attr: [0] };
    case "set":
      return {
        attr: Object.keys(dataPoints).map(Number),
        data: { ...dataPoints },
      };
  }
}

function commandCode(command: RequestCommand): number {
  switch (command) {
    case "info":
      return WireCommand.INFO;
    case "query":
      return WireCommand.QUERY;
    case "set":
      return WireCommand.SET;
  }
}

/**
 * Encode one request frame.
 *
 * @example
 * encodeFrame("set", "1700000000000", { "1": 255 })
 * // {"pv":0,"cmd":3,"sn":"1700000000000","msg":{"attr":[1],"data":{"1":255}}}\r\n
 */
export function encodeFrame(
  command: RequestCommand,
  sequenceId: string,
  dataPoints: DataPointMap = {},
): Buffer {
  const frame = {
    pv: PROTOCOL_VERSION,
    cmd: commandCode(command),
    sn: sequenceId,
    msg: buildRequestMessage(command, dataPoints),
  };
  return Buffer.from(JSON.stringify(frame) + FRAME_TERMINATOR, "utf8");
}

// =============================================================================
// Decoding
// =============================================================================

function asRecord(value: unknown): Readonly<Record<string, unknown>> {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/**
 * Classify a validated envelope into a typed message.
 */
export function classifyFrame(envelope: FrameEnvelope): WireMessage {
  const base = {
    sequenceId: envelope.sn,
    resultCode: envelope.res ?? 0,
    command: envelope.cmd,
  };

  switch (envelope.cmd) {
    case WireCommand.INFO:
      return { ...base, kind: "discoveryResponse", info: asRecord(envelope.msg) };

    case WireCommand.QUERY: {
      const parsed = QueryMessageSchema.safeParse(asRecord(envelope.msg));
      const attr = parsed.success ? (parsed.data.attr ?? []) : [];
      const data = parsed.success ? (parsed.data.data ?? {}) : {};
      return { ...base, kind: "queryResponse", attr, data };
    }

    case WireCommand.SET: {
      const parsed = DataMessageSchema.safeParse(asRecord(envelope.msg));
      const data = parsed.success ? (parsed.data.data ?? {}) : {};
      return { ...base, kind: "acknowledgement", data };
    }

    default: {
      const parsed = DataMessageSchema.safeParse(asRecord(envelope.msg));
      const data = parsed.success ? (parsed.data.data ?? {}) : {};
      return { ...base, kind: "stateReport", data };
    }
  }
}

/**
 * Decode a single line (without terminator).
 */
export function decodeLine(
  line: string,
  bufferedBytes = 0,
): Result<WireMessage, CodecError> {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(malformedFrame("INVALID_JSON", message, bufferedBytes, line));
  }

  const envelope = FrameEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    const message = envelope.error.issues
      .map((issue) => `${issue.path.join(".") || "frame"}: ${issue.message}`)
      .join("; ");
    return err(malformedFrame("INVALID_ENVELOPE", message, bufferedBytes, line));
  }

  return ok(classifyFrame(envelope.data));
}

/**
 * Stateful stream decoder. Holds partial bytes between reads and only
 * yields complete lines.
 */
export type FrameDecoder = Readonly<{
  /** Feed bytes read from the socket; returns one Result per complete line */
  push: (chunk: Buffer) => Result<WireMessage, CodecError>[];
  /** Bytes currently buffered without a terminator */
  bufferedBytes: () => number;
  /** Drop any buffered bytes */
  reset: () => void;
}>;

/**
 * Create a frame decoder with a bounded buffer.
 */
export function createFrameDecoder(
  options: FrameDecoderOptions = {},
): FrameDecoder {
  const maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  let buffer: Buffer = Buffer.alloc(0);

  const push = (chunk: Buffer): Result<WireMessage, CodecError>[] => {
    buffer = buffer.length === 0 ? chunk : Buffer.concat([buffer, chunk]);
    const results: Result<WireMessage, CodecError>[] = [];

    let start = 0;
    let newline = buffer.indexOf(LINE_FEED, start);
    while (newline !== -1) {
      const line = buffer.toString("utf8", start, newline).trim();
      start = newline + 1;
      if (line.length > 0) {
        results.push(decodeLine(line, buffer.length - start));
      }
      newline = buffer.indexOf(LINE_FEED, start);
    }

    buffer = start >= buffer.length ? Buffer.alloc(0) : buffer.subarray(start);

    if (buffer.length > maxFrameBytes) {
      const bufferedBytes = buffer.length;
      buffer = Buffer.alloc(0);
      results.push(
        err(
          malformedFrame(
            "OVERFLOW",
            `No frame terminator within ${maxFrameBytes} bytes`,
            bufferedBytes,
          ),
        ),
      );
    }

    return results;
  };

  return {
    push,
    bufferedBytes: () => buffer.length,
    reset: () => {
      buffer = Buffer.alloc(0);
    },
  };
}

// =============================================================================
// Sequence Ids
// =============================================================================

/**
 * Next sequence id: the current millisecond timestamp, bumped when needed so
 * ids are strictly increasing within a session.
 *
 * @param previous - Last id issued by this session, or null
 * @param now - Current timestamp in ms
 */
export function nextSequenceId(previous: string | null, now: number): string {
  const last = previous === null ? Number.NaN : Number(previous);
  const next = Number.isFinite(last) && last >= now ? last + 1 : now;
  return String(next);
}
