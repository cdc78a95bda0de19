/**
 * Codec Module - Schemas and Types
 *
 * Wire shapes for the CozyLife LAN protocol: one JSON object per line,
 * terminated by CRLF, exchanged on TCP port 5555.
 *
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Protocol Constants
// =============================================================================

export const COZYLIFE_PORT = 5555;

/** Protocol version marker sent in every request. */
export const PROTOCOL_VERSION = 0;

/** Default ceiling for bytes buffered without a line terminator. */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024;

/**
 * Numeric `cmd` codes.
 */
export const WireCommand = {
  INFO: 0,
  QUERY: 2,
  SET: 3,
  REPORT: 10,
} as const;

export type WireCommandCode = (typeof WireCommand)[keyof typeof WireCommand];

/**
 * Commands the client sends.
 */
export type RequestCommand = "info" | "query" | "set";

// =============================================================================
// Data Points
// =============================================================================

/**
 * Raw DPID → value map, keyed by the decimal DPID as it appears on the wire.
 * Values are untyped integers at this layer.
 */
export type DataPointMap = Readonly<Record<string, number>>;

const DPID_KEY = /^[1-9]\d*$/;

/**
 * Lenient data map: keeps numeric and boolean entries under positive integer
 * keys, drops everything else.
 */
export const DataPointMapSchema = z
  .record(z.string(), z.unknown())
  .transform((raw): DataPointMap => {
    const data: Record<string, number> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!DPID_KEY.test(key)) continue;
      if (typeof value === "number" && Number.isFinite(value)) {
        data[key] = value;
      } else if (typeof value === "boolean") {
        data[key] = value ? 1 : 0;
      }
    }
    return data;
  });

// =============================================================================
// Frame Envelope
// =============================================================================

/**
 * Envelope shared by every inbound frame.
 */
export const FrameEnvelopeSchema = z.object({
  pv: z.number().optional(),
  cmd: z.number().int(),
  sn: z.union([z.string(), z.number()]).transform(String),
  res: z.number().int().optional(),
  msg: z.unknown().optional(),
});

export type FrameEnvelope = z.infer<typeof FrameEnvelopeSchema>;

/**
 * `msg` of a QUERY response.
 */
export const QueryMessageSchema = z.object({
  attr: z.array(z.number().int()).optional(),
  data: DataPointMapSchema.optional(),
});

/**
 * `msg` of a SET acknowledgement or unsolicited report.
 */
export const DataMessageSchema = z.object({
  data: DataPointMapSchema.optional(),
});

// =============================================================================
// Decoded Messages
// =============================================================================

type WireMessageBase = Readonly<{
  /** Sequence id echoed by the device (`sn`) */
  sequenceId: string;
  /** Device result code (`res`), 0 when absent */
  resultCode: number;
  /** Raw `cmd` value */
  command: number;
}>;

export type DiscoveryResponse = WireMessageBase &
  Readonly<{
    kind: "discoveryResponse";
    info: Readonly<Record<string, unknown>>;
  }>;

export type QueryResponse = WireMessageBase &
  Readonly<{
    kind: "queryResponse";
    attr: readonly number[];
    data: DataPointMap;
  }>;

export type Acknowledgement = WireMessageBase &
  Readonly<{
    kind: "acknowledgement";
    data: DataPointMap;
  }>;

export type StateReport = WireMessageBase &
  Readonly<{
    kind: "stateReport";
    data: DataPointMap;
  }>;

/**
 * Union of every message the decoder yields.
 */
export type WireMessage =
  | DiscoveryResponse
  | QueryResponse
  | Acknowledgement
  | StateReport;

export type FrameDecoderOptions = Readonly<{
  maxFrameBytes?: number;
}>;
