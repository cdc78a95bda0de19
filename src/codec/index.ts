/**
 * Codec Module - Public API
 *
 * Line-delimited JSON framing for the CozyLife LAN protocol.
 */

// Types
export type {
  Acknowledgement,
  DataPointMap,
  DiscoveryResponse,
  FrameDecoderOptions,
  QueryResponse,
  RequestCommand,
  StateReport,
  WireCommandCode,
  WireMessage,
} from "./schema.js";
export type { CodecError, MalformedFrameReason } from "./errors.js";

// Constants
export {
  COZYLIFE_PORT,
  DEFAULT_MAX_FRAME_BYTES,
  PROTOCOL_VERSION,
  WireCommand,
} from "./schema.js";

// Error utilities
export { formatCodecError, malformedFrame } from "./errors.js";

// Pure transformations
export {
  classifyFrame,
  createFrameDecoder,
  decodeLine,
  encodeFrame,
  nextSequenceId,
} from "./transform.js";
export type { FrameDecoder } from "./transform.js";
