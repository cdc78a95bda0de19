/**
 * Codec Module - Error Types
 *
 * Typed error union for frame decoding.
 */

export type MalformedFrameReason = "INVALID_JSON" | "INVALID_ENVELOPE" | "OVERFLOW";

/**
 * Errors that can occur while decoding the inbound byte stream.
 */
export type CodecError = {
  readonly type: "MALFORMED_FRAME";
  readonly reason: MalformedFrameReason;
  readonly message: string;
  /** Bytes held in the decoder buffer when the error was raised */
  readonly bufferedBytes: number;
  /** First bytes of the offending line, for diagnostics */
  readonly excerpt?: string;
};

const EXCERPT_LENGTH = 80;

/**
 * Create a MALFORMED_FRAME error.
 */
export function malformedFrame(
  reason: MalformedFrameReason,
  message: string,
  bufferedBytes: number,
  line?: string,
): CodecError {
  if (line !== undefined) {
    return {
      type: "MALFORMED_FRAME",
      reason,
      message,
      bufferedBytes,
      excerpt: line.slice(0, EXCERPT_LENGTH),
    };
  }
  return { type: "MALFORMED_FRAME", reason, message, bufferedBytes };
}

/**
 * Format a CodecError for logging.
 */
export function formatCodecError(error: CodecError): string {
  switch (error.reason) {
    case "INVALID_JSON":
      return `Malformed frame (invalid JSON): ${error.message}`;
    case "INVALID_ENVELOPE":
      return `Malformed frame (invalid envelope): ${error.message}`;
    case "OVERFLOW":
      return `Malformed frame (buffer overflow at ${error.bufferedBytes} bytes): ${error.message}`;
  }
}
