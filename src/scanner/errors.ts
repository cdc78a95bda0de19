/**
 * Scanner Module - Error Types
 */

export type ScannerError =
  | {
      readonly type: "INVALID_RANGE";
      readonly input: string;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_SCAN_OPTIONS";
      readonly issues: readonly string[];
      readonly message: string;
    };

export function invalidRange(input: string, message: string): ScannerError {
  return { type: "INVALID_RANGE", input, message };
}

export function invalidScanOptions(issues: readonly string[]): ScannerError {
  return {
    type: "INVALID_SCAN_OPTIONS",
    issues,
    message: `Invalid scan options: ${issues.join("; ")}`,
  };
}

/**
 * Format error for logging.
 */
export function formatScannerError(error: ScannerError): string {
  switch (error.type) {
    case "INVALID_RANGE":
      return `Invalid IP range "${error.input}": ${error.message}`;
    case "INVALID_SCAN_OPTIONS":
      return error.message;
  }
}
