/**
 * Scanner Module - Public API
 */

// Types
export type {
  AddressRange,
  ScanFinding,
  ScanOptions,
  ScanReport,
} from "./schema.js";
export type { ScannerError } from "./errors.js";

export {
  DEFAULT_SCAN_CONCURRENCY,
  DEFAULT_SCAN_TIMEOUT_MS,
  MAX_SCAN_ADDRESSES,
} from "./schema.js";

// Error utilities
export { formatScannerError } from "./errors.js";

// Pure transformations
export { ipv4ToNumber, numberToIpv4, parseIpRange } from "./transform.js";

// Service
export { probeAddress, scanRange } from "./service.js";
