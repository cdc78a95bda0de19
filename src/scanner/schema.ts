/**
 * Scanner Module - Schemas and Types
 */
import { z } from "zod";

import type { DeviceClassification } from "../capabilities/index.js";
import type { DeviceIdentity } from "../session/index.js";

/** Addresses probed per scan; larger ranges are truncated */
export const MAX_SCAN_ADDRESSES = 256;

export const DEFAULT_SCAN_CONCURRENCY = 10;

export const DEFAULT_SCAN_TIMEOUT_MS = 2000;

// =============================================================================
// Options
// =============================================================================

export const ScanOptionsSchema = z.object({
  port: z.number().int().min(1).max(65535).optional(),
  concurrency: z.number().int().positive().default(DEFAULT_SCAN_CONCURRENCY),
  timeoutMs: z.number().positive().default(DEFAULT_SCAN_TIMEOUT_MS),
});

export type ScanOptions = z.input<typeof ScanOptionsSchema>;

// =============================================================================
// Results
// =============================================================================

export type AddressRange = Readonly<{
  addresses: readonly string[];
  /** Whether the range held more than MAX_SCAN_ADDRESSES addresses */
  truncated: boolean;
}>;

/**
 * A device that completed discovery.
 */
export type ScanFinding = Readonly<{
  address: string;
  identity: DeviceIdentity;
  classification: DeviceClassification;
  dpids: readonly number[];
  entityCount: number;
}>;

export type ScanReport = Readonly<{
  scanned: number;
  truncated: boolean;
  /** Findings in address order */
  devices: readonly ScanFinding[];
}>;
