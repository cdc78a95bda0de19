/**
 * Discovery Module - Schemas and Types
 *
 * Device identity as learned from the INFO exchange, and the caller-supplied
 * assumption used when discovery is skipped.
 */
import { z } from "zod";

import type { DataPointMap } from "../codec/index.js";

/**
 * Immutable identity of a device.
 */
export type DeviceIdentity = Readonly<{
  /** Wire `did` */
  deviceId: string;
  /** Wire `pid` */
  productId: string;
  /** Wire `dtp`, normalised to an integer (0 switch, 1 light, 2 RGB light) */
  deviceType: number;
  modelName: string;
}>;

/**
 * Everything the session needs after discovery.
 */
export type DiscoveryResult = Readonly<{
  identity: DeviceIdentity;
  /** Supported DPIDs, ascending */
  dpids: readonly number[];
  /** Initial raw state from the QUERY exchange */
  state: DataPointMap;
}>;

export type DiscoveryStage = "info" | "query";

/**
 * Identity and DPIDs supplied by the caller in skip-validation mode.
 */
export const AssumedDeviceSchema = z.object({
  deviceId: z.string().min(1).optional(),
  productId: z.string().min(1),
  deviceType: z.number().int().min(0),
  dpids: z.array(z.number().int().positive()).min(1),
});

export type AssumedDevice = z.infer<typeof AssumedDeviceSchema>;
