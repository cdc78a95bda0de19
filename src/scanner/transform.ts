/**
 * Scanner Module - Pure Transformations
 *
 * IPv4 range parsing for LAN scans.
 */
import { type Result, err, ok } from "neverthrow";

import { type ScannerError, invalidRange } from "./errors.js";
import { type AddressRange, MAX_SCAN_ADDRESSES } from "./schema.js";

const IPV4_OCTET = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/;

/**
 * Dotted quad to an unsigned 32-bit integer, or null if not a valid IPv4
 * address.
 */
export function ipv4ToNumber(address: string): number | null {
  const octets = address.trim().split(".");
  if (octets.length !== 4) return null;

  let value = 0;
  for (const octet of octets) {
    if (!IPV4_OCTET.test(octet)) return null;
    value = value * 256 + Number(octet);
  }
  return value;
}

export function numberToIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join(".");
}

/**
 * Parse a single address or an inclusive `start-end` range.
 * Swapped bounds are accepted; ranges beyond MAX_SCAN_ADDRESSES keep the
 * first addresses and are flagged as truncated.
 *
 * @example
 * parseIpRange("192.168.1.10-192.168.1.12")
 * // ok({ addresses: ["192.168.1.10", "192.168.1.11", "192.168.1.12"], truncated: false })
 */
export function parseIpRange(input: string): Result<AddressRange, ScannerError> {
  const parts = input.split("-");
  if (parts.length > 2) {
    return err(invalidRange(input, "Expected an address or start-end"));
  }

  const bounds: number[] = [];
  for (const part of parts) {
    const value = ipv4ToNumber(part);
    if (value === null) {
      return err(invalidRange(input, `"${part.trim()}" is not an IPv4 address`));
    }
    bounds.push(value);
  }

  const low = Math.min(...bounds);
  const high = Math.max(...bounds);
  const total = high - low + 1;
  const count = Math.min(total, MAX_SCAN_ADDRESSES);

  return ok({
    addresses: Array.from({ length: count }, (_, i) => numberToIpv4(low + i)),
    truncated: total > MAX_SCAN_ADDRESSES,
  });
}
