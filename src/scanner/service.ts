/**
 * Scanner Module - Service Layer
 *
 * Probes a range of addresses with short-lived sessions. Each probe runs
 * discovery only and closes immediately; no command is ever sent.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import { formatSessionError, openSession } from "../session/index.js";
import {
  type ScannerError,
  formatScannerError,
  invalidScanOptions,
} from "./errors.js";
import {
  type ScanFinding,
  type ScanOptions,
  ScanOptionsSchema,
  type ScanReport,
} from "./schema.js";
import { parseIpRange } from "./transform.js";

const log = createLogger("scanner");

/**
 * Open, identify and close one address. Null when nothing answered as a
 * CozyLife device.
 */
export async function probeAddress(
  address: string,
  timeoutMs: number,
  port?: number,
): Promise<ScanFinding | null> {
  const result = await openSession({
    address,
    port,
    connectTimeoutMs: timeoutMs,
    requestTimeoutMs: timeoutMs,
    keepaliveMs: 0,
  });

  if (result.isErr()) {
    log.debug({ address, error: formatSessionError(result.error) }, "No device");
    return null;
  }

  const session = result.value;
  const model = session.capabilities();
  const finding: ScanFinding = {
    address,
    identity: session.identity(),
    classification: model.classification,
    dpids: model.dpids,
    entityCount: session.entities().length,
  };
  session.close();

  log.info(
    {
      address,
      deviceId: finding.identity.deviceId,
      classification: finding.classification,
    },
    "Found device",
  );
  return finding;
}

/**
 * Scan an address or `start-end` range, at most `concurrency` probes at a
 * time.
 *
 * @example
 * const report = await scanRange("192.168.1.1-192.168.1.254");
 */
export async function scanRange(
  range: string,
  options: ScanOptions = {},
): Promise<Result<ScanReport, ScannerError>> {
  const parsedOptions = ScanOptionsSchema.safeParse(options);
  if (!parsedOptions.success) {
    return err(
      invalidScanOptions(
        parsedOptions.error.issues.map(
          (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
        ),
      ),
    );
  }
  const { concurrency, timeoutMs, port } = parsedOptions.data;

  const parsedRange = parseIpRange(range);
  if (parsedRange.isErr()) {
    log.warn(formatScannerError(parsedRange.error));
    return err(parsedRange.error);
  }
  const { addresses, truncated } = parsedRange.value;

  if (truncated) {
    log.warn(
      { range, scanning: addresses.length },
      "Range too large, scanning the first addresses only",
    );
  }

  const startTime = Date.now();
  logOperationStart(log, "scanRange", {
    range,
    addresses: addresses.length,
    concurrency,
  });

  const findings: (ScanFinding | null)[] = new Array(addresses.length).fill(null);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < addresses.length) {
      const index = cursor;
      cursor += 1;
      const address = addresses[index];
      if (address === undefined) return;
      findings[index] = await probeAddress(address, timeoutMs, port);
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, addresses.length) }, worker),
  );

  const devices = findings.filter(
    (finding): finding is ScanFinding => finding !== null,
  );

  logOperationComplete(log, "scanRange", startTime, {
    scanned: addresses.length,
    found: devices.length,
  });

  return ok({ scanned: addresses.length, truncated, devices });
}
