/**
 * LAN scanner CLI.
 *
 * Usage: npm run scan -- 192.168.1.1-192.168.1.254
 *
 * Probes each address with a discovery-only session and prints the devices
 * found as JSON.
 */
import { scanConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { formatScannerError, scanRange } from "./scanner/index.js";

const log = createLogger("scanner");

const range = process.argv[2];

if (!range) {
  console.error("Usage: npm run scan -- <ip | start-end>");
  process.exit(2);
}

const result = await scanRange(range, {
  port: scanConfig.port,
  concurrency: scanConfig.concurrency,
  timeoutMs: scanConfig.timeoutMs,
});

if (result.isErr()) {
  log.error(formatScannerError(result.error));
  process.exit(2);
}

const report = result.value;
log.info(
  { scanned: report.scanned, found: report.devices.length, truncated: report.truncated },
  "Scan complete",
);
console.log(JSON.stringify(report.devices, null, 2));
