/**
 * Configuration Schema Tests
 */
import { describe, expect, test } from "vitest";

import { ConfigSchema } from "../config.js";

describe("ConfigSchema", () => {
  test("defaults the keepalive window to 30 seconds", () => {
    const parsed = ConfigSchema.parse({});

    expect(parsed.COZYLIFE_KEEPALIVE_MS).toBe(30000);
  });

  test("accepts 0 to disable the keepalive probe", () => {
    const parsed = ConfigSchema.parse({ COZYLIFE_KEEPALIVE_MS: "0" });

    expect(parsed.COZYLIFE_KEEPALIVE_MS).toBe(0);
  });

  test("rejects a negative keepalive window", () => {
    const result = ConfigSchema.safeParse({ COZYLIFE_KEEPALIVE_MS: "-5" });

    expect(result.success).toBe(false);
  });

  test("parses the assumed DPID list", () => {
    const parsed = ConfigSchema.parse({ COZYLIFE_ASSUMED_DPIDS: "1, 3,5" });

    expect(parsed.COZYLIFE_ASSUMED_DPIDS).toEqual([1, 3, 5]);
  });
});
