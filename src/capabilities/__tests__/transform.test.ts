/**
 * Capabilities Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  inferCapabilities,
  normalizeDpids,
  resolveDpid3Role,
} from "../transform.js";

const light = (productId: string, dpids: number[]) => ({
  deviceId: "dev1",
  productId,
  deviceType: 1,
  dpids,
});

describe("Capabilities Transform", () => {
  describe("resolveDpid3Role", () => {
    it("returns brightness for products in the quirk table", () => {
      expect(resolveDpid3Role("d50v0i")).toBe("brightness");
    });

    it("returns exactly one role for any product id", () => {
      for (const pid of ["", "d50v0i", "D50V0I", "x", "d50v0i ", "p1"]) {
        expect(["brightness", "colorTemperature"]).toContain(
          resolveDpid3Role(pid),
        );
      }
      expect(resolveDpid3Role("D50V0I")).toBe("colorTemperature");
    });
  });

  describe("normalizeDpids", () => {
    it("sorts, de-duplicates and drops non-positive ids", () => {
      expect(normalizeDpids([6, 3, 3, 0, -1, 1.5, 1])).toEqual([1, 3, 6]);
    });
  });

  // ===========================================================================
  // Lights
  // ===========================================================================

  describe("inferCapabilities - lights", () => {
    it("resolves DPID 3 to brightness and ignores a lone hue DPID", () => {
      const { model, entities } = inferCapabilities(light("d50v0i", [1, 3, 5]));

      expect(model.dpid3Role).toBe("brightness");
      expect(model.roles).toEqual({ "1": "power", "3": "brightness", "5": "hue" });
      expect(model.channels.brightness).toBe(3);
      expect(model.color).toBe(false);
      expect(model.classification).toBe("dimmableLight");
      expect(model.diagnostics).toEqual(["HUE_WITHOUT_SATURATION"]);
      expect(entities).toEqual([
        {
          index: 0,
          kind: "light",
          address: { type: "device" },
          controls: {
            power: true,
            brightness: true,
            colorTemperature: false,
            color: false,
          },
          uniqueId: "dev1_light",
          name: "CozyLife Device (d50v0i)",
        },
      ]);
    });

    it("enables color temperature and RGB for an unrecognized product", () => {
      const { model, entities } = inferCapabilities(
        light("p9zz", [1, 3, 5, 6]),
      );

      expect(model.dpid3Role).toBe("colorTemperature");
      expect(model.channels).toEqual({
        power: 1,
        workMode: undefined,
        brightness: undefined,
        colorTemperature: 3,
        hue: 5,
        saturation: 6,
      });
      expect(model.classification).toBe("colorLight");
      expect(model.diagnostics).toEqual([]);
      expect(entities[0]?.controls).toEqual({
        power: true,
        brightness: false,
        colorTemperature: true,
        color: true,
      });
    });

    it("prefers DPID 4 when DPID 3 also resolves to brightness", () => {
      const { model } = inferCapabilities(light("d50v0i", [1, 3, 4]));

      expect(model.channels.brightness).toBe(4);
      expect(model.roles["3"]).toBe("brightness");
      expect(model.diagnostics).toEqual(["DPID3_BRIGHTNESS_SHADOWED"]);
    });

    it("keeps unknown DPIDs without blocking the entity", () => {
      const { model, entities } = inferCapabilities(light("p1", [1, 4, 20]));

      expect(model.roles["20"]).toBe("unknown");
      expect(model.unknownDpids).toEqual([20]);
      expect(model.diagnostics).toEqual(["UNKNOWN_DPIDS"]);
      expect(entities).toHaveLength(1);
      expect(entities[0]?.controls.brightness).toBe(true);
    });

    it("classifies a device with only DPID 1 as an on/off switch", () => {
      const { model, entities } = inferCapabilities(light("plug", [1]));

      expect(model.classification).toBe("onOff");
      expect(model.diagnostics).toEqual(["ON_OFF_ONLY"]);
      expect(entities[0]?.kind).toBe("switch");
      expect(entities[0]?.uniqueId).toBe("dev1_switch");
    });

    it("reports a missing power DPID", () => {
      const { model, entities } = inferCapabilities(light("p1", [4]));

      expect(model.onOff).toBe(false);
      expect(model.diagnostics).toEqual(["NO_POWER_DPID"]);
      expect(entities[0]?.controls.power).toBe(false);
    });

    it("produces no entities when nothing is controllable", () => {
      const { model, entities } = inferCapabilities(light("p1", []));

      expect(entities).toEqual([]);
      expect(model.diagnostics).toEqual(["NO_POWER_DPID", "ON_OFF_ONLY"]);
    });
  });

  // ===========================================================================
  // Switches
  // ===========================================================================

  describe("inferCapabilities - switches", () => {
    const gangSwitch = {
      deviceId: "sw1",
      productId: "p2g",
      deviceType: 0,
      dpids: [1],
    };

    it("creates two gang entities by default", () => {
      const { model, entities } = inferCapabilities(gangSwitch);

      expect(model.classification).toBe("multiGangSwitch");
      expect(model.diagnostics).toEqual(["ON_OFF_ONLY", "GANG_COUNT_ASSUMED"]);
      expect(entities.map((entity) => entity.address)).toEqual([
        { type: "gang", gang: 1, bit: 0 },
        { type: "gang", gang: 2, bit: 1 },
      ]);
      expect(entities.map((entity) => entity.uniqueId)).toEqual([
        "sw1_1",
        "sw1_2",
      ]);
      expect(entities[1]?.name).toBe("CozyLife Device (p2g) 2");
    });

    it("honours an explicit gang count", () => {
      const { model, entities } = inferCapabilities(gangSwitch, {
        gangCount: 3,
      });

      expect(entities).toHaveLength(3);
      expect(entities[2]?.address).toEqual({ type: "gang", gang: 3, bit: 2 });
      expect(model.diagnostics).toEqual(["ON_OFF_ONLY"]);
    });

    it("falls back to the default for an invalid gang count", () => {
      const { model, entities } = inferCapabilities(gangSwitch, {
        gangCount: 0,
      });

      expect(entities).toHaveLength(2);
      expect(model.diagnostics).toContain("GANG_COUNT_ASSUMED");
    });

    it("never claims dimming or color on gang entities", () => {
      const { model, entities } = inferCapabilities({
        ...gangSwitch,
        dpids: [1, 3, 4, 5, 6],
      });

      expect(model.dimmable).toBe(false);
      expect(model.color).toBe(false);
      expect(model.roles).toEqual({
        "1": "power",
        "3": "unknown",
        "4": "unknown",
        "5": "unknown",
        "6": "unknown",
      });
      expect(model.channels).toEqual({ power: 1 });
      expect(model.unknownDpids).toEqual([3, 4, 5, 6]);
      for (const entity of entities) {
        expect(entity.controls).toEqual({
          power: true,
          brightness: false,
          colorTemperature: false,
          color: false,
        });
      }
    });

    it("keeps gang order stable across repeated inference", () => {
      const first = inferCapabilities(gangSwitch, { gangCount: 4 });
      const second = inferCapabilities(
        { ...gangSwitch, dpids: [1, 1] },
        { gangCount: 4 },
      );

      expect(second.entities).toEqual(first.entities);
    });
  });

  describe("determinism", () => {
    it("returns identical results for identical inputs", () => {
      const input = light("p1", [1, 2, 3, 4, 5, 6, 9]);

      expect(inferCapabilities(input)).toEqual(inferCapabilities(input));
    });

    it("does not depend on DPID order or duplicates", () => {
      expect(inferCapabilities(light("p1", [6, 5, 3, 1, 3]))).toEqual(
        inferCapabilities(light("p1", [1, 3, 5, 6])),
      );
    });
  });
});
