import { describe, it, expect } from "vitest";
import { createBalancerConfig } from "./config";
import { FallbackController } from "./fallbackController";

const configWith = (
  overrides: Partial<Parameters<typeof createBalancerConfig>[0]> = {}
) =>
  createBalancerConfig({
    maxServiceCurrentA: 25,
    chargers: [{ id: "garage", minCurrentA: 6, maxCurrentA: 16 }],
    ...overrides,
  });

describe("FallbackController", () => {
  describe("readiness", () => {
    it("should enter fallback on an unavailable reading before ready", () => {
      const fallback = new FallbackController();
      fallback.meterLost();

      expect(fallback.isReady).toBe(false);
      expect(fallback.meterHealthy).toBe(false);
      expect(fallback.fallbackActive).toBe(true);
    });

    it("should apply the fallback on ready when no valid reading was seen", () => {
      const fallback = new FallbackController();

      expect(fallback.markReady()).toBe(true);
      expect(fallback.fallbackActive).toBe(true);
      expect(fallback.meterHealthy).toBe(false);
    });

    it("should not apply the fallback on ready after a valid reading", () => {
      const fallback = new FallbackController();
      fallback.meterRecovered();

      expect(fallback.markReady()).toBe(false);
      expect(fallback.fallbackActive).toBe(false);
    });

    it("should not apply the fallback again on ready after the meter went away", () => {
      const fallback = new FallbackController();
      fallback.meterRecovered();
      fallback.meterLost();

      expect(fallback.markReady()).toBe(false);
      expect(fallback.fallbackActive).toBe(true);
    });

    it("should not apply the fallback again on ready after an early unavailable reading", () => {
      const fallback = new FallbackController();
      fallback.meterLost();

      expect(fallback.markReady()).toBe(false);
      expect(fallback.isReady).toBe(true);
    });

    it("should only become ready once", () => {
      const fallback = new FallbackController();

      expect(fallback.markReady()).toBe(true);
      expect(fallback.markReady()).toBe(false);
      expect(fallback.isReady).toBe(true);
    });
  });

  it("should clear both flags when the meter recovers", () => {
    const fallback = new FallbackController({ ready: true });
    fallback.meterLost();
    fallback.meterRecovered();

    expect(fallback.meterHealthy).toBe(true);
    expect(fallback.fallbackActive).toBe(false);
  });

  describe("resolveFor", () => {
    it("should stop in stop mode", () => {
      const config = configWith();
      const fallback = new FallbackController();

      expect(fallback.resolveFor(config.chargers[0], config)).toBe(0);
    });

    it("should leave the charger alone in ignore mode", () => {
      const config = configWith({ unavailableBehavior: "ignore" });
      const fallback = new FallbackController();

      expect(fallback.resolveFor(config.chargers[0], config)).toBeNull();
    });

    it("should cap the fallback current by every limit", () => {
      // min(20, charger 16) = 16, then service limit 12
      const config = configWith({
        unavailableBehavior: "set_current",
        unavailableFallbackCurrentA: 20,
        maxServiceCurrentA: 12,
      });
      const fallback = new FallbackController();

      expect(fallback.resolveFor(config.chargers[0], config)).toBe(12);
    });
  });

  describe("reapplyFor", () => {
    it("should re-clamp the held current in ignore mode", () => {
      const config = configWith({
        unavailableBehavior: "ignore",
        chargers: [{ id: "garage", minCurrentA: 6, maxCurrentA: 10 }],
      });
      const fallback = new FallbackController();

      expect(fallback.reapplyFor(config.chargers[0], 16, config)).toBe(10);
    });

    it("should re-apply the lowered cap in set_current mode", () => {
      const config = configWith({
        unavailableBehavior: "set_current",
        unavailableFallbackCurrentA: 12,
        chargers: [{ id: "garage", minCurrentA: 6, maxCurrentA: 8 }],
      });
      const fallback = new FallbackController();

      expect(fallback.reapplyFor(config.chargers[0], 12, config)).toBe(8);
    });
  });
});
