import { describe, it, expect, afterEach, vi } from "vitest";
import {
  DEFAULT_SCHEDULER_CONFIG,
  loadSchedulerConfig,
} from "../../src/config/config";
import { logger } from "../../src/infrastructure/utils/logger";

describe("Config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    vi.resetModules();
  });

  describe("loadSchedulerConfig", () => {
    it("debe usar los valores por defecto sin variables", () => {
      expect(loadSchedulerConfig({})).toEqual(DEFAULT_SCHEDULER_CONFIG);
      expect(DEFAULT_SCHEDULER_CONFIG.staleClaimMaxAge).toBe(300);
      expect(DEFAULT_SCHEDULER_CONFIG.commandQueueLimit).toBe(200);
    });

    it("debe usar valores de entorno cuando están disponibles", () => {
      const config = loadSchedulerConfig({
        TICK_INTERVAL_MS: "50",
        STALE_CLAIM_MAX_AGE: "12",
        HUNGER_THRESHOLD: "55.5",
        HAUL_CARRY_CAPACITY: "10",
      });

      expect(config.tickIntervalMs).toBe(50);
      expect(config.staleClaimMaxAge).toBe(12);
      expect(config.hungerThreshold).toBe(55.5);
      expect(config.haulCarryCapacity).toBe(10);
      expect(config.baseWorkPerTick).toBe(DEFAULT_SCHEDULER_CONFIG.baseWorkPerTick);
    });

    it("debe volver al valor por defecto con valores inválidos", () => {
      const warnSpy = vi.spyOn(logger, "warn");

      const config = loadSchedulerConfig({
        STALE_CLAIM_MAX_AGE: "1.5",
        MAX_CLAIM_ATTEMPTS_PER_TICK: "0",
        HUNGER_RATE_PER_TICK: "fast",
        MAX_UNCLAIMED_AGE: "",
      });

      expect(config.staleClaimMaxAge).toBe(300);
      expect(config.maxClaimAttemptsPerTick).toBe(5);
      expect(config.hungerRatePerTick).toBe(0.01);
      expect(config.maxUnclaimedAge).toBe(20000);
      expect(warnSpy).toHaveBeenCalledTimes(3);
    });
  });

  describe("CONFIG", () => {
    it("debe leer el proceso al cargarse", async () => {
      vi.stubEnv("PORT", "3000");
      vi.stubEnv("SIM_SEED", "seed-test");
      vi.stubEnv("ALLOWED_ORIGINS", "http://a.test, http://b.test");
      vi.stubEnv("WORLD_WIDTH", "32");
      vi.stubEnv("WORLD_LEVELS", "1");
      vi.stubEnv("SNAPSHOT_PATH", "/tmp/colony.msgpack");

      const { CONFIG } = await import("../../src/config/config");

      expect(CONFIG.PORT).toBe(3000);
      expect(CONFIG.SIM_SEED).toBe("seed-test");
      expect(CONFIG.ALLOWED_ORIGINS).toEqual(["http://a.test", "http://b.test"]);
      expect(CONFIG.WORLD).toEqual({ width: 32, height: 48, levels: 1 });
      expect(CONFIG.SNAPSHOT_PATH).toBe("/tmp/colony.msgpack");
    });

    it("debe rechazar mundos menores que la colonia inicial", async () => {
      vi.stubEnv("WORLD_WIDTH", "8");
      vi.stubEnv("ALLOWED_ORIGINS", "*");
      vi.stubEnv("SNAPSHOT_PATH", "");

      const { CONFIG } = await import("../../src/config/config");

      expect(CONFIG.WORLD.width).toBe(48);
      expect(CONFIG.ALLOWED_ORIGINS).toBe("*");
      expect(CONFIG.SNAPSHOT_PATH).toBeNull();
    });
  });
});
