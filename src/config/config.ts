import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";
import { SCHEDULER_DEFAULTS } from "../shared/constants/SchedulerConstants";

/**
 * Application configuration loaded from environment variables.
 *
 * @module config
 */

/**
 * Scheduler tunables. Injected into systems under `TYPES.SchedulerConfig`.
 */
export interface SchedulerConfig {
  tickIntervalMs: number;
  commandQueueLimit: number;
  staleClaimMaxAge: number;
  maxUnclaimedAge: number;
  maxClaimAttemptsPerTick: number;
  unreachableCooldownTicks: number;
  missingMaterialsMaxWait: number;
  missingMaterialsCooldownTicks: number;
  baseWorkPerTick: number;
  stockpileCellCapacity: number;
  haulCarryCapacity: number;
  autoHaulIntervalTicks: number;
  hungerThreshold: number;
  hungerRatePerTick: number;
  mealHungerRelief: number;
  mealRetryCooldownTicks: number;
  starvationDamagePerTick: number;
  fatigueRateWorking: number;
  fatigueRecoveryRate: number;
  fatigueThreshold: number;
  fatigueWorkMultiplier: number;
}

export const DEFAULT_SCHEDULER_CONFIG: Readonly<SchedulerConfig> = {
  tickIntervalMs: SCHEDULER_DEFAULTS.TICK_INTERVAL_MS,
  commandQueueLimit: SCHEDULER_DEFAULTS.COMMAND_QUEUE_LIMIT,
  staleClaimMaxAge: SCHEDULER_DEFAULTS.STALE_CLAIM_MAX_AGE,
  maxUnclaimedAge: SCHEDULER_DEFAULTS.MAX_UNCLAIMED_AGE,
  maxClaimAttemptsPerTick: SCHEDULER_DEFAULTS.MAX_CLAIM_ATTEMPTS_PER_TICK,
  unreachableCooldownTicks: SCHEDULER_DEFAULTS.UNREACHABLE_COOLDOWN_TICKS,
  missingMaterialsMaxWait: SCHEDULER_DEFAULTS.MISSING_MATERIALS_MAX_WAIT,
  missingMaterialsCooldownTicks:
    SCHEDULER_DEFAULTS.MISSING_MATERIALS_COOLDOWN_TICKS,
  baseWorkPerTick: SCHEDULER_DEFAULTS.BASE_WORK_PER_TICK,
  stockpileCellCapacity: SCHEDULER_DEFAULTS.STOCKPILE_CELL_CAPACITY,
  haulCarryCapacity: SCHEDULER_DEFAULTS.HAUL_CARRY_CAPACITY,
  autoHaulIntervalTicks: SCHEDULER_DEFAULTS.AUTO_HAUL_INTERVAL_TICKS,
  hungerThreshold: SCHEDULER_DEFAULTS.HUNGER_THRESHOLD,
  hungerRatePerTick: SCHEDULER_DEFAULTS.HUNGER_RATE_PER_TICK,
  mealHungerRelief: SCHEDULER_DEFAULTS.MEAL_HUNGER_RELIEF,
  mealRetryCooldownTicks: SCHEDULER_DEFAULTS.MEAL_RETRY_COOLDOWN_TICKS,
  starvationDamagePerTick: SCHEDULER_DEFAULTS.STARVATION_DAMAGE_PER_TICK,
  fatigueRateWorking: SCHEDULER_DEFAULTS.FATIGUE_RATE_WORKING,
  fatigueRecoveryRate: SCHEDULER_DEFAULTS.FATIGUE_RECOVERY_RATE,
  fatigueThreshold: SCHEDULER_DEFAULTS.FATIGUE_THRESHOLD,
  fatigueWorkMultiplier: SCHEDULER_DEFAULTS.FATIGUE_WORK_MULTIPLIER,
};

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  { integer = false, min = 0 }: { integer?: boolean; min?: number } = {},
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  const valid =
    Number.isFinite(value) &&
    value >= min &&
    (!integer || Number.isInteger(value));
  if (!valid) {
    logger.warn(
      `Invalid value for ${name}: "${raw}", using ${fallback}`,
      LogCategory.SIMULATION,
    );
    return fallback;
  }
  return value;
}

/**
 * Overlays scheduler tunables from the environment on the defaults.
 * Invalid values fall back to the default with a warning.
 */
export function loadSchedulerConfig(env: Env = process.env): SchedulerConfig {
  const d = DEFAULT_SCHEDULER_CONFIG;
  return {
    ...d,
    tickIntervalMs: readNumber(env, "TICK_INTERVAL_MS", d.tickIntervalMs, {
      min: 1,
    }),
    staleClaimMaxAge: readNumber(
      env,
      "STALE_CLAIM_MAX_AGE",
      d.staleClaimMaxAge,
      { integer: true, min: 1 },
    ),
    maxUnclaimedAge: readNumber(env, "MAX_UNCLAIMED_AGE", d.maxUnclaimedAge, {
      integer: true,
    }),
    maxClaimAttemptsPerTick: readNumber(
      env,
      "MAX_CLAIM_ATTEMPTS_PER_TICK",
      d.maxClaimAttemptsPerTick,
      { integer: true, min: 1 },
    ),
    unreachableCooldownTicks: readNumber(
      env,
      "UNREACHABLE_COOLDOWN_TICKS",
      d.unreachableCooldownTicks,
      { integer: true },
    ),
    missingMaterialsMaxWait: readNumber(
      env,
      "MISSING_MATERIALS_MAX_WAIT",
      d.missingMaterialsMaxWait,
      { integer: true },
    ),
    stockpileCellCapacity: readNumber(
      env,
      "STOCKPILE_CELL_CAPACITY",
      d.stockpileCellCapacity,
      { integer: true, min: 1 },
    ),
    haulCarryCapacity: readNumber(
      env,
      "HAUL_CARRY_CAPACITY",
      d.haulCarryCapacity,
      { integer: true, min: 1 },
    ),
    hungerThreshold: readNumber(env, "HUNGER_THRESHOLD", d.hungerThreshold),
    hungerRatePerTick: readNumber(
      env,
      "HUNGER_RATE_PER_TICK",
      d.hungerRatePerTick,
    ),
  };
}

function readOrigins(raw: string | undefined): string[] | "*" {
  if (!raw || raw.trim() === "*") return "*";
  return raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Process-level configuration.
 *
 * @property PORT - HTTP server port (default: 8080)
 * @property SIM_SEED - seed of the trait generator and the default colony
 * @property ALLOWED_ORIGINS - CORS origins, comma separated, `*` for any
 * @property WORLD - dimensions of the default colony grid
 * @property SNAPSHOT_PATH - MessagePack file restored on start and written on
 *   shutdown; unset disables persistence
 */
export const CONFIG = {
  PORT: readNumber(process.env, "PORT", 8080, { integer: true, min: 1 }),
  SIM_SEED: process.env.SIM_SEED || "colony",
  ALLOWED_ORIGINS: readOrigins(process.env.ALLOWED_ORIGINS),
  WORLD: {
    width: readNumber(process.env, "WORLD_WIDTH", 48, { integer: true, min: 16 }),
    height: readNumber(process.env, "WORLD_HEIGHT", 48, {
      integer: true,
      min: 16,
    }),
    levels: readNumber(process.env, "WORLD_LEVELS", 2, {
      integer: true,
      min: 1,
    }),
  },
  SNAPSHOT_PATH: process.env.SNAPSHOT_PATH || null,
  SCHEDULER: loadSchedulerConfig(),
};
