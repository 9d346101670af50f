/**
 * Tunable defaults for the colony scheduler.
 *
 * `config/config.ts` overlays environment values on top of these.
 *
 * @module shared/constants/SchedulerConstants
 */
import { JobType } from "./JobEnums";

export const SCHEDULER_DEFAULTS = {
  TICK_INTERVAL_MS: 200,
  COMMAND_QUEUE_LIMIT: 200,

  /** Ticks without activity before a claim is force-released. */
  STALE_CLAIM_MAX_AGE: 300,
  /** Ticks an unclaimed job may wait before removal. 0 disables. */
  MAX_UNCLAIMED_AGE: 20000,
  MAX_CLAIM_ATTEMPTS_PER_TICK: 5,
  UNREACHABLE_COOLDOWN_TICKS: 60,
  MISSING_MATERIALS_MAX_WAIT: 120,
  MISSING_MATERIALS_COOLDOWN_TICKS: 30,

  BASE_WORK_PER_TICK: 1,
  STOCKPILE_CELL_CAPACITY: 100,
  HAUL_CARRY_CAPACITY: 25,
  AUTO_HAUL_INTERVAL_TICKS: 5,

  HUNGER_THRESHOLD: 70,
  HUNGER_RATE_PER_TICK: 0.01,
  MEAL_HUNGER_RELIEF: 70,
  MEAL_RETRY_COOLDOWN_TICKS: 60,
  STARVATION_DAMAGE_PER_TICK: 0.05,
  FATIGUE_RATE_WORKING: 0.02,
  FATIGUE_RECOVERY_RATE: 0.05,
  FATIGUE_THRESHOLD: 80,
  FATIGUE_WORK_MULTIPLIER: 0.5,
} as const;

/**
 * Weights of the claim score.
 *
 * One priority level outweighs the largest distance bonus, so distance only
 * orders jobs of equal priority.
 */
export const SCORING_WEIGHTS = {
  PRIORITY: 100,
  MAX_DISTANCE_BONUS: 50,
  DISTANCE_DECAY: 0.1,
  Z_LEVEL_PENALTY: 100,
  URGENCY: 75,
} as const;

/** Loose ground piles are unbounded. */
export const GROUND_CELL_CAPACITY = Number.MAX_SAFE_INTEGER;

export interface JobTypeDefaults {
  category: string;
  priority: number;
  requiredProgress: number;
  requeueable: boolean;
}

export const JOB_DEFAULTS: Record<JobType, JobTypeDefaults> = {
  [JobType.BUILD]: {
    category: "construction",
    priority: 3,
    requiredProgress: 100,
    requeueable: true,
  },
  [JobType.HAUL]: {
    category: "hauling",
    priority: 2,
    requiredProgress: 1,
    requeueable: true,
  },
  [JobType.CRAFT]: {
    category: "crafting",
    priority: 3,
    requiredProgress: 50,
    requeueable: true,
  },
  [JobType.HARVEST]: {
    category: "harvesting",
    priority: 2,
    requiredProgress: 60,
    requeueable: true,
  },
  [JobType.SALVAGE]: {
    category: "salvage",
    priority: 2,
    requiredProgress: 80,
    requeueable: true,
  },
  [JobType.HUNT]: {
    category: "hunting",
    priority: 3,
    requiredProgress: 30,
    requeueable: false,
  },
  [JobType.EQUIP]: {
    category: "equip",
    priority: 4,
    requiredProgress: 1,
    requeueable: true,
  },
};

/** Relocation hauls outrank ordinary hauls. */
export const RELOCATION_HAUL_PRIORITY = 3;

/** Bumped whenever the snapshot layout changes. */
export const SNAPSHOT_VERSION = 1;
