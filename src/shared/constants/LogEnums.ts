/**
 * Log level enumerations for the scheduler.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which system generated the log.
 */
export enum LogCategory {
  /** Tick loop, runner and command processing */
  SIMULATION = "simulation",
  /** Job registry: insert, claim, release, expiry */
  JOBS = "jobs",
  /** Per-agent state machine */
  AGENTS = "agents",
  /** Routing and movement */
  MOVEMENT = "movement",
  /** Stockpile zones, cells and filters */
  STOCKPILES = "stockpiles",
  /** Reservation layer */
  RESERVATIONS = "reservations",
  /** Execution engines */
  ENGINES = "engines",
  /** Hunger, fatigue, starvation */
  NEEDS = "needs",
  /** Tiles, resource nodes, animals */
  WORLD = "world",
  /** Snapshots and codecs */
  PERSISTENCE = "persistence",
  /** HTTP and WebSocket surface */
  NETWORK = "network",
  /** General/uncategorized logs */
  GENERAL = "general",
}

export const ALL_LOG_LEVELS: readonly LogLevel[] = Object.values(LogLevel);
export const ALL_LOG_CATEGORIES: readonly LogCategory[] =
  Object.values(LogCategory);

export function isLogCategory(value: unknown): value is LogCategory {
  return ALL_LOG_CATEGORIES.some((category) => category === value);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return ALL_LOG_LEVELS.some((level) => level === value);
}
