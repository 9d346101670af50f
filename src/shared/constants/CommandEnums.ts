/**
 * Operator command type enumerations.
 *
 * @module shared/constants/CommandEnums
 */
export enum SimulationCommandType {
  DESIGNATE_BUILD = "DESIGNATE_BUILD",
  DEMOLISH = "DEMOLISH",
  DESIGNATE_HARVEST = "DESIGNATE_HARVEST",
  DESIGNATE_HUNT = "DESIGNATE_HUNT",
  CREATE_ZONE = "CREATE_ZONE",
  SET_ZONE_FILTER = "SET_ZONE_FILTER",
  REMOVE_ZONE = "REMOVE_ZONE",
  ADD_CRAFT_ORDER = "ADD_CRAFT_ORDER",
  CANCEL_CRAFT_ORDER = "CANCEL_CRAFT_ORDER",
  CANCEL_JOB = "CANCEL_JOB",
  SET_JOB_PRIORITY = "SET_JOB_PRIORITY",
  SET_AGENT_JOB_TYPES = "SET_AGENT_JOB_TYPES",
  REQUEST_EQUIP = "REQUEST_EQUIP",
  SPAWN_AGENT = "SPAWN_AGENT",
}

/**
 * Craft order modes.
 */
export enum CraftOrderMode {
  /** Craft a fixed number of times. */
  REPEAT = "repeat",
  /** Keep the stored amount of the output at or above a target. */
  MAINTAIN = "maintain",
}

export function isSimulationCommandType(
  value: unknown,
): value is SimulationCommandType {
  return Object.values(SimulationCommandType).some((type) => type === value);
}

export function isCraftOrderMode(value: unknown): value is CraftOrderMode {
  return Object.values(CraftOrderMode).some((mode) => mode === value);
}
