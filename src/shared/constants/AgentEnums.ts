/**
 * Agent enumerations for the colony scheduler.
 *
 * @module shared/constants/AgentEnums
 */

/**
 * States of the per-agent execution machine.
 *
 * COMPLETING and ABANDONING are transient: an agent passes through them
 * inside a single update and is back in IDLE before the tick ends.
 */
export enum AgentState {
  IDLE = "idle",
  EVALUATING = "evaluating",
  MOVING = "moving",
  EXECUTING = "executing",
  COMPLETING = "completing",
  ABANDONING = "abandoning",
  PREEMPTED = "preempted",
}

/**
 * How close an agent must stand to its target before executing.
 */
export enum InteractionRange {
  EXACT = "exact",
  ADJACENT = "adjacent",
}

/**
 * Slots an equipment item can occupy.
 */
export enum EquipmentSlot {
  MAIN_HAND = "main_hand",
  HANDS = "hands",
  BODY = "body",
}

export function isEquipmentSlot(value: unknown): value is EquipmentSlot {
  return Object.values(EquipmentSlot).some((slot) => slot === value);
}
