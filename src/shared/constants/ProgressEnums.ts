/**
 * Outcome of a single execution engine step.
 *
 * @module shared/constants/ProgressEnums
 */
export enum ProgressStatus {
  CONTINUING = "continuing",
  COMPLETED = "completed",
  BLOCKED = "blocked",
  REPOSITION = "reposition",
}

/**
 * Result of a single movement step.
 */
export enum MoveStepStatus {
  ARRIVED = "arrived",
  MOVING = "moving",
  BLOCKED = "blocked",
}
