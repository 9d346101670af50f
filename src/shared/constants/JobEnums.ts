/**
 * Job enumerations for the colony scheduler.
 *
 * Defines job types, job lifecycle status and the reasons a job can be
 * blocked or abandoned.
 *
 * @module shared/constants/JobEnums
 */

/**
 * Kinds of work an agent can claim from the shared pool.
 */
export enum JobType {
  BUILD = "build",
  HAUL = "haul",
  CRAFT = "craft",
  HARVEST = "harvest",
  SALVAGE = "salvage",
  HUNT = "hunt",
  EQUIP = "equip",
}

/**
 * Lifecycle status of a job while it lives in the registry.
 * Completed and abandoned jobs leave the registry, so they have no status.
 */
export enum JobStatus {
  PENDING = "pending",
  CLAIMED = "claimed",
  IN_PROGRESS = "in_progress",
  BLOCKED = "blocked",
}

/**
 * Why an engine could not make progress this tick.
 */
export enum BlockedReason {
  MISSING_MATERIALS = "missing-materials",
  NO_STORAGE = "no-storage",
  INVALID_TARGET = "invalid-target",
}

/**
 * Why an agent let go of its job without completing it.
 */
export enum AbandonReason {
  UNREACHABLE = "unreachable",
  MISSING_MATERIALS = "missing_materials",
  INVALID_TARGET = "invalid_target",
  CANCELLED = "cancelled",
  PREEMPTED = "preempted",
  LOST_CLAIM = "lost_claim",
  ERROR = "error",
}

/**
 * Why a job left the registry.
 */
export enum JobRemovalReason {
  COMPLETED = "completed",
  CANCELLED = "cancelled",
  EXPIRED = "expired",
  ABANDONED = "abandoned",
}

export const ALL_JOB_TYPES: readonly JobType[] = Object.values(JobType);
export const ALL_JOB_STATUSES: readonly JobStatus[] = Object.values(JobStatus);
export const ALL_BLOCKED_REASONS: readonly BlockedReason[] =
  Object.values(BlockedReason);

export function isJobType(value: unknown): value is JobType {
  return ALL_JOB_TYPES.some((type) => type === value);
}

export function isJobStatus(value: unknown): value is JobStatus {
  return ALL_JOB_STATUSES.some((status) => status === value);
}

export function isBlockedReason(value: unknown): value is BlockedReason {
  return ALL_BLOCKED_REASONS.some((reason) => reason === value);
}

/**
 * Outcome of an external cancellation.
 */
export enum CancelOutcome {
  /** Unclaimed job removed immediately. */
  REMOVED = "removed",
  /** Claimed job flagged; the claimant abandons it on its next update. */
  REQUESTED = "requested",
  NOT_FOUND = "not_found",
}
