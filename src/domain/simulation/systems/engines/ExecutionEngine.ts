import type { BlockedReason, JobType } from "../../../../shared/constants/JobEnums";
import { ProgressStatus } from "../../../../shared/constants/ProgressEnums";
import type { Agent, MoveTarget } from "../../../../shared/types/simulation/agents";
import type { Job } from "../../../../shared/types/simulation/jobs";

export type ProgressResult =
  | { status: ProgressStatus.CONTINUING }
  | { status: ProgressStatus.COMPLETED }
  | { status: ProgressStatus.BLOCKED; reason: BlockedReason }
  | { status: ProgressStatus.REPOSITION; target: MoveTarget };

/**
 * Per-job-type behaviour driven by the agent execution machine.
 *
 * `advance` runs once per tick while the agent is within range of its
 * target. Side effects of completion are applied inside the call that
 * returns COMPLETED.
 */
export interface ExecutionEngine {
  readonly jobTypes: readonly JobType[];
  /** Where the agent must stand first. Null when the target is gone. */
  interactionTarget(agent: Agent, job: Job): MoveTarget | null;
  advance(agent: Agent, job: Job, delta: number): ProgressResult;
}

export const CONTINUING: ProgressResult = { status: ProgressStatus.CONTINUING };
export const COMPLETED: ProgressResult = { status: ProgressStatus.COMPLETED };

export function blocked(reason: BlockedReason): ProgressResult {
  return { status: ProgressStatus.BLOCKED, reason };
}

export function reposition(target: MoveTarget): ProgressResult {
  return { status: ProgressStatus.REPOSITION, target };
}
