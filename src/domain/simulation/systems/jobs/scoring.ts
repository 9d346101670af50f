import { SCORING_WEIGHTS } from "../../../../shared/constants/SchedulerConstants";

/**
 * Linear in priority. One level outweighs the whole distance bonus.
 */
export function priorityWeight(priority: number): number {
  return priority * SCORING_WEIGHTS.PRIORITY;
}

/**
 * Bounded and monotonically decreasing in distance.
 */
export function distanceWeight(distance: number): number {
  return (
    SCORING_WEIGHTS.MAX_DISTANCE_BONUS /
    (1 + Math.max(0, distance) * SCORING_WEIGHTS.DISTANCE_DECAY)
  );
}

export function urgencyWeight(urgency: number | undefined): number {
  if (urgency === undefined) return 0;
  return Math.min(1, Math.max(0, urgency)) * SCORING_WEIGHTS.URGENCY;
}
