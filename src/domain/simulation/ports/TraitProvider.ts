import type { Agent } from "../../../shared/types/simulation/agents";

/**
 * Personality bias added to the claim score of a job category.
 */
export interface TraitProvider {
  scoringBias(agent: Agent, category: string): number;
}
