import { injectable } from "inversify";
import type { Agent } from "../../../../shared/types/simulation/agents";
import type { TraitProvider } from "../../ports/TraitProvider";

/**
 * Reads the per-category bonus carried in the agent's own traits.
 */
@injectable()
export class AgentTraitProvider implements TraitProvider {
  public scoringBias(agent: Agent, category: string): number {
    return agent.traits.categoryBonus[category] ?? 0;
  }
}
