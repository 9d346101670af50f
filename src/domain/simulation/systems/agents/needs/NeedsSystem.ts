import { inject, injectable, optional } from "inversify";
import { TYPES } from "../../../../../config/Types";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
} from "../../../../../config/config";
import { logger, LogLevel } from "../../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../../shared/constants/LogEnums";
import { SchedulerEventType } from "../../../../../shared/constants/EventEnums";
import { ContentKind } from "../../../../../shared/constants/ResourceEnums";
import type { Agent } from "../../../../../shared/types/simulation/agents";
import type { StorableContent } from "../../../../../shared/types/simulation/stockpiles";
import { ItemCatalog } from "../../../../data/ItemCatalog";
import { BatchedEventEmitter } from "../../../core/BatchedEventEmitter";

const NEED_MAX = 100;

/**
 * Hunger and fatigue.
 *
 * Hunger rises every tick; at the cap the agent starves and loses health.
 * Fatigue rises while working and recovers otherwise; past the threshold
 * work output drops.
 */
@injectable()
export class NeedsSystem {
  constructor(
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
    @inject(TYPES.SchedulerConfig)
    @optional()
    private readonly config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  ) {}

  /**
   * Applies one tick of needs. Returns false when the agent's health ran
   * out.
   */
  public update(agent: Agent, working: boolean): boolean {
    const needs = agent.needs;
    needs.hunger = Math.min(NEED_MAX, needs.hunger + this.config.hungerRatePerTick);
    if (needs.hunger >= NEED_MAX) {
      agent.health = Math.max(0, agent.health - this.config.starvationDamagePerTick);
    }

    needs.fatigue = working
      ? Math.min(NEED_MAX, needs.fatigue + this.config.fatigueRateWorking)
      : Math.max(0, needs.fatigue - this.config.fatigueRecoveryRate);

    return agent.health > 0;
  }

  public isHungry(agent: Agent): boolean {
    return agent.needs.hunger >= this.config.hungerThreshold;
  }

  public workMultiplier(agent: Agent): number {
    return agent.needs.fatigue >= this.config.fatigueThreshold
      ? this.config.fatigueWorkMultiplier
      : 1;
  }

  private nutritionOf(content: StorableContent): number {
    if (content.kind === ContentKind.RESOURCE) {
      const perUnit =
        ItemCatalog.getResourceNutrition(content.resource) ||
        this.config.mealHungerRelief;
      return perUnit * content.quantity;
    }
    return (
      ItemCatalog.getItem(content.item.itemId)?.nutrition ??
      this.config.mealHungerRelief
    );
  }

  public eat(agent: Agent, meal: StorableContent): void {
    const relief = this.nutritionOf(meal);
    agent.needs.hunger = Math.max(0, agent.needs.hunger - relief);
    this.events.publish(SchedulerEventType.AGENT_ATE, {
      agentId: agent.id,
      hunger: agent.needs.hunger,
    });
    logger.agentLog(
      LogLevel.INFO,
      LogCategory.NEEDS,
      agent.id,
      `ate, hunger now ${agent.needs.hunger.toFixed(1)}`,
    );
  }
}
