import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger, LogLevel } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import {
  EquipmentSlot,
  InteractionRange,
} from "../../../../shared/constants/AgentEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import { BlockedReason, JobType } from "../../../../shared/constants/JobEnums";
import { ContentKind } from "../../../../shared/constants/ResourceEnums";
import type { Agent, MoveTarget } from "../../../../shared/types/simulation/agents";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type { Animal } from "../../../../shared/types/simulation/world";
import { clonePosition, isAdjacent } from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { JobRegistry } from "../jobs/JobRegistry";
import { ItemFactory } from "../stockpiles/ItemFactory";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import { AnimalSystem } from "../world/AnimalSystem";
import {
  blocked,
  COMPLETED,
  CONTINUING,
  reposition,
  type ExecutionEngine,
  type ProgressResult,
} from "./ExecutionEngine";

export const WEAPON_DAMAGE_MULTIPLIER = 1.5;

/**
 * Attacks the target animal from an adjacent tile. A kill drops the corpse
 * on the ground, where the auto-haul scan picks it up.
 */
@injectable()
export class HuntingEngine implements ExecutionEngine {
  public readonly jobTypes = [JobType.HUNT] as const;

  constructor(
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.AnimalSystem) private readonly animals: AnimalSystem,
    @inject(TYPES.StockpileSystem) private readonly stockpiles: StockpileSystem,
    @inject(TYPES.ItemFactory) private readonly itemFactory: ItemFactory,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {}

  private animalOf(job: Job): Animal | null {
    const animalId = job.metadata.animalId;
    const animal = animalId ? this.animals.get(animalId) : undefined;
    return animal && animal.alive ? animal : null;
  }

  public interactionTarget(_agent: Agent, job: Job): MoveTarget | null {
    const animal = this.animalOf(job);
    return animal
      ? { position: animal.position, range: InteractionRange.ADJACENT }
      : null;
  }

  public damageOf(agent: Agent, delta: number): number {
    const weapon = agent.equipment[EquipmentSlot.MAIN_HAND];
    const multiplier = weapon?.tags.includes("weapon") ? WEAPON_DAMAGE_MULTIPLIER : 1;
    return agent.traits.attackPower * delta * multiplier;
  }

  public advance(agent: Agent, job: Job, delta: number): ProgressResult {
    const animal = this.animalOf(job);
    if (!animal) return blocked(BlockedReason.INVALID_TARGET);
    if (!isAdjacent(agent.position, animal.position)) {
      return reposition({
        position: animal.position,
        range: InteractionRange.ADJACENT,
      });
    }

    const position = clonePosition(animal.position);
    const { dealt, killed } = this.animals.applyDamage(
      animal.id,
      this.damageOf(agent, delta),
    );
    this.jobs.addProgress(job.id, dealt);
    if (!killed) return CONTINUING;

    const corpse = this.itemFactory.create(animal.corpseItemId);
    if (corpse) {
      this.stockpiles.dropOnGround(position, { kind: ContentKind.ITEM, item: corpse });
      this.events.publish(SchedulerEventType.ANIMAL_KILLED, {
        animalId: animal.id,
        corpseInstanceId: corpse.instanceId,
        position,
      });
    } else {
      logger.error(
        `No corpse item "${animal.corpseItemId}" for ${animal.id}`,
        LogCategory.ENGINES,
      );
    }
    logger.agentLog(LogLevel.INFO, LogCategory.ENGINES, agent.id, `killed ${animal.id}`);
    this.jobs.addProgress(job.id, job.requiredProgress);
    return COMPLETED;
  }
}
