import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger, LogLevel } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { InteractionRange } from "../../../../shared/constants/AgentEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import { BlockedReason, JobType } from "../../../../shared/constants/JobEnums";
import { ContentKind } from "../../../../shared/constants/ResourceEnums";
import type { Agent, MoveTarget } from "../../../../shared/types/simulation/agents";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type { Reservation } from "../../../../shared/types/simulation/stockpiles";
import { samePosition } from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { JobRegistry } from "../jobs/JobRegistry";
import { ResourceReservationSystem } from "../stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import {
  blocked,
  COMPLETED,
  reposition,
  type ExecutionEngine,
  type ProgressResult,
} from "./ExecutionEngine";

/**
 * Personal job: fetch a matching item and put it in the agent's slot. The
 * item the slot held before is dropped where the agent stands.
 */
@injectable()
export class EquipEngine implements ExecutionEngine {
  public readonly jobTypes = [JobType.EQUIP] as const;

  constructor(
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.ResourceReservationSystem)
    private readonly reservations: ResourceReservationSystem,
    @inject(TYPES.StockpileSystem) private readonly stockpiles: StockpileSystem,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {}

  /**
   * The reserved item's tile once reserved; until then the agent starts
   * where it stands and the first step reserves.
   */
  public interactionTarget(agent: Agent, job: Job): MoveTarget | null {
    if (job.metadata.assigneeId !== agent.id) return null;
    const [reservation] = this.reservations.getByOwner(job.id);
    return {
      position: reservation ? reservation.position : agent.position,
      range: InteractionRange.EXACT,
    };
  }

  private ensureReserved(agent: Agent, job: Job): Reservation | null {
    const [existing] = this.reservations.getByOwner(job.id);
    if (existing) return existing;

    const requirement = job.metadata.materials?.[0];
    if (!requirement) return null;
    const result = this.reservations.findAndReserve(
      requirement.selector,
      1,
      job.id,
      { includeGround: true, near: agent.position },
    );
    return result.success ? result.reservations[0] : null;
  }

  public advance(agent: Agent, job: Job): ProgressResult {
    const slot = job.metadata.equipSlot;
    if (!slot || job.metadata.assigneeId !== agent.id) {
      return blocked(BlockedReason.INVALID_TARGET);
    }

    const reservation = this.ensureReserved(agent, job);
    if (!reservation) return blocked(BlockedReason.MISSING_MATERIALS);
    if (!samePosition(agent.position, reservation.position)) {
      return reposition({
        position: reservation.position,
        range: InteractionRange.EXACT,
      });
    }

    const committed = this.reservations.commitReservation(reservation.id);
    if (!committed.success) return blocked(BlockedReason.MISSING_MATERIALS);
    if (committed.content.kind !== ContentKind.ITEM) {
      this.stockpiles.dropOnGround(agent.position, committed.content);
      return blocked(BlockedReason.INVALID_TARGET);
    }

    const item = committed.content.item;
    const previous = agent.equipment[slot];
    if (previous) {
      this.stockpiles.dropOnGround(agent.position, {
        kind: ContentKind.ITEM,
        item: previous,
      });
    }
    agent.equipment[slot] = item;

    this.events.publish(SchedulerEventType.ITEM_EQUIPPED, {
      agentId: agent.id,
      instanceId: item.instanceId,
      slot,
    });
    logger.agentLog(
      LogLevel.INFO,
      LogCategory.ENGINES,
      agent.id,
      `equipped ${item.itemId} (${item.instanceId}) in ${slot}`,
    );
    this.jobs.addProgress(job.id, job.requiredProgress);
    return COMPLETED;
  }
}
