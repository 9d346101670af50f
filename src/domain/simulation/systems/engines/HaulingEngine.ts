import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger, LogLevel } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { InteractionRange } from "../../../../shared/constants/AgentEnums";
import { BlockedReason, JobType } from "../../../../shared/constants/JobEnums";
import type { Position3D } from "../../../../shared/types/geometry";
import type { Agent, MoveTarget } from "../../../../shared/types/simulation/agents";
import type { HaulSpec, Job } from "../../../../shared/types/simulation/jobs";
import type { StorableContent } from "../../../../shared/types/simulation/stockpiles";
import {
  clonePosition,
  isAdjacent,
  positionKey,
  samePosition,
} from "../../../../shared/utils/geometry";
import { JobRegistry } from "../jobs/JobRegistry";
import { contentKey } from "../stockpiles/contentMatching";
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
 * Moves content from a source cell to a stockpile cell.
 *
 * Pick-up happens on the source tile: the content is reserved, committed
 * and carried. Drop-off happens next to the destination. A destination that
 * refuses the payload is searched again once; after that the job is
 * abandoned and the payload ends up on the ground.
 */
@injectable()
export class HaulingEngine implements ExecutionEngine {
  public readonly jobTypes = [JobType.HAUL] as const;

  constructor(
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.ResourceReservationSystem)
    private readonly reservations: ResourceReservationSystem,
    @inject(TYPES.StockpileSystem) private readonly stockpiles: StockpileSystem,
  ) {}

  public interactionTarget(agent: Agent, job: Job): MoveTarget | null {
    const haul = job.metadata.haul;
    if (!haul) return null;
    if (agent.carrying && haul.destination) {
      return { position: haul.destination, range: InteractionRange.ADJACENT };
    }
    return { position: haul.source, range: InteractionRange.EXACT };
  }

  public advance(agent: Agent, job: Job): ProgressResult {
    const haul = job.metadata.haul;
    if (!haul) return blocked(BlockedReason.INVALID_TARGET);
    return agent.carrying
      ? this.dropOff(agent, job, haul, agent.carrying)
      : this.pickUp(agent, job, haul);
  }

  private pickUp(agent: Agent, job: Job, haul: HaulSpec): ProgressResult {
    if (!samePosition(agent.position, haul.source)) {
      return reposition({ position: haul.source, range: InteractionRange.EXACT });
    }

    const sourceKey = positionKey(haul.source);
    const quantity = Math.min(
      haul.quantity,
      this.reservations.availableAt(sourceKey, haul.content),
    );
    const preview =
      quantity > 0
        ? this.stockpiles.peekContent(sourceKey, haul.content, quantity)
        : null;
    if (!preview) return blocked(BlockedReason.INVALID_TARGET);

    const destination = this.resolveDestination(haul, preview, sourceKey);
    if (!destination) return blocked(BlockedReason.INVALID_TARGET);

    const reserved = this.reservations.reserveAt(
      sourceKey,
      haul.content,
      quantity,
      job.id,
    );
    if (!reserved.success) return blocked(BlockedReason.INVALID_TARGET);

    const [reservation] = reserved.reservations;
    const committed = this.reservations.commitReservation(reservation.id);
    if (!committed.success) return blocked(BlockedReason.INVALID_TARGET);

    agent.carrying = committed.content;
    this.jobs.updateMetadata(job.id, {
      haul: { ...haul, quantity, destination },
    });
    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.ENGINES,
      agent.id,
      `picked up ${contentKey(haul.content)} x${quantity} for ${job.id}`,
    );

    return isAdjacent(agent.position, destination)
      ? this.dropOff(agent, job, { ...haul, destination }, committed.content)
      : reposition({ position: destination, range: InteractionRange.ADJACENT });
  }

  /**
   * The planned destination when it still takes the content, else the
   * nearest cell that does.
   */
  private resolveDestination(
    haul: HaulSpec,
    content: StorableContent,
    sourceKey: string,
  ): Position3D | null {
    if (haul.destination) {
      const key = positionKey(haul.destination);
      if (key !== sourceKey && this.stockpiles.checkStore(key, content) === null) {
        return haul.destination;
      }
    }
    const cell = this.stockpiles.findStorageCell(content, {
      near: haul.source,
      excludeCellKey: sourceKey,
    });
    return cell ? clonePosition(cell.position) : null;
  }

  private dropOff(
    agent: Agent,
    job: Job,
    haul: HaulSpec,
    payload: StorableContent,
  ): ProgressResult {
    const destination = haul.destination;
    if (!destination) return this.research(agent, job, haul, payload);
    if (!isAdjacent(agent.position, destination)) {
      return reposition({ position: destination, range: InteractionRange.ADJACENT });
    }

    const result = this.stockpiles.store(positionKey(destination), payload);
    if (!result.success) {
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.ENGINES,
        agent.id,
        `drop-off at ${positionKey(destination)} refused: ${result.reason}`,
      );
      return this.research(agent, job, haul, payload);
    }

    agent.carrying = null;
    this.jobs.addProgress(job.id, job.requiredProgress);
    return COMPLETED;
  }

  private research(
    agent: Agent,
    job: Job,
    haul: HaulSpec,
    payload: StorableContent,
  ): ProgressResult {
    if (haul.destinationResearched) {
      return blocked(BlockedReason.INVALID_TARGET);
    }

    const cell = this.stockpiles.findStorageCell(payload, {
      near: agent.position,
      excludeCellKey: positionKey(haul.source),
    });
    this.jobs.updateMetadata(job.id, {
      haul: {
        ...haul,
        destination: cell ? clonePosition(cell.position) : undefined,
        destinationResearched: true,
      },
    });
    if (!cell) return blocked(BlockedReason.INVALID_TARGET);
    return reposition({
      position: cell.position,
      range: InteractionRange.ADJACENT,
    });
  }
}
