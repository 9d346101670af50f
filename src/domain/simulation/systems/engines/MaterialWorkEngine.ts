import { injectable } from "inversify";
import { ContentKind } from "../../../../shared/constants/ResourceEnums";
import { BlockedReason, type JobType } from "../../../../shared/constants/JobEnums";
import { InteractionRange } from "../../../../shared/constants/AgentEnums";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { logger } from "../../../../infrastructure/utils/logger";
import type { Agent, MoveTarget } from "../../../../shared/types/simulation/agents";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type {
  OutputSpec,
  StoragePlacement,
  StorableContent,
} from "../../../../shared/types/simulation/stockpiles";
import { JobRegistry } from "../jobs/JobRegistry";
import { ResourceReservationSystem } from "../stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import {
  blocked,
  COMPLETED,
  CONTINUING,
  type ExecutionEngine,
  type ProgressResult,
} from "./ExecutionEngine";

/**
 * Work that consumes reserved inputs at a fixed spot.
 *
 * Inputs are reserved all-or-nothing on the first call and stay reserved
 * while progress accrues. At the boundary the output destinations are
 * planned first; only then are the inputs committed and the output
 * applied.
 */
@injectable()
export abstract class MaterialWorkEngine implements ExecutionEngine {
  public abstract readonly jobTypes: readonly JobType[];

  constructor(
    protected readonly jobs: JobRegistry,
    protected readonly reservations: ResourceReservationSystem,
    protected readonly stockpiles: StockpileSystem,
  ) {}

  /** False when the work site no longer supports the job. */
  protected abstract isTargetValid(job: Job): boolean;

  /** Outputs that need a stockpile destination. */
  protected abstract outputs(job: Job): OutputSpec[];

  protected abstract apply(
    agent: Agent,
    job: Job,
    placements: StoragePlacement[],
  ): void;

  public interactionTarget(_agent: Agent, job: Job): MoveTarget | null {
    if (!this.isTargetValid(job)) return null;
    return { position: job.location, range: InteractionRange.EXACT };
  }

  public advance(agent: Agent, job: Job, delta: number): ProgressResult {
    if (!this.isTargetValid(job)) return blocked(BlockedReason.INVALID_TARGET);
    if (!this.ensureReserved(job)) {
      return blocked(BlockedReason.MISSING_MATERIALS);
    }

    const progress = this.jobs.addProgress(job.id, delta);
    if (progress < job.requiredProgress) return CONTINUING;

    const outputs = this.outputs(job);
    let placements: StoragePlacement[] = [];
    if (outputs.length > 0) {
      const planned = this.stockpiles.planStorage(outputs, job.location);
      if (!planned) return blocked(BlockedReason.NO_STORAGE);
      placements = planned;
    }

    if (!this.commitInputs(job)) {
      return blocked(BlockedReason.MISSING_MATERIALS);
    }
    this.apply(agent, job, placements);
    return COMPLETED;
  }

  private ensureReserved(job: Job): boolean {
    const materials = job.metadata.materials ?? [];
    if (materials.length === 0) return true;
    if (this.reservations.getByOwner(job.id).length > 0) return true;

    const result = this.reservations.reserveAll(materials, job.id, {
      includeGround: true,
      near: job.location,
    });
    return result.success;
  }

  /**
   * Commits every input. If stock vanished under a reservation, whatever
   * was already withdrawn goes back on the ground and the rest is released.
   */
  private commitInputs(job: Job): boolean {
    const consumed: StorableContent[] = [];
    for (const reservation of this.reservations.getByOwner(job.id)) {
      const result = this.reservations.commitReservation(reservation.id);
      if (result.success) {
        consumed.push(result.content);
        continue;
      }

      logger.error(
        `Input commit for ${job.id} failed: ${result.reason}`,
        LogCategory.ENGINES,
      );
      for (const content of consumed) {
        this.stockpiles.dropOnGround(job.location, content);
      }
      this.reservations.cancelAllForOwner(job.id);
      return false;
    }

    logger.debug(
      `${job.id} consumed ${consumed
        .map((c) => (c.kind === ContentKind.RESOURCE ? `${c.resource}x${c.quantity}` : c.item.itemId))
        .join(", ")}`,
      LogCategory.ENGINES,
    );
    return true;
  }
}
