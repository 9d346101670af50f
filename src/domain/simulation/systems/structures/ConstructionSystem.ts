import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import { JobRemovalReason, JobType } from "../../../../shared/constants/JobEnums";
import type { TileType } from "../../../../shared/constants/TileTypeEnums";
import type { Position3D } from "../../../../shared/types/geometry";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type { MaterialRequirement } from "../../../../shared/types/simulation/stockpiles";
import { samePosition } from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { JobRegistry } from "../jobs/JobRegistry";
import { WorldGrid } from "../world/WorldGrid";

export interface BuildDesignation {
  position: Position3D;
  finishedTile: TileType;
  materials?: MaterialRequirement[];
  work?: number;
  priority?: number;
}

/**
 * Blueprints and their build jobs. A blueprint whose build job leaves the
 * pool without completing (expired, dropped as abandoned) is cleared, so the
 * tile can be designated again.
 */
@injectable()
export class ConstructionSystem {
  private readonly unsubscribers: Array<() => void> = [];

  constructor(
    @inject(TYPES.WorldGrid) private readonly world: WorldGrid,
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {
    this.unsubscribers.push(
      this.events.subscribe(SchedulerEventType.JOB_REMOVED, (payload) => {
        if (
          payload.jobType === JobType.BUILD &&
          payload.reason !== JobRemovalReason.COMPLETED
        ) {
          this.dropOrphanBlueprint(payload.location);
        }
      }),
    );
  }

  private dropOrphanBlueprint(position: Position3D): void {
    if (this.findBuildJob(position)) return;
    if (this.world.clearBlueprint(position)) {
      logger.info("Blueprint cleared: build job left the pool", LogCategory.WORLD, {
        position,
      });
    }
  }

  public designate(designation: BuildDesignation): Job | null {
    if (!this.world.placeBlueprint(designation.position)) {
      logger.warn("Blueprint rejected: tile unavailable", LogCategory.WORLD, {
        position: designation.position,
      });
      return null;
    }

    const job = this.jobs.insert({
      type: JobType.BUILD,
      location: designation.position,
      priority: designation.priority,
      requiredProgress: designation.work,
      subtype: designation.finishedTile,
      metadata: {
        finishedTile: designation.finishedTile,
        materials: designation.materials,
      },
    });
    if (!job) this.world.clearBlueprint(designation.position);
    return job;
  }

  public findBuildJob(position: Position3D): Job | undefined {
    return this.jobs.find(
      (job) => job.type === JobType.BUILD && samePosition(job.location, position),
    );
  }

  /**
   * Cancels the build job, if any, and restores the tile under the
   * blueprint. A claimed job is abandoned by its claimant on its next update.
   */
  public demolish(position: Position3D): boolean {
    const job = this.findBuildJob(position);
    if (job) this.jobs.cancel(job.id);
    return this.world.clearBlueprint(position) || job !== undefined;
  }

  public cleanup(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }
}
