import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import { JobType } from "../../../../shared/constants/JobEnums";
import { TileType } from "../../../../shared/constants/TileTypeEnums";
import type { Agent } from "../../../../shared/types/simulation/agents";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type { OutputSpec } from "../../../../shared/types/simulation/stockpiles";
import { clonePosition } from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { JobRegistry } from "../jobs/JobRegistry";
import { ResourceReservationSystem } from "../stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import { WorldGrid } from "../world/WorldGrid";
import { MaterialWorkEngine } from "./MaterialWorkEngine";

/**
 * Builds a blueprint tile into its finished tile.
 */
@injectable()
export class ConstructionEngine extends MaterialWorkEngine {
  public readonly jobTypes = [JobType.BUILD] as const;

  constructor(
    @inject(TYPES.JobRegistry) jobs: JobRegistry,
    @inject(TYPES.ResourceReservationSystem)
    reservations: ResourceReservationSystem,
    @inject(TYPES.StockpileSystem) stockpiles: StockpileSystem,
    @inject(TYPES.WorldGrid) private readonly world: WorldGrid,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {
    super(jobs, reservations, stockpiles);
  }

  protected isTargetValid(job: Job): boolean {
    return (
      job.metadata.finishedTile !== undefined &&
      this.world.getTile(job.location) === TileType.BLUEPRINT
    );
  }

  protected outputs(): OutputSpec[] {
    return [];
  }

  protected apply(_agent: Agent, job: Job): void {
    const tile = job.metadata.finishedTile ?? TileType.FLOOR;
    this.world.finishBlueprint(job.location, tile);
    this.events.publish(SchedulerEventType.CONSTRUCTION_COMPLETED, {
      jobId: job.id,
      position: clonePosition(job.location),
      tile,
    });
  }
}
