import { inject, injectable, optional } from "inversify";
import { TYPES } from "../../../../config/Types";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
} from "../../../../config/config";
import { RELOCATION_HAUL_PRIORITY } from "../../../../shared/constants/SchedulerConstants";
import type { Job } from "../../../../shared/types/simulation/jobs";
import { SimulationClock } from "../../core/SimulationClock";
import { JobRegistry } from "../jobs/JobRegistry";
import { ResourceReservationSystem } from "../stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import { HaulProducer, type HaulCandidate } from "./HaulProducer";

/**
 * Moves content flagged misplaced (after a filter change or a zone removal)
 * to a zone that allows it, then deletes emptied zones pending removal.
 */
@injectable()
export class RelocationProducer extends HaulProducer {
  protected readonly priority = RELOCATION_HAUL_PRIORITY;
  protected readonly relocation = true;

  constructor(
    @inject(TYPES.JobRegistry) jobs: JobRegistry,
    @inject(TYPES.StockpileSystem) stockpiles: StockpileSystem,
    @inject(TYPES.ResourceReservationSystem)
    reservations: ResourceReservationSystem,
    @inject(TYPES.SimulationClock) clock: SimulationClock,
    @inject(TYPES.SchedulerConfig)
    @optional()
    config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  ) {
    super(jobs, stockpiles, reservations, clock, config);
  }

  protected candidates(): HaulCandidate[] {
    return this.stockpiles.getMisplacedContents();
  }

  public scan(): Job[] {
    this.stockpiles.sweepRemovedZones();
    return super.scan();
  }
}
