import { inject, injectable, optional } from "inversify";
import { TYPES } from "../../../../config/Types";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
} from "../../../../config/config";
import { SimulationClock } from "../../core/SimulationClock";
import { JobRegistry } from "../jobs/JobRegistry";
import { ResourceReservationSystem } from "../stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import { HaulProducer, type HaulCandidate } from "./HaulProducer";

/**
 * Hauls loose ground content (drops, corpses, abandoned payloads) to the
 * nearest stockpile cell that takes it.
 */
@injectable()
export class AutoHaulProducer extends HaulProducer {
  protected readonly priority = undefined;
  protected readonly relocation = false;

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
    return this.stockpiles.getLooseContents();
  }
}
