import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import type { JobType } from "../../../../shared/constants/JobEnums";
import { ConstructionEngine } from "./ConstructionEngine";
import { CraftingEngine } from "./CraftingEngine";
import { EquipEngine } from "./EquipEngine";
import type { ExecutionEngine } from "./ExecutionEngine";
import { HarvestingEngine } from "./HarvestingEngine";
import { HaulingEngine } from "./HaulingEngine";
import { HuntingEngine } from "./HuntingEngine";

/**
 * Engine lookup by job type.
 */
@injectable()
export class EngineRegistry {
  private readonly engines = new Map<JobType, ExecutionEngine>();

  constructor(
    @inject(TYPES.ConstructionEngine) construction: ConstructionEngine,
    @inject(TYPES.CraftingEngine) crafting: CraftingEngine,
    @inject(TYPES.HaulingEngine) hauling: HaulingEngine,
    @inject(TYPES.HarvestingEngine) harvesting: HarvestingEngine,
    @inject(TYPES.HuntingEngine) hunting: HuntingEngine,
    @inject(TYPES.EquipEngine) equip: EquipEngine,
  ) {
    for (const engine of [construction, crafting, hauling, harvesting, hunting, equip]) {
      this.register(engine);
    }
  }

  public register(engine: ExecutionEngine): void {
    for (const type of engine.jobTypes) {
      this.engines.set(type, engine);
    }
  }

  public get(type: JobType): ExecutionEngine | undefined {
    return this.engines.get(type);
  }
}
