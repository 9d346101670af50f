import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import { JobType } from "../../../../shared/constants/JobEnums";
import type { Agent } from "../../../../shared/types/simulation/agents";
import type { Recipe } from "../../../../shared/types/simulation/items";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type {
  OutputSpec,
  StoragePlacement,
} from "../../../../shared/types/simulation/stockpiles";
import { RecipesCatalog } from "../../../data/RecipesCatalog";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { JobRegistry } from "../jobs/JobRegistry";
import { ResourceReservationSystem } from "../stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import { WorldGrid } from "../world/WorldGrid";
import { MaterialWorkEngine } from "./MaterialWorkEngine";

/**
 * Runs a recipe at its workstation. Crafted output must have a stockpile
 * destination before any input is consumed.
 */
@injectable()
export class CraftingEngine extends MaterialWorkEngine {
  public readonly jobTypes = [JobType.CRAFT] as const;

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

  private recipeOf(job: Job): Recipe | undefined {
    const recipeId = job.metadata.recipeId;
    return recipeId ? RecipesCatalog.getRecipeById(recipeId) : undefined;
  }

  protected isTargetValid(job: Job): boolean {
    const recipe = this.recipeOf(job);
    if (!recipe) return false;
    return (
      recipe.workstation === undefined ||
      this.world.getTile(job.location) === recipe.workstation
    );
  }

  protected outputs(job: Job): OutputSpec[] {
    return this.recipeOf(job)?.outputs ?? [];
  }

  protected apply(_agent: Agent, job: Job, placements: StoragePlacement[]): void {
    const created = this.stockpiles.storePlanned(placements, job.location);
    this.events.publish(SchedulerEventType.ITEM_CRAFTED, {
      jobId: job.id,
      recipeId: job.metadata.recipeId ?? "",
      outputs: created.length,
    });
  }
}
