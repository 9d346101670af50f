import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { CraftOrderMode } from "../../../../shared/constants/CommandEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import { JobType } from "../../../../shared/constants/JobEnums";
import {
  ContentKind,
  SelectorKind,
} from "../../../../shared/constants/ResourceEnums";
import type {
  CraftOrder,
  CraftOrderParams,
  CraftOrderSnapshot,
} from "../../../../shared/types/simulation/crafting";
import type { Recipe } from "../../../../shared/types/simulation/items";
import type { MaterialSelector } from "../../../../shared/types/simulation/stockpiles";
import { clonePosition, isPosition3D } from "../../../../shared/utils/geometry";
import { RecipesCatalog } from "../../../data/RecipesCatalog";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { JobRegistry } from "../jobs/JobRegistry";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import { WorldGrid } from "../world/WorldGrid";

/**
 * Craft bills. Each order keeps at most one open craft job at its
 * workstation: REPEAT orders run a fixed number of times, MAINTAIN orders
 * run while the stored output is below the target.
 *
 * Completions arrive through the event bus, so counters move at the tick's
 * flush.
 */
@injectable()
export class CraftOrderSystem {
  private orders = new Map<string, CraftOrder>();
  private nextSeq = 0;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.StockpileSystem) private readonly stockpiles: StockpileSystem,
    @inject(TYPES.WorldGrid) private readonly world: WorldGrid,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {
    this.unsubscribers.push(
      this.events.subscribe(SchedulerEventType.JOB_COMPLETED, (payload) => {
        if (payload.craftOrderId) {
          this.onCompleted(payload.craftOrderId, payload.jobId);
        }
      }),
      this.events.subscribe(SchedulerEventType.JOB_REMOVED, (payload) => {
        const order = payload.craftOrderId
          ? this.orders.get(payload.craftOrderId)
          : undefined;
        if (order && order.activeJobId === payload.jobId) {
          order.activeJobId = null;
        }
      }),
    );
  }

  public addOrder(params: CraftOrderParams): CraftOrder | null {
    const recipe = RecipesCatalog.getRecipeById(params.recipeId);
    if (!recipe) {
      logger.warn(`Craft order rejected: unknown recipe ${params.recipeId}`, LogCategory.JOBS);
      return null;
    }
    if (!isPosition3D(params.workstation) || !this.workstationReady(recipe, params.workstation)) {
      logger.warn(
        `Craft order rejected: no ${recipe.workstation ?? "workstation"} at the given tile`,
        LogCategory.JOBS,
      );
      return null;
    }

    const count = params.count ?? 1;
    const targetStock = params.targetStock ?? 0;
    if (params.mode === CraftOrderMode.REPEAT && (!Number.isInteger(count) || count <= 0)) {
      return null;
    }
    if (params.mode === CraftOrderMode.MAINTAIN && (!Number.isInteger(targetStock) || targetStock <= 0)) {
      return null;
    }

    this.nextSeq++;
    const order: CraftOrder = {
      id: `order_${this.nextSeq}`,
      recipeId: recipe.id,
      workstation: clonePosition(params.workstation),
      mode: params.mode,
      remaining: params.mode === CraftOrderMode.REPEAT ? count : 0,
      targetStock: params.mode === CraftOrderMode.MAINTAIN ? targetStock : 0,
      priority: params.priority ?? 3,
      activeJobId: null,
      suspended: false,
    };
    this.orders.set(order.id, order);
    return order;
  }

  public cancelOrder(orderId: string): boolean {
    const order = this.orders.get(orderId);
    if (!order) return false;
    if (order.activeJobId) this.jobs.cancel(order.activeJobId);
    this.orders.delete(orderId);
    return true;
  }

  public get(orderId: string): CraftOrder | undefined {
    return this.orders.get(orderId);
  }

  public getAll(): CraftOrder[] {
    return Array.from(this.orders.values());
  }

  private workstationReady(recipe: Recipe, position: CraftOrder["workstation"]): boolean {
    return (
      recipe.workstation === undefined ||
      this.world.getTile(position) === recipe.workstation
    );
  }

  private outputSelector(recipe: Recipe): MaterialSelector | null {
    const [output] = recipe.outputs;
    if (!output) return null;
    return output.kind === ContentKind.RESOURCE
      ? { kind: SelectorKind.RESOURCE, resource: output.resource }
      : { kind: SelectorKind.ITEM, itemId: output.itemId };
  }

  private wantsMore(order: CraftOrder, recipe: Recipe): boolean {
    if (order.mode === CraftOrderMode.REPEAT) return order.remaining > 0;
    const selector = this.outputSelector(recipe);
    return selector !== null && this.stockpiles.countStored(selector) < order.targetStock;
  }

  /**
   * Opens a craft job for each order that needs one.
   */
  public update(): void {
    for (const order of this.orders.values()) {
      if (order.activeJobId && !this.jobs.get(order.activeJobId)) {
        order.activeJobId = null;
      }
      if (order.activeJobId) continue;

      const recipe = RecipesCatalog.getRecipeById(order.recipeId);
      if (!recipe) continue;
      order.suspended = !this.workstationReady(recipe, order.workstation);
      if (order.suspended || !this.wantsMore(order, recipe)) continue;

      const job = this.jobs.insert({
        type: JobType.CRAFT,
        location: order.workstation,
        priority: order.priority,
        metadata: { recipeId: order.recipeId, craftOrderId: order.id },
      });
      order.activeJobId = job ? job.id : null;
    }
  }

  private onCompleted(orderId: string, jobId: string): void {
    const order = this.orders.get(orderId);
    if (!order) return;
    if (order.activeJobId === jobId) order.activeJobId = null;
    if (order.mode !== CraftOrderMode.REPEAT) return;

    order.remaining = Math.max(0, order.remaining - 1);
    if (order.remaining === 0 && order.activeJobId === null) {
      this.orders.delete(orderId);
      logger.info(`Craft order ${orderId} finished`, LogCategory.JOBS);
    }
  }

  public snapshot(): CraftOrderSnapshot {
    return structuredClone({ orders: this.getAll(), nextSeq: this.nextSeq });
  }

  public restore(snapshot: CraftOrderSnapshot): void {
    const data = structuredClone(snapshot);
    this.orders = new Map(data.orders.map((order) => [order.id, order]));
    this.nextSeq = data.nextSeq;
  }

  public cleanup(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }
}
