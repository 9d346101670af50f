import { inject, injectable, optional } from "inversify";
import { TYPES } from "../../../../config/Types";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
} from "../../../../config/config";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import {
  ALL_RESOURCE_TYPES,
  ContentKind,
  type ResourceType,
} from "../../../../shared/constants/ResourceEnums";
import { StoreFailure } from "../../../../shared/constants/StockpileEnums";
import { GROUND_CELL_CAPACITY } from "../../../../shared/constants/SchedulerConstants";
import type { Position3D } from "../../../../shared/types/geometry";
import type {
  ContentRef,
  FilterKey,
  LooseContent,
  MaterialSelector,
  MisplacedContent,
  OutputSpec,
  StockpileSnapshot,
  StockpileZone,
  StorableContent,
  StorageCell,
  StoragePlacement,
  StoreResult,
  ZoneFilters,
} from "../../../../shared/types/simulation/stockpiles";
import {
  clonePosition,
  jobDistance,
  positionKey,
} from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { SimulationClock } from "../../core/SimulationClock";
import { WorldGrid } from "../world/WorldGrid";
import {
  contentKey,
  filterKeyOf,
  quantityOf,
  refOf,
  selectorMatchesItem,
  selectorMatchesResource,
} from "./contentMatching";
import { ItemFactory } from "./ItemFactory";

export interface StorageSearchOptions {
  near?: Position3D;
  excludeCellKey?: string;
}

/**
 * Stockpile zones and cells: bounded, filtered storage plus loose ground
 * piles.
 *
 * Cells are the unit of capacity. A zone cell never exceeds its capacity and
 * only admits content its zone filter allows. Ground cells (`zoneId` null)
 * are unbounded and accept anything; they hold drops, harvest yields and
 * corpses until the auto-haul scan moves them.
 *
 * When a filter changes, content it no longer allows is flagged misplaced.
 * The flag clears when the content leaves the cell or the filter allows it
 * again. Physical withdrawal only happens through the reservation layer.
 */
@injectable()
export class StockpileSystem {
  private zones = new Map<string, StockpileZone>();
  private cells = new Map<string, StorageCell>();
  private nextZoneSeq = 0;

  constructor(
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
    @inject(TYPES.SimulationClock) private readonly clock: SimulationClock,
    @inject(TYPES.ItemFactory) private readonly itemFactory: ItemFactory,
    @inject(TYPES.WorldGrid) private readonly world: WorldGrid,
    @inject(TYPES.SchedulerConfig)
    @optional()
    private readonly config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  ) {}

  // ---------------------------------------------------------------------------
  // Zones
  // ---------------------------------------------------------------------------

  /**
   * Creates a zone over the given tiles. Tiles that already hold a cell are
   * skipped; returns null when no tile is left.
   */
  public createZone(
    name: string,
    positions: Position3D[],
    filters: ZoneFilters = {},
  ): StockpileZone | null {
    const freeKeys: string[] = [];
    const freePositions: Position3D[] = [];
    for (const position of positions) {
      const key = positionKey(position);
      if (this.cells.has(key) || freeKeys.includes(key)) continue;
      freeKeys.push(key);
      freePositions.push(clonePosition(position));
    }

    if (freeKeys.length === 0) {
      logger.warn(
        `Zone "${name}" rejected: no free tiles`,
        LogCategory.STOCKPILES,
      );
      return null;
    }

    this.nextZoneSeq++;
    const zone: StockpileZone = {
      id: `zone_${this.nextZoneSeq}`,
      name,
      cellKeys: freeKeys,
      filters: { ...filters },
      pendingRemoval: false,
      createdTick: this.clock.now,
    };
    this.zones.set(zone.id, zone);

    freePositions.forEach((position, index) => {
      this.cells.set(freeKeys[index], {
        key: freeKeys[index],
        position,
        zoneId: zone.id,
        capacity: this.config.stockpileCellCapacity,
        resources: {},
        items: [],
        misplaced: [],
      });
    });

    this.events.publish(SchedulerEventType.ZONE_CREATED, {
      zoneId: zone.id,
      cellCount: freeKeys.length,
    });
    logger.info(
      `Zone ${zone.id} "${name}" created with ${freeKeys.length} cells`,
      LogCategory.STOCKPILES,
    );
    return zone;
  }

  public getZone(zoneId: string): StockpileZone | undefined {
    return this.zones.get(zoneId);
  }

  public getZones(): StockpileZone[] {
    return Array.from(this.zones.values());
  }

  public getZoneCells(zoneId: string): StorageCell[] {
    const zone = this.zones.get(zoneId);
    if (!zone) return [];
    return zone.cellKeys.flatMap((key) => {
      const cell = this.cells.get(key);
      return cell ? [cell] : [];
    });
  }

  /**
   * Merges `filters` into the zone filter (or replaces it) and re-evaluates
   * every cell of the zone.
   */
  public setZoneFilters(
    zoneId: string,
    filters: ZoneFilters,
    replace = false,
  ): boolean {
    const zone = this.zones.get(zoneId);
    if (!zone) return false;

    zone.filters = replace ? { ...filters } : { ...zone.filters, ...filters };
    const flagged = this.refreshMisplaced(zone);

    this.events.publish(SchedulerEventType.ZONE_FILTERS_CHANGED, { zoneId });
    logger.info(
      `Zone ${zoneId} filters updated, ${flagged} contents misplaced`,
      LogCategory.STOCKPILES,
      { filters: zone.filters },
    );
    return true;
  }

  /**
   * Removes an empty zone now. A zone with contents is marked for removal:
   * everything in it becomes misplaced, and the zone disappears once
   * relocation has emptied it.
   */
  public requestZoneRemoval(zoneId: string): boolean {
    const zone = this.zones.get(zoneId);
    if (!zone) return false;

    if (this.isZoneEmpty(zone)) {
      this.deleteZone(zone);
      return true;
    }

    zone.pendingRemoval = true;
    this.refreshMisplaced(zone);
    logger.info(
      `Zone ${zoneId} marked for removal, waiting for relocation`,
      LogCategory.STOCKPILES,
    );
    return true;
  }

  /**
   * Deletes zones marked for removal that are empty now.
   */
  public sweepRemovedZones(): number {
    let removed = 0;
    for (const zone of Array.from(this.zones.values())) {
      if (zone.pendingRemoval && this.isZoneEmpty(zone)) {
        this.deleteZone(zone);
        removed++;
      }
    }
    return removed;
  }

  private isZoneEmpty(zone: StockpileZone): boolean {
    return zone.cellKeys.every((key) => {
      const cell = this.cells.get(key);
      return !cell || this.load(cell) === 0;
    });
  }

  private deleteZone(zone: StockpileZone): void {
    for (const key of zone.cellKeys) {
      this.cells.delete(key);
    }
    this.zones.delete(zone.id);
    this.events.publish(SchedulerEventType.ZONE_REMOVED, { zoneId: zone.id });
    logger.info(`Zone ${zone.id} removed`, LogCategory.STOCKPILES);
  }

  // ---------------------------------------------------------------------------
  // Cells
  // ---------------------------------------------------------------------------

  public getCell(cellKey: string): StorageCell | undefined {
    return this.cells.get(cellKey);
  }

  public getCellAt(position: Position3D): StorageCell | undefined {
    return this.cells.get(positionKey(position));
  }

  /** Cells in creation order. */
  public getCells(): StorageCell[] {
    return Array.from(this.cells.values());
  }

  public load(cell: StorageCell): number {
    let total = cell.items.length;
    for (const resource of ALL_RESOURCE_TYPES) {
      total += cell.resources[resource] ?? 0;
    }
    return total;
  }

  public freeCapacity(cell: StorageCell): number {
    return Math.max(0, cell.capacity - this.load(cell));
  }

  /**
   * Ground cells accept anything. A zone marked for removal accepts nothing.
   */
  public allows(cell: StorageCell, key: FilterKey): boolean {
    if (cell.zoneId === null) return true;
    const zone = this.zones.get(cell.zoneId);
    if (!zone || zone.pendingRemoval) return false;
    return zone.filters[key] !== false;
  }

  public physicalQuantity(cellKey: string, ref: ContentRef): number {
    const cell = this.cells.get(cellKey);
    if (!cell) return 0;
    if (ref.kind === ContentKind.RESOURCE) {
      return cell.resources[ref.resource] ?? 0;
    }
    return cell.items.some((item) => item.instanceId === ref.instanceId)
      ? 1
      : 0;
  }

  /**
   * Why `content` cannot go into the cell right now, or null when it can.
   */
  public checkStore(
    cellKey: string,
    content: StorableContent | OutputSpec,
  ): StoreFailure | null {
    const cell = this.cells.get(cellKey);
    if (!cell) return StoreFailure.UNKNOWN_CELL;

    const quantity = quantityOf(content);
    if (!Number.isInteger(quantity) || quantity <= 0) {
      return StoreFailure.INVALID_QUANTITY;
    }
    if (!this.allows(cell, filterKeyOf(content))) {
      return StoreFailure.FILTER_DENIED;
    }
    if (this.freeCapacity(cell) < quantity) {
      return StoreFailure.CAPACITY_EXCEEDED;
    }
    return null;
  }

  /**
   * Admits the whole content or nothing.
   */
  public store(cellKey: string, content: StorableContent): StoreResult {
    const failure = this.checkStore(cellKey, content);
    const cell = this.cells.get(cellKey);
    if (failure !== null || !cell) {
      return { success: false, reason: failure ?? StoreFailure.UNKNOWN_CELL };
    }

    this.addContent(cell, content);
    this.events.publish(SchedulerEventType.CONTENT_STORED, {
      cellKey,
      content: refOf(content),
      quantity: quantityOf(content),
    });
    return { success: true, cellKey };
  }

  /**
   * Puts content on the ground at `position`, or on the nearest tile that
   * is not a zone cell. Never fails.
   */
  public dropOnGround(position: Position3D, content: StorableContent): string {
    const target = this.findGroundTile(position);
    const key = positionKey(target);
    let cell = this.cells.get(key);
    if (!cell) {
      cell = {
        key,
        position: clonePosition(target),
        zoneId: null,
        capacity: GROUND_CELL_CAPACITY,
        resources: {},
        items: [],
        misplaced: [],
      };
      this.cells.set(key, cell);
    }

    this.addContent(cell, content);
    this.events.publish(SchedulerEventType.CONTENT_DROPPED, {
      cellKey: key,
      content: refOf(content),
      quantity: quantityOf(content),
    });
    logger.debug(
      `Dropped ${contentKey(refOf(content))} x${quantityOf(content)} at ${key}`,
      LogCategory.STOCKPILES,
    );
    return key;
  }

  /**
   * Nearest walkable in-bounds tile that is not a zone cell, searched in
   * rings around `position`. Falls back to `position` when none exists.
   */
  private findGroundTile(position: Position3D): Position3D {
    const isFree = (candidate: Position3D): boolean => {
      if (!this.world.isWalkable(candidate)) return false;
      const cell = this.cells.get(positionKey(candidate));
      return !cell || cell.zoneId === null;
    };
    if (isFree(position)) return position;

    const { width, height } = this.world.dimensions;
    const maxRadius = Math.max(width, height);
    for (let radius = 1; radius <= maxRadius; radius++) {
      for (let dy = -radius; dy <= radius; dy++) {
        for (let dx = -radius; dx <= radius; dx++) {
          if (Math.max(Math.abs(dx), Math.abs(dy)) !== radius) continue;
          const candidate = {
            x: position.x + dx,
            y: position.y + dy,
            z: position.z,
          };
          if (isFree(candidate)) return candidate;
        }
      }
    }

    logger.warn("No free ground tile, dropping in place", LogCategory.STOCKPILES, {
      position,
    });
    return position;
  }

  private addContent(cell: StorageCell, content: StorableContent): void {
    if (content.kind === ContentKind.RESOURCE) {
      cell.resources[content.resource] =
        (cell.resources[content.resource] ?? 0) + content.quantity;
    } else {
      cell.items.push(content.item);
    }
  }

  /**
   * Removes content physically. Only the reservation layer calls this, on
   * commit.
   */
  public withdraw(
    cellKey: string,
    ref: ContentRef,
    quantity: number,
  ): StorableContent | null {
    const cell = this.cells.get(cellKey);
    if (!cell) return null;

    let removed: StorableContent | null = null;
    if (ref.kind === ContentKind.RESOURCE) {
      const have = cell.resources[ref.resource] ?? 0;
      if (quantity <= 0 || have < quantity) return null;
      if (have === quantity) {
        delete cell.resources[ref.resource];
      } else {
        cell.resources[ref.resource] = have - quantity;
      }
      removed = { kind: ContentKind.RESOURCE, resource: ref.resource, quantity };
    } else {
      const index = cell.items.findIndex(
        (item) => item.instanceId === ref.instanceId,
      );
      if (index === -1 || quantity !== 1) return null;
      const [item] = cell.items.splice(index, 1);
      removed = { kind: ContentKind.ITEM, item };
    }

    if (this.physicalQuantity(cellKey, ref) === 0) {
      const key = contentKey(ref);
      cell.misplaced = cell.misplaced.filter((flagged) => flagged !== key);
    }
    if (cell.zoneId === null && this.load(cell) === 0) {
      this.cells.delete(cellKey);
    }
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Destination search
  // ---------------------------------------------------------------------------

  /**
   * Nearest zone cell that takes the whole content. Cells already holding
   * the same resource win ties.
   */
  public findStorageCell(
    content: StorableContent | OutputSpec,
    options: StorageSearchOptions = {},
  ): StorageCell | null {
    const quantity = quantityOf(content);
    const key = filterKeyOf(content);
    const stackResource =
      content.kind === ContentKind.RESOURCE ? content.resource : null;

    let best: StorageCell | null = null;
    let bestRank = Infinity;
    for (const cell of this.cells.values()) {
      if (cell.zoneId === null || cell.key === options.excludeCellKey) continue;
      if (!this.allows(cell, key) || this.freeCapacity(cell) < quantity) {
        continue;
      }
      const distance = options.near
        ? jobDistance(options.near, cell.position)
        : 0;
      const stacks =
        stackResource !== null && (cell.resources[stackResource] ?? 0) > 0;
      const rank = distance * 2 + (stacks ? 0 : 1);
      if (rank < bestRank) {
        best = cell;
        bestRank = rank;
      }
    }
    return best;
  }

  /**
   * Plans storage for several outputs at once, splitting across cells when
   * needed. Returns null unless every unit has a place.
   */
  public planStorage(
    outputs: OutputSpec[],
    near?: Position3D,
  ): StoragePlacement[] | null {
    const tentative = new Map<string, number>();
    const placements: StoragePlacement[] = [];

    const zoneCells = Array.from(this.cells.values()).filter(
      (cell) => cell.zoneId !== null,
    );
    if (near) {
      zoneCells.sort(
        (a, b) => jobDistance(near, a.position) - jobDistance(near, b.position),
      );
    }

    for (const output of outputs) {
      let remaining = output.quantity;
      const key = filterKeyOf(output);
      for (const cell of zoneCells) {
        if (remaining === 0) break;
        if (!this.allows(cell, key)) continue;
        const free = this.freeCapacity(cell) - (tentative.get(cell.key) ?? 0);
        if (free <= 0) continue;

        const take = Math.min(free, remaining);
        tentative.set(cell.key, (tentative.get(cell.key) ?? 0) + take);
        placements.push({ cellKey: cell.key, output: { ...output, quantity: take } });
        remaining -= take;
      }
      if (remaining > 0) return null;
    }
    return placements;
  }

  /**
   * Creates the planned content and stores it. Anything the plan no longer
   * fits goes to the ground at `fallback`.
   */
  public storePlanned(
    placements: StoragePlacement[],
    fallback: Position3D,
  ): StorableContent[] {
    const created: StorableContent[] = [];
    for (const placement of placements) {
      for (const content of this.materialize(placement.output)) {
        created.push(content);
        const result = this.store(placement.cellKey, content);
        if (!result.success) {
          logger.warn(
            `Planned storage at ${placement.cellKey} failed (${result.reason}), dropping`,
            LogCategory.STOCKPILES,
          );
          this.dropOnGround(fallback, content);
        }
      }
    }
    return created;
  }

  private materialize(output: OutputSpec): StorableContent[] {
    if (output.kind === ContentKind.RESOURCE) {
      return [
        {
          kind: ContentKind.RESOURCE,
          resource: output.resource,
          quantity: output.quantity,
        },
      ];
    }
    const contents: StorableContent[] = [];
    for (let i = 0; i < output.quantity; i++) {
      const item = this.itemFactory.create(output.itemId);
      if (item) contents.push({ kind: ContentKind.ITEM, item });
    }
    return contents;
  }

  // ---------------------------------------------------------------------------
  // Misplaced and loose content
  // ---------------------------------------------------------------------------

  private cellContentKeys(cell: StorageCell): Array<[string, FilterKey]> {
    const keys: Array<[string, FilterKey]> = [];
    for (const resource of ALL_RESOURCE_TYPES) {
      if ((cell.resources[resource] ?? 0) > 0) {
        keys.push([
          contentKey({ kind: ContentKind.RESOURCE, resource }),
          resource,
        ]);
      }
    }
    for (const item of cell.items) {
      keys.push([
        contentKey({ kind: ContentKind.ITEM, instanceId: item.instanceId }),
        item.filterCategory,
      ]);
    }
    return keys;
  }

  /**
   * Re-evaluates the misplaced flags of every cell in the zone. Returns the
   * number of flagged contents.
   */
  private refreshMisplaced(zone: StockpileZone): number {
    let flagged = 0;
    for (const cell of this.getZoneCells(zone.id)) {
      const misplaced: string[] = [];
      for (const [key, filterKey] of this.cellContentKeys(cell)) {
        if (this.allows(cell, filterKey)) continue;
        misplaced.push(key);
        if (!cell.misplaced.includes(key)) {
          this.events.publish(SchedulerEventType.CONTENT_MISPLACED, {
            cellKey: cell.key,
            zoneId: zone.id,
            contentKey: key,
          });
        }
      }
      cell.misplaced = misplaced;
      flagged += misplaced.length;
    }
    return flagged;
  }

  public getMisplacedContents(): MisplacedContent[] {
    const result: MisplacedContent[] = [];
    for (const cell of this.cells.values()) {
      if (cell.zoneId === null || cell.misplaced.length === 0) continue;
      for (const ref of this.refsOf(cell)) {
        if (!cell.misplaced.includes(contentKey(ref))) continue;
        result.push({
          cellKey: cell.key,
          position: cell.position,
          zoneId: cell.zoneId,
          content: ref,
          quantity: this.physicalQuantity(cell.key, ref),
        });
      }
    }
    return result;
  }

  public getLooseContents(): LooseContent[] {
    const result: LooseContent[] = [];
    for (const cell of this.cells.values()) {
      if (cell.zoneId !== null) continue;
      for (const ref of this.refsOf(cell)) {
        result.push({
          cellKey: cell.key,
          position: cell.position,
          content: ref,
          quantity: this.physicalQuantity(cell.key, ref),
        });
      }
    }
    return result;
  }

  /** Content refs of a cell: resources in catalog order, then items. */
  public refsOf(cell: StorageCell): ContentRef[] {
    const refs: ContentRef[] = [];
    for (const resource of ALL_RESOURCE_TYPES) {
      if ((cell.resources[resource] ?? 0) > 0) {
        refs.push({ kind: ContentKind.RESOURCE, resource });
      }
    }
    for (const item of cell.items) {
      refs.push({ kind: ContentKind.ITEM, instanceId: item.instanceId });
    }
    return refs;
  }

  /**
   * Content as it would leave the cell, without removing it.
   */
  public peekContent(
    cellKey: string,
    ref: ContentRef,
    quantity: number,
  ): StorableContent | null {
    const cell = this.cells.get(cellKey);
    if (!cell) return null;
    if (ref.kind === ContentKind.RESOURCE) {
      return { kind: ContentKind.RESOURCE, resource: ref.resource, quantity };
    }
    const item = cell.items.find((i) => i.instanceId === ref.instanceId);
    return item ? { kind: ContentKind.ITEM, item } : null;
  }

  /**
   * Physical units in zone cells matching the selector, reserved or not.
   */
  public countStored(selector: MaterialSelector): number {
    let total = 0;
    for (const cell of this.cells.values()) {
      if (cell.zoneId === null) continue;
      for (const resource of ALL_RESOURCE_TYPES) {
        if (selectorMatchesResource(selector, resource)) {
          total += cell.resources[resource] ?? 0;
        }
      }
      total += cell.items.filter((item) => selectorMatchesItem(selector, item))
        .length;
    }
    return total;
  }

  public getTotalsByResource(): Partial<Record<ResourceType, number>> {
    const totals: Partial<Record<ResourceType, number>> = {};
    for (const cell of this.cells.values()) {
      if (cell.zoneId === null) continue;
      for (const resource of ALL_RESOURCE_TYPES) {
        const amount = cell.resources[resource] ?? 0;
        if (amount > 0) totals[resource] = (totals[resource] ?? 0) + amount;
      }
    }
    return totals;
  }

  public getStats(): {
    zones: number;
    cells: number;
    groundPiles: number;
    storedUnits: number;
    misplaced: number;
  } {
    let groundPiles = 0;
    let storedUnits = 0;
    let misplaced = 0;
    for (const cell of this.cells.values()) {
      if (cell.zoneId === null) {
        groundPiles++;
        continue;
      }
      storedUnits += this.load(cell);
      misplaced += cell.misplaced.length;
    }
    return {
      zones: this.zones.size,
      cells: this.cells.size - groundPiles,
      groundPiles,
      storedUnits,
      misplaced,
    };
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  public snapshot(): StockpileSnapshot {
    return structuredClone({
      zones: this.getZones(),
      cells: this.getCells(),
      nextZoneSeq: this.nextZoneSeq,
    });
  }

  public restore(snapshot: StockpileSnapshot): void {
    const data = structuredClone(snapshot);
    this.zones = new Map(data.zones.map((zone) => [zone.id, zone]));
    this.cells = new Map(data.cells.map((cell) => [cell.key, cell]));
    this.nextZoneSeq = data.nextZoneSeq;
  }
}
