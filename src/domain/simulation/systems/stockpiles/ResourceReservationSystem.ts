import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import {
  ALL_RESOURCE_TYPES,
  ContentKind,
} from "../../../../shared/constants/ResourceEnums";
import { ReservationFailure } from "../../../../shared/constants/StockpileEnums";
import type {
  CancelResult,
  CommitResult,
  ContentRef,
  MaterialRequirement,
  MaterialSelector,
  Reservation,
  ReservationScope,
  ReservationSnapshot,
  ReserveAllResult,
  ReserveResult,
  StorageCell,
} from "../../../../shared/types/simulation/stockpiles";
import { clonePosition, jobDistance } from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { SimulationClock } from "../../core/SimulationClock";
import {
  contentKey,
  describeSelector,
  selectorMatchesItem,
  selectorMatchesResource,
} from "./contentMatching";
import { StockpileSystem } from "./StockpileSystem";

/** Scope used for materials and food: stockpiles plus loose ground. */
export const MATERIAL_SCOPE: ReservationScope = { includeGround: true };

/** Settled ids remembered to explain rejected double commits. */
const MAX_SETTLED_HISTORY = 10000;

interface Candidate {
  cell: StorageCell;
  ref: ContentRef;
  available: number;
}

/**
 * Reservation layer over the stockpiles.
 *
 * A reservation holds a quantity of one content in one cell for an owner
 * (a job id or an agent meal token). For every (cell, content) the sum of
 * active reservations never exceeds the physical quantity, so availability
 * is always `physical - reserved`.
 *
 * Commit withdraws exactly once, cancel releases exactly once. A second
 * commit or cancel of the same id is rejected and logged as an error.
 */
@injectable()
export class ResourceReservationSystem {
  private active = new Map<string, Reservation>();
  private settled = new Map<string, ReservationFailure>();
  private byOwner = new Map<string, Set<string>>();
  private reservedIndex = new Map<string, number>();
  private nextSeq = 0;

  constructor(
    @inject(TYPES.StockpileSystem) private readonly stockpiles: StockpileSystem,
    @inject(TYPES.SimulationClock) private readonly clock: SimulationClock,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {}

  private indexKey(cellKey: string, ref: ContentRef): string {
    return `${cellKey}|${contentKey(ref)}`;
  }

  public reservedAt(cellKey: string, ref: ContentRef): number {
    return this.reservedIndex.get(this.indexKey(cellKey, ref)) ?? 0;
  }

  public availableAt(cellKey: string, ref: ContentRef): number {
    return Math.max(
      0,
      this.stockpiles.physicalQuantity(cellKey, ref) -
        this.reservedAt(cellKey, ref),
    );
  }

  private eligibleCells(scope: ReservationScope): StorageCell[] {
    const cells = this.stockpiles.getCells().filter((cell) => {
      if (scope.z !== undefined && cell.position.z !== scope.z) return false;
      if (cell.zoneId === null) return scope.includeGround === true;
      return !scope.zoneIds || scope.zoneIds.includes(cell.zoneId);
    });

    const near = scope.near;
    if (near) {
      cells.sort(
        (a, b) => jobDistance(near, a.position) - jobDistance(near, b.position),
      );
    }
    return cells;
  }

  /**
   * Unreserved content matching the selector, in scan order. Zone cells only
   * offer content their filter allows.
   */
  private *candidates(
    selector: MaterialSelector,
    scope: ReservationScope,
  ): Generator<Candidate> {
    for (const cell of this.eligibleCells(scope)) {
      for (const resource of ALL_RESOURCE_TYPES) {
        if (!selectorMatchesResource(selector, resource)) continue;
        if (!this.stockpiles.allows(cell, resource)) continue;
        const ref: ContentRef = { kind: ContentKind.RESOURCE, resource };
        const available = this.availableAt(cell.key, ref);
        if (available > 0) yield { cell, ref, available };
      }
      for (const item of cell.items) {
        if (!selectorMatchesItem(selector, item)) continue;
        if (!this.stockpiles.allows(cell, item.filterCategory)) continue;
        const ref: ContentRef = {
          kind: ContentKind.ITEM,
          instanceId: item.instanceId,
        };
        if (this.availableAt(cell.key, ref) > 0) {
          yield { cell, ref, available: 1 };
        }
      }
    }
  }

  /**
   * Unreserved quantity matching the selector. No side effects.
   */
  public countAvailable(
    selector: MaterialSelector,
    scope: ReservationScope = MATERIAL_SCOPE,
  ): number {
    let total = 0;
    for (const candidate of this.candidates(selector, scope)) {
      total += candidate.available;
    }
    return total;
  }

  /**
   * Reserves `quantity` units matching the selector, possibly across cells.
   * All or nothing.
   */
  public findAndReserve(
    selector: MaterialSelector,
    quantity: number,
    ownerId: string,
    scope: ReservationScope = MATERIAL_SCOPE,
  ): ReserveResult {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      logger.error(
        `Invalid reservation quantity ${quantity} for ${ownerId}`,
        LogCategory.RESERVATIONS,
      );
      return {
        success: false,
        reason: ReservationFailure.INSUFFICIENT,
        available: 0,
      };
    }

    const picks: Array<{ cell: StorageCell; ref: ContentRef; take: number }> =
      [];
    let remaining = quantity;
    for (const candidate of this.candidates(selector, scope)) {
      const take = Math.min(candidate.available, remaining);
      picks.push({ cell: candidate.cell, ref: candidate.ref, take });
      remaining -= take;
      if (remaining === 0) break;
    }

    if (remaining > 0) {
      logger.debug(
        `Not enough ${describeSelector(selector)} for ${ownerId}: ${quantity - remaining}/${quantity}`,
        LogCategory.RESERVATIONS,
      );
      return {
        success: false,
        reason: ReservationFailure.INSUFFICIENT,
        available: quantity - remaining,
      };
    }

    return {
      success: true,
      reservations: picks.map((pick) =>
        this.create(ownerId, pick.cell, pick.ref, pick.take),
      ),
    };
  }

  /**
   * Reserves at a known source cell, regardless of the zone filter (used to
   * move misplaced content out).
   */
  public reserveAt(
    cellKey: string,
    ref: ContentRef,
    quantity: number,
    ownerId: string,
  ): ReserveResult {
    const cell = this.stockpiles.getCell(cellKey);
    const available = this.availableAt(cellKey, ref);
    if (!cell || !Number.isInteger(quantity) || quantity <= 0) {
      return {
        success: false,
        reason: ReservationFailure.INSUFFICIENT,
        available,
      };
    }
    if (available < quantity) {
      return {
        success: false,
        reason: ReservationFailure.INSUFFICIENT,
        available,
      };
    }
    return {
      success: true,
      reservations: [this.create(ownerId, cell, ref, quantity)],
    };
  }

  /**
   * Reserves every requirement or none: on the first shortfall the grants
   * made so far are cancelled.
   */
  public reserveAll(
    requirements: MaterialRequirement[],
    ownerId: string,
    scope: ReservationScope = MATERIAL_SCOPE,
  ): ReserveAllResult {
    const granted: Reservation[] = [];
    for (const requirement of requirements) {
      const result = this.findAndReserve(
        requirement.selector,
        requirement.quantity,
        ownerId,
        scope,
      );
      if (!result.success) {
        for (const reservation of granted) {
          this.cancelReservation(reservation.id);
        }
        return {
          success: false,
          reason: result.reason,
          missing: requirement,
        };
      }
      granted.push(...result.reservations);
    }
    return { success: true, reservations: granted };
  }

  private create(
    ownerId: string,
    cell: StorageCell,
    ref: ContentRef,
    quantity: number,
  ): Reservation {
    this.nextSeq++;
    const reservation: Reservation = {
      id: `res_${this.nextSeq}`,
      ownerId,
      cellKey: cell.key,
      position: clonePosition(cell.position),
      content: { ...ref },
      quantity,
      createdTick: this.clock.now,
    };
    this.track(reservation);
    this.events.publish(SchedulerEventType.RESERVATION_CREATED, {
      reservationId: reservation.id,
      ownerId,
      cellKey: cell.key,
      quantity,
    });
    return reservation;
  }

  private track(reservation: Reservation): void {
    this.active.set(reservation.id, reservation);
    let owned = this.byOwner.get(reservation.ownerId);
    if (!owned) {
      owned = new Set();
      this.byOwner.set(reservation.ownerId, owned);
    }
    owned.add(reservation.id);
    const key = this.indexKey(reservation.cellKey, reservation.content);
    this.reservedIndex.set(
      key,
      (this.reservedIndex.get(key) ?? 0) + reservation.quantity,
    );
  }

  private settle(reservation: Reservation, outcome: ReservationFailure): void {
    this.active.delete(reservation.id);
    const owned = this.byOwner.get(reservation.ownerId);
    owned?.delete(reservation.id);
    if (owned && owned.size === 0) this.byOwner.delete(reservation.ownerId);

    const key = this.indexKey(reservation.cellKey, reservation.content);
    const left = (this.reservedIndex.get(key) ?? 0) - reservation.quantity;
    if (left > 0) {
      this.reservedIndex.set(key, left);
    } else {
      this.reservedIndex.delete(key);
    }

    this.settled.set(reservation.id, outcome);
    if (this.settled.size > MAX_SETTLED_HISTORY) {
      const oldest = this.settled.keys().next();
      if (!oldest.done) this.settled.delete(oldest.value);
    }
  }

  private rejection(id: string, operation: string): ReservationFailure {
    const reason = this.settled.get(id) ?? ReservationFailure.UNKNOWN;
    logger.error(
      `Rejected ${operation} of reservation ${id}: ${reason}`,
      LogCategory.RESERVATIONS,
    );
    return reason;
  }

  /**
   * Withdraws the reserved content from its cell and returns it.
   */
  public commitReservation(id: string): CommitResult {
    const reservation = this.active.get(id);
    if (!reservation) {
      return { success: false, reason: this.rejection(id, "commit") };
    }

    const content = this.stockpiles.withdraw(
      reservation.cellKey,
      reservation.content,
      reservation.quantity,
    );
    this.settle(reservation, ReservationFailure.ALREADY_COMMITTED);

    if (!content) {
      logger.error(
        `Reservation ${id} committed against missing stock at ${reservation.cellKey}`,
        LogCategory.RESERVATIONS,
      );
      return { success: false, reason: ReservationFailure.PHYSICAL_SHORTAGE };
    }

    this.events.publish(SchedulerEventType.RESERVATION_COMMITTED, {
      reservationId: id,
      ownerId: reservation.ownerId,
    });
    return { success: true, content };
  }

  public cancelReservation(id: string): CancelResult {
    const reservation = this.active.get(id);
    if (!reservation) {
      return { success: false, reason: this.rejection(id, "cancel") };
    }

    this.settle(reservation, ReservationFailure.ALREADY_CANCELLED);
    this.events.publish(SchedulerEventType.RESERVATION_CANCELLED, {
      reservationId: id,
      ownerId: reservation.ownerId,
    });
    return { success: true };
  }

  /**
   * Cancels every active reservation of the owner. Returns how many.
   */
  public cancelAllForOwner(ownerId: string): number {
    const ids = Array.from(this.byOwner.get(ownerId) ?? []);
    for (const id of ids) {
      this.cancelReservation(id);
    }
    return ids.length;
  }

  public getByOwner(ownerId: string): Reservation[] {
    return Array.from(this.byOwner.get(ownerId) ?? []).flatMap((id) => {
      const reservation = this.active.get(id);
      return reservation ? [reservation] : [];
    });
  }

  public getReservation(id: string): Reservation | undefined {
    return this.active.get(id);
  }

  public getActive(): Reservation[] {
    return Array.from(this.active.values());
  }

  public getActiveCount(): number {
    return this.active.size;
  }

  public getStats(): { active: number; owners: number; reservedUnits: number } {
    let reservedUnits = 0;
    for (const reservation of this.active.values()) {
      reservedUnits += reservation.quantity;
    }
    return {
      active: this.active.size,
      owners: this.byOwner.size,
      reservedUnits,
    };
  }

  public snapshot(): ReservationSnapshot {
    return structuredClone({
      active: this.getActive(),
      settled: Array.from(this.settled.entries()),
      nextSeq: this.nextSeq,
    });
  }

  public restore(snapshot: ReservationSnapshot): void {
    const data = structuredClone(snapshot);
    this.active.clear();
    this.byOwner.clear();
    this.reservedIndex.clear();
    for (const reservation of data.active) {
      this.track(reservation);
    }
    this.settled = new Map(data.settled);
    this.nextSeq = data.nextSeq;
  }
}
