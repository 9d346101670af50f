import type {
  ContentKind,
  ItemFilterCategory,
  ResourceType,
  SelectorKind,
} from "../../constants/ResourceEnums";
import type {
  ReservationFailure,
  StoreFailure,
} from "../../constants/StockpileEnums";
import type { Position3D } from "../geometry";
import type { ItemInstance } from "./items";

/** Keys a zone filter can allow or deny. */
export type FilterKey = ResourceType | ItemFilterCategory;

/** Missing key means allowed. */
export type ZoneFilters = Partial<Record<FilterKey, boolean>>;

/**
 * What a consumer asks for: an exact resource, an exact item definition,
 * or any content whose tags are a superset of `tags`.
 */
export type MaterialSelector =
  | { kind: SelectorKind.RESOURCE; resource: ResourceType }
  | { kind: SelectorKind.ITEM; itemId: string }
  | { kind: SelectorKind.TAGS; tags: string[] };

export interface MaterialRequirement {
  selector: MaterialSelector;
  quantity: number;
}

/**
 * Reference to content inside a cell.
 */
export type ContentRef =
  | { kind: ContentKind.RESOURCE; resource: ResourceType }
  | { kind: ContentKind.ITEM; instanceId: string };

/**
 * Physical content moving between cells, agents and the ground.
 */
export type StorableContent =
  | { kind: ContentKind.RESOURCE; resource: ResourceType; quantity: number }
  | { kind: ContentKind.ITEM; item: ItemInstance };

/**
 * Content that does not exist yet (crafting, harvest yield) but needs a
 * storage destination.
 */
export type OutputSpec =
  | { kind: ContentKind.RESOURCE; resource: ResourceType; quantity: number }
  | { kind: ContentKind.ITEM; itemId: string; quantity: number };

export interface StockpileZone {
  id: string;
  name: string;
  cellKeys: string[];
  filters: ZoneFilters;
  pendingRemoval: boolean;
  createdTick: number;
}

export interface StorageCell {
  key: string;
  position: Position3D;
  /** `null` for loose ground piles. */
  zoneId: string | null;
  capacity: number;
  resources: Partial<Record<ResourceType, number>>;
  items: ItemInstance[];
  /** Content keys flagged as violating the zone filter. */
  misplaced: string[];
}

export type StoreResult =
  | { success: true; cellKey: string }
  | { success: false; reason: StoreFailure };

/** One step of a multi-cell storage plan. */
export interface StoragePlacement {
  cellKey: string;
  output: OutputSpec;
}

export interface MisplacedContent {
  cellKey: string;
  position: Position3D;
  zoneId: string;
  content: ContentRef;
  quantity: number;
}

export interface LooseContent {
  cellKey: string;
  position: Position3D;
  content: ContentRef;
  quantity: number;
}

/**
 * Query scope for reservations.
 */
export interface ReservationScope {
  z?: number;
  zoneIds?: string[];
  /** Sort candidate cells by distance from here. */
  near?: Position3D;
  includeGround?: boolean;
}

export interface Reservation {
  id: string;
  ownerId: string;
  cellKey: string;
  position: Position3D;
  content: ContentRef;
  quantity: number;
  createdTick: number;
}

export type ReserveResult =
  | { success: true; reservations: Reservation[] }
  | { success: false; reason: ReservationFailure; available: number };

export type ReserveAllResult =
  | { success: true; reservations: Reservation[] }
  | {
      success: false;
      reason: ReservationFailure;
      missing: MaterialRequirement;
    };

export type CommitResult =
  | { success: true; content: StorableContent }
  | { success: false; reason: ReservationFailure };

export type CancelResult =
  | { success: true }
  | { success: false; reason: ReservationFailure };

export interface StockpileSnapshot {
  zones: StockpileZone[];
  cells: StorageCell[];
  nextZoneSeq: number;
}

export interface ReservationSnapshot {
  active: Reservation[];
  settled: Array<[string, ReservationFailure]>;
  nextSeq: number;
}
