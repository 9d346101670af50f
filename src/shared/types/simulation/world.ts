import type {
  AnimalSpecies,
  ResourceNodeKind,
  ResourceType,
} from "../../constants/ResourceEnums";
import type { TileType } from "../../constants/TileTypeEnums";
import type { Position3D } from "../geometry";

export interface WorldDimensions {
  width: number;
  height: number;
  levels: number;
}

export interface WorldGridSnapshot {
  dimensions: WorldDimensions;
  /** Only tiles that differ from ground. */
  tiles: Array<[string, TileType]>;
  /** Tile a blueprint replaced, restored on demolish. */
  underlying: Array<[string, TileType]>;
}

export interface ResourceNode {
  id: string;
  kind: ResourceNodeKind;
  position: Position3D;
  resource: ResourceType;
  remaining: number;
  maxYield: number;
  yieldPerHarvest: number;
  /** 0 for finite nodes. */
  regrowTicks: number;
  regrowAtTick: number | null;
  designated: boolean;
}

export interface ResourceNodeSnapshot {
  nodes: ResourceNode[];
  nextSeq: number;
}

export interface Animal {
  id: string;
  species: AnimalSpecies;
  position: Position3D;
  health: number;
  maxHealth: number;
  alive: boolean;
  corpseItemId: string;
}

export interface AnimalSnapshot {
  animals: Animal[];
  nextSeq: number;
}
