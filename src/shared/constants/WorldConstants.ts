/**
 * Resource node and animal definitions.
 *
 * @module shared/constants/WorldConstants
 */
import { JobType } from "./JobEnums";
import {
  AnimalSpecies,
  ResourceNodeKind,
  ResourceType,
} from "./ResourceEnums";
import { TileType } from "./TileTypeEnums";

export interface ResourceNodeDefinition {
  resource: ResourceType;
  maxYield: number;
  yieldPerHarvest: number;
  /** 0 for finite nodes. */
  regrowTicks: number;
  tile: TileType;
  depletedTile: TileType;
  jobType: JobType.HARVEST | JobType.SALVAGE;
}

export const NODE_DEFINITIONS: Record<ResourceNodeKind, ResourceNodeDefinition> =
  {
    [ResourceNodeKind.TREE]: {
      resource: ResourceType.WOOD,
      maxYield: 50,
      yieldPerHarvest: 10,
      regrowTicks: 600,
      tile: TileType.TREE,
      depletedTile: TileType.STUMP,
      jobType: JobType.HARVEST,
    },
    [ResourceNodeKind.FOOD_PLANT]: {
      resource: ResourceType.RAW_FOOD,
      maxYield: 20,
      yieldPerHarvest: 5,
      regrowTicks: 800,
      tile: TileType.FOOD_PLANT,
      depletedTile: TileType.BARE_PLANT,
      jobType: JobType.HARVEST,
    },
    [ResourceNodeKind.MINERAL_NODE]: {
      resource: ResourceType.MINERAL,
      maxYield: 75,
      yieldPerHarvest: 15,
      regrowTicks: 0,
      tile: TileType.MINERAL_NODE,
      depletedTile: TileType.QUARRIED,
      jobType: JobType.HARVEST,
    },
    [ResourceNodeKind.SALVAGE_PILE]: {
      resource: ResourceType.SCRAP,
      maxYield: 12,
      yieldPerHarvest: 4,
      regrowTicks: 0,
      tile: TileType.SALVAGE_PILE,
      depletedTile: TileType.RUBBLE,
      jobType: JobType.SALVAGE,
    },
  };

export interface AnimalDefinition {
  maxHealth: number;
  corpseItemId: string;
}

export const ANIMAL_DEFINITIONS: Record<AnimalSpecies, AnimalDefinition> = {
  [AnimalSpecies.DEER]: { maxHealth: 30, corpseItemId: "deer_corpse" },
  [AnimalSpecies.BOAR]: { maxHealth: 45, corpseItemId: "boar_corpse" },
  [AnimalSpecies.RABBIT]: { maxHealth: 10, corpseItemId: "rabbit_corpse" },
};
