import type { EquipmentSlot } from "../../constants/AgentEnums";
import type {
  ItemFilterCategory,
  ResourceType,
} from "../../constants/ResourceEnums";
import type { MaterialRequirement, OutputSpec } from "./stockpiles";

/**
 * Catalog entry of a discrete item kind.
 */
export interface ItemDefinition {
  id: string;
  name: string;
  tags: string[];
  filterCategory: ItemFilterCategory;
  slot?: EquipmentSlot;
  /** Hunger relief when eaten. */
  nutrition?: number;
}

/**
 * Catalog entry of a fungible resource.
 */
export interface ResourceDefinition {
  id: ResourceType;
  name: string;
  tags: string[];
  nutrition?: number;
}

/**
 * One concrete item in the world. Tags are copied from the catalog at
 * creation time.
 */
export interface ItemInstance {
  instanceId: string;
  itemId: string;
  tags: string[];
  filterCategory: ItemFilterCategory;
}

export interface Recipe {
  id: string;
  name: string;
  category: string;
  inputs: MaterialRequirement[];
  outputs: OutputSpec[];
  work: number;
  /** Tile the crafter must stand on. */
  workstation?: string;
}
