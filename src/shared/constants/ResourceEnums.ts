/**
 * Resource and stockpile content enumerations.
 *
 * @module shared/constants/ResourceEnums
 */

/**
 * Fungible resources. Stored per unit in stockpile cells.
 */
export enum ResourceType {
  WOOD = "wood",
  MINERAL = "mineral",
  SCRAP = "scrap",
  METAL = "metal",
  FIBER = "fiber",
  RAW_FOOD = "raw_food",
  COOKED_MEAL = "cooked_meal",
}

/**
 * Filter categories of discrete items. Zone filters use these keys next to
 * the resource types.
 */
export enum ItemFilterCategory {
  EQUIPMENT = "equipment",
  CORPSE = "corpse",
  MEAT = "meat",
  FURNITURE = "furniture",
  COMPONENT = "component",
}

/**
 * Discriminant of stored content and content references.
 */
export enum ContentKind {
  RESOURCE = "resource",
  ITEM = "item",
}

/**
 * Discriminant of material selectors.
 */
export enum SelectorKind {
  RESOURCE = "resource",
  ITEM = "item",
  TAGS = "tags",
}

/**
 * Harvestable and salvageable node kinds placed in the world.
 */
export enum ResourceNodeKind {
  TREE = "tree",
  FOOD_PLANT = "food_plant",
  MINERAL_NODE = "mineral_node",
  SALVAGE_PILE = "salvage_pile",
}

/**
 * Huntable species.
 */
export enum AnimalSpecies {
  DEER = "deer",
  BOAR = "boar",
  RABBIT = "rabbit",
}

export const ALL_RESOURCE_TYPES: readonly ResourceType[] =
  Object.values(ResourceType);

export function isResourceType(value: unknown): value is ResourceType {
  return ALL_RESOURCE_TYPES.some((type) => type === value);
}

export function isItemFilterCategory(
  value: unknown,
): value is ItemFilterCategory {
  return Object.values(ItemFilterCategory).some((cat) => cat === value);
}
