/**
 * Tile type enumerations for the colony grid.
 *
 * @module shared/constants/TileTypeEnums
 */
export enum TileType {
  GROUND = "ground",
  FLOOR = "floor",
  WALL = "wall",
  DOOR = "door",
  WATER = "water",
  ROCK = "rock",
  RAMP = "ramp",
  BLUEPRINT = "blueprint",
  WORKBENCH = "workbench",
  STOVE = "stove",
  TREE = "tree",
  STUMP = "stump",
  FOOD_PLANT = "food_plant",
  BARE_PLANT = "bare_plant",
  MINERAL_NODE = "mineral_node",
  QUARRIED = "quarried",
  SALVAGE_PILE = "salvage_pile",
  RUBBLE = "rubble",
}

/**
 * Tiles agents cannot stand on.
 */
export const BLOCKING_TILES: ReadonlySet<TileType> = new Set([
  TileType.WALL,
  TileType.WATER,
  TileType.ROCK,
]);

export function isTileType(value: unknown): value is TileType {
  return Object.values(TileType).some((tile) => tile === value);
}
