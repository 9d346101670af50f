import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { CraftOrderMode } from "../../../../shared/constants/CommandEnums";
import {
  AnimalSpecies,
  ContentKind,
  ResourceNodeKind,
  ResourceType,
} from "../../../../shared/constants/ResourceEnums";
import { TileType } from "../../../../shared/constants/TileTypeEnums";
import type { Position3D } from "../../../../shared/types/geometry";
import { positionKey } from "../../../../shared/utils/geometry";
import type { SimulationRunner } from "../SimulationRunner";

/** Smallest grid the starter layout fits on. */
export const MIN_COLONY_SIZE = 16;

const at = (x: number, y: number, z = 0): Position3D => ({ x, y, z });

const STOCKPILE_AREA = { x: 2, y: 2, width: 4, height: 3 };

const STARTING_STOCK: Array<{ cell: Position3D; resource: ResourceType; quantity: number }> = [
  { cell: at(2, 2), resource: ResourceType.WOOD, quantity: 20 },
  { cell: at(3, 2), resource: ResourceType.COOKED_MEAL, quantity: 8 },
  { cell: at(4, 2), resource: ResourceType.FIBER, quantity: 6 },
  { cell: at(5, 2), resource: ResourceType.MINERAL, quantity: 5 },
];

const NODES: Array<{ kind: ResourceNodeKind; position: Position3D; designate?: boolean }> = [
  { kind: ResourceNodeKind.TREE, position: at(10, 8), designate: true },
  { kind: ResourceNodeKind.TREE, position: at(11, 8) },
  { kind: ResourceNodeKind.TREE, position: at(12, 9) },
  { kind: ResourceNodeKind.FOOD_PLANT, position: at(3, 10), designate: true },
  { kind: ResourceNodeKind.FOOD_PLANT, position: at(4, 10) },
  { kind: ResourceNodeKind.MINERAL_NODE, position: at(13, 3) },
  { kind: ResourceNodeKind.SALVAGE_PILE, position: at(12, 12), designate: true },
];

/**
 * Builds the starter colony on an empty grid: one stockpile with some
 * stock, a workbench and a stove, resource nodes, game animals, three
 * colonists and a first craft order. The layout is fixed, so the same seed
 * always yields the same colony.
 */
export class ColonyLoader {
  constructor(private readonly runner: SimulationRunner) {}

  public loadDefault(): void {
    const r = this.runner;
    const { width, height, levels } = r.world.dimensions;
    if (width < MIN_COLONY_SIZE || height < MIN_COLONY_SIZE) {
      throw new Error(
        `Starter colony needs at least ${MIN_COLONY_SIZE}x${MIN_COLONY_SIZE} tiles, got ${width}x${height}`,
      );
    }

    const workbench = at(8, 2);
    const stove = at(8, 4);
    r.world.setTile(workbench, TileType.WORKBENCH);
    r.world.setTile(stove, TileType.STOVE);

    const cells: Position3D[] = [];
    for (let dy = 0; dy < STOCKPILE_AREA.height; dy++) {
      for (let dx = 0; dx < STOCKPILE_AREA.width; dx++) {
        cells.push(at(STOCKPILE_AREA.x + dx, STOCKPILE_AREA.y + dy));
      }
    }
    const zone = r.stockpiles.createZone("Main stockpile", cells);
    if (zone) {
      for (const stock of STARTING_STOCK) {
        r.stockpiles.store(positionKey(stock.cell), {
          kind: ContentKind.RESOURCE,
          resource: stock.resource,
          quantity: stock.quantity,
        });
      }
    }
    r.stockpiles.dropOnGround(at(7, 9), {
      kind: ContentKind.RESOURCE,
      resource: ResourceType.SCRAP,
      quantity: 5,
    });

    for (const entry of NODES) {
      const node = r.nodes.spawnNode(entry.kind, entry.position);
      if (node && entry.designate) r.nodes.designate(node.id);
    }

    if (levels > 1) {
      r.world.setTile(at(14, 14, 0), TileType.RAMP);
      r.world.setTile(at(14, 14, 1), TileType.RAMP);
      r.nodes.spawnNode(ResourceNodeKind.MINERAL_NODE, at(5, 5, 1));
    }

    r.animals.spawn(AnimalSpecies.DEER, at(6, 13));
    r.animals.spawn(AnimalSpecies.RABBIT, at(9, 14));

    for (const position of [at(6, 6), at(7, 6), at(6, 7)]) {
      r.agents.spawn({ position });
    }

    r.craftOrders.addOrder({
      recipeId: "craft_work_gloves",
      workstation: workbench,
      mode: CraftOrderMode.REPEAT,
      count: 2,
    });

    r.events.flushEvents();
    logger.info(
      `Starter colony loaded on ${width}x${height}x${levels}: ${r.agents.size} agents, ${r.nodes.getAll().length} nodes`,
      LogCategory.WORLD,
    );
  }
}
