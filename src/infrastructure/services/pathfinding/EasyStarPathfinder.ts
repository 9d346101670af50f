import EasyStar from "easystarjs";
import { inject, injectable } from "inversify";
import { TYPES } from "../../../config/Types";
import type {
  Pathfinder,
  RouteResult,
  ZConstraints,
} from "../../../domain/simulation/ports/Pathfinder";
import { WorldGrid } from "../../../domain/simulation/systems/world/WorldGrid";
import type { Position3D } from "../../../shared/types/geometry";
import { manhattan2D, samePosition } from "../../../shared/utils/geometry";
import { logger } from "../../utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";

const WALKABLE = 0;
const BLOCKED = 1;

interface LevelGrid {
  revision: number;
  cells: number[][];
}

/**
 * A* over the world grid, one EasyStar grid per level.
 *
 * Levels connect through ramps: a ramp tile with another ramp straight above
 * or below it. Routes across levels are stitched from per-level searches.
 */
@injectable()
export class EasyStarPathfinder implements Pathfinder {
  private readonly finder = new EasyStar.js();
  private readonly grids = new Map<number, LevelGrid>();

  constructor(@inject(TYPES.WorldGrid) private readonly world: WorldGrid) {
    this.finder.enableSync();
    this.finder.enableDiagonals();
    this.finder.disableCornerCutting();
    this.finder.setAcceptableTiles([WALKABLE]);
  }

  public isWalkable(position: Position3D): boolean {
    return this.world.isWalkable(position);
  }

  public findRoute(
    from: Position3D,
    to: Position3D,
    zConstraints: ZConstraints = {},
  ): RouteResult {
    if (!this.world.inBounds(from) || !this.world.inBounds(to)) {
      return { success: false, reason: "out of bounds" };
    }
    if (!this.world.isWalkable(to)) {
      return { success: false, reason: "destination blocked" };
    }
    if (samePosition(from, to)) return { success: true, path: [] };

    const allowed = zConstraints.allowedLevels;
    if (allowed && (!allowed.includes(from.z) || !allowed.includes(to.z))) {
      return { success: false, reason: "level not allowed" };
    }

    const path = this.route(from, to, allowed, new Set([from.z]));
    if (!path) {
      logger.debug(
        `No route ${from.x},${from.y},${from.z} -> ${to.x},${to.y},${to.z}`,
        LogCategory.MOVEMENT,
      );
      return { success: false, reason: "no route" };
    }
    return { success: true, path };
  }

  private route(
    from: Position3D,
    to: Position3D,
    allowed: number[] | undefined,
    visited: Set<number>,
  ): Position3D[] | null {
    if (from.z === to.z) return this.searchLevel(from, to);

    const step = to.z > from.z ? 1 : -1;
    const nextZ = from.z + step;
    if (visited.has(nextZ) || (allowed && !allowed.includes(nextZ))) {
      return null;
    }

    const ramps = this.world
      .getRampLinks(from.z, nextZ)
      .sort(
        (a, b) =>
          manhattan2D(from, { ...a, z: from.z }) -
          manhattan2D(from, { ...b, z: from.z }),
      );

    for (const ramp of ramps) {
      const bottom = { x: ramp.x, y: ramp.y, z: from.z };
      const top = { x: ramp.x, y: ramp.y, z: nextZ };
      const toRamp = samePosition(from, bottom) ? [] : this.searchLevel(from, bottom);
      if (!toRamp) continue;

      const rest = this.route(top, to, allowed, new Set([...visited, nextZ]));
      if (rest) return [...toRamp, top, ...rest];
    }
    return null;
  }

  /**
   * Same-level search. The start tile is not part of the result.
   */
  private searchLevel(from: Position3D, to: Position3D): Position3D[] | null {
    this.finder.setGrid(this.gridFor(from.z));

    const result: { path: Array<{ x: number; y: number }> | null } = {
      path: null,
    };
    this.finder.findPath(from.x, from.y, to.x, to.y, (path) => {
      result.path = path;
    });
    this.finder.calculate();

    if (!result.path) return null;
    return result.path.slice(1).map((point) => ({
      x: point.x,
      y: point.y,
      z: from.z,
    }));
  }

  private gridFor(z: number): number[][] {
    const revision = this.world.revision;
    const cached = this.grids.get(z);
    if (cached && cached.revision === revision) return cached.cells;

    const { width, height } = this.world.dimensions;
    const cells: number[][] = [];
    for (let y = 0; y < height; y++) {
      const row: number[] = [];
      for (let x = 0; x < width; x++) {
        row.push(this.world.isWalkable({ x, y, z }) ? WALKABLE : BLOCKED);
      }
      cells.push(row);
    }
    this.grids.set(z, { revision, cells });
    return cells;
  }
}
