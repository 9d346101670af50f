import type { Position3D } from "../../../shared/types/geometry";

/**
 * Limits on the levels a route may cross.
 */
export interface ZConstraints {
  allowedLevels?: number[];
}

export type RouteResult =
  | { success: true; path: Position3D[] }
  | { success: false; reason: string };

/**
 * Route provider. `path` excludes the start tile and ends on `to`.
 */
export interface Pathfinder {
  findRoute(
    from: Position3D,
    to: Position3D,
    zConstraints?: ZConstraints,
  ): RouteResult;
  isWalkable(position: Position3D): boolean;
}
