import { SCORING_WEIGHTS } from "../constants/SchedulerConstants";
import type { Position3D } from "../types/geometry";

export function positionKey(position: Position3D): string {
  return `${position.x},${position.y},${position.z}`;
}

export function parsePositionKey(key: string): Position3D | null {
  const parts = key.split(",").map(Number);
  if (parts.length !== 3 || parts.some((n) => !Number.isInteger(n))) {
    return null;
  }
  const [x, y, z] = parts;
  return { x, y, z };
}

export function samePosition(a: Position3D, b: Position3D): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

/**
 * Same level and within one tile, diagonals included.
 */
export function isAdjacent(a: Position3D, b: Position3D): boolean {
  return (
    a.z === b.z && Math.abs(a.x - b.x) <= 1 && Math.abs(a.y - b.y) <= 1
  );
}

export function manhattan2D(a: Position3D, b: Position3D): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * Manhattan distance with a fixed penalty per level crossed.
 */
export function jobDistance(a: Position3D, b: Position3D): number {
  return (
    manhattan2D(a, b) + Math.abs(a.z - b.z) * SCORING_WEIGHTS.Z_LEVEL_PENALTY
  );
}

export function clonePosition(position: Position3D): Position3D {
  return { x: position.x, y: position.y, z: position.z };
}

export function isPosition3D(value: unknown): value is Position3D {
  if (typeof value !== "object" || value === null) return false;
  return (
    "x" in value &&
    "y" in value &&
    "z" in value &&
    Number.isInteger(value.x) &&
    Number.isInteger(value.y) &&
    Number.isInteger(value.z)
  );
}

/** The eight neighbours on the same level, clockwise from north. */
export function neighbours(position: Position3D): Position3D[] {
  const offsets: Array<[number, number]> = [
    [0, -1],
    [1, -1],
    [1, 0],
    [1, 1],
    [0, 1],
    [-1, 1],
    [-1, 0],
    [-1, -1],
  ];
  return offsets.map(([dx, dy]) => ({
    x: position.x + dx,
    y: position.y + dy,
    z: position.z,
  }));
}
