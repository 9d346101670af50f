import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import {
  BLOCKING_TILES,
  TileType,
} from "../../../../shared/constants/TileTypeEnums";
import type { Position3D } from "../../../../shared/types/geometry";
import type {
  WorldDimensions,
  WorldGridSnapshot,
} from "../../../../shared/types/simulation/world";
import { positionKey } from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";

/**
 * Tile grid over several levels. Unset tiles are ground.
 */
@injectable()
export class WorldGrid {
  private tiles = new Map<string, TileType>();
  private underlying = new Map<string, TileType>();
  private dims: WorldDimensions;
  private changeCount = 0;

  constructor(
    @inject(TYPES.WorldDimensions) dimensions: WorldDimensions,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {
    this.dims = { ...dimensions };
  }

  public get dimensions(): WorldDimensions {
    return { ...this.dims };
  }

  /** Bumped on every tile change; route caches key on it. */
  public get revision(): number {
    return this.changeCount;
  }

  public inBounds(position: Position3D): boolean {
    return (
      Number.isInteger(position.x) &&
      Number.isInteger(position.y) &&
      Number.isInteger(position.z) &&
      position.x >= 0 &&
      position.y >= 0 &&
      position.z >= 0 &&
      position.x < this.dims.width &&
      position.y < this.dims.height &&
      position.z < this.dims.levels
    );
  }

  public getTile(position: Position3D): TileType {
    if (!this.inBounds(position)) return TileType.ROCK;
    return this.tiles.get(positionKey(position)) ?? TileType.GROUND;
  }

  public setTile(position: Position3D, tile: TileType): boolean {
    if (!this.inBounds(position)) return false;
    const from = this.getTile(position);
    if (from === tile) return true;

    const key = positionKey(position);
    if (tile === TileType.GROUND) {
      this.tiles.delete(key);
    } else {
      this.tiles.set(key, tile);
    }
    this.changeCount++;
    this.events.publish(SchedulerEventType.TILE_CHANGED, {
      position: { ...position },
      from,
      to: tile,
    });
    return true;
  }

  public isWalkable(position: Position3D): boolean {
    return this.inBounds(position) && !BLOCKING_TILES.has(this.getTile(position));
  }

  /**
   * Turns the tile into a blueprint, remembering what was there.
   */
  public placeBlueprint(position: Position3D): boolean {
    const current = this.getTile(position);
    if (!this.inBounds(position) || current === TileType.BLUEPRINT) {
      return false;
    }
    this.underlying.set(positionKey(position), current);
    return this.setTile(position, TileType.BLUEPRINT);
  }

  /** Restores the tile a blueprint replaced. */
  public clearBlueprint(position: Position3D): boolean {
    if (this.getTile(position) !== TileType.BLUEPRINT) return false;
    const key = positionKey(position);
    const previous = this.underlying.get(key) ?? TileType.GROUND;
    this.underlying.delete(key);
    return this.setTile(position, previous);
  }

  public finishBlueprint(position: Position3D, tile: TileType): boolean {
    if (this.getTile(position) !== TileType.BLUEPRINT) return false;
    this.underlying.delete(positionKey(position));
    return this.setTile(position, tile);
  }

  /**
   * Columns with a ramp on both levels.
   */
  public getRampLinks(z: number, otherZ: number): Array<{ x: number; y: number }> {
    const links: Array<{ x: number; y: number }> = [];
    for (const [key, tile] of this.tiles) {
      if (tile !== TileType.RAMP) continue;
      const [x, y, level] = key.split(",").map(Number);
      if (level !== z) continue;
      if (this.getTile({ x, y, z: otherZ }) === TileType.RAMP) {
        links.push({ x, y });
      }
    }
    return links;
  }

  public snapshot(): WorldGridSnapshot {
    return {
      dimensions: { ...this.dims },
      tiles: Array.from(this.tiles.entries()),
      underlying: Array.from(this.underlying.entries()),
    };
  }

  public restore(snapshot: WorldGridSnapshot): void {
    this.dims = { ...snapshot.dimensions };
    this.tiles = new Map(snapshot.tiles);
    this.underlying = new Map(snapshot.underlying);
    this.changeCount++;
  }
}
