import { describe, it, expect, beforeEach } from "vitest";
import { at, createTestContext, type TestContext } from "../../setup";
import { SchedulerEventType } from "../../../src/shared/constants/EventEnums";
import { TileType } from "../../../src/shared/constants/TileTypeEnums";

describe("WorldGrid", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext({ dimensions: { width: 16, height: 16, levels: 2 } });
    ctx.runner.events.clearQueue();
  });

  it("debe tratar el exterior del mapa como roca", () => {
    const world = ctx.runner.world;
    expect(world.inBounds(at(15, 15, 1))).toBe(true);
    expect(world.inBounds(at(16, 0))).toBe(false);
    expect(world.inBounds(at(0.5, 0))).toBe(false);
    expect(world.getTile(at(-1, 0))).toBe(TileType.ROCK);
    expect(world.getTile(at(3, 3))).toBe(TileType.GROUND);
  });

  it("debe publicar los cambios de casilla y contar revisiones", () => {
    const world = ctx.runner.world;
    const before = world.revision;

    expect(world.setTile(at(2, 2), TileType.WALL)).toBe(true);
    expect(world.setTile(at(2, 2), TileType.WALL)).toBe(true);

    expect(world.revision).toBe(before + 1);
    expect(ctx.runner.events.peekQueue()).toEqual([SchedulerEventType.TILE_CHANGED]);
    expect(world.isWalkable(at(2, 2))).toBe(false);
    expect(world.setTile(at(99, 2), TileType.WALL)).toBe(false);
  });

  it("debe recordar la casilla bajo un plano", () => {
    const world = ctx.runner.world;
    world.setTile(at(1, 1), TileType.FLOOR);

    expect(world.placeBlueprint(at(1, 1))).toBe(true);
    expect(world.placeBlueprint(at(1, 1))).toBe(false);
    expect(world.clearBlueprint(at(1, 1))).toBe(true);
    expect(world.getTile(at(1, 1))).toBe(TileType.FLOOR);
    expect(world.clearBlueprint(at(1, 1))).toBe(false);
  });

  it("debe terminar un plano solo si sigue siéndolo", () => {
    const world = ctx.runner.world;
    expect(world.finishBlueprint(at(1, 1), TileType.WALL)).toBe(false);

    world.placeBlueprint(at(1, 1));
    expect(world.finishBlueprint(at(1, 1), TileType.DOOR)).toBe(true);
    expect(world.getTile(at(1, 1))).toBe(TileType.DOOR);
  });

  it("debe enlazar niveles por rampas en ambas alturas", () => {
    const world = ctx.runner.world;
    world.setTile(at(4, 4, 0), TileType.RAMP);
    world.setTile(at(4, 4, 1), TileType.RAMP);
    world.setTile(at(6, 6, 0), TileType.RAMP);

    expect(world.getRampLinks(0, 1)).toEqual([{ x: 4, y: 4 }]);
    expect(world.getRampLinks(1, 0)).toEqual([{ x: 4, y: 4 }]);
  });

  it("debe restaurar casillas y planos desde una instantánea", () => {
    const world = ctx.runner.world;
    world.setTile(at(1, 1), TileType.FLOOR);
    world.placeBlueprint(at(1, 1));
    world.setTile(at(5, 5), TileType.WATER);
    const snapshot = world.snapshot();

    const other = createTestContext().runner.world;
    other.restore(snapshot);

    expect(other.dimensions).toEqual({ width: 16, height: 16, levels: 2 });
    expect(other.getTile(at(5, 5))).toBe(TileType.WATER);
    expect(other.clearBlueprint(at(1, 1))).toBe(true);
    expect(other.getTile(at(1, 1))).toBe(TileType.FLOOR);
  });
});
