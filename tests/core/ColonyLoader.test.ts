import { describe, it, expect } from "vitest";
import { at, createTestContext } from "../setup";
import { MIN_COLONY_SIZE } from "../../src/domain/simulation/core/runner/ColonyLoader";
import { JobType } from "../../src/shared/constants/JobEnums";
import { ResourceType, SelectorKind } from "../../src/shared/constants/ResourceEnums";
import { TileType } from "../../src/shared/constants/TileTypeEnums";

describe("ColonyLoader", () => {
  it("debe montar la colonia inicial", () => {
    const { runner } = createTestContext();

    runner.loadDefaultColony();

    expect(runner.agents.getAll().map((agent) => agent.position)).toEqual([
      at(6, 6),
      at(7, 6),
      at(6, 7),
    ]);
    expect(runner.nodes.getAll()).toHaveLength(7);
    expect(runner.animals.getAll()).toHaveLength(2);
    expect(runner.world.getTile(at(8, 2))).toBe(TileType.WORKBENCH);
    expect(runner.world.getTile(at(8, 4))).toBe(TileType.STOVE);

    const [zone] = runner.stockpiles.getZones();
    expect(runner.stockpiles.getZoneCells(zone.id)).toHaveLength(12);
    expect(
      runner.stockpiles.countStored({ kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD }),
    ).toBe(20);
    expect(runner.stockpiles.getCell("7,9,0")?.resources).toEqual({
      [ResourceType.SCRAP]: 5,
    });
  });

  it("debe abrir los trabajos designados y la orden de fabricación", () => {
    const { runner } = createTestContext();
    runner.loadDefaultColony();

    expect(runner.jobs.getAll().map((job) => job.type)).toEqual([
      JobType.HARVEST,
      JobType.HARVEST,
      JobType.SALVAGE,
    ]);
    expect(runner.craftOrders.get("order_1")?.remaining).toBe(2);

    runner.tick();

    expect(runner.craftOrders.get("order_1")?.activeJobId).toBe("job_4");
    expect(runner.jobs.get("job_4")?.type).toBe(JobType.CRAFT);
  });

  it("debe añadir rampas y un nodo más con dos niveles", () => {
    const { runner } = createTestContext({ dimensions: { width: 16, height: 16, levels: 2 } });

    runner.loadDefaultColony();

    expect(runner.world.getTile(at(14, 14, 0))).toBe(TileType.RAMP);
    expect(runner.world.getTile(at(14, 14, 1))).toBe(TileType.RAMP);
    expect(runner.nodes.getAll()).toHaveLength(8);
    expect(runner.nodes.getAt(at(5, 5, 1))).toBeDefined();
  });

  it("debe rechazar mundos más pequeños que la colonia", () => {
    const { runner } = createTestContext({
      dimensions: { width: MIN_COLONY_SIZE - 4, height: MIN_COLONY_SIZE, levels: 1 },
    });

    expect(() => runner.loadDefaultColony()).toThrow("Starter colony needs at least 16x16 tiles, got 12x16");
    expect(runner.agents.size).toBe(0);
  });
});
