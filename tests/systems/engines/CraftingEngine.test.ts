import { describe, it, expect, beforeEach } from "vitest";
import { at, createTestContext, NEUTRAL_TRAITS, resource, wood, type TestContext } from "../../setup";
import { InteractionRange } from "../../../src/shared/constants/AgentEnums";
import { SchedulerEventType } from "../../../src/shared/constants/EventEnums";
import { BlockedReason, JobType } from "../../../src/shared/constants/JobEnums";
import { ProgressStatus } from "../../../src/shared/constants/ProgressEnums";
import { ResourceType } from "../../../src/shared/constants/ResourceEnums";
import { TileType } from "../../../src/shared/constants/TileTypeEnums";
import type { ExecutionEngine } from "../../../src/domain/simulation/systems/engines/ExecutionEngine";
import type { Agent } from "../../../src/shared/types/simulation/agents";
import type { Job } from "../../../src/shared/types/simulation/jobs";

describe("CraftingEngine", () => {
  let ctx: TestContext;
  let engine: ExecutionEngine;
  let agent: Agent;

  const craft = (recipeId: string, workstation: TileType): Job => {
    ctx.runner.world.setTile(at(3, 3), workstation);
    const job = ctx.runner.jobs.insert({
      type: JobType.CRAFT,
      location: at(3, 3),
      metadata: { recipeId },
    });
    if (!job) throw new Error("insert failed");
    ctx.runner.jobs.claim(job.id, agent.id);
    return job;
  };

  beforeEach(() => {
    ctx = createTestContext();
    const spawned = ctx.runner.agents.spawn({ position: at(3, 3), traits: NEUTRAL_TRAITS });
    if (!spawned) throw new Error("spawn failed");
    agent = spawned;
    const found = ctx.engines.get(JobType.CRAFT);
    if (!found) throw new Error("engine missing");
    engine = found;
  });

  it("debe trabajar sobre la estación de la receta", () => {
    const job = craft("craft_chair", TileType.WORKBENCH);

    expect(job.requiredProgress).toBe(60);
    expect(engine.interactionTarget(agent, job)).toEqual({
      position: at(3, 3),
      range: InteractionRange.EXACT,
    });
  });

  it("debe retener los insumos mientras no haya dónde guardar el producto", () => {
    const job = craft("craft_chair", TileType.WORKBENCH);
    ctx.runner.stockpiles.dropOnGround(at(5, 5), wood(4));

    expect(engine.advance(agent, job, 60)).toEqual({
      status: ProgressStatus.BLOCKED,
      reason: BlockedReason.NO_STORAGE,
    });
    expect(ctx.runner.stockpiles.getCell("5,5,0")?.resources).toEqual({
      [ResourceType.WOOD]: 4,
    });
    expect(ctx.runner.reservations.getByOwner(job.id)).toHaveLength(1);

    ctx.runner.stockpiles.createZone("Taller", [at(8, 8)]);
    ctx.runner.events.clearQueue();

    expect(engine.advance(agent, job, 1).status).toBe(ProgressStatus.COMPLETED);
    expect(ctx.runner.stockpiles.getCell("5,5,0")).toBeUndefined();
    expect(ctx.runner.stockpiles.getCell("8,8,0")?.items.map((item) => item.itemId)).toEqual([
      "chair",
    ]);
    expect(ctx.runner.events.peekQueue()).toContain(SchedulerEventType.ITEM_CRAFTED);
  });

  it("debe guardar productos que son recursos", () => {
    const job = craft("smelt_metal", TileType.STOVE);
    ctx.runner.stockpiles.dropOnGround(at(0, 0), resource(ResourceType.SCRAP, 3));
    ctx.runner.stockpiles.createZone("Metal", [at(6, 3)]);

    expect(engine.advance(agent, job, 50).status).toBe(ProgressStatus.COMPLETED);
    expect(ctx.runner.stockpiles.getCell("6,3,0")?.resources).toEqual({
      [ResourceType.METAL]: 1,
    });
  });

  it("debe invalidar el trabajo si la estación desaparece", () => {
    const job = craft("craft_chair", TileType.WORKBENCH);
    ctx.runner.world.setTile(at(3, 3), TileType.GROUND);

    expect(engine.interactionTarget(agent, job)).toBeNull();
    expect(engine.advance(agent, job, 1)).toEqual({
      status: ProgressStatus.BLOCKED,
      reason: BlockedReason.INVALID_TARGET,
    });
  });
});
