import { describe, it, expect, beforeEach } from "vitest";
import { at, createTestContext, NEUTRAL_TRAITS, type TestContext } from "../../setup";
import { InteractionRange } from "../../../src/shared/constants/AgentEnums";
import { BlockedReason, JobType } from "../../../src/shared/constants/JobEnums";
import { ProgressStatus } from "../../../src/shared/constants/ProgressEnums";
import {
  ResourceNodeKind,
  ResourceType,
} from "../../../src/shared/constants/ResourceEnums";
import { TileType } from "../../../src/shared/constants/TileTypeEnums";
import type { ExecutionEngine } from "../../../src/domain/simulation/systems/engines/ExecutionEngine";
import type { Agent } from "../../../src/shared/types/simulation/agents";
import type { Job } from "../../../src/shared/types/simulation/jobs";
import type { ResourceNode } from "../../../src/shared/types/simulation/world";

describe("HarvestingEngine", () => {
  let ctx: TestContext;
  let engine: ExecutionEngine;
  let agent: Agent;

  const designated = (kind: ResourceNodeKind): { node: ResourceNode; job: Job } => {
    const node = ctx.runner.nodes.spawnNode(kind, at(4, 4));
    if (!node) throw new Error("spawn failed");
    const job = ctx.runner.nodes.designate(node.id);
    if (!job) throw new Error("designation failed");
    ctx.runner.jobs.claim(job.id, agent.id);
    return { node, job };
  };

  beforeEach(() => {
    ctx = createTestContext();
    const spawned = ctx.runner.agents.spawn({ position: at(4, 4), traits: NEUTRAL_TRAITS });
    if (!spawned) throw new Error("spawn failed");
    agent = spawned;
    const found = ctx.engines.get(JobType.HARVEST);
    if (!found) throw new Error("engine missing");
    engine = found;
  });

  it("debe servir también para el rescate de chatarra", () => {
    expect(ctx.engines.get(JobType.SALVAGE)).toBe(engine);
  });

  it("debe extraer un rendimiento por trabajo completado", () => {
    const { node, job } = designated(ResourceNodeKind.TREE);
    ctx.runner.stockpiles.createZone("Leña", [at(1, 1)]);

    expect(engine.interactionTarget(agent, job)).toEqual({
      position: at(4, 4),
      range: InteractionRange.EXACT,
    });
    expect(engine.advance(agent, job, 30).status).toBe(ProgressStatus.CONTINUING);
    expect(engine.advance(agent, job, 30).status).toBe(ProgressStatus.COMPLETED);
    expect(node.remaining).toBe(40);
    expect(ctx.runner.stockpiles.getCell("1,1,0")?.resources).toEqual({
      [ResourceType.WOOD]: 10,
    });
  });

  it("debe detenerse sin tocar el nodo si no hay almacenamiento", () => {
    const { node, job } = designated(ResourceNodeKind.TREE);

    expect(engine.advance(agent, job, 60)).toEqual({
      status: ProgressStatus.BLOCKED,
      reason: BlockedReason.NO_STORAGE,
    });
    expect(node.remaining).toBe(50);
  });

  it("debe agotar un nodo finito con el último rendimiento", () => {
    const { node, job } = designated(ResourceNodeKind.SALVAGE_PILE);
    node.remaining = 3;
    ctx.runner.stockpiles.createZone("Chatarra", [at(6, 6)]);

    expect(engine.advance(agent, job, 80).status).toBe(ProgressStatus.COMPLETED);
    expect(ctx.runner.nodes.get(node.id)).toBeUndefined();
    expect(ctx.runner.world.getTile(at(4, 4))).toBe(TileType.RUBBLE);
    expect(ctx.runner.stockpiles.getCell("6,6,0")?.resources).toEqual({
      [ResourceType.SCRAP]: 3,
    });
  });

  it("debe invalidar el trabajo de un nodo que ya no existe", () => {
    const { node, job } = designated(ResourceNodeKind.MINERAL_NODE);
    ctx.runner.nodes.extract(node.id, 75);

    expect(engine.interactionTarget(agent, job)).toBeNull();
    expect(engine.advance(agent, job, 1)).toEqual({
      status: ProgressStatus.BLOCKED,
      reason: BlockedReason.INVALID_TARGET,
    });
  });
});
