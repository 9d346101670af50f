import { describe, it, expect, beforeEach } from "vitest";
import { at, createTestContext, NEUTRAL_TRAITS, type TestContext } from "../../setup";
import { EquipmentSlot, InteractionRange } from "../../../src/shared/constants/AgentEnums";
import { BlockedReason, JobType } from "../../../src/shared/constants/JobEnums";
import { ProgressStatus } from "../../../src/shared/constants/ProgressEnums";
import { ContentKind, SelectorKind } from "../../../src/shared/constants/ResourceEnums";
import type { ExecutionEngine } from "../../../src/domain/simulation/systems/engines/ExecutionEngine";
import type { Agent } from "../../../src/shared/types/simulation/agents";
import type { Job } from "../../../src/shared/types/simulation/jobs";

describe("EquipEngine", () => {
  let ctx: TestContext;
  let engine: ExecutionEngine;
  let agent: Agent;
  let job: Job;

  const stockKnife = (): void => {
    const knife = ctx.runner.itemFactory.create("stone_knife");
    if (!knife) throw new Error("unknown item");
    ctx.runner.stockpiles.createZone("Armería", [at(3, 3)]);
    ctx.runner.stockpiles.store("3,3,0", { kind: ContentKind.ITEM, item: knife });
  };

  beforeEach(() => {
    ctx = createTestContext();
    const spawned = ctx.runner.agents.spawn({ position: at(0, 0), traits: NEUTRAL_TRAITS });
    if (!spawned) throw new Error("spawn failed");
    agent = spawned;
    const found = ctx.engines.get(JobType.EQUIP);
    if (!found) throw new Error("engine missing");
    engine = found;

    const inserted = ctx.runner.jobs.insert({
      type: JobType.EQUIP,
      location: at(0, 0),
      metadata: {
        equipSlot: EquipmentSlot.MAIN_HAND,
        assigneeId: agent.id,
        materials: [{ selector: { kind: SelectorKind.ITEM, itemId: "stone_knife" }, quantity: 1 }],
      },
    });
    if (!inserted) throw new Error("insert failed");
    job = inserted;
    ctx.runner.jobs.claim(job.id, agent.id);
  });

  it("debe ignorar a cualquier agente que no sea el asignado", () => {
    const other = ctx.runner.agents.spawn({ position: at(1, 1), traits: NEUTRAL_TRAITS });
    if (!other) throw new Error("spawn failed");

    expect(engine.interactionTarget(other, job)).toBeNull();
    expect(engine.advance(other, job, 1)).toEqual({
      status: ProgressStatus.BLOCKED,
      reason: BlockedReason.INVALID_TARGET,
    });
  });

  it("debe empezar donde está el agente y reservar en el primer paso", () => {
    stockKnife();
    expect(engine.interactionTarget(agent, job)).toEqual({
      position: at(0, 0),
      range: InteractionRange.EXACT,
    });

    expect(engine.advance(agent, job, 1)).toEqual({
      status: ProgressStatus.REPOSITION,
      target: { position: at(3, 3), range: InteractionRange.EXACT },
    });
    expect(engine.interactionTarget(agent, job)?.position).toEqual(at(3, 3));
  });

  it("debe equipar el objeto y soltar el anterior junto al agente", () => {
    stockKnife();
    engine.advance(agent, job, 1);
    const spear = ctx.runner.itemFactory.create("spear");
    if (!spear) throw new Error("unknown item");
    agent.equipment[EquipmentSlot.MAIN_HAND] = spear;
    agent.position = at(3, 3);

    expect(engine.advance(agent, job, 1).status).toBe(ProgressStatus.COMPLETED);
    expect(agent.equipment[EquipmentSlot.MAIN_HAND]?.instanceId).toBe("item_1");
    expect(ctx.runner.stockpiles.getCell("3,3,0")?.items).toEqual([]);
    expect(ctx.runner.stockpiles.getCell("2,2,0")?.items.map((item) => item.itemId)).toEqual([
      "spear",
    ]);
  });

  it("debe esperar materiales si no hay ningún objeto que encaje", () => {
    expect(engine.advance(agent, job, 1)).toEqual({
      status: ProgressStatus.BLOCKED,
      reason: BlockedReason.MISSING_MATERIALS,
    });
  });
});
