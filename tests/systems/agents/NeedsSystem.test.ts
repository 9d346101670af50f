import { describe, it, expect, beforeEach } from "vitest";
import { at, createTestContext, NEUTRAL_TRAITS, resource, type TestContext } from "../../setup";
import { ContentKind, ResourceType } from "../../../src/shared/constants/ResourceEnums";
import { SchedulerEventType } from "../../../src/shared/constants/EventEnums";
import type { Agent } from "../../../src/shared/types/simulation/agents";

describe("NeedsSystem", () => {
  let ctx: TestContext;
  let agent: Agent;

  beforeEach(() => {
    ctx = createTestContext();
    const spawned = ctx.runner.agents.spawn({ position: at(0, 0), traits: NEUTRAL_TRAITS });
    if (!spawned) throw new Error("spawn failed");
    agent = spawned;
  });

  describe("update", () => {
    it("debe subir el hambre cada tick y el cansancio solo al trabajar", () => {
      ctx.needs.update(agent, true);
      expect(agent.needs.hunger).toBeCloseTo(0.01);
      expect(agent.needs.fatigue).toBeCloseTo(0.02);

      ctx.needs.update(agent, false);
      expect(agent.needs.hunger).toBeCloseTo(0.02);
      expect(agent.needs.fatigue).toBe(0);
    });

    it("debe dañar la salud con el hambre al máximo", () => {
      agent.needs.hunger = 100;

      expect(ctx.needs.update(agent, false)).toBe(true);
      expect(agent.needs.hunger).toBe(100);
      expect(agent.health).toBeCloseTo(99.95);
    });

    it("debe informar la muerte cuando la salud llega a cero", () => {
      agent.needs.hunger = 100;
      agent.health = 0.05;

      expect(ctx.needs.update(agent, false)).toBe(false);
      expect(agent.health).toBe(0);
    });
  });

  it("debe considerar hambriento desde el umbral", () => {
    agent.needs.hunger = 69.9;
    expect(ctx.needs.isHungry(agent)).toBe(false);
    agent.needs.hunger = 70;
    expect(ctx.needs.isHungry(agent)).toBe(true);
  });

  it("debe reducir el trabajo con el cansancio alto", () => {
    agent.needs.fatigue = 79;
    expect(ctx.needs.workMultiplier(agent)).toBe(1);
    agent.needs.fatigue = 80;
    expect(ctx.needs.workMultiplier(agent)).toBe(0.5);
  });

  describe("eat", () => {
    it("debe aliviar el hambre según la nutrición del recurso", () => {
      agent.needs.hunger = 90;
      ctx.runner.events.clearQueue();

      ctx.needs.eat(agent, resource(ResourceType.COOKED_MEAL, 1));

      expect(agent.needs.hunger).toBe(20);
      expect(ctx.runner.events.peekQueue()).toEqual([SchedulerEventType.AGENT_ATE]);
    });

    it("debe usar el alivio por defecto y no bajar de cero", () => {
      const meat = ctx.runner.itemFactory.create("raw_meat");
      if (!meat) throw new Error("unknown item");
      agent.needs.hunger = 50;

      ctx.needs.eat(agent, { kind: ContentKind.ITEM, item: meat });

      expect(agent.needs.hunger).toBe(0);
    });
  });
});
