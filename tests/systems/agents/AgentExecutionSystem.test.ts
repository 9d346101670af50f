import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { at, createTestContext, NEUTRAL_TRAITS, resource, wood, type TestContext } from "../../setup";
import { logger } from "../../../src/infrastructure/utils/logger";
import { AgentState } from "../../../src/shared/constants/AgentEnums";
import { SchedulerEventType } from "../../../src/shared/constants/EventEnums";
import {
  AbandonReason,
  BlockedReason,
  CancelOutcome,
  JobStatus,
  JobType,
} from "../../../src/shared/constants/JobEnums";
import {
  AnimalSpecies,
  ResourceType,
  SelectorKind,
} from "../../../src/shared/constants/ResourceEnums";
import { TileType } from "../../../src/shared/constants/TileTypeEnums";
import type { Agent, AgentSpawnParams } from "../../../src/shared/types/simulation/agents";
import type { Position3D } from "../../../src/shared/types/geometry";
import {
  MEAL_SELECTOR,
  mealOwnerId,
} from "../../../src/domain/simulation/systems/agents/AgentExecutionSystem";

describe("AgentExecutionSystem", () => {
  let ctx: TestContext;

  const spawn = (position: Position3D, extra: Partial<AgentSpawnParams> = {}): Agent => {
    const agent = ctx.runner.agents.spawn({ position, traits: NEUTRAL_TRAITS, ...extra });
    if (!agent) throw new Error("spawn failed");
    return agent;
  };

  const blueprint = (position: Position3D, work = 3, materials?: { quantity: number }) =>
    ctx.runner.construction.designate({
      position,
      finishedTile: TileType.WALL,
      work,
      materials: materials
        ? [
            {
              selector: { kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD },
              quantity: materials.quantity,
            },
          ]
        : undefined,
    });

  const update = (agent: Agent, times = 1) => {
    for (let i = 0; i < times; i++) ctx.runner.execution.updateAgent(agent);
  };

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("debe exportar el selector de comida y el dueño de su reserva", () => {
    expect(MEAL_SELECTOR).toEqual({ kind: SelectorKind.TAGS, tags: ["edible"] });
    expect(mealOwnerId("agent_1")).toBe("agent:agent_1:meal");
  });

  describe("ciclo completo", () => {
    it("debe reclamar, moverse, trabajar y completar una construcción", () => {
      const agent = spawn(at(0, 0));
      blueprint(at(2, 0));

      update(agent);
      expect(agent.state).toBe(AgentState.MOVING);
      expect(agent.currentJobId).toBe("job_1");

      update(agent, 2);
      expect(agent.position).toEqual(at(2, 0));
      expect(agent.state).toBe(AgentState.EXECUTING);

      update(agent, 2);
      expect(ctx.runner.jobs.get("job_1")?.accumulatedProgress).toBe(2);
      expect(ctx.runner.jobs.get("job_1")?.status).toBe(JobStatus.IN_PROGRESS);

      update(agent);
      expect(ctx.runner.world.getTile(at(2, 0))).toBe(TileType.WALL);
      expect(ctx.runner.jobs.get("job_1")).toBeUndefined();
      expect(ctx.runner.jobs.getStats().completed).toBe(1);
      expect(agent.state).toBe(AgentState.IDLE);
      expect(agent.currentJobId).toBeNull();
    });

    it("debe ejecutar sin moverse si ya está en rango", () => {
      const agent = spawn(at(4, 4));
      blueprint(at(4, 4));

      update(agent);
      expect(agent.state).toBe(AgentState.EXECUTING);
    });

    it("debe quedar inactivo sin trabajos disponibles", () => {
      const agent = spawn(at(0, 0));
      update(agent);
      expect(agent.state).toBe(AgentState.IDLE);
    });

    it("debe resolver la carrera por un trabajo según el orden de aparición", () => {
      const first = spawn(at(9, 9));
      const second = spawn(at(3, 3));
      blueprint(at(3, 3));

      ctx.runner.execution.update();

      expect(ctx.runner.jobs.get("job_1")?.claimant).toBe(first.id);
      expect(second.state).toBe(AgentState.IDLE);
    });
  });

  describe("abandono", () => {
    it("debe devolver el trabajo con enfriamiento si no hay ruta", () => {
      const agent = spawn(at(0, 0));
      blueprint(at(3, 0));
      ctx.pathfinder.block(at(2, 0));
      ctx.runner.events.clearQueue();

      update(agent);

      const job = ctx.runner.jobs.get("job_1");
      expect(agent.state).toBe(AgentState.IDLE);
      expect(job?.claimant).toBeNull();
      expect(job?.cooldownUntilTick).toBe(60);
      expect(ctx.runner.events.peekQueue()).toContain(SchedulerEventType.JOB_ABANDONED);
    });

    it("debe eliminar un trabajo cancelado mientras se mueve", () => {
      const agent = spawn(at(0, 0));
      blueprint(at(3, 0));
      update(agent);

      expect(ctx.runner.jobs.cancel("job_1")).toBe(CancelOutcome.REQUESTED);
      update(agent);

      expect(ctx.runner.jobs.get("job_1")).toBeUndefined();
      expect(agent.state).toBe(AgentState.IDLE);
      expect(agent.moveTarget).toBeNull();
    });

    it("debe eliminar un trabajo cuyo objetivo ya no existe", () => {
      const agent = spawn(at(0, 0));
      ctx.runner.jobs.insert({
        type: JobType.BUILD,
        location: at(1, 0),
        metadata: { finishedTile: TileType.WALL },
      });

      update(agent);

      expect(ctx.runner.jobs.size).toBe(0);
      expect(ctx.runner.jobs.getStats().abandoned).toBe(1);
      expect(agent.state).toBe(AgentState.IDLE);
    });

    it("debe soltar un trabajo cuyo reclamo perdió", () => {
      const agent = spawn(at(0, 0));
      blueprint(at(3, 0));
      update(agent);
      ctx.runner.jobs.release("job_1", agent.id);

      update(agent);

      expect(agent.currentJobId).toBeNull();
      expect(agent.state).toBe(AgentState.IDLE);
      expect(ctx.runner.jobs.get("job_1")?.claimant).toBeNull();
    });

    it("debe esperar materiales y abandonar pasado el límite", () => {
      ctx = createTestContext({ config: { missingMaterialsMaxWait: 2 } });
      const agent = spawn(at(1, 0));
      blueprint(at(1, 0), 3, { quantity: 2 });
      ctx.runner.stockpiles.dropOnGround(at(5, 5), wood(2));

      update(agent);
      expect(agent.state).toBe(AgentState.EXECUTING);
      ctx.runner.reservations.findAndReserve(
        { kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD },
        2,
        "someone-else",
      );

      update(agent);
      expect(ctx.runner.jobs.get("job_1")?.blockedReason).toBe(BlockedReason.MISSING_MATERIALS);
      expect(agent.blockedTicks).toBe(1);

      update(agent, 2);
      const job = ctx.runner.jobs.get("job_1");
      expect(agent.state).toBe(AgentState.IDLE);
      expect(job?.claimant).toBeNull();
      expect(job?.cooldownUntilTick).toBe(30);
    });

    it("debe soltar en el suelo la carga al abandonar", () => {
      const agent = spawn(at(2, 2));
      blueprint(at(5, 5));
      update(agent);
      agent.carrying = wood(4);

      ctx.runner.execution.abandon(agent, AbandonReason.ERROR);

      expect(agent.carrying).toBeNull();
      expect(ctx.runner.stockpiles.getCell("2,2,0")?.resources).toEqual({
        [ResourceType.WOOD]: 4,
      });
    });

    it("debe recuperar al agente si su actualización falla", () => {
      const agent = spawn(at(0, 0));
      blueprint(at(3, 0));
      const errorSpy = vi.spyOn(logger, "error");
      vi.spyOn(ctx.engines, "get").mockImplementation(() => {
        throw new Error("boom");
      });

      ctx.runner.execution.update();

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(agent.state).toBe(AgentState.IDLE);
      expect(ctx.runner.jobs.get("job_1")?.claimant).toBeNull();
    });
  });

  describe("comidas", () => {
    it("debe interrumpir para comer y volver a inactivo", () => {
      const agent = spawn(at(0, 0), { needs: { hunger: 80 } });
      ctx.runner.stockpiles.dropOnGround(at(3, 0), resource(ResourceType.COOKED_MEAL, 1));

      update(agent);
      expect(agent.state).toBe(AgentState.PREEMPTED);
      expect(agent.mealReservationId).toBe("res_1");
      expect(ctx.runner.reservations.getByOwner(mealOwnerId(agent.id))).toHaveLength(1);

      update(agent);
      expect(agent.position).toEqual(at(1, 0));
      expect(agent.state).toBe(AgentState.PREEMPTED);

      update(agent);
      expect(agent.position).toEqual(at(2, 0));
      expect(agent.state).toBe(AgentState.IDLE);
      expect(agent.needs.hunger).toBeCloseTo(10.03);
      expect(agent.mealReservationId).toBeNull();
      expect(ctx.runner.stockpiles.getCell("3,0,0")).toBeUndefined();
    });

    it("debe devolver el trabajo en curso al interrumpir", () => {
      const agent = spawn(at(0, 0));
      blueprint(at(5, 0));
      update(agent);
      agent.needs.hunger = 75;
      ctx.runner.stockpiles.dropOnGround(at(0, 2), resource(ResourceType.COOKED_MEAL, 1));

      update(agent);

      expect(agent.state).toBe(AgentState.PREEMPTED);
      expect(agent.currentJobId).toBeNull();
      expect(ctx.runner.jobs.get("job_1")?.claimant).toBeNull();
      expect(ctx.runner.jobs.get("job_1")?.cooldownUntilTick).toBe(0);
    });

    it("debe conservar una cacería aunque no se pueda reencolar", () => {
      const agent = spawn(at(0, 0));
      const deer = ctx.runner.animals.spawn(AnimalSpecies.DEER, at(6, 0));
      if (!deer) throw new Error("spawn failed");
      const hunt = ctx.runner.animals.designateHunt(deer.id);
      update(agent);
      expect(agent.currentJobId).toBe(hunt?.id);
      expect(hunt?.requeueable).toBe(false);

      agent.needs.hunger = 80;
      ctx.runner.stockpiles.dropOnGround(at(0, 2), resource(ResourceType.COOKED_MEAL, 1));
      update(agent);

      expect(agent.state).toBe(AgentState.PREEMPTED);
      const job = ctx.runner.jobs.get(hunt?.id ?? "");
      expect(job?.type).toBe(JobType.HUNT);
      expect(job?.claimant).toBeNull();
      expect(job?.status).toBe(JobStatus.PENDING);
      expect(ctx.runner.animals.get(deer.id)?.alive).toBe(true);
    });

    it("no debe interrumpir si no hay comida", () => {
      const agent = spawn(at(0, 0), { needs: { hunger: 90 } });
      blueprint(at(3, 0));

      update(agent);
      expect(agent.state).toBe(AgentState.MOVING);
    });

    it("debe posponer la comida si no llega a ella", () => {
      const agent = spawn(at(0, 0), { needs: { hunger: 80 } });
      ctx.runner.stockpiles.dropOnGround(at(3, 0), resource(ResourceType.COOKED_MEAL, 1));
      for (let x = 0; x <= 4; x++) {
        for (let y = 0; y <= 1; y++) {
          if (x !== 0 || y !== 0) ctx.pathfinder.block(at(x, y));
        }
      }

      update(agent);

      expect(agent.state).toBe(AgentState.IDLE);
      expect(agent.nextMealAttemptTick).toBe(60);
      expect(ctx.runner.reservations.getActiveCount()).toBe(0);
    });
  });

  describe("muerte", () => {
    it("debe conservar el reclamo del agente muerto", () => {
      const agent = spawn(at(0, 0));
      blueprint(at(3, 0));
      update(agent);
      agent.needs.hunger = 100;
      agent.health = 0.05;
      ctx.runner.events.clearQueue();

      update(agent);

      expect(agent.alive).toBe(false);
      expect(ctx.runner.jobs.get("job_1")?.claimant).toBe(agent.id);
      expect(ctx.runner.events.peekQueue()).toEqual([SchedulerEventType.AGENT_DIED]);
    });
  });
});
