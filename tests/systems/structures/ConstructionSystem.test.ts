import { describe, it, expect, beforeEach } from "vitest";
import { at, createTestContext, runTicks, type TestContext } from "../../setup";
import { CancelOutcome, JobType } from "../../../src/shared/constants/JobEnums";
import { TileType } from "../../../src/shared/constants/TileTypeEnums";

describe("ConstructionSystem", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it("debe colocar el plano y abrir su trabajo de construcción", () => {
    const job = ctx.runner.construction.designate({
      position: at(4, 4),
      finishedTile: TileType.FLOOR,
      work: 20,
      priority: 5,
    });

    expect(ctx.runner.world.getTile(at(4, 4))).toBe(TileType.BLUEPRINT);
    expect(job?.type).toBe(JobType.BUILD);
    expect(job?.subtype).toBe(TileType.FLOOR);
    expect(job?.requiredProgress).toBe(20);
    expect(job?.priority).toBe(5);
    expect(ctx.runner.construction.findBuildJob(at(4, 4))?.id).toBe(job?.id);
  });

  it("debe rechazar un plano sobre otro o fuera del mapa", () => {
    ctx.runner.construction.designate({ position: at(4, 4), finishedTile: TileType.WALL });

    expect(
      ctx.runner.construction.designate({ position: at(4, 4), finishedTile: TileType.WALL }),
    ).toBeNull();
    expect(
      ctx.runner.construction.designate({ position: at(40, 4), finishedTile: TileType.WALL }),
    ).toBeNull();
    expect(ctx.runner.jobs.size).toBe(1);
  });

  it("debe restaurar la casilla al demoler y cancelar el trabajo", () => {
    ctx.runner.world.setTile(at(4, 4), TileType.FLOOR);
    ctx.runner.construction.designate({ position: at(4, 4), finishedTile: TileType.WALL });

    expect(ctx.runner.construction.demolish(at(4, 4))).toBe(true);
    expect(ctx.runner.world.getTile(at(4, 4))).toBe(TileType.FLOOR);
    expect(ctx.runner.jobs.size).toBe(0);
    expect(ctx.runner.construction.demolish(at(4, 4))).toBe(false);
  });

  it("debe dejar que el reclamante abandone un plano demolido", () => {
    const job = ctx.runner.construction.designate({
      position: at(4, 4),
      finishedTile: TileType.WALL,
    });
    if (!job) throw new Error("designation failed");
    ctx.runner.jobs.claim(job.id, "agent_1");

    ctx.runner.construction.demolish(at(4, 4));

    expect(ctx.runner.jobs.get(job.id)?.cancelRequested).toBe(true);
    expect(ctx.runner.jobs.cancel(job.id)).toBe(CancelOutcome.REQUESTED);
  });
  describe("expiración", () => {
    it("debe limpiar el plano cuando su trabajo caduca sin reclamar", () => {
      const local = createTestContext({ config: { maxUnclaimedAge: 5 } });
      const job = local.runner.construction.designate({
        position: at(4, 4),
        finishedTile: TileType.WALL,
      });
      if (!job) throw new Error("designation failed");

      runTicks(local.runner, 5);
      expect(local.runner.world.getTile(at(4, 4))).toBe(TileType.BLUEPRINT);

      runTicks(local.runner, 1);
      expect(local.runner.jobs.get(job.id)).toBeUndefined();
      expect(local.runner.world.getTile(at(4, 4))).toBe(TileType.GROUND);
      expect(local.runner.construction.findBuildJob(at(4, 4))).toBeUndefined();

      const again = local.runner.construction.designate({
        position: at(4, 4),
        finishedTile: TileType.WALL,
      });
      expect(again?.type).toBe(JobType.BUILD);
      expect(local.runner.world.getTile(at(4, 4))).toBe(TileType.BLUEPRINT);
    });

    it("debe restaurar la casilla previa al caducar el plano", () => {
      const local = createTestContext({ config: { maxUnclaimedAge: 5 } });
      local.runner.world.setTile(at(2, 2), TileType.FLOOR);
      local.runner.construction.designate({ position: at(2, 2), finishedTile: TileType.WALL });

      runTicks(local.runner, 6);

      expect(local.runner.world.getTile(at(2, 2))).toBe(TileType.FLOOR);
      expect(local.runner.jobs.size).toBe(0);
    });
  });
});
