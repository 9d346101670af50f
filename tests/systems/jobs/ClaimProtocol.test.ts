import { describe, it, expect, beforeEach, vi } from "vitest";
import { at, createTestContext, NEUTRAL_TRAITS, type TestContext } from "../../setup";
import { JobType } from "../../../src/shared/constants/JobEnums";
import { TileType } from "../../../src/shared/constants/TileTypeEnums";
import type { Agent } from "../../../src/shared/types/simulation/agents";
import type { Position3D } from "../../../src/shared/types/geometry";
import {
  distanceWeight,
  priorityWeight,
  urgencyWeight,
} from "../../../src/domain/simulation/systems/jobs/scoring";

describe("scoring", () => {
  it("debe ponderar la prioridad de forma lineal", () => {
    expect(priorityWeight(0)).toBe(0);
    expect(priorityWeight(3)).toBe(300);
  });

  it("debe acotar y decrecer el peso de la distancia", () => {
    expect(distanceWeight(0)).toBe(50);
    expect(distanceWeight(10)).toBe(25);
    expect(distanceWeight(-4)).toBe(50);
    expect(distanceWeight(30)).toBeLessThan(distanceWeight(29));
  });

  it("debe recortar la urgencia al rango 0..1", () => {
    expect(urgencyWeight(undefined)).toBe(0);
    expect(urgencyWeight(0.5)).toBe(37.5);
    expect(urgencyWeight(4)).toBe(75);
    expect(urgencyWeight(-1)).toBe(0);
  });
});

describe("ClaimProtocol", () => {
  let ctx: TestContext;
  let agent: Agent;

  const build = (location: Position3D, priority?: number, urgency?: number) =>
    ctx.runner.jobs.insert({
      type: JobType.BUILD,
      location,
      priority,
      metadata: { finishedTile: TileType.WALL, urgency },
    });

  beforeEach(() => {
    ctx = createTestContext();
    const spawned = ctx.runner.agents.spawn({ position: at(0, 0), traits: NEUTRAL_TRAITS });
    if (!spawned) throw new Error("spawn failed");
    agent = spawned;
  });

  it("debe sumar prioridad, distancia, sesgo de categoría y urgencia", () => {
    const job = build(at(0, 0), 3, 1);
    if (!job) throw new Error("insert failed");
    agent.traits = { ...NEUTRAL_TRAITS, categoryBonus: { construction: 10 } };

    expect(ctx.claims.score(agent, job)).toBe(300 + 50 + 10 + 75);
  });

  it("debe preferir el trabajo más cercano a igual prioridad", () => {
    build(at(10, 0));
    build(at(1, 0));

    expect(ctx.claims.tryClaim(agent)?.id).toBe("job_2");
  });

  it("debe dejar que un nivel de prioridad domine sobre la distancia", () => {
    build(at(0, 1), 3);
    build(at(15, 15), 4);

    expect(ctx.claims.rank(agent).map((scored) => scored.job.id)).toEqual(["job_2", "job_1"]);
  });

  it("debe desempatar por antigüedad", () => {
    build(at(2, 0));
    build(at(0, 2));

    const ranked = ctx.claims.rank(agent);
    expect(ranked[0].score).toBe(ranked[1].score);
    expect(ranked.map((scored) => scored.job.id)).toEqual(["job_1", "job_2"]);
  });

  it("debe dar el trabajo a un solo agente", () => {
    build(at(3, 3));
    const other = ctx.runner.agents.spawn({ position: at(3, 3), traits: NEUTRAL_TRAITS });
    if (!other) throw new Error("spawn failed");

    expect(ctx.claims.tryClaim(agent)?.id).toBe("job_1");
    expect(ctx.claims.tryClaim(other)).toBeNull();
    expect(ctx.runner.jobs.get("job_1")?.claimant).toBe(agent.id);
  });

  it("debe limitar los intentos de reclamo por tick", () => {
    for (let x = 1; x <= 7; x++) build(at(x, 0));
    const claimSpy = vi.spyOn(ctx.runner.jobs, "claim").mockReturnValue(false);

    expect(ctx.claims.tryClaim(agent)).toBeNull();
    expect(claimSpy).toHaveBeenCalledTimes(5);
    expect(claimSpy.mock.calls.map(([jobId]) => jobId)).toEqual([
      "job_1",
      "job_2",
      "job_3",
      "job_4",
      "job_5",
    ]);
  });
});
