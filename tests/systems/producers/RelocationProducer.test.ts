import { describe, it, expect, beforeEach } from "vitest";
import { at, createTestContext, wood, type TestContext } from "../../setup";
import { ContentKind, ResourceType } from "../../../src/shared/constants/ResourceEnums";
import { RELOCATION_HAUL_PRIORITY } from "../../../src/shared/constants/SchedulerConstants";

const WOOD_REF = { kind: ContentKind.RESOURCE, resource: ResourceType.WOOD } as const;

describe("RelocationProducer", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
    ctx.runner.stockpiles.createZone("Vieja", [at(1, 1)]);
    ctx.runner.stockpiles.createZone("Nueva", [at(5, 5)]);
    ctx.runner.stockpiles.store("1,1,0", wood(10));
  });

  it("no debe mover contenido bien ubicado", () => {
    expect(ctx.runner.relocation.scan()).toEqual([]);
  });

  it("debe mover el contenido que el filtro ya no admite", () => {
    ctx.runner.stockpiles.setZoneFilters("zone_1", { [ResourceType.WOOD]: false });

    const [job] = ctx.runner.relocation.scan();

    expect(job.priority).toBe(RELOCATION_HAUL_PRIORITY);
    expect(job.metadata.haul).toEqual({
      source: at(1, 1),
      content: WOOD_REF,
      quantity: 10,
      destination: at(5, 5),
      relocation: true,
    });
  });

  it("debe vaciar una zona en retirada y borrarla cuando quede vacía", () => {
    ctx.runner.stockpiles.requestZoneRemoval("zone_1");
    expect(ctx.runner.relocation.scan()).toHaveLength(1);
    expect(ctx.runner.stockpiles.getZone("zone_1")?.pendingRemoval).toBe(true);

    ctx.runner.stockpiles.withdraw("1,1,0", WOOD_REF, 10);
    ctx.runner.relocation.scan();

    expect(ctx.runner.stockpiles.getZone("zone_1")).toBeUndefined();
  });
});
