import { describe, it, expect } from "vitest";
import { validateSimulationCommand } from "../../src/shared/validation/commandValidation";
import { EquipmentSlot } from "../../src/shared/constants/AgentEnums";
import {
  CraftOrderMode,
  SimulationCommandType,
} from "../../src/shared/constants/CommandEnums";
import { JobType } from "../../src/shared/constants/JobEnums";
import {
  ItemFilterCategory,
  ResourceType,
  SelectorKind,
} from "../../src/shared/constants/ResourceEnums";
import { TileType } from "../../src/shared/constants/TileTypeEnums";

const position = { x: 2, y: 3, z: 0 };

function errorOf(body: unknown): string | null {
  const result = validateSimulationCommand(body);
  return result.success ? null : result.error;
}

describe("validateSimulationCommand", () => {
  it("debe rechazar cuerpos que no son objetos o tipos desconocidos", () => {
    expect(errorOf(null)).toBe("Command must be an object");
    expect(errorOf([1, 2])).toBe("Command must be an object");
    expect(errorOf({ type: "NOPE" })).toBe("Unknown command type: NOPE");
  });

  describe("DESIGNATE_BUILD", () => {
    it("debe aceptar un plano con materiales", () => {
      const result = validateSimulationCommand({
        type: SimulationCommandType.DESIGNATE_BUILD,
        position,
        finishedTile: TileType.WALL,
        materials: [
          { selector: { kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD }, quantity: 4 },
        ],
        work: 120,
      });

      expect(result).toEqual({
        success: true,
        command: {
          type: SimulationCommandType.DESIGNATE_BUILD,
          position,
          finishedTile: TileType.WALL,
          materials: [
            { selector: { kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD }, quantity: 4 },
          ],
          work: 120,
          priority: undefined,
        },
      });
    });

    it("debe señalar el primer campo inválido", () => {
      const base = { type: SimulationCommandType.DESIGNATE_BUILD, position, finishedTile: TileType.WALL };

      expect(errorOf({ ...base, finishedTile: "castle" })).toBe("finishedTile is not a known tile");
      expect(errorOf({ ...base, position: { x: 1, y: 1 } })).toBe(
        "position must be an {x, y, z} of integers",
      );
      expect(
        errorOf({
          ...base,
          materials: [{ selector: { kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD }, quantity: 0 }],
        }),
      ).toBe("materials[0].quantity must be a positive integer");
      expect(errorOf({ ...base, materials: [{ selector: { kind: "magic" }, quantity: 1 }] })).toBe(
        "materials[0].selector.kind must be resource, item or tags",
      );
      expect(errorOf({ ...base, work: 0 })).toBe("work must be a number >= 1");
      expect(errorOf({ ...base, priority: 1.5 })).toBe("priority must be a integer >= 0");
    });
  });

  describe("zonas", () => {
    it("debe aceptar filtros de recursos y categorías de objetos", () => {
      const result = validateSimulationCommand({
        type: SimulationCommandType.CREATE_ZONE,
        name: "Depósito",
        cells: [position],
        filters: { [ResourceType.WOOD]: false, [ItemFilterCategory.EQUIPMENT]: true },
      });

      expect(result.success && result.command).toEqual({
        type: SimulationCommandType.CREATE_ZONE,
        name: "Depósito",
        cells: [position],
        filters: { [ResourceType.WOOD]: false, [ItemFilterCategory.EQUIPMENT]: true },
      });
    });

    it("debe rechazar claves o valores de filtro inválidos", () => {
      const base = { type: SimulationCommandType.SET_ZONE_FILTER, zoneId: "zone_1" };

      expect(errorOf({ ...base, filters: { gold: true } })).toBe(
        "filters.gold is not a resource or item category",
      );
      expect(errorOf({ ...base, filters: { [ResourceType.WOOD]: "no" } })).toBe(
        `filters.${ResourceType.WOOD} must be a boolean`,
      );
      expect(errorOf(base)).toBe("filters must be an object");
    });

    it("debe exigir celdas", () => {
      expect(errorOf({ type: SimulationCommandType.CREATE_ZONE, name: "Vacía", cells: [] })).toBe(
        "cells must be a non-empty array",
      );
    });
  });

  it("debe reconstruir el comando solo con los campos validados", () => {
    const result = validateSimulationCommand({
      type: SimulationCommandType.DESIGNATE_HUNT,
      animalId: "animal_1",
      extra: "ignored",
    });

    expect(result).toEqual({
      success: true,
      command: { type: SimulationCommandType.DESIGNATE_HUNT, animalId: "animal_1" },
    });
  });

  it("debe validar órdenes de fabricación", () => {
    const base = {
      type: SimulationCommandType.ADD_CRAFT_ORDER,
      recipeId: "craft_work_gloves",
      workstation: position,
    };

    expect(errorOf({ ...base, mode: "forever" })).toBe("mode must be repeat or maintain");
    expect(errorOf({ ...base, mode: CraftOrderMode.REPEAT, count: 0 })).toBe(
      "count must be a integer >= 1",
    );
    expect(errorOf({ ...base, mode: CraftOrderMode.MAINTAIN, targetStock: 5 })).toBeNull();
  });

  it("debe validar prioridades y tipos de trabajo", () => {
    expect(errorOf({ type: SimulationCommandType.SET_JOB_PRIORITY, jobId: "job_1" })).toBe(
      "priority is required",
    );
    expect(
      errorOf({
        type: SimulationCommandType.SET_AGENT_JOB_TYPES,
        agentId: "agent_1",
        jobTypes: [JobType.HAUL, "fly"],
      }),
    ).toBe("jobTypes contains unknown type fly");
    expect(errorOf({ type: SimulationCommandType.CANCEL_JOB, jobId: "" })).toBe(
      "jobId must be a non-empty string",
    );
  });

  it("debe validar peticiones de equipo", () => {
    const base = { type: SimulationCommandType.REQUEST_EQUIP, agentId: "agent_1" };

    expect(
      errorOf({ ...base, slot: "feet", selector: { kind: SelectorKind.TAGS, tags: ["boots"] } }),
    ).toBe("slot is not a known equipment slot");
    expect(
      errorOf({ ...base, slot: EquipmentSlot.MAIN_HAND, selector: { kind: SelectorKind.TAGS, tags: ["weapon", 3] } }),
    ).toBe("selector.tags must be strings");
    expect(
      errorOf({ ...base, slot: EquipmentSlot.MAIN_HAND, selector: { kind: SelectorKind.TAGS, tags: ["weapon"] } }),
    ).toBeNull();
  });

  it("debe aceptar un agente nuevo sin nombre", () => {
    expect(validateSimulationCommand({ type: SimulationCommandType.SPAWN_AGENT, position })).toEqual({
      success: true,
      command: { type: SimulationCommandType.SPAWN_AGENT, position, name: undefined },
    });
    expect(errorOf({ type: SimulationCommandType.SPAWN_AGENT, position, name: 7 })).toBe(
      "name must be a string",
    );
  });
});
