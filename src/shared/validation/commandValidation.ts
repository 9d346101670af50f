import {
  SimulationCommandType,
  isCraftOrderMode,
  isSimulationCommandType,
} from "../constants/CommandEnums";
import { isEquipmentSlot } from "../constants/AgentEnums";
import { isJobType, type JobType } from "../constants/JobEnums";
import {
  SelectorKind,
  isItemFilterCategory,
  isResourceType,
} from "../constants/ResourceEnums";
import { isTileType } from "../constants/TileTypeEnums";
import type { SimulationCommand } from "../types/commands/SimulationCommand";
import type { Position3D } from "../types/geometry";
import type {
  MaterialRequirement,
  MaterialSelector,
  ZoneFilters,
} from "../types/simulation/stockpiles";
import { isPosition3D } from "../utils/geometry";

export type CommandValidationResult =
  | { success: true; command: SimulationCommand }
  | { success: false; error: string };

class CommandValidationError extends Error {}

function fail(message: string): never {
  throw new CommandValidationError(message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== "string" || value.length === 0) {
    fail(`${field} must be a non-empty string`);
  }
  return value;
}

function readPosition(value: unknown, field: string): Position3D {
  if (!isPosition3D(value)) fail(`${field} must be an {x, y, z} of integers`);
  return { x: value.x, y: value.y, z: value.z };
}

function readOptionalNumber(
  body: Record<string, unknown>,
  field: string,
  { integer = false, min = 0 }: { integer?: boolean; min?: number } = {},
): number | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    value < min ||
    (integer && !Number.isInteger(value))
  ) {
    fail(`${field} must be a ${integer ? "integer" : "number"} >= ${min}`);
  }
  return value;
}

function readSelector(value: unknown, field: string): MaterialSelector {
  if (!isRecord(value)) fail(`${field} must be an object`);

  switch (value.kind) {
    case SelectorKind.RESOURCE:
      if (!isResourceType(value.resource)) {
        fail(`${field}.resource is not a known resource`);
      }
      return { kind: SelectorKind.RESOURCE, resource: value.resource };
    case SelectorKind.ITEM:
      if (typeof value.itemId !== "string" || value.itemId.length === 0) {
        fail(`${field}.itemId must be a non-empty string`);
      }
      return { kind: SelectorKind.ITEM, itemId: value.itemId };
    case SelectorKind.TAGS: {
      const tags: unknown = value.tags;
      if (!Array.isArray(tags) || tags.length === 0) {
        fail(`${field}.tags must be a non-empty string array`);
      }
      const entries: unknown[] = tags;
      return {
        kind: SelectorKind.TAGS,
        tags: entries.map((tag) =>
          typeof tag === "string" ? tag : fail(`${field}.tags must be strings`),
        ),
      };
    }
    default:
      return fail(`${field}.kind must be resource, item or tags`);
  }
}

function readMaterials(value: unknown): MaterialRequirement[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) fail("materials must be an array");

  const entries: unknown[] = value;
  return entries.map((entry, index) => {
    if (!isRecord(entry)) fail(`materials[${index}] must be an object`);
    const quantity = entry.quantity;
    if (typeof quantity !== "number" || !Number.isInteger(quantity) || quantity < 1) {
      fail(`materials[${index}].quantity must be a positive integer`);
    }
    return {
      selector: readSelector(entry.selector, `materials[${index}].selector`),
      quantity,
    };
  });
}

function readFilters(value: unknown, optional: boolean): ZoneFilters | undefined {
  if (value === undefined && optional) return undefined;
  if (!isRecord(value)) fail("filters must be an object");

  const filters: ZoneFilters = {};
  for (const [key, allowed] of Object.entries(value)) {
    if (typeof allowed !== "boolean") fail(`filters.${key} must be a boolean`);
    if (isResourceType(key) || isItemFilterCategory(key)) {
      filters[key] = allowed;
    } else {
      fail(`filters.${key} is not a resource or item category`);
    }
  }
  return filters;
}

function readJobTypes(value: unknown): JobType[] {
  if (!Array.isArray(value)) fail("jobTypes must be an array");
  const entries: unknown[] = value;
  const types: JobType[] = [];
  for (const type of entries) {
    if (!isJobType(type)) fail(`jobTypes contains unknown type ${String(type)}`);
    types.push(type);
  }
  return types;
}

function buildCommand(
  type: SimulationCommandType,
  body: Record<string, unknown>,
): SimulationCommand {
  switch (type) {
    case SimulationCommandType.DESIGNATE_BUILD: {
      const finishedTile = body.finishedTile;
      if (!isTileType(finishedTile)) fail("finishedTile is not a known tile");
      return {
        type,
        position: readPosition(body.position, "position"),
        finishedTile,
        materials: readMaterials(body.materials),
        work: readOptionalNumber(body, "work", { min: 1 }),
        priority: readOptionalNumber(body, "priority", { integer: true }),
      };
    }
    case SimulationCommandType.DEMOLISH:
      return { type, position: readPosition(body.position, "position") };
    case SimulationCommandType.DESIGNATE_HARVEST:
      return { type, nodeId: readString(body, "nodeId") };
    case SimulationCommandType.DESIGNATE_HUNT:
      return { type, animalId: readString(body, "animalId") };
    case SimulationCommandType.CREATE_ZONE: {
      const cells: unknown = body.cells;
      if (!Array.isArray(cells) || cells.length === 0) {
        fail("cells must be a non-empty array");
      }
      const entries: unknown[] = cells;
      return {
        type,
        name: readString(body, "name"),
        cells: entries.map((cell, index) =>
          readPosition(cell, `cells[${index}]`),
        ),
        filters: readFilters(body.filters, true),
      };
    }
    case SimulationCommandType.SET_ZONE_FILTER:
      return {
        type,
        zoneId: readString(body, "zoneId"),
        filters: readFilters(body.filters, false) ?? {},
      };
    case SimulationCommandType.REMOVE_ZONE:
      return { type, zoneId: readString(body, "zoneId") };
    case SimulationCommandType.ADD_CRAFT_ORDER: {
      const mode = body.mode;
      if (!isCraftOrderMode(mode)) fail("mode must be repeat or maintain");
      return {
        type,
        recipeId: readString(body, "recipeId"),
        workstation: readPosition(body.workstation, "workstation"),
        mode,
        count: readOptionalNumber(body, "count", { integer: true, min: 1 }),
        targetStock: readOptionalNumber(body, "targetStock", {
          integer: true,
          min: 1,
        }),
        priority: readOptionalNumber(body, "priority", { integer: true }),
      };
    }
    case SimulationCommandType.CANCEL_CRAFT_ORDER:
      return { type, orderId: readString(body, "orderId") };
    case SimulationCommandType.CANCEL_JOB:
      return { type, jobId: readString(body, "jobId") };
    case SimulationCommandType.SET_JOB_PRIORITY: {
      const priority = readOptionalNumber(body, "priority", { integer: true });
      if (priority === undefined) fail("priority is required");
      return { type, jobId: readString(body, "jobId"), priority };
    }
    case SimulationCommandType.SET_AGENT_JOB_TYPES:
      return {
        type,
        agentId: readString(body, "agentId"),
        jobTypes: readJobTypes(body.jobTypes),
      };
    case SimulationCommandType.REQUEST_EQUIP: {
      const slot = body.slot;
      if (!isEquipmentSlot(slot)) fail("slot is not a known equipment slot");
      return {
        type,
        agentId: readString(body, "agentId"),
        slot,
        selector: readSelector(body.selector, "selector"),
      };
    }
    case SimulationCommandType.SPAWN_AGENT: {
      const name = body.name;
      if (name !== undefined && typeof name !== "string") {
        fail("name must be a string");
      }
      return {
        type,
        position: readPosition(body.position, "position"),
        name,
      };
    }
  }
}

/**
 * Validates an operator command received over HTTP or WebSocket and
 * rebuilds it from the checked fields only.
 */
export function validateSimulationCommand(
  body: unknown,
): CommandValidationResult {
  if (!isRecord(body)) {
    return { success: false, error: "Command must be an object" };
  }
  if (!isSimulationCommandType(body.type)) {
    return {
      success: false,
      error: `Unknown command type: ${String(body.type)}`,
    };
  }

  try {
    return { success: true, command: buildCommand(body.type, body) };
  } catch (error) {
    if (error instanceof CommandValidationError) {
      return { success: false, error: error.message };
    }
    throw error;
  }
}
