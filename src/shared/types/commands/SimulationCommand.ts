import type { SimulationCommandType } from "../../constants/CommandEnums";
import type { CraftOrderMode } from "../../constants/CommandEnums";
import type { EquipmentSlot } from "../../constants/AgentEnums";
import type { JobType } from "../../constants/JobEnums";
import type { TileType } from "../../constants/TileTypeEnums";
import type { Position3D } from "../geometry";
import type {
  MaterialRequirement,
  MaterialSelector,
  ZoneFilters,
} from "../simulation/stockpiles";

/**
 * Operator commands queued for the next tick.
 */
export type SimulationCommand =
  | {
      type: SimulationCommandType.DESIGNATE_BUILD;
      position: Position3D;
      finishedTile: TileType;
      materials?: MaterialRequirement[];
      work?: number;
      priority?: number;
    }
  | { type: SimulationCommandType.DEMOLISH; position: Position3D }
  | { type: SimulationCommandType.DESIGNATE_HARVEST; nodeId: string }
  | { type: SimulationCommandType.DESIGNATE_HUNT; animalId: string }
  | {
      type: SimulationCommandType.CREATE_ZONE;
      name: string;
      cells: Position3D[];
      filters?: ZoneFilters;
    }
  | {
      type: SimulationCommandType.SET_ZONE_FILTER;
      zoneId: string;
      filters: ZoneFilters;
    }
  | { type: SimulationCommandType.REMOVE_ZONE; zoneId: string }
  | {
      type: SimulationCommandType.ADD_CRAFT_ORDER;
      recipeId: string;
      workstation: Position3D;
      mode: CraftOrderMode;
      count?: number;
      targetStock?: number;
      priority?: number;
    }
  | { type: SimulationCommandType.CANCEL_CRAFT_ORDER; orderId: string }
  | { type: SimulationCommandType.CANCEL_JOB; jobId: string }
  | {
      type: SimulationCommandType.SET_JOB_PRIORITY;
      jobId: string;
      priority: number;
    }
  | {
      type: SimulationCommandType.SET_AGENT_JOB_TYPES;
      agentId: string;
      jobTypes: JobType[];
    }
  | {
      type: SimulationCommandType.REQUEST_EQUIP;
      agentId: string;
      slot: EquipmentSlot;
      selector: MaterialSelector;
    }
  | {
      type: SimulationCommandType.SPAWN_AGENT;
      position: Position3D;
      name?: string;
    };
