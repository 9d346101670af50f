import type {
  AgentState,
  EquipmentSlot,
  InteractionRange,
} from "../../constants/AgentEnums";
import type { JobType } from "../../constants/JobEnums";
import type { Position3D } from "../geometry";
import type { ItemInstance } from "./items";
import type { StorableContent } from "./stockpiles";

/**
 * Read-only weights consumed by scoring and engines.
 */
export interface AgentTraits {
  /** Multiplier of work applied per tick. */
  workSpeed: number;
  /** Tiles advanced per tick (fractional speeds accumulate). */
  moveSpeed: number;
  /** Damage per unit of work while hunting. */
  attackPower: number;
  /** Additive claim-score bias per job category. */
  categoryBonus: Record<string, number>;
}

export interface AgentNeeds {
  hunger: number;
  fatigue: number;
}

export interface MoveTarget {
  position: Position3D;
  range: InteractionRange;
}

export interface Agent {
  id: string;
  name: string;
  position: Position3D;
  state: AgentState;
  currentJobId: string | null;
  enabledJobTypes: JobType[];
  traits: AgentTraits;
  needs: AgentNeeds;
  health: number;
  alive: boolean;
  route: Position3D[];
  moveTarget: MoveTarget | null;
  movePoints: number;
  rerouteAttempts: number;
  carrying: StorableContent | null;
  /** Consecutive ticks blocked on missing materials. */
  blockedTicks: number;
  equipment: Partial<Record<EquipmentSlot, ItemInstance>>;
  mealReservationId: string | null;
  nextMealAttemptTick: number;
  lastStateChangeTick: number;
}

export interface AgentSpawnParams {
  name?: string;
  position: Position3D;
  enabledJobTypes?: JobType[];
  traits?: AgentTraits;
  needs?: Partial<AgentNeeds>;
}

/** ARC4 state of the trait generator. */
export interface TraitRngState {
  i: number;
  j: number;
  S: number[];
}

export interface AgentRegistrySnapshot {
  agents: Agent[];
  nextSeq: number;
}
