import type { AgentRegistrySnapshot, TraitRngState } from "./agents";
import type { CraftOrderSnapshot } from "./crafting";
import type { JobRegistrySnapshot } from "./jobs";
import type { ReservationSnapshot, StockpileSnapshot } from "./stockpiles";
import type {
  AnimalSnapshot,
  ResourceNodeSnapshot,
  WorldGridSnapshot,
} from "./world";

/**
 * Full scheduler state at a tick boundary. Plain data only, so it survives
 * a MessagePack round-trip.
 */
export interface SchedulerSnapshot {
  version: number;
  tick: number;
  jobs: JobRegistrySnapshot;
  reservations: ReservationSnapshot;
  stockpiles: StockpileSnapshot;
  agents: AgentRegistrySnapshot;
  world: WorldGridSnapshot;
  nodes: ResourceNodeSnapshot;
  animals: AnimalSnapshot;
  craftOrders: CraftOrderSnapshot;
  itemSeq: number;
  traitRng: TraitRngState;
}

/**
 * Per-tick summary pushed to WebSocket clients.
 */
export interface TickSummary {
  tick: number;
  agents: Array<{
    id: string;
    state: string;
    position: { x: number; y: number; z: number };
    jobId: string | null;
    hunger: number;
    alive: boolean;
  }>;
  jobs: {
    total: number;
    pending: number;
    claimed: number;
    inProgress: number;
    blocked: number;
  };
  activeReservations: number;
}
