import type {
  AbandonReason,
  BlockedReason,
  JobRemovalReason,
  JobType,
} from "../../constants/JobEnums";
import type { AgentState } from "../../constants/AgentEnums";
import type { SchedulerEventType } from "../../constants/EventEnums";
import type { ResourceType } from "../../constants/ResourceEnums";
import type { TileType } from "../../constants/TileTypeEnums";
import type { Position3D } from "../geometry";
import type { ContentRef } from "./stockpiles";

interface JobEventBase {
  jobId: string;
  jobType: JobType;
  tick: number;
}

/**
 * Payload shape per event type.
 */
export interface SchedulerEventPayloads {
  [SchedulerEventType.JOB_INSERTED]: JobEventBase & { priority: number };
  [SchedulerEventType.JOB_CLAIMED]: JobEventBase & { agentId: string };
  [SchedulerEventType.JOB_RELEASED]: JobEventBase & {
    agentId: string;
    cooldownTicks: number;
  };
  [SchedulerEventType.JOB_BLOCKED]: JobEventBase & { reason: BlockedReason };
  [SchedulerEventType.JOB_COMPLETED]: JobEventBase & {
    agentId: string;
    craftOrderId?: string;
  };
  [SchedulerEventType.JOB_ABANDONED]: JobEventBase & {
    agentId: string;
    reason: AbandonReason;
  };
  [SchedulerEventType.JOB_CANCEL_REQUESTED]: JobEventBase & {
    agentId: string;
  };
  [SchedulerEventType.JOB_REMOVED]: JobEventBase & {
    reason: JobRemovalReason;
    location: Position3D;
    craftOrderId?: string;
  };
  [SchedulerEventType.STALE_CLAIM_RECOVERED]: JobEventBase & {
    agentId: string;
    idleTicks: number;
  };

  [SchedulerEventType.RESERVATION_CREATED]: {
    reservationId: string;
    ownerId: string;
    cellKey: string;
    quantity: number;
  };
  [SchedulerEventType.RESERVATION_COMMITTED]: {
    reservationId: string;
    ownerId: string;
  };
  [SchedulerEventType.RESERVATION_CANCELLED]: {
    reservationId: string;
    ownerId: string;
  };

  [SchedulerEventType.CONTENT_STORED]: {
    cellKey: string;
    content: ContentRef;
    quantity: number;
  };
  [SchedulerEventType.CONTENT_DROPPED]: {
    cellKey: string;
    content: ContentRef;
    quantity: number;
  };
  [SchedulerEventType.CONTENT_MISPLACED]: {
    cellKey: string;
    zoneId: string;
    contentKey: string;
  };
  [SchedulerEventType.ZONE_CREATED]: { zoneId: string; cellCount: number };
  [SchedulerEventType.ZONE_FILTERS_CHANGED]: { zoneId: string };
  [SchedulerEventType.ZONE_REMOVED]: { zoneId: string };

  [SchedulerEventType.AGENT_SPAWNED]: {
    agentId: string;
    position: Position3D;
  };
  [SchedulerEventType.AGENT_STATE_CHANGED]: {
    agentId: string;
    from: AgentState;
    to: AgentState;
    tick: number;
  };
  [SchedulerEventType.AGENT_PREEMPTED]: {
    agentId: string;
    jobId: string | null;
    tick: number;
  };
  [SchedulerEventType.AGENT_ATE]: { agentId: string; hunger: number };
  [SchedulerEventType.AGENT_DIED]: {
    agentId: string;
    tick: number;
    cause: string;
  };
  [SchedulerEventType.ITEM_EQUIPPED]: {
    agentId: string;
    instanceId: string;
    slot: string;
  };

  [SchedulerEventType.TILE_CHANGED]: {
    position: Position3D;
    from: TileType;
    to: TileType;
  };
  [SchedulerEventType.CONSTRUCTION_COMPLETED]: {
    jobId: string;
    position: Position3D;
    tile: TileType;
  };
  [SchedulerEventType.ITEM_CRAFTED]: {
    jobId: string;
    recipeId: string;
    outputs: number;
  };
  [SchedulerEventType.NODE_DEPLETED]: { nodeId: string; position: Position3D };
  [SchedulerEventType.NODE_REGROWN]: {
    nodeId: string;
    resource: ResourceType;
  };
  [SchedulerEventType.ANIMAL_KILLED]: {
    animalId: string;
    corpseInstanceId: string;
    position: Position3D;
  };
}
