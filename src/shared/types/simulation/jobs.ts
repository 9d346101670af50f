import type { EquipmentSlot } from "../../constants/AgentEnums";
import type {
  BlockedReason,
  JobStatus,
  JobType,
} from "../../constants/JobEnums";
import type { TileType } from "../../constants/TileTypeEnums";
import type { Position3D } from "../geometry";
import type { ContentRef, MaterialRequirement } from "./stockpiles";

export interface HaulSpec {
  source: Position3D;
  content: ContentRef;
  quantity: number;
  destination?: Position3D;
  /** Set once the drop-off destination has been searched again. */
  destinationResearched?: boolean;
  /** The content is misplaced in its zone. */
  relocation?: boolean;
}

export interface JobMetadata {
  recipeId?: string;
  materials?: MaterialRequirement[];
  finishedTile?: TileType;
  nodeId?: string;
  animalId?: string;
  haul?: HaulSpec;
  equipSlot?: EquipmentSlot;
  /** Personal job: only this agent may claim it. */
  assigneeId?: string;
  /** 0..1 extra pull on the claim score. */
  urgency?: number;
  craftOrderId?: string;
}

export interface Job {
  id: string;
  seq: number;
  type: JobType;
  category: string;
  subtype?: string;
  location: Position3D;
  targetEntityId?: string;
  priority: number;
  requiredProgress: number;
  accumulatedProgress: number;
  claimant: string | null;
  claimTick: number | null;
  lastActivityTick: number;
  createdTick: number;
  status: JobStatus;
  blockedReason: BlockedReason | null;
  blockedSinceTick: number | null;
  cooldownUntilTick: number;
  cancelRequested: boolean;
  requeueable: boolean;
  metadata: JobMetadata;
}

export interface JobCreationParams {
  type: JobType;
  location: Position3D;
  category?: string;
  subtype?: string;
  targetEntityId?: string;
  priority?: number;
  requiredProgress?: number;
  requeueable?: boolean;
  metadata?: JobMetadata;
}

export interface ReleaseOptions {
  cooldownTicks?: number;
}

export interface JobStats {
  total: number;
  byStatus: Record<JobStatus, number>;
  byType: Record<JobType, number>;
  blockedByReason: Record<BlockedReason, number>;
  onCooldown: number;
  completed: number;
  abandoned: number;
  expired: number;
  staleClaimsRecovered: number;
}

export interface JobRegistrySnapshot {
  jobs: Job[];
  nextSeq: number;
  counters: {
    completed: number;
    abandoned: number;
    expired: number;
    staleClaimsRecovered: number;
  };
}
