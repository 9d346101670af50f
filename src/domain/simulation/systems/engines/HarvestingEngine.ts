import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { InteractionRange } from "../../../../shared/constants/AgentEnums";
import { BlockedReason, JobType } from "../../../../shared/constants/JobEnums";
import { ContentKind } from "../../../../shared/constants/ResourceEnums";
import type { Agent, MoveTarget } from "../../../../shared/types/simulation/agents";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type { ResourceNode } from "../../../../shared/types/simulation/world";
import { JobRegistry } from "../jobs/JobRegistry";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import { ResourceNodeSystem } from "../world/ResourceNodeSystem";
import {
  blocked,
  COMPLETED,
  CONTINUING,
  type ExecutionEngine,
  type ProgressResult,
} from "./ExecutionEngine";

/**
 * Harvest and salvage. One completed job takes one yield from the node and
 * stores it; with nowhere to store it the job stalls before touching the
 * node.
 */
@injectable()
export class HarvestingEngine implements ExecutionEngine {
  public readonly jobTypes = [JobType.HARVEST, JobType.SALVAGE] as const;

  constructor(
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.StockpileSystem) private readonly stockpiles: StockpileSystem,
    @inject(TYPES.ResourceNodeSystem) private readonly nodes: ResourceNodeSystem,
  ) {}

  private nodeOf(job: Job): ResourceNode | null {
    const nodeId = job.metadata.nodeId;
    const node = nodeId ? this.nodes.get(nodeId) : undefined;
    return node && node.remaining > 0 ? node : null;
  }

  public interactionTarget(_agent: Agent, job: Job): MoveTarget | null {
    const node = this.nodeOf(job);
    return node ? { position: node.position, range: InteractionRange.EXACT } : null;
  }

  public advance(_agent: Agent, job: Job, delta: number): ProgressResult {
    const node = this.nodeOf(job);
    if (!node) return blocked(BlockedReason.INVALID_TARGET);

    const progress = this.jobs.addProgress(job.id, delta);
    if (progress < job.requiredProgress) return CONTINUING;

    const amount = Math.min(node.yieldPerHarvest, node.remaining);
    const placements = this.stockpiles.planStorage(
      [{ kind: ContentKind.RESOURCE, resource: node.resource, quantity: amount }],
      node.position,
    );
    if (!placements) return blocked(BlockedReason.NO_STORAGE);

    const position = node.position;
    const taken = this.nodes.extract(node.id, amount);
    if (taken < amount) return blocked(BlockedReason.INVALID_TARGET);

    this.stockpiles.storePlanned(placements, position);
    return COMPLETED;
  }
}
