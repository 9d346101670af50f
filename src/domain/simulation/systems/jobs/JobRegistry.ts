import { inject, injectable, optional } from "inversify";
import { TYPES } from "../../../../config/Types";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
} from "../../../../config/config";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import {
  BlockedReason,
  CancelOutcome,
  JobRemovalReason,
  JobStatus,
  JobType,
  isJobType,
} from "../../../../shared/constants/JobEnums";
import { isEquipmentSlot } from "../../../../shared/constants/AgentEnums";
import {
  ContentKind,
  isResourceType,
} from "../../../../shared/constants/ResourceEnums";
import { isTileType } from "../../../../shared/constants/TileTypeEnums";
import { JOB_DEFAULTS } from "../../../../shared/constants/SchedulerConstants";
import type { Agent } from "../../../../shared/types/simulation/agents";
import type {
  Job,
  JobCreationParams,
  JobMetadata,
  JobRegistrySnapshot,
  JobStats,
  ReleaseOptions,
} from "../../../../shared/types/simulation/jobs";
import { clonePosition, isPosition3D } from "../../../../shared/utils/geometry";
import { RecipesCatalog } from "../../../data/RecipesCatalog";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { SimulationClock } from "../../core/SimulationClock";
import { isMaterialRequirement } from "../stockpiles/contentMatching";
import { ResourceReservationSystem } from "../stockpiles/ResourceReservationSystem";

/**
 * Shared pool of pending and claimed jobs.
 *
 * Jobs are returned by reference; callers mutate them only through the
 * registry methods. A job has at most one claimant and a claimed job is
 * invisible to candidate queries. The stale sweep (`expireStale`) is the
 * only liveness guarantee: it force-releases claims that stopped reporting
 * activity.
 */
@injectable()
export class JobRegistry {
  private jobs = new Map<string, Job>();
  private nextSeq = 0;
  private counters = {
    completed: 0,
    abandoned: 0,
    expired: 0,
    staleClaimsRecovered: 0,
  };

  constructor(
    @inject(TYPES.SimulationClock) private readonly clock: SimulationClock,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
    @inject(TYPES.ResourceReservationSystem)
    private readonly reservations: ResourceReservationSystem,
    @inject(TYPES.SchedulerConfig)
    @optional()
    private readonly config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  ) {}

  /**
   * Adds a job to the pool. Returns null (and logs) when the parameters are
   * malformed.
   */
  public insert(params: JobCreationParams): Job | null {
    const problem = this.validate(params);
    if (problem) {
      logger.warn(`Job rejected: ${problem}`, LogCategory.JOBS, {
        type: params.type,
        location: params.location,
      });
      return null;
    }

    const defaults = JOB_DEFAULTS[params.type];
    const metadata: JobMetadata = structuredClone(params.metadata ?? {});
    let requiredProgress = params.requiredProgress ?? defaults.requiredProgress;
    let subtype = params.subtype;

    if (params.type === JobType.CRAFT && metadata.recipeId) {
      const recipe = RecipesCatalog.getRecipeById(metadata.recipeId);
      if (recipe) {
        metadata.materials ??= structuredClone(recipe.inputs);
        requiredProgress = params.requiredProgress ?? recipe.work;
        subtype ??= recipe.category;
      }
    }

    const now = this.clock.now;
    this.nextSeq++;
    const job: Job = {
      id: `job_${this.nextSeq}`,
      seq: this.nextSeq,
      type: params.type,
      category: params.category ?? defaults.category,
      subtype,
      location: clonePosition(params.location),
      targetEntityId: params.targetEntityId,
      priority: params.priority ?? defaults.priority,
      requiredProgress,
      accumulatedProgress: 0,
      claimant: null,
      claimTick: null,
      lastActivityTick: now,
      createdTick: now,
      status: JobStatus.PENDING,
      blockedReason: null,
      blockedSinceTick: null,
      cooldownUntilTick: 0,
      cancelRequested: false,
      requeueable: params.requeueable ?? defaults.requeueable,
      metadata,
    };

    this.jobs.set(job.id, job);
    this.events.publish(SchedulerEventType.JOB_INSERTED, {
      jobId: job.id,
      jobType: job.type,
      tick: now,
      priority: job.priority,
    });
    logger.debug(
      `Job ${job.id} (${job.type}) inserted at priority ${job.priority}`,
      LogCategory.JOBS,
    );
    return job;
  }

  private validate(params: JobCreationParams): string | null {
    if (!isJobType(params.type)) return `unknown job type "${params.type}"`;
    if (!isPosition3D(params.location)) return "invalid location";
    if (params.priority !== undefined && !Number.isFinite(params.priority)) {
      return "priority must be finite";
    }
    if (
      params.requiredProgress !== undefined &&
      (!Number.isFinite(params.requiredProgress) ||
        params.requiredProgress <= 0)
    ) {
      return "required progress must be positive and finite";
    }

    const metadata = params.metadata ?? {};
    if (
      metadata.materials !== undefined &&
      !metadata.materials.every((m) => isMaterialRequirement(m))
    ) {
      return "malformed material requirements";
    }
    if (metadata.urgency !== undefined && !Number.isFinite(metadata.urgency)) {
      return "urgency must be finite";
    }

    switch (params.type) {
      case JobType.BUILD:
        return isTileType(metadata.finishedTile)
          ? null
          : "build job needs a finished tile";
      case JobType.CRAFT:
        return metadata.recipeId &&
          RecipesCatalog.getRecipeById(metadata.recipeId)
          ? null
          : `unknown recipe "${metadata.recipeId ?? ""}"`;
      case JobType.HARVEST:
      case JobType.SALVAGE:
        return metadata.nodeId ? null : `${params.type} job needs a node`;
      case JobType.HUNT:
        return metadata.animalId ? null : "hunt job needs an animal";
      case JobType.HAUL:
        return this.validateHaul(metadata);
      case JobType.EQUIP:
        if (!isEquipmentSlot(metadata.equipSlot)) {
          return "equip job needs a slot";
        }
        if (!metadata.assigneeId) return "equip job needs an assignee";
        return metadata.materials?.length === 1
          ? null
          : "equip job needs exactly one item requirement";
    }
  }

  private validateHaul(metadata: JobMetadata): string | null {
    const haul = metadata.haul;
    if (!haul) return "haul job needs a haul spec";
    if (!isPosition3D(haul.source)) return "haul job needs a source";
    if (!Number.isInteger(haul.quantity) || haul.quantity <= 0) {
      return "haul quantity must be a positive integer";
    }
    if (haul.destination !== undefined && !isPosition3D(haul.destination)) {
      return "invalid haul destination";
    }
    const content = haul.content;
    if (content.kind === ContentKind.RESOURCE) {
      return isResourceType(content.resource) ? null : "unknown haul resource";
    }
    if (!content.instanceId) return "haul item needs an instance id";
    return haul.quantity === 1 ? null : "item hauls carry one instance";
  }

  public get(jobId: string): Job | undefined {
    return this.jobs.get(jobId);
  }

  /** All jobs in insertion order. */
  public getAll(): Job[] {
    return Array.from(this.jobs.values());
  }

  public get size(): number {
    return this.jobs.size;
  }

  /**
   * Unclaimed jobs the agent may take, by priority desc then insertion
   * order. Materials get a cheap existence check; nothing is reserved.
   */
  public queryCandidates(agent: Agent): Job[] {
    const now = this.clock.now;
    const candidates = this.getAll().filter(
      (job) =>
        job.claimant === null &&
        !job.cancelRequested &&
        job.cooldownUntilTick <= now &&
        agent.enabledJobTypes.includes(job.type) &&
        (job.metadata.assigneeId === undefined ||
          job.metadata.assigneeId === agent.id) &&
        this.materialsPlausible(job),
    );
    return candidates.sort((a, b) => b.priority - a.priority || a.seq - b.seq);
  }

  private materialsPlausible(job: Job): boolean {
    const materials = job.metadata.materials;
    if (!materials) return true;
    return materials.every(
      (requirement) =>
        this.reservations.countAvailable(requirement.selector) >=
        requirement.quantity,
    );
  }

  /**
   * Compare-and-set on the claimant. True only when the job was unclaimed.
   */
  public claim(jobId: string, agentId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || job.claimant !== null || job.cancelRequested) return false;

    const now = this.clock.now;
    job.claimant = agentId;
    job.claimTick = now;
    job.lastActivityTick = now;
    job.status = JobStatus.CLAIMED;
    job.blockedReason = null;
    job.blockedSinceTick = null;

    this.events.publish(SchedulerEventType.JOB_CLAIMED, {
      jobId,
      jobType: job.type,
      tick: now,
      agentId,
    });
    return true;
  }

  /**
   * Clears the claim and keeps the job with its progress. Only the claimant
   * may release.
   */
  public release(
    jobId: string,
    agentId: string,
    options: ReleaseOptions = {},
  ): boolean {
    const job = this.jobs.get(jobId);
    if (!job || job.claimant !== agentId) return false;

    const now = this.clock.now;
    const cooldownTicks = Math.max(0, options.cooldownTicks ?? 0);
    this.unclaim(job, now);
    if (cooldownTicks > 0) job.cooldownUntilTick = now + cooldownTicks;

    this.events.publish(SchedulerEventType.JOB_RELEASED, {
      jobId,
      jobType: job.type,
      tick: now,
      agentId,
      cooldownTicks,
    });
    return true;
  }

  private unclaim(job: Job, now: number): void {
    job.claimant = null;
    job.claimTick = null;
    job.status = JobStatus.PENDING;
    job.blockedReason = null;
    job.blockedSinceTick = null;
    job.lastActivityTick = now;
  }

  /**
   * Adds work and counts as activity. Returns the clamped progress.
   */
  public addProgress(jobId: string, amount: number): number {
    const job = this.jobs.get(jobId);
    if (!job) return 0;
    if (Number.isFinite(amount) && amount > 0) {
      job.accumulatedProgress = Math.min(
        job.requiredProgress,
        job.accumulatedProgress + amount,
      );
    }
    job.lastActivityTick = this.clock.now;
    return job.accumulatedProgress;
  }

  /** Marks the claim alive without progress. */
  public heartbeat(jobId: string): void {
    const job = this.jobs.get(jobId);
    if (job) job.lastActivityTick = this.clock.now;
  }

  public markInProgress(jobId: string): void {
    const job = this.jobs.get(jobId);
    if (!job || job.claimant === null) return;
    job.status = JobStatus.IN_PROGRESS;
    job.blockedReason = null;
    job.blockedSinceTick = null;
    job.lastActivityTick = this.clock.now;
  }

  /**
   * Flags a claimed job as blocked. The event fires when the reason
   * changes, not every tick.
   */
  public markBlocked(jobId: string, reason: BlockedReason): void {
    const job = this.jobs.get(jobId);
    if (!job || job.claimant === null) return;

    const now = this.clock.now;
    job.lastActivityTick = now;
    if (job.status === JobStatus.BLOCKED && job.blockedReason === reason) {
      return;
    }

    job.status = JobStatus.BLOCKED;
    job.blockedReason = reason;
    job.blockedSinceTick = now;
    this.events.publish(SchedulerEventType.JOB_BLOCKED, {
      jobId,
      jobType: job.type,
      tick: now,
      reason,
    });
    logger.debug(`Job ${jobId} blocked: ${reason}`, LogCategory.JOBS);
  }

  public updateMetadata(jobId: string, patch: Partial<JobMetadata>): boolean {
    const job = this.jobs.get(jobId);
    if (!job) return false;
    job.metadata = { ...job.metadata, ...structuredClone(patch) };
    return true;
  }

  public setPriority(jobId: string, priority: number): boolean {
    const job = this.jobs.get(jobId);
    if (!job || !Number.isFinite(priority)) return false;
    job.priority = priority;
    return true;
  }

  /**
   * External cancellation. An unclaimed job goes away now; a claimed one is
   * flagged and its claimant abandons it on its next update.
   */
  public cancel(jobId: string): CancelOutcome {
    const job = this.jobs.get(jobId);
    if (!job) return CancelOutcome.NOT_FOUND;

    if (job.claimant === null) {
      this.remove(jobId, JobRemovalReason.CANCELLED);
      return CancelOutcome.REMOVED;
    }

    job.cancelRequested = true;
    this.events.publish(SchedulerEventType.JOB_CANCEL_REQUESTED, {
      jobId,
      jobType: job.type,
      tick: this.clock.now,
      agentId: job.claimant,
    });
    return CancelOutcome.REQUESTED;
  }

  /**
   * Removes a job completed by its claimant.
   */
  public complete(jobId: string, agentId: string): Job | null {
    const job = this.jobs.get(jobId);
    if (!job || job.claimant !== agentId) {
      logger.error(
        `Completion of ${jobId} by ${agentId} rejected: not the claimant`,
        LogCategory.JOBS,
      );
      return null;
    }

    this.events.publish(SchedulerEventType.JOB_COMPLETED, {
      jobId,
      jobType: job.type,
      tick: this.clock.now,
      agentId,
      craftOrderId: job.metadata.craftOrderId,
    });
    this.remove(jobId, JobRemovalReason.COMPLETED);
    return job;
  }

  /**
   * Deletes the job and cancels every reservation it owns.
   */
  public remove(jobId: string, reason: JobRemovalReason): boolean {
    const job = this.jobs.get(jobId);
    if (!job) return false;

    this.jobs.delete(jobId);
    this.reservations.cancelAllForOwner(jobId);

    switch (reason) {
      case JobRemovalReason.COMPLETED:
        this.counters.completed++;
        break;
      case JobRemovalReason.EXPIRED:
        this.counters.expired++;
        break;
      case JobRemovalReason.ABANDONED:
      case JobRemovalReason.CANCELLED:
        this.counters.abandoned++;
        break;
    }

    this.events.publish(SchedulerEventType.JOB_REMOVED, {
      jobId,
      jobType: job.type,
      tick: this.clock.now,
      reason,
      location: clonePosition(job.location),
      craftOrderId: job.metadata.craftOrderId,
    });
    logger.debug(`Job ${jobId} removed (${reason})`, LogCategory.JOBS);
    return true;
  }

  /**
   * Liveness sweep. Force-releases claims idle for more than `maxAge` ticks,
   * cancelling every reservation the job owns, and removes unclaimed jobs
   * older than the configured unclaimed age. Returns affected job ids.
   */
  public expireStale(maxAge: number = this.config.staleClaimMaxAge): string[] {
    const now = this.clock.now;
    const affected: string[] = [];
    const maxUnclaimedAge = this.config.maxUnclaimedAge;

    for (const job of this.getAll()) {
      const idle = now - job.lastActivityTick;

      if (job.claimant !== null) {
        if (idle <= maxAge) continue;

        const agentId = job.claimant;
        this.reservations.cancelAllForOwner(job.id);
        this.unclaim(job, now);
        this.counters.staleClaimsRecovered++;
        affected.push(job.id);

        this.events.publish(SchedulerEventType.STALE_CLAIM_RECOVERED, {
          jobId: job.id,
          jobType: job.type,
          tick: now,
          agentId,
          idleTicks: idle,
        });
        logger.warn(
          `Stale claim on ${job.id} by ${agentId} released after ${idle} idle ticks`,
          LogCategory.JOBS,
        );
        continue;
      }

      if (maxUnclaimedAge > 0 && idle > maxUnclaimedAge) {
        this.remove(job.id, JobRemovalReason.EXPIRED);
        affected.push(job.id);
      }
    }
    return affected;
  }

  public queryByStatus(status?: JobStatus, reason?: BlockedReason): Job[] {
    return this.getAll().filter(
      (job) =>
        (status === undefined || job.status === status) &&
        (reason === undefined || job.blockedReason === reason),
    );
  }

  /** Blocked jobs, optionally narrowed to one reason. */
  public getStalledJobs(reason?: BlockedReason): Job[] {
    return this.queryByStatus(JobStatus.BLOCKED, reason);
  }

  public find(predicate: (job: Job) => boolean): Job | undefined {
    for (const job of this.jobs.values()) {
      if (predicate(job)) return job;
    }
    return undefined;
  }

  public getStats(): JobStats {
    const now = this.clock.now;
    const byStatus: Record<JobStatus, number> = {
      [JobStatus.PENDING]: 0,
      [JobStatus.CLAIMED]: 0,
      [JobStatus.IN_PROGRESS]: 0,
      [JobStatus.BLOCKED]: 0,
    };
    const byType: Record<JobType, number> = {
      [JobType.BUILD]: 0,
      [JobType.HAUL]: 0,
      [JobType.CRAFT]: 0,
      [JobType.HARVEST]: 0,
      [JobType.SALVAGE]: 0,
      [JobType.HUNT]: 0,
      [JobType.EQUIP]: 0,
    };
    const blockedByReason: Record<BlockedReason, number> = {
      [BlockedReason.MISSING_MATERIALS]: 0,
      [BlockedReason.NO_STORAGE]: 0,
      [BlockedReason.INVALID_TARGET]: 0,
    };
    let onCooldown = 0;

    for (const job of this.jobs.values()) {
      byStatus[job.status]++;
      byType[job.type]++;
      if (job.blockedReason) blockedByReason[job.blockedReason]++;
      if (job.claimant === null && job.cooldownUntilTick > now) onCooldown++;
    }

    return {
      total: this.jobs.size,
      byStatus,
      byType,
      blockedByReason,
      onCooldown,
      ...this.counters,
    };
  }

  public snapshot(): JobRegistrySnapshot {
    return structuredClone({
      jobs: this.getAll(),
      nextSeq: this.nextSeq,
      counters: this.counters,
    });
  }

  public restore(snapshot: JobRegistrySnapshot): void {
    const data = structuredClone(snapshot);
    this.jobs = new Map(data.jobs.map((job) => [job.id, job]));
    this.nextSeq = data.nextSeq;
    this.counters = data.counters;
  }
}
