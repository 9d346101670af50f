import { inject, injectable, optional } from "inversify";
import { TYPES } from "../../../../config/Types";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
} from "../../../../config/config";
import { logger, LogLevel } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import {
  AgentState,
  InteractionRange,
} from "../../../../shared/constants/AgentEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import {
  AbandonReason,
  BlockedReason,
  JobRemovalReason,
} from "../../../../shared/constants/JobEnums";
import {
  MoveStepStatus,
  ProgressStatus,
} from "../../../../shared/constants/ProgressEnums";
import { SelectorKind } from "../../../../shared/constants/ResourceEnums";
import type { Agent, MoveTarget } from "../../../../shared/types/simulation/agents";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type { MaterialSelector } from "../../../../shared/types/simulation/stockpiles";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { SimulationClock } from "../../core/SimulationClock";
import { EngineRegistry } from "../engines/EngineRegistry";
import type { ProgressResult } from "../engines/ExecutionEngine";
import { ClaimProtocol } from "../jobs/ClaimProtocol";
import { JobRegistry } from "../jobs/JobRegistry";
import {
  MATERIAL_SCOPE,
  ResourceReservationSystem,
} from "../stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../stockpiles/StockpileSystem";
import { AgentRegistry } from "./AgentRegistry";
import { MovementSystem } from "./movement/MovementSystem";
import { NeedsSystem } from "./needs/NeedsSystem";

export const MEAL_SELECTOR: MaterialSelector = {
  kind: SelectorKind.TAGS,
  tags: ["edible"],
};

export function mealOwnerId(agentId: string): string {
  return `agent:${agentId}:meal`;
}

/**
 * Per-agent execution machine.
 *
 * Idle → Evaluating → Moving → Executing → Completing | Abandoning → Idle,
 * with Preempted entered from any state when the agent gets hungry and food
 * exists. Agents update in spawn order, so claim races resolve by that
 * order. Shared state is only touched through the job registry and the
 * reservation layer.
 *
 * An error inside one agent's update is logged and the agent is abandoned
 * back to Idle; the rest of the tick goes on.
 */
@injectable()
export class AgentExecutionSystem {
  constructor(
    @inject(TYPES.AgentRegistry) private readonly agents: AgentRegistry,
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.ClaimProtocol) private readonly claims: ClaimProtocol,
    @inject(TYPES.ResourceReservationSystem)
    private readonly reservations: ResourceReservationSystem,
    @inject(TYPES.StockpileSystem) private readonly stockpiles: StockpileSystem,
    @inject(TYPES.MovementSystem) private readonly movement: MovementSystem,
    @inject(TYPES.NeedsSystem) private readonly needs: NeedsSystem,
    @inject(TYPES.EngineRegistry) private readonly engines: EngineRegistry,
    @inject(TYPES.SimulationClock) private readonly clock: SimulationClock,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
    @inject(TYPES.SchedulerConfig)
    @optional()
    private readonly config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  ) {}

  public update(): void {
    for (const agent of this.agents.getAll()) {
      if (!agent.alive) continue;
      try {
        this.updateAgent(agent);
      } catch (error) {
        logger.error(
          `Agent ${agent.id} update failed in ${agent.state}: ${error instanceof Error ? error.message : String(error)}`,
          LogCategory.AGENTS,
          { jobId: agent.currentJobId },
        );
        this.recover(agent);
      }
    }
  }

  public updateAgent(agent: Agent): void {
    const working = agent.state === AgentState.EXECUTING;
    if (!this.needs.update(agent, working)) {
      this.kill(agent, "starvation");
      return;
    }

    if (agent.state === AgentState.PREEMPTED) {
      this.updateMeal(agent);
      return;
    }
    if (this.shouldPreempt(agent)) {
      this.preempt(agent);
      return;
    }

    switch (agent.state) {
      case AgentState.IDLE:
      case AgentState.EVALUATING:
        this.evaluate(agent);
        break;
      case AgentState.MOVING:
        this.move(agent);
        break;
      case AgentState.EXECUTING:
        this.execute(agent);
        break;
      default:
        this.setState(agent, AgentState.IDLE);
    }
  }

  private setState(agent: Agent, to: AgentState): void {
    const from = agent.state;
    if (from === to) return;
    agent.state = to;
    agent.lastStateChangeTick = this.clock.now;
    this.events.publish(SchedulerEventType.AGENT_STATE_CHANGED, {
      agentId: agent.id,
      from,
      to,
      tick: this.clock.now,
    });
  }

  // ---------------------------------------------------------------------------
  // Idle / Evaluating
  // ---------------------------------------------------------------------------

  private evaluate(agent: Agent): void {
    this.setState(agent, AgentState.EVALUATING);
    const job = this.claims.tryClaim(agent);
    if (!job) {
      this.setState(agent, AgentState.IDLE);
      return;
    }

    agent.currentJobId = job.id;
    agent.blockedTicks = 0;
    const target = this.engines.get(job.type)?.interactionTarget(agent, job);
    if (!target) {
      this.abandon(agent, AbandonReason.INVALID_TARGET);
      return;
    }
    this.goTo(agent, target);
  }

  private goTo(agent: Agent, target: MoveTarget): void {
    if (this.movement.inRange(agent.position, target)) {
      this.movement.clear(agent);
      this.setState(agent, AgentState.EXECUTING);
      return;
    }
    if (!this.movement.planRoute(agent, target)) {
      this.abandon(agent, AbandonReason.UNREACHABLE);
      return;
    }
    this.setState(agent, AgentState.MOVING);
  }

  // ---------------------------------------------------------------------------
  // Moving / Executing
  // ---------------------------------------------------------------------------

  /**
   * The agent's job while it still holds the claim. Otherwise the agent is
   * abandoned and null is returned.
   */
  private ownedJob(agent: Agent): Job | null {
    const job = agent.currentJobId ? this.jobs.get(agent.currentJobId) : undefined;
    if (!job || job.claimant !== agent.id) {
      this.abandon(agent, AbandonReason.LOST_CLAIM);
      return null;
    }
    if (job.cancelRequested) {
      this.abandon(agent, AbandonReason.CANCELLED);
      return null;
    }
    return job;
  }

  private move(agent: Agent): void {
    const job = this.ownedJob(agent);
    if (!job) return;

    this.jobs.heartbeat(job.id);
    switch (this.movement.step(agent)) {
      case MoveStepStatus.ARRIVED:
        this.setState(agent, AgentState.EXECUTING);
        break;
      case MoveStepStatus.BLOCKED:
        this.abandon(agent, AbandonReason.UNREACHABLE);
        break;
      case MoveStepStatus.MOVING:
        break;
    }
  }

  private execute(agent: Agent): void {
    const job = this.ownedJob(agent);
    if (!job) return;

    const engine = this.engines.get(job.type);
    if (!engine) {
      this.abandon(agent, AbandonReason.INVALID_TARGET);
      return;
    }

    const delta =
      this.config.baseWorkPerTick *
      agent.traits.workSpeed *
      this.needs.workMultiplier(agent);
    this.handleProgress(agent, job, engine.advance(agent, job, delta));
  }

  private handleProgress(agent: Agent, job: Job, result: ProgressResult): void {
    switch (result.status) {
      case ProgressStatus.CONTINUING:
        agent.blockedTicks = 0;
        this.jobs.markInProgress(job.id);
        return;
      case ProgressStatus.COMPLETED:
        this.completeJob(agent, job);
        return;
      case ProgressStatus.REPOSITION:
        this.jobs.heartbeat(job.id);
        this.goTo(agent, result.target);
        return;
      case ProgressStatus.BLOCKED:
        this.handleBlocked(agent, job, result.reason);
        return;
    }
  }

  private handleBlocked(agent: Agent, job: Job, reason: BlockedReason): void {
    switch (reason) {
      case BlockedReason.INVALID_TARGET:
        this.abandon(agent, AbandonReason.INVALID_TARGET);
        return;
      case BlockedReason.MISSING_MATERIALS:
        this.jobs.markBlocked(job.id, reason);
        agent.blockedTicks++;
        if (agent.blockedTicks > this.config.missingMaterialsMaxWait) {
          this.abandon(agent, AbandonReason.MISSING_MATERIALS);
        }
        return;
      case BlockedReason.NO_STORAGE:
        // Held until storage frees up.
        this.jobs.markBlocked(job.id, reason);
        return;
    }
  }

  private completeJob(agent: Agent, job: Job): void {
    this.setState(agent, AgentState.COMPLETING);
    this.jobs.complete(job.id, agent.id);
    logger.agentLog(
      LogLevel.INFO,
      LogCategory.AGENTS,
      agent.id,
      `completed ${job.id} (${job.type})`,
    );
    this.resetJobState(agent);
    this.setState(agent, AgentState.IDLE);
  }

  // ---------------------------------------------------------------------------
  // Abandoning
  // ---------------------------------------------------------------------------

  /**
   * Gives the job up. Reservations are cancelled and any payload goes to the
   * ground. Cancelled, invalid and non-requeueable jobs are removed; the
   * rest return to the pool, some with a cooldown. A preempted job always
   * returns to the pool.
   */
  public abandon(agent: Agent, reason: AbandonReason): void {
    this.setState(agent, AgentState.ABANDONING);

    const job = agent.currentJobId ? this.jobs.get(agent.currentJobId) : undefined;
    if (job && job.claimant === agent.id) {
      this.reservations.cancelAllForOwner(job.id);
      this.events.publish(SchedulerEventType.JOB_ABANDONED, {
        jobId: job.id,
        jobType: job.type,
        tick: this.clock.now,
        agentId: agent.id,
        reason,
      });

      if (reason === AbandonReason.CANCELLED) {
        this.jobs.remove(job.id, JobRemovalReason.CANCELLED);
      } else if (
        reason === AbandonReason.INVALID_TARGET ||
        (!job.requeueable && reason !== AbandonReason.PREEMPTED)
      ) {
        this.jobs.remove(job.id, JobRemovalReason.ABANDONED);
      } else {
        this.jobs.release(job.id, agent.id, {
          cooldownTicks: this.cooldownFor(reason),
        });
      }
    }

    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.AGENTS,
      agent.id,
      `abandoned ${agent.currentJobId ?? "job"}: ${reason}`,
    );
    this.dropPayload(agent);
    this.resetJobState(agent);
    this.setState(agent, AgentState.IDLE);
  }

  private cooldownFor(reason: AbandonReason): number {
    switch (reason) {
      case AbandonReason.UNREACHABLE:
        return this.config.unreachableCooldownTicks;
      case AbandonReason.MISSING_MATERIALS:
        return this.config.missingMaterialsCooldownTicks;
      default:
        return 0;
    }
  }

  private dropPayload(agent: Agent): void {
    if (!agent.carrying) return;
    this.stockpiles.dropOnGround(agent.position, agent.carrying);
    agent.carrying = null;
  }

  private resetJobState(agent: Agent): void {
    agent.currentJobId = null;
    agent.blockedTicks = 0;
    this.movement.clear(agent);
  }

  private recover(agent: Agent): void {
    try {
      this.abandon(agent, AbandonReason.ERROR);
    } catch (error) {
      logger.error(
        `Recovery of ${agent.id} failed: ${error instanceof Error ? error.message : String(error)}`,
        LogCategory.AGENTS,
      );
      this.resetJobState(agent);
      agent.state = AgentState.IDLE;
    }
  }

  // ---------------------------------------------------------------------------
  // Preemption (meals)
  // ---------------------------------------------------------------------------

  private shouldPreempt(agent: Agent): boolean {
    return (
      this.needs.isHungry(agent) &&
      this.clock.now >= agent.nextMealAttemptTick &&
      this.reservations.countAvailable(MEAL_SELECTOR) > 0
    );
  }

  private preempt(agent: Agent): void {
    const jobId = agent.currentJobId;
    if (jobId) this.abandon(agent, AbandonReason.PREEMPTED);
    this.events.publish(SchedulerEventType.AGENT_PREEMPTED, {
      agentId: agent.id,
      jobId,
      tick: this.clock.now,
    });

    const result = this.reservations.findAndReserve(
      MEAL_SELECTOR,
      1,
      mealOwnerId(agent.id),
      { ...MATERIAL_SCOPE, near: agent.position },
    );
    if (!result.success) {
      this.postponeMeal(agent);
      return;
    }

    const [reservation] = result.reservations;
    agent.mealReservationId = reservation.id;
    this.setState(agent, AgentState.PREEMPTED);
    if (!this.movement.planRoute(agent, this.mealTarget(reservation.position))) {
      this.abortMeal(agent);
    }
  }

  private mealTarget(position: MoveTarget["position"]): MoveTarget {
    return { position, range: InteractionRange.ADJACENT };
  }

  private updateMeal(agent: Agent): void {
    const reservation = agent.mealReservationId
      ? this.reservations.getReservation(agent.mealReservationId)
      : undefined;
    if (!reservation) {
      this.abortMeal(agent);
      return;
    }

    const target = this.mealTarget(reservation.position);
    if (!this.movement.inRange(agent.position, target)) {
      const status = this.movement.step(agent);
      if (status === MoveStepStatus.BLOCKED) {
        this.abortMeal(agent);
        return;
      }
      if (status === MoveStepStatus.MOVING) return;
    }

    const committed = this.reservations.commitReservation(reservation.id);
    agent.mealReservationId = null;
    if (committed.success) {
      this.needs.eat(agent, committed.content);
    } else {
      this.postponeMeal(agent);
    }
    this.movement.clear(agent);
    this.setState(agent, AgentState.IDLE);
  }

  private abortMeal(agent: Agent): void {
    this.cancelMeal(agent);
    this.postponeMeal(agent);
    this.movement.clear(agent);
    this.setState(agent, AgentState.IDLE);
  }

  private cancelMeal(agent: Agent): void {
    if (agent.mealReservationId) {
      this.reservations.cancelAllForOwner(mealOwnerId(agent.id));
      agent.mealReservationId = null;
    }
  }

  private postponeMeal(agent: Agent): void {
    agent.nextMealAttemptTick = this.clock.now + this.config.mealRetryCooldownTicks;
  }

  // ---------------------------------------------------------------------------
  // Death
  // ---------------------------------------------------------------------------

  /**
   * The claim is left in place; the stale sweep recovers the job.
   */
  private kill(agent: Agent, cause: string): void {
    agent.alive = false;
    this.dropPayload(agent);
    this.cancelMeal(agent);
    this.movement.clear(agent);
    this.events.publish(SchedulerEventType.AGENT_DIED, {
      agentId: agent.id,
      tick: this.clock.now,
      cause,
    });
    logger.agentLog(LogLevel.WARN, LogCategory.AGENTS, agent.id, `died of ${cause}`);
  }
}
