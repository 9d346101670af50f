/**
 * Colonists and their execution-facing state.
 *
 * The registry owns agent records; the execution system mutates them in
 * place during its update. Records are plain data so snapshots are a
 * structured clone.
 *
 * @module domain/simulation/systems/agents
 */
import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { AgentState } from "../../../../shared/constants/AgentEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import { ALL_JOB_TYPES } from "../../../../shared/constants/JobEnums";
import type {
  Agent,
  AgentRegistrySnapshot,
  AgentSpawnParams,
} from "../../../../shared/types/simulation/agents";
import { clonePosition, isPosition3D } from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { SimulationClock } from "../../core/SimulationClock";
import { TraitGenerator } from "./TraitGenerator";

const MAX_HEALTH = 100;

@injectable()
export class AgentRegistry {
  private agents = new Map<string, Agent>();
  private nextSeq = 0;

  constructor(
    @inject(TYPES.TraitGenerator) private readonly traits: TraitGenerator,
    @inject(TYPES.SimulationClock) private readonly clock: SimulationClock,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {}

  public spawn(params: AgentSpawnParams): Agent | null {
    if (!isPosition3D(params.position)) {
      logger.warn("Agent spawn rejected: invalid position", LogCategory.AGENTS);
      return null;
    }

    this.nextSeq++;
    const agent: Agent = {
      id: `agent_${this.nextSeq}`,
      name: params.name ?? `Colonist ${this.nextSeq}`,
      position: clonePosition(params.position),
      state: AgentState.IDLE,
      currentJobId: null,
      enabledJobTypes: [...(params.enabledJobTypes ?? ALL_JOB_TYPES)],
      traits: params.traits ?? this.traits.roll(),
      needs: {
        hunger: params.needs?.hunger ?? 0,
        fatigue: params.needs?.fatigue ?? 0,
      },
      health: MAX_HEALTH,
      alive: true,
      route: [],
      moveTarget: null,
      movePoints: 0,
      rerouteAttempts: 0,
      carrying: null,
      blockedTicks: 0,
      equipment: {},
      mealReservationId: null,
      nextMealAttemptTick: 0,
      lastStateChangeTick: this.clock.now,
    };

    this.agents.set(agent.id, agent);
    this.events.publish(SchedulerEventType.AGENT_SPAWNED, {
      agentId: agent.id,
      position: clonePosition(agent.position),
    });
    logger.info(`Agent ${agent.id} (${agent.name}) spawned`, LogCategory.AGENTS);
    return agent;
  }

  public get(agentId: string): Agent | undefined {
    return this.agents.get(agentId);
  }

  /** Agents in spawn order. */
  public getAll(): Agent[] {
    return Array.from(this.agents.values());
  }

  public getLiving(): Agent[] {
    return this.getAll().filter((agent) => agent.alive);
  }

  public get size(): number {
    return this.agents.size;
  }

  public setEnabledJobTypes(
    agentId: string,
    types: Agent["enabledJobTypes"],
  ): boolean {
    const agent = this.agents.get(agentId);
    if (!agent) return false;
    agent.enabledJobTypes = Array.from(new Set(types));
    return true;
  }

  public snapshot(): AgentRegistrySnapshot {
    return structuredClone({ agents: this.getAll(), nextSeq: this.nextSeq });
  }

  public restore(snapshot: AgentRegistrySnapshot): void {
    const data = structuredClone(snapshot);
    this.agents = new Map(data.agents.map((agent) => [agent.id, agent]));
    this.nextSeq = data.nextSeq;
  }
}
