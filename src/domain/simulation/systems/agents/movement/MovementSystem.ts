import { inject, injectable } from "inversify";
import { TYPES } from "../../../../../config/Types";
import { logger, LogLevel } from "../../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../../shared/constants/LogEnums";
import { InteractionRange } from "../../../../../shared/constants/AgentEnums";
import { MoveStepStatus } from "../../../../../shared/constants/ProgressEnums";
import type {
  Agent,
  MoveTarget,
} from "../../../../../shared/types/simulation/agents";
import type { Position3D } from "../../../../../shared/types/geometry";
import {
  clonePosition,
  isAdjacent,
  manhattan2D,
  neighbours,
  samePosition,
} from "../../../../../shared/utils/geometry";
import type { Pathfinder } from "../../../ports/Pathfinder";

/** Replans allowed per route before the move counts as blocked. */
const MAX_REROUTES = 1;

/**
 * Tile-by-tile movement along precomputed routes.
 *
 * Speeds below one tile per tick accumulate move points, so an agent with
 * speed 0.5 advances every other tick. A route that runs into a tile that
 * became unwalkable is replanned once; after that the step reports BLOCKED.
 */
@injectable()
export class MovementSystem {
  constructor(
    @inject(TYPES.Pathfinder) private readonly pathfinder: Pathfinder,
  ) {}

  public inRange(position: Position3D, target: MoveTarget): boolean {
    return target.range === InteractionRange.EXACT
      ? samePosition(position, target.position)
      : isAdjacent(position, target.position);
  }

  /**
   * Computes a route to the target and stores it on the agent. False when
   * no route exists.
   */
  public planRoute(agent: Agent, target: MoveTarget): boolean {
    agent.moveTarget = {
      position: clonePosition(target.position),
      range: target.range,
    };
    agent.rerouteAttempts = 0;
    return this.replan(agent, agent.moveTarget);
  }

  private replan(agent: Agent, target: MoveTarget): boolean {
    agent.route = [];
    if (this.inRange(agent.position, target)) return true;

    for (const goal of this.goalsFor(agent.position, target)) {
      const result = this.pathfinder.findRoute(agent.position, goal);
      if (result.success) {
        agent.route = result.path;
        return true;
      }
    }

    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.MOVEMENT,
      agent.id,
      `no route to ${target.position.x},${target.position.y},${target.position.z}`,
    );
    return false;
  }

  /**
   * Tiles that satisfy the target range, nearest first.
   */
  private goalsFor(from: Position3D, target: MoveTarget): Position3D[] {
    if (target.range === InteractionRange.EXACT) return [target.position];

    return neighbours(target.position)
      .filter((tile) => this.pathfinder.isWalkable(tile))
      .sort((a, b) => manhattan2D(from, a) - manhattan2D(from, b));
  }

  /**
   * Advances the agent along its route for one tick.
   */
  public step(agent: Agent): MoveStepStatus {
    const target = agent.moveTarget;
    if (!target || this.inRange(agent.position, target)) {
      this.clear(agent);
      return MoveStepStatus.ARRIVED;
    }

    agent.movePoints += agent.traits.moveSpeed;
    while (agent.movePoints >= 1) {
      const next = agent.route[0];
      if (!next) {
        if (!this.reroute(agent, target)) return MoveStepStatus.BLOCKED;
        continue;
      }
      if (!this.pathfinder.isWalkable(next)) {
        if (!this.reroute(agent, target)) return MoveStepStatus.BLOCKED;
        continue;
      }

      agent.position = clonePosition(next);
      agent.route.shift();
      agent.movePoints -= 1;

      if (this.inRange(agent.position, target)) {
        this.clear(agent);
        return MoveStepStatus.ARRIVED;
      }
    }
    return MoveStepStatus.MOVING;
  }

  private reroute(agent: Agent, target: MoveTarget): boolean {
    if (agent.rerouteAttempts >= MAX_REROUTES) {
      agent.movePoints = 0;
      return false;
    }
    agent.rerouteAttempts++;
    if (this.replan(agent, target) && agent.route.length > 0) return true;
    agent.movePoints = 0;
    return false;
  }

  /** Drops the route and leftover move points. */
  public clear(agent: Agent): void {
    agent.route = [];
    agent.moveTarget = null;
    agent.movePoints = 0;
    agent.rerouteAttempts = 0;
  }
}
