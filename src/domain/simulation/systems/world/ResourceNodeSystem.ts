import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { SchedulerEventType } from "../../../../shared/constants/EventEnums";
import { JobRemovalReason } from "../../../../shared/constants/JobEnums";
import type { ResourceNodeKind } from "../../../../shared/constants/ResourceEnums";
import { NODE_DEFINITIONS } from "../../../../shared/constants/WorldConstants";
import type { Position3D } from "../../../../shared/types/geometry";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type {
  ResourceNode,
  ResourceNodeSnapshot,
} from "../../../../shared/types/simulation/world";
import {
  clonePosition,
  samePosition,
} from "../../../../shared/utils/geometry";
import { BatchedEventEmitter } from "../../core/BatchedEventEmitter";
import { SimulationClock } from "../../core/SimulationClock";
import { JobRegistry } from "../jobs/JobRegistry";
import { WorldGrid } from "./WorldGrid";

/**
 * Harvestable and salvageable nodes.
 *
 * A designated node keeps one open job while it has yield left. Finite
 * nodes disappear when depleted; regrowing nodes turn into their depleted
 * tile and come back after `regrowTicks`.
 */
@injectable()
export class ResourceNodeSystem {
  private nodes = new Map<string, ResourceNode>();
  private nextSeq = 0;

  constructor(
    @inject(TYPES.WorldGrid) private readonly world: WorldGrid,
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.SimulationClock) private readonly clock: SimulationClock,
    @inject(TYPES.EventBus) private readonly events: BatchedEventEmitter,
  ) {}

  public spawnNode(
    kind: ResourceNodeKind,
    position: Position3D,
  ): ResourceNode | null {
    if (!this.world.inBounds(position) || this.getAt(position)) return null;

    const definition = NODE_DEFINITIONS[kind];
    this.nextSeq++;
    const node: ResourceNode = {
      id: `node_${this.nextSeq}`,
      kind,
      position: clonePosition(position),
      resource: definition.resource,
      remaining: definition.maxYield,
      maxYield: definition.maxYield,
      yieldPerHarvest: definition.yieldPerHarvest,
      regrowTicks: definition.regrowTicks,
      regrowAtTick: null,
      designated: false,
    };
    this.nodes.set(node.id, node);
    this.world.setTile(position, definition.tile);
    return node;
  }

  public get(nodeId: string): ResourceNode | undefined {
    return this.nodes.get(nodeId);
  }

  public getAt(position: Position3D): ResourceNode | undefined {
    for (const node of this.nodes.values()) {
      if (samePosition(node.position, position)) return node;
    }
    return undefined;
  }

  public getAll(): ResourceNode[] {
    return Array.from(this.nodes.values());
  }

  /**
   * Marks the node for harvesting and opens its job.
   */
  public designate(nodeId: string, priority?: number): Job | null {
    const node = this.nodes.get(nodeId);
    if (!node) {
      logger.warn(`Designation of unknown node ${nodeId}`, LogCategory.WORLD);
      return null;
    }
    node.designated = true;
    return this.ensureJob(node, priority);
  }

  public undesignate(nodeId: string): boolean {
    const node = this.nodes.get(nodeId);
    if (!node) return false;
    node.designated = false;
    const open = this.openJobFor(nodeId);
    if (open) this.jobs.cancel(open.id);
    return true;
  }

  public openJobFor(nodeId: string): Job | undefined {
    return this.jobs.find((job) => job.metadata.nodeId === nodeId);
  }

  private ensureJob(node: ResourceNode, priority?: number): Job | null {
    if (node.remaining <= 0) return null;
    const existing = this.openJobFor(node.id);
    if (existing) return existing;

    return this.jobs.insert({
      type: NODE_DEFINITIONS[node.kind].jobType,
      location: node.position,
      targetEntityId: node.id,
      priority,
      subtype: node.kind,
      metadata: { nodeId: node.id },
    });
  }

  /**
   * Takes up to `amount` from the node. Returns what was taken.
   */
  public extract(nodeId: string, amount: number): number {
    const node = this.nodes.get(nodeId);
    if (!node || amount <= 0) return 0;

    const taken = Math.min(node.remaining, amount);
    node.remaining -= taken;
    if (node.remaining > 0) return taken;

    const definition = NODE_DEFINITIONS[node.kind];
    this.world.setTile(node.position, definition.depletedTile);
    this.events.publish(SchedulerEventType.NODE_DEPLETED, {
      nodeId,
      position: clonePosition(node.position),
    });

    if (node.regrowTicks > 0) {
      node.regrowAtTick = this.clock.now + node.regrowTicks;
    } else {
      this.nodes.delete(nodeId);
      const open = this.openJobFor(nodeId);
      if (open && open.claimant === null) {
        this.jobs.remove(open.id, JobRemovalReason.CANCELLED);
      }
    }
    logger.debug(`Node ${nodeId} depleted`, LogCategory.WORLD);
    return taken;
  }

  /**
   * Regrowth timers, then one open job per designated node with yield.
   */
  public update(): void {
    const now = this.clock.now;
    for (const node of this.nodes.values()) {
      if (node.regrowAtTick !== null && now >= node.regrowAtTick) {
        node.remaining = node.maxYield;
        node.regrowAtTick = null;
        this.world.setTile(node.position, NODE_DEFINITIONS[node.kind].tile);
        this.events.publish(SchedulerEventType.NODE_REGROWN, {
          nodeId: node.id,
          resource: node.resource,
        });
      }
      if (node.designated) this.ensureJob(node);
    }
  }

  public snapshot(): ResourceNodeSnapshot {
    return structuredClone({ nodes: this.getAll(), nextSeq: this.nextSeq });
  }

  public restore(snapshot: ResourceNodeSnapshot): void {
    const data = structuredClone(snapshot);
    this.nodes = new Map(data.nodes.map((node) => [node.id, node]));
    this.nextSeq = data.nextSeq;
  }
}
