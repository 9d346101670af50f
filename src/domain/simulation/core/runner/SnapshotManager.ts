import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { SNAPSHOT_VERSION } from "../../../../shared/constants/SchedulerConstants";
import {
  decodeMessage,
  encodeMsgPack,
} from "../../../../shared/MessagePackCodec";
import type { SchedulerSnapshot } from "../../../../shared/types/simulation/snapshot";
import { isTraitRngState } from "../../systems/agents/TraitGenerator";
import type { SimulationRunner } from "../SimulationRunner";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasArrays(value: unknown, ...fields: string[]): boolean {
  return (
    isRecord(value) && fields.every((field) => Array.isArray(value[field]))
  );
}

/**
 * Structural check of a decoded snapshot. Section contents are trusted once
 * the version and the section layout match.
 */
export function isSchedulerSnapshot(value: unknown): value is SchedulerSnapshot {
  if (!isRecord(value)) return false;
  return (
    value.version === SNAPSHOT_VERSION &&
    Number.isInteger(value.tick) &&
    Number.isInteger(value.itemSeq) &&
    hasArrays(value.jobs, "jobs") &&
    hasArrays(value.reservations, "active", "settled") &&
    hasArrays(value.stockpiles, "zones", "cells") &&
    hasArrays(value.agents, "agents") &&
    hasArrays(value.world, "tiles", "underlying") &&
    hasArrays(value.nodes, "nodes") &&
    hasArrays(value.animals, "animals") &&
    hasArrays(value.craftOrders, "orders") &&
    isTraitRngState(value.traitRng)
  );
}

/**
 * Captures and restores the whole scheduler at a tick boundary.
 */
export class SnapshotManager {
  constructor(private readonly runner: SimulationRunner) {}

  public capture(): SchedulerSnapshot {
    const r = this.runner;
    return structuredClone({
      version: SNAPSHOT_VERSION,
      tick: r.clock.now,
      jobs: r.jobs.snapshot(),
      reservations: r.reservations.snapshot(),
      stockpiles: r.stockpiles.snapshot(),
      agents: r.agents.snapshot(),
      world: r.world.snapshot(),
      nodes: r.nodes.snapshot(),
      animals: r.animals.snapshot(),
      craftOrders: r.craftOrders.snapshot(),
      itemSeq: r.itemFactory.sequence,
      traitRng: r.traits.snapshot(),
    });
  }

  /**
   * Replaces the live state. Stockpiles go in before reservations, which
   * point into their cells.
   */
  public restore(snapshot: SchedulerSnapshot): void {
    const r = this.runner;
    r.events.clearQueue();

    r.clock.restore(snapshot.tick);
    logger.setTick(snapshot.tick);
    r.world.restore(snapshot.world);
    r.stockpiles.restore(snapshot.stockpiles);
    r.reservations.restore(snapshot.reservations);
    r.jobs.restore(snapshot.jobs);
    r.agents.restore(snapshot.agents);
    r.nodes.restore(snapshot.nodes);
    r.animals.restore(snapshot.animals);
    r.craftOrders.restore(snapshot.craftOrders);
    r.itemFactory.restore(snapshot.itemSeq);
    r.traits.restore(snapshot.traitRng);

    logger.info(
      `Snapshot restored at tick ${snapshot.tick}: ${snapshot.jobs.jobs.length} jobs, ${snapshot.agents.agents.length} agents`,
      LogCategory.PERSISTENCE,
    );
  }

  public encode(): Buffer {
    return encodeMsgPack(this.capture());
  }

  public decode(raw: Buffer | ArrayBuffer | string): SchedulerSnapshot | null {
    let decoded: unknown;
    try {
      decoded = decodeMessage(raw);
    } catch (error) {
      logger.warn(
        `Snapshot payload unreadable: ${error instanceof Error ? error.message : String(error)}`,
        LogCategory.PERSISTENCE,
      );
      return null;
    }

    if (!isSchedulerSnapshot(decoded)) {
      logger.warn(
        "Snapshot rejected: unknown version or layout",
        LogCategory.PERSISTENCE,
      );
      return null;
    }
    return decoded;
  }
}
