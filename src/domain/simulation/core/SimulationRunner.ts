import { EventEmitter } from "node:events";
import { inject, injectable } from "inversify";
import { TYPES } from "../../../config/Types";
import type { SchedulerConfig } from "../../../config/config";
import { logger } from "../../../infrastructure/utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { JobStatus } from "../../../shared/constants/JobEnums";
import type { SimulationCommand } from "../../../shared/types/commands/SimulationCommand";
import type {
  SchedulerSnapshot,
  TickSummary,
} from "../../../shared/types/simulation/snapshot";
import { BatchedEventEmitter } from "./BatchedEventEmitter";
import { SimulationClock } from "./SimulationClock";
import { CommandProcessor } from "./runner/CommandProcessor";
import { SnapshotManager } from "./runner/SnapshotManager";
import { ColonyLoader } from "./runner/ColonyLoader";
import { JobRegistry } from "../systems/jobs/JobRegistry";
import { ResourceReservationSystem } from "../systems/stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../systems/stockpiles/StockpileSystem";
import { ItemFactory } from "../systems/stockpiles/ItemFactory";
import { AgentRegistry } from "../systems/agents/AgentRegistry";
import { AgentExecutionSystem } from "../systems/agents/AgentExecutionSystem";
import { TraitGenerator } from "../systems/agents/TraitGenerator";
import { WorldGrid } from "../systems/world/WorldGrid";
import { ResourceNodeSystem } from "../systems/world/ResourceNodeSystem";
import { AnimalSystem } from "../systems/world/AnimalSystem";
import { ConstructionSystem } from "../systems/structures/ConstructionSystem";
import { CraftOrderSystem } from "../systems/economy/CraftOrderSystem";
import { AutoHaulProducer } from "../systems/producers/AutoHaulProducer";
import { RelocationProducer } from "../systems/producers/RelocationProducer";

/**
 * Events the runner emits to its own listeners (WebSocket fan-out, tests).
 * Scheduler domain events go through the event bus instead.
 */
interface RunnerEvents {
  tick: [TickSummary];
  commandDropped: [SimulationCommand];
}

/**
 * Fixed-step tick loop.
 *
 * Each tick: apply queued operator commands, recover stale claims, let the
 * producers refresh the job pool, update agents in spawn order, then flush
 * the event bus. Nothing inside a tick waits on I/O.
 */
@injectable()
export class SimulationRunner {
  @inject(TYPES.SchedulerConfig) public readonly config!: SchedulerConfig;
  @inject(TYPES.SimulationClock) public readonly clock!: SimulationClock;
  @inject(TYPES.EventBus) public readonly events!: BatchedEventEmitter;

  @inject(TYPES.JobRegistry) public readonly jobs!: JobRegistry;
  @inject(TYPES.ResourceReservationSystem)
  public readonly reservations!: ResourceReservationSystem;
  @inject(TYPES.StockpileSystem) public readonly stockpiles!: StockpileSystem;
  @inject(TYPES.ItemFactory) public readonly itemFactory!: ItemFactory;

  @inject(TYPES.AgentRegistry) public readonly agents!: AgentRegistry;
  @inject(TYPES.AgentExecutionSystem)
  public readonly execution!: AgentExecutionSystem;
  @inject(TYPES.TraitGenerator) public readonly traits!: TraitGenerator;

  @inject(TYPES.WorldGrid) public readonly world!: WorldGrid;
  @inject(TYPES.ResourceNodeSystem) public readonly nodes!: ResourceNodeSystem;
  @inject(TYPES.AnimalSystem) public readonly animals!: AnimalSystem;
  @inject(TYPES.ConstructionSystem)
  public readonly construction!: ConstructionSystem;
  @inject(TYPES.CraftOrderSystem) public readonly craftOrders!: CraftOrderSystem;
  @inject(TYPES.AutoHaulProducer) public readonly autoHaul!: AutoHaulProducer;
  @inject(TYPES.RelocationProducer)
  public readonly relocation!: RelocationProducer;

  private readonly emitter = new EventEmitter();
  private readonly commands: SimulationCommand[] = [];
  private tickHandle?: NodeJS.Timeout;

  private readonly commandProcessor = new CommandProcessor(this);
  private readonly snapshotManager = new SnapshotManager(this);
  private readonly colonyLoader = new ColonyLoader(this);

  public on<K extends keyof RunnerEvents>(
    event: K,
    listener: (...args: RunnerEvents[K]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  public off<K extends keyof RunnerEvents>(
    event: K,
    listener: (...args: RunnerEvents[K]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  private emit<K extends keyof RunnerEvents>(
    event: K,
    ...args: RunnerEvents[K]
  ): void {
    this.emitter.emit(event, ...args);
  }

  /**
   * Queues a command for the next tick. A full queue drops its oldest entry.
   */
  public enqueueCommand(command: SimulationCommand): boolean {
    if (this.commands.length >= this.config.commandQueueLimit) {
      const dropped = this.commands.shift();
      if (dropped) {
        logger.warn(
          `Command queue full (${this.config.commandQueueLimit}), dropping oldest command: ${dropped.type}`,
          LogCategory.SIMULATION,
        );
        this.emit("commandDropped", dropped);
      }
    }
    this.commands.push(command);
    return true;
  }

  public get pendingCommands(): number {
    return this.commands.length;
  }

  /**
   * Runs one tick and returns its summary.
   */
  public tick(): TickSummary {
    const now = this.clock.advance();
    logger.setTick(now);

    this.commandProcessor.process(this.commands);

    this.jobs.expireStale();
    this.nodes.update();
    this.craftOrders.update();
    this.autoHaul.update();
    this.relocation.update();

    this.execution.update();

    this.events.flushEvents();

    const summary = this.getTickSummary();
    this.emit("tick", summary);
    return summary;
  }

  public start(): void {
    if (this.tickHandle) return;

    this.tickHandle = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        logger.error(
          `Tick ${this.clock.now} failed: ${error instanceof Error ? error.message : String(error)}`,
          LogCategory.SIMULATION,
          error,
        );
      }
    }, this.config.tickIntervalMs);

    logger.info(
      `Simulation started (${this.config.tickIntervalMs}ms per tick)`,
      LogCategory.SIMULATION,
    );
  }

  public stop(): void {
    if (!this.tickHandle) return;
    clearInterval(this.tickHandle);
    this.tickHandle = undefined;
    logger.info(`Simulation stopped at tick ${this.clock.now}`, LogCategory.SIMULATION);
  }

  public get isRunning(): boolean {
    return this.tickHandle !== undefined;
  }

  public getTickSummary(): TickSummary {
    const stats = this.jobs.getStats();
    return {
      tick: this.clock.now,
      agents: this.agents.getAll().map((agent) => ({
        id: agent.id,
        state: agent.state,
        position: { ...agent.position },
        jobId: agent.currentJobId,
        hunger: agent.needs.hunger,
        alive: agent.alive,
      })),
      jobs: {
        total: stats.total,
        pending: stats.byStatus[JobStatus.PENDING],
        claimed: stats.byStatus[JobStatus.CLAIMED],
        inProgress: stats.byStatus[JobStatus.IN_PROGRESS],
        blocked: stats.byStatus[JobStatus.BLOCKED],
      },
      activeReservations: this.reservations.getActiveCount(),
    };
  }

  /** Populates an empty world with the starter colony. */
  public loadDefaultColony(): void {
    this.colonyLoader.loadDefault();
  }

  public getSnapshot(): SchedulerSnapshot {
    return this.snapshotManager.capture();
  }

  public restoreSnapshot(snapshot: SchedulerSnapshot): void {
    this.commands.length = 0;
    this.snapshotManager.restore(snapshot);
  }

  public encodeSnapshot(): Buffer {
    return this.snapshotManager.encode();
  }

  /**
   * Restores from an encoded snapshot. Returns false when the payload is
   * not a snapshot this version can read.
   */
  public restoreEncodedSnapshot(raw: Buffer | ArrayBuffer | string): boolean {
    const snapshot = this.snapshotManager.decode(raw);
    if (!snapshot) return false;
    this.restoreSnapshot(snapshot);
    return true;
  }

  public cleanup(): void {
    this.stop();
    this.craftOrders.cleanup();
    this.construction.cleanup();
    this.emitter.removeAllListeners();
  }
}
