import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { SimulationCommandType } from "../../../../shared/constants/CommandEnums";
import { CancelOutcome, JobType } from "../../../../shared/constants/JobEnums";
import type { SimulationCommand } from "../../../../shared/types/commands/SimulationCommand";
import type { SimulationRunner } from "../SimulationRunner";

/**
 * Applies operator commands at the start of a tick. A failing command is
 * logged and skipped; the rest of the queue still runs.
 */
export class CommandProcessor {
  constructor(private readonly runner: SimulationRunner) {}

  public process(commands: SimulationCommand[]): void {
    if (commands.length > 0) {
      logger.debug(
        `Processing ${commands.length} command(s)`,
        LogCategory.SIMULATION,
      );
    }
    while (commands.length > 0) {
      const command = commands.shift();
      if (!command) break;
      try {
        this.dispatchCommand(command);
      } catch (error) {
        logger.error(
          `Failed to process command ${command.type}: ${error instanceof Error ? error.message : String(error)}`,
          LogCategory.SIMULATION,
          command,
        );
      }
    }
  }

  private dispatchCommand(command: SimulationCommand): void {
    const runner = this.runner;

    switch (command.type) {
      case SimulationCommandType.DESIGNATE_BUILD:
        this.report(
          command.type,
          runner.construction.designate({
            position: command.position,
            finishedTile: command.finishedTile,
            materials: command.materials,
            work: command.work,
            priority: command.priority,
          }) !== null,
        );
        break;
      case SimulationCommandType.DEMOLISH:
        this.report(command.type, runner.construction.demolish(command.position));
        break;
      case SimulationCommandType.DESIGNATE_HARVEST:
        this.report(command.type, runner.nodes.designate(command.nodeId) !== null);
        break;
      case SimulationCommandType.DESIGNATE_HUNT:
        this.report(
          command.type,
          runner.animals.designateHunt(command.animalId) !== null,
        );
        break;
      case SimulationCommandType.CREATE_ZONE:
        this.report(
          command.type,
          runner.stockpiles.createZone(
            command.name,
            command.cells,
            command.filters,
          ) !== null,
        );
        break;
      case SimulationCommandType.SET_ZONE_FILTER:
        this.report(
          command.type,
          runner.stockpiles.setZoneFilters(command.zoneId, command.filters),
        );
        break;
      case SimulationCommandType.REMOVE_ZONE:
        this.report(
          command.type,
          runner.stockpiles.requestZoneRemoval(command.zoneId),
        );
        break;
      case SimulationCommandType.ADD_CRAFT_ORDER:
        this.report(
          command.type,
          runner.craftOrders.addOrder({
            recipeId: command.recipeId,
            workstation: command.workstation,
            mode: command.mode,
            count: command.count,
            targetStock: command.targetStock,
            priority: command.priority,
          }) !== null,
        );
        break;
      case SimulationCommandType.CANCEL_CRAFT_ORDER:
        this.report(command.type, runner.craftOrders.cancelOrder(command.orderId));
        break;
      case SimulationCommandType.CANCEL_JOB:
        this.report(
          command.type,
          runner.jobs.cancel(command.jobId) !== CancelOutcome.NOT_FOUND,
        );
        break;
      case SimulationCommandType.SET_JOB_PRIORITY:
        this.report(
          command.type,
          runner.jobs.setPriority(command.jobId, command.priority),
        );
        break;
      case SimulationCommandType.SET_AGENT_JOB_TYPES:
        this.report(
          command.type,
          runner.agents.setEnabledJobTypes(command.agentId, command.jobTypes),
        );
        break;
      case SimulationCommandType.REQUEST_EQUIP:
        this.handleEquipRequest(command);
        break;
      case SimulationCommandType.SPAWN_AGENT:
        this.report(
          command.type,
          runner.agents.spawn({
            position: command.position,
            name: command.name,
          }) !== null,
        );
        break;
    }
  }

  private handleEquipRequest(
    command: Extract<
      SimulationCommand,
      { type: SimulationCommandType.REQUEST_EQUIP }
    >,
  ): void {
    const agent = this.runner.agents.get(command.agentId);
    if (!agent || !agent.alive) {
      this.report(command.type, false);
      return;
    }

    const existing = this.runner.jobs.find(
      (job) =>
        job.type === JobType.EQUIP &&
        job.metadata.assigneeId === agent.id &&
        job.metadata.equipSlot === command.slot,
    );
    if (existing) {
      logger.debug(
        `Equip request for ${agent.id} ignored, ${existing.id} already open`,
        LogCategory.SIMULATION,
      );
      return;
    }

    const job = this.runner.jobs.insert({
      type: JobType.EQUIP,
      location: agent.position,
      targetEntityId: agent.id,
      subtype: command.slot,
      metadata: {
        assigneeId: agent.id,
        equipSlot: command.slot,
        materials: [{ selector: command.selector, quantity: 1 }],
      },
    });
    this.report(command.type, job !== null);
  }

  private report(type: SimulationCommandType, applied: boolean): void {
    if (applied) {
      logger.debug(`Command ${type} applied`, LogCategory.SIMULATION);
    } else {
      logger.warn(`Command ${type} rejected`, LogCategory.SIMULATION);
    }
  }
}
