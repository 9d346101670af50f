import type { Request, Response } from "express";
import type { SimulationRunner } from "../../domain/simulation/core/SimulationRunner";
import { logger } from "../utils/logger";
import { LogCategory } from "../../shared/constants/LogEnums";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../../shared/constants/ResponseEnums";
import { isBlockedReason, isJobStatus } from "../../shared/constants/JobEnums";
import { validateSimulationCommand } from "../../shared/validation/commandValidation";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * HTTP handlers over a running colony: health, job diagnostics, command
 * intake, stockpile listing and MessagePack snapshots.
 */
export class SimulationController {
  constructor(private readonly runner: SimulationRunner) {}

  health(_req: Request, res: Response): void {
    try {
      const agents = this.runner.agents;
      res.json({
        status: ResponseStatus.OK,
        tick: this.runner.clock.now,
        running: this.runner.isRunning,
        agents: { total: agents.size, living: agents.getLiving().length },
        jobs: this.runner.jobs.getStats().total,
        pendingCommands: this.runner.pendingCommands,
      });
    } catch (error) {
      logger.error(
        `Error getting simulation health: ${errorMessage(error)}`,
        LogCategory.NETWORK,
      );
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to get simulation health" });
    }
  }

  /**
   * `?status=` and `?reason=` narrow the list; blocked jobs with a reason
   * are the stalled work an operator needs to see.
   */
  listJobs(req: Request, res: Response): void {
    const { status, reason } = req.query;
    if (status !== undefined && !isJobStatus(status)) {
      res
        .status(HttpStatusCode.BAD_REQUEST)
        .json({ error: `Unknown job status: ${String(status)}` });
      return;
    }
    if (reason !== undefined && !isBlockedReason(reason)) {
      res
        .status(HttpStatusCode.BAD_REQUEST)
        .json({ error: `Unknown blocked reason: ${String(reason)}` });
      return;
    }

    try {
      res.json({ jobs: this.runner.jobs.queryByStatus(status, reason) });
    } catch (error) {
      logger.error(`Error listing jobs: ${errorMessage(error)}`, LogCategory.NETWORK);
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to list jobs" });
    }
  }

  jobStats(_req: Request, res: Response): void {
    try {
      res.json({
        tick: this.runner.clock.now,
        jobs: this.runner.jobs.getStats(),
        reservations: this.runner.reservations.getStats(),
      });
    } catch (error) {
      logger.error(
        `Error getting job stats: ${errorMessage(error)}`,
        LogCategory.NETWORK,
      );
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to get job stats" });
    }
  }

  enqueueCommand(req: Request, res: Response): void {
    const result = validateSimulationCommand(req.body);
    if (!result.success) {
      res.status(HttpStatusCode.BAD_REQUEST).json({ error: result.error });
      return;
    }

    this.runner.enqueueCommand(result.command);
    res
      .status(HttpStatusCode.ACCEPTED)
      .json({ status: ResponseStatus.QUEUED, type: result.command.type });
  }

  listStockpiles(_req: Request, res: Response): void {
    try {
      const stockpiles = this.runner.stockpiles;
      res.json({
        zones: stockpiles.getZones(),
        cells: stockpiles.getCells(),
        misplaced: stockpiles.getMisplacedContents(),
        totals: stockpiles.getTotalsByResource(),
      });
    } catch (error) {
      logger.error(
        `Error listing stockpiles: ${errorMessage(error)}`,
        LogCategory.NETWORK,
      );
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to list stockpiles" });
    }
  }

  downloadSnapshot(_req: Request, res: Response): void {
    try {
      const payload = this.runner.encodeSnapshot();
      res.type("application/msgpack").send(payload);
    } catch (error) {
      logger.error(
        `Error encoding snapshot: ${errorMessage(error)}`,
        LogCategory.PERSISTENCE,
      );
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to encode snapshot" });
    }
  }

  /**
   * Body is the raw MessagePack produced by `downloadSnapshot`.
   */
  restoreSnapshot(req: Request, res: Response): void {
    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      res
        .status(HttpStatusCode.BAD_REQUEST)
        .json({ error: "Expected a MessagePack snapshot body" });
      return;
    }

    if (!this.runner.restoreEncodedSnapshot(body)) {
      res
        .status(HttpStatusCode.BAD_REQUEST)
        .json({ error: "Snapshot rejected" });
      return;
    }
    res.json({ status: ResponseStatus.RESTORED, tick: this.runner.clock.now });
  }
}
