import express, { Router, type Request, type Response } from "express";
import type { SimulationController } from "../../infrastructure/controllers/simulationController";

/** Largest accepted snapshot upload. */
const SNAPSHOT_BODY_LIMIT = "20mb";

/**
 * Mounts the scheduler endpoints on a fresh router.
 *
 * - `GET  /api/sim/health`
 * - `GET  /api/jobs?status=&reason=`
 * - `GET  /api/jobs/stats`
 * - `POST /api/commands`
 * - `GET  /api/stockpiles`
 * - `GET  /api/snapshot` (MessagePack)
 * - `POST /api/snapshot` (MessagePack body)
 */
export function createSimulationRoutes(controller: SimulationController): Router {
  const router = Router();

  router.get("/api/sim/health", (req: Request, res: Response): void =>
    controller.health(req, res),
  );
  router.get("/api/jobs", (req: Request, res: Response): void =>
    controller.listJobs(req, res),
  );
  router.get("/api/jobs/stats", (req: Request, res: Response): void =>
    controller.jobStats(req, res),
  );
  router.post("/api/commands", (req: Request, res: Response): void =>
    controller.enqueueCommand(req, res),
  );
  router.get("/api/stockpiles", (req: Request, res: Response): void =>
    controller.listStockpiles(req, res),
  );
  router.get("/api/snapshot", (req: Request, res: Response): void =>
    controller.downloadSnapshot(req, res),
  );
  router.post(
    "/api/snapshot",
    express.raw({ type: "application/msgpack", limit: SNAPSHOT_BODY_LIMIT }),
    (req: Request, res: Response): void => controller.restoreSnapshot(req, res),
  );

  return router;
}
