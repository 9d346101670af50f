import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import { createSimulationRoutes } from "./routes/simulationRoutes";
import { SimulationController } from "../infrastructure/controllers/simulationController";
import type { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { CONFIG } from "../config/config";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";

/**
 * Builds the Express application around a runner.
 *
 * @module application
 */
export function createApp(runner: SimulationRunner): Express {
  const app = express();

  app.use(
    cors({
      origin: CONFIG.ALLOWED_ORIGINS,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  if (process.env.NODE_ENV !== "production") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, LogCategory.NETWORK);
      next();
    });
  }

  app.use("/", createSimulationRoutes(new SimulationController(runner)));

  app.use(
    (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
      // body-parser marks malformed or oversized bodies with a 4xx status
      if (
        "status" in err &&
        typeof err.status === "number" &&
        err.status >= 400 &&
        err.status < 500
      ) {
        res.status(err.status).json({ error: err.message });
        return;
      }

      const message =
        process.env.NODE_ENV === "production"
          ? "Internal server error"
          : err.message;
      logger.error(`Unhandled error: ${err.message}`, LogCategory.NETWORK);
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({ error: message });
    },
  );

  app.use((_req: Request, res: Response): void => {
    res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
  });

  return app;
}
