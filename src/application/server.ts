import "dotenv/config";
import * as fs from "fs";
import { WebSocketServer } from "ws";
import { createApp } from "./app";
import { attachSimulationSocket } from "./simulationSocket";
import { CONFIG } from "../config/config";
import { container } from "../config/container";
import { TYPES } from "../config/Types";
import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";

/**
 * Main server entry point.
 *
 * Restores the colony from `SNAPSHOT_PATH` when a snapshot is there, or
 * builds the starter colony, then serves HTTP and the `/ws/sim` stream.
 *
 * @module application
 */

const simulationRunner = container.get<SimulationRunner>(
  TYPES.SimulationRunner,
);

function loadColony(): void {
  const path = CONFIG.SNAPSHOT_PATH;
  if (path && fs.existsSync(path)) {
    if (simulationRunner.restoreEncodedSnapshot(fs.readFileSync(path))) {
      logger.info(`Colony restored from ${path}`, LogCategory.PERSISTENCE);
      return;
    }
    logger.warn(
      `Snapshot at ${path} unusable, building a fresh colony`,
      LogCategory.PERSISTENCE,
    );
  }
  simulationRunner.loadDefaultColony();
}

function saveColony(): void {
  const path = CONFIG.SNAPSHOT_PATH;
  if (!path) return;
  try {
    fs.writeFileSync(path, simulationRunner.encodeSnapshot());
    logger.info(`Colony saved to ${path}`, LogCategory.PERSISTENCE);
  } catch (error) {
    logger.error(
      `Failed to save colony: ${error instanceof Error ? error.message : String(error)}`,
      LogCategory.PERSISTENCE,
    );
  }
}

loadColony();

const app = createApp(simulationRunner);
const simulationWss = new WebSocketServer({ noServer: true });
const detachSocket = attachSimulationSocket(simulationWss, simulationRunner);

const server = app.listen(CONFIG.PORT, () => {
  logger.info(
    `Colony scheduler listening on http://localhost:${CONFIG.PORT}`,
    LogCategory.NETWORK,
  );
  simulationRunner.start();
});

server.on("upgrade", (request, socket, head) => {
  const host = request.headers.host ?? "localhost";
  let pathname: string;
  try {
    pathname = new URL(request.url ?? "/", `http://${host}`).pathname;
  } catch (error) {
    logger.debug("Invalid URL in WebSocket upgrade request", LogCategory.NETWORK, {
      url: request.url,
      error: error instanceof Error ? error.message : String(error),
    });
    socket.destroy();
    return;
  }

  if (pathname !== "/ws/sim") {
    socket.destroy();
    return;
  }
  simulationWss.handleUpgrade(request, socket, head, (ws) => {
    simulationWss.emit("connection", ws, request);
  });
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`, LogCategory.SIMULATION);
  simulationRunner.stop();
  saveColony();
  detachSocket();
  simulationRunner.cleanup();
  simulationWss.close();
  server.close(() => {
    logger
      .flush()
      .catch((error: unknown) => {
        console.error("Failed to flush logs", error);
      })
      .finally(() => process.exit(0));
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
