import { WebSocket, type RawData, type WebSocketServer } from "ws";
import type { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";
import { ResponseStatus } from "../shared/constants/ResponseEnums";
import { WebSocketMessageType } from "../shared/constants/WebSocketEnums";
import { decodeMessage, encodeMsgPack } from "../shared/MessagePackCodec";
import type { TickSummary } from "../shared/types/simulation/snapshot";
import { validateSimulationCommand } from "../shared/validation/commandValidation";

export type ServerMessage =
  | { type: WebSocketMessageType.TICK; payload: TickSummary }
  | {
      type: WebSocketMessageType.RESPONSE;
      requestId?: string;
      payload: { status: ResponseStatus; commandType: string };
    }
  | { type: WebSocketMessageType.ERROR; requestId?: string; message: string };

function toPayload(data: RawData, isBinary: boolean): Buffer | ArrayBuffer | string {
  const buffer = Array.isArray(data) ? Buffer.concat(data) : data;
  if (isBinary) return buffer;
  return Buffer.isBuffer(buffer) ? buffer.toString("utf8") : Buffer.from(buffer).toString("utf8");
}

/**
 * Turns one client frame into the reply. Clients send
 * `{ type: "COMMAND", requestId?, payload: <command> }` as MessagePack or JSON.
 */
export function handleClientMessage(
  runner: SimulationRunner,
  raw: Buffer | ArrayBuffer | string,
): ServerMessage {
  let parsed: unknown;
  try {
    parsed = decodeMessage(raw);
  } catch (error) {
    logger.warn(
      `Failed to parse client message: ${error instanceof Error ? error.message : String(error)}`,
      LogCategory.NETWORK,
    );
    return { type: WebSocketMessageType.ERROR, message: "Failed to parse command" };
  }

  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("type" in parsed) ||
    parsed.type !== WebSocketMessageType.COMMAND
  ) {
    return { type: WebSocketMessageType.ERROR, message: "Invalid command format" };
  }

  const requestId =
    "requestId" in parsed && typeof parsed.requestId === "string"
      ? parsed.requestId
      : undefined;
  const result = validateSimulationCommand(
    "payload" in parsed ? parsed.payload : undefined,
  );
  if (!result.success) {
    return { type: WebSocketMessageType.ERROR, requestId, message: result.error };
  }

  runner.enqueueCommand(result.command);
  return {
    type: WebSocketMessageType.RESPONSE,
    requestId,
    payload: { status: ResponseStatus.QUEUED, commandType: result.command.type },
  };
}

/**
 * Streams tick summaries to every open client and accepts commands back.
 * Returns a function that detaches the runner listener.
 */
export function attachSimulationSocket(
  wss: WebSocketServer,
  runner: SimulationRunner,
): () => void {
  let cachedTick = -1;
  let cachedBuffer: Buffer | null = null;

  const encodeTick = (summary: TickSummary): Buffer => {
    if (summary.tick !== cachedTick || !cachedBuffer) {
      cachedBuffer = encodeMsgPack<ServerMessage>({
        type: WebSocketMessageType.TICK,
        payload: summary,
      });
      cachedTick = summary.tick;
    }
    return cachedBuffer;
  };

  const onTick = (summary: TickSummary): void => {
    const buffer = encodeTick(summary);
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(buffer);
    }
  };
  runner.on("tick", onTick);

  wss.on("connection", (ws: WebSocket) => {
    logger.info("Client connected to simulation", LogCategory.NETWORK);
    ws.send(encodeTick(runner.getTickSummary()));

    ws.on("message", (data: RawData, isBinary: boolean) => {
      const reply = handleClientMessage(runner, toPayload(data, isBinary));
      ws.send(encodeMsgPack(reply));
    });

    ws.on("close", () => {
      logger.info("Client disconnected from simulation", LogCategory.NETWORK);
    });
  });

  return () => runner.off("tick", onTick);
}
