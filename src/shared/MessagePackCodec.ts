/**
 * MessagePack codec for snapshots and WebSocket messages.
 *
 * JSON text is accepted on decode so clients can send plain JSON while
 * debugging.
 */

import { encode, decode } from "@msgpack/msgpack";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "./constants/LogEnums";

/**
 * Detects if a message is MessagePack (binary) or JSON (text).
 */
export function isBinaryMessage(data: unknown): data is Buffer | ArrayBuffer {
  return Buffer.isBuffer(data) || data instanceof ArrayBuffer;
}

/**
 * Serializes data to MessagePack. Undefined properties are left out.
 */
export function encodeMsgPack<T>(data: T): Buffer {
  return Buffer.from(encode(data, { ignoreUndefined: true }));
}

/**
 * Deserializes MessagePack or JSON. The result is unvalidated.
 *
 * @param raw - Raw message data (string, Buffer, or ArrayBuffer)
 */
export function decodeMessage(raw: string | Buffer | ArrayBuffer): unknown {
  if (typeof raw === "string") {
    return JSON.parse(raw);
  }

  const buffer = raw instanceof ArrayBuffer ? Buffer.from(raw) : raw;

  try {
    return decode(buffer);
  } catch (error) {
    logger.warn(
      `Failed to decode MessagePack, falling back to JSON: ${error instanceof Error ? error.message : String(error)}`,
      LogCategory.NETWORK,
    );
    return JSON.parse(buffer.toString());
  }
}
