/**
 * WebSocket message type enumerations.
 *
 * @module shared/constants/WebSocketEnums
 */
export enum WebSocketMessageType {
  TICK = "TICK",
  COMMAND = "COMMAND",
  RESPONSE = "RESPONSE",
  ERROR = "ERROR",
}
