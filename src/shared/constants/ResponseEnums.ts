/**
 * Status values returned in HTTP response bodies.
 *
 * @module shared/constants/ResponseEnums
 */
export enum ResponseStatus {
  OK = "ok",
  ERROR = "error",
  QUEUED = "queued",
  RESTORED = "restored",
}
