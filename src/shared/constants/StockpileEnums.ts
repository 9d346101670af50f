/**
 * Failure reasons of the stockpile and reservation layer.
 *
 * @module shared/constants/StockpileEnums
 */

export enum StoreFailure {
  UNKNOWN_CELL = "unknown_cell",
  FILTER_DENIED = "filter_denied",
  CAPACITY_EXCEEDED = "capacity_exceeded",
  INVALID_QUANTITY = "invalid_quantity",
}

export enum ReservationFailure {
  UNKNOWN = "unknown",
  ALREADY_COMMITTED = "already_committed",
  ALREADY_CANCELLED = "already_cancelled",
  PHYSICAL_SHORTAGE = "physical_shortage",
  INSUFFICIENT = "insufficient",
}
