/**
 * Simulation event type enumerations.
 *
 * Every system publishes through the batched event bus using these names.
 * Payload shapes live in `shared/types/simulation/events`.
 *
 * @module shared/constants/EventEnums
 */
export enum SchedulerEventType {
  JOB_INSERTED = "job:inserted",
  JOB_CLAIMED = "job:claimed",
  JOB_RELEASED = "job:released",
  JOB_BLOCKED = "job:blocked",
  JOB_COMPLETED = "job:completed",
  JOB_ABANDONED = "job:abandoned",
  JOB_CANCEL_REQUESTED = "job:cancel_requested",
  JOB_REMOVED = "job:removed",
  STALE_CLAIM_RECOVERED = "job:stale_claim_recovered",

  RESERVATION_CREATED = "reservation:created",
  RESERVATION_COMMITTED = "reservation:committed",
  RESERVATION_CANCELLED = "reservation:cancelled",

  CONTENT_STORED = "stockpile:content_stored",
  CONTENT_DROPPED = "stockpile:content_dropped",
  CONTENT_MISPLACED = "stockpile:content_misplaced",
  ZONE_CREATED = "stockpile:zone_created",
  ZONE_FILTERS_CHANGED = "stockpile:zone_filters_changed",
  ZONE_REMOVED = "stockpile:zone_removed",

  AGENT_SPAWNED = "agent:spawned",
  AGENT_STATE_CHANGED = "agent:state_changed",
  AGENT_PREEMPTED = "agent:preempted",
  AGENT_ATE = "agent:ate",
  AGENT_DIED = "agent:died",
  ITEM_EQUIPPED = "agent:item_equipped",

  TILE_CHANGED = "world:tile_changed",
  CONSTRUCTION_COMPLETED = "world:construction_completed",
  ITEM_CRAFTED = "world:item_crafted",
  NODE_DEPLETED = "world:node_depleted",
  NODE_REGROWN = "world:node_regrown",
  ANIMAL_KILLED = "world:animal_killed",
}
