/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationRunner: Symbol.for("SimulationRunner"),
  SchedulerConfig: Symbol.for("SchedulerConfig"),
  WorldDimensions: Symbol.for("WorldDimensions"),
  SimulationSeed: Symbol.for("SimulationSeed"),
  EventBus: Symbol.for("EventBus"),
  SimulationClock: Symbol.for("SimulationClock"),

  JobRegistry: Symbol.for("JobRegistry"),
  ClaimProtocol: Symbol.for("ClaimProtocol"),
  StockpileSystem: Symbol.for("StockpileSystem"),
  ResourceReservationSystem: Symbol.for("ResourceReservationSystem"),
  ItemFactory: Symbol.for("ItemFactory"),

  AgentRegistry: Symbol.for("AgentRegistry"),
  AgentExecutionSystem: Symbol.for("AgentExecutionSystem"),
  MovementSystem: Symbol.for("MovementSystem"),
  NeedsSystem: Symbol.for("NeedsSystem"),
  TraitGenerator: Symbol.for("TraitGenerator"),

  Pathfinder: Symbol.for("Pathfinder"),
  TraitProvider: Symbol.for("TraitProvider"),

  EngineRegistry: Symbol.for("EngineRegistry"),
  ConstructionEngine: Symbol.for("ConstructionEngine"),
  CraftingEngine: Symbol.for("CraftingEngine"),
  HaulingEngine: Symbol.for("HaulingEngine"),
  HarvestingEngine: Symbol.for("HarvestingEngine"),
  HuntingEngine: Symbol.for("HuntingEngine"),
  EquipEngine: Symbol.for("EquipEngine"),

  WorldGrid: Symbol.for("WorldGrid"),
  ResourceNodeSystem: Symbol.for("ResourceNodeSystem"),
  AnimalSystem: Symbol.for("AnimalSystem"),
  ConstructionSystem: Symbol.for("ConstructionSystem"),
  CraftOrderSystem: Symbol.for("CraftOrderSystem"),
  AutoHaulProducer: Symbol.for("AutoHaulProducer"),
  RelocationProducer: Symbol.for("RelocationProducer"),
};
