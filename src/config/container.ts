import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Every scheduler service is a singleton within its container. Each call
 * to `createSimulationContainer` yields an independent colony with its own
 * clock, event bus and registries.
 *
 * @module config
 */
import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { BatchedEventEmitter } from "../domain/simulation/core/BatchedEventEmitter";
import { SimulationClock } from "../domain/simulation/core/SimulationClock";
import type { Pathfinder } from "../domain/simulation/ports/Pathfinder";
import type { TraitProvider } from "../domain/simulation/ports/TraitProvider";
import { JobRegistry } from "../domain/simulation/systems/jobs/JobRegistry";
import { ClaimProtocol } from "../domain/simulation/systems/jobs/ClaimProtocol";
import { StockpileSystem } from "../domain/simulation/systems/stockpiles/StockpileSystem";
import { ResourceReservationSystem } from "../domain/simulation/systems/stockpiles/ResourceReservationSystem";
import { ItemFactory } from "../domain/simulation/systems/stockpiles/ItemFactory";
import { AgentRegistry } from "../domain/simulation/systems/agents/AgentRegistry";
import { AgentExecutionSystem } from "../domain/simulation/systems/agents/AgentExecutionSystem";
import { AgentTraitProvider } from "../domain/simulation/systems/agents/AgentTraitProvider";
import { TraitGenerator } from "../domain/simulation/systems/agents/TraitGenerator";
import { MovementSystem } from "../domain/simulation/systems/agents/movement/MovementSystem";
import { NeedsSystem } from "../domain/simulation/systems/agents/needs/NeedsSystem";
import { EngineRegistry } from "../domain/simulation/systems/engines/EngineRegistry";
import { ConstructionEngine } from "../domain/simulation/systems/engines/ConstructionEngine";
import { CraftingEngine } from "../domain/simulation/systems/engines/CraftingEngine";
import { HaulingEngine } from "../domain/simulation/systems/engines/HaulingEngine";
import { HarvestingEngine } from "../domain/simulation/systems/engines/HarvestingEngine";
import { HuntingEngine } from "../domain/simulation/systems/engines/HuntingEngine";
import { EquipEngine } from "../domain/simulation/systems/engines/EquipEngine";
import { WorldGrid } from "../domain/simulation/systems/world/WorldGrid";
import { ResourceNodeSystem } from "../domain/simulation/systems/world/ResourceNodeSystem";
import { AnimalSystem } from "../domain/simulation/systems/world/AnimalSystem";
import { ConstructionSystem } from "../domain/simulation/systems/structures/ConstructionSystem";
import { CraftOrderSystem } from "../domain/simulation/systems/economy/CraftOrderSystem";
import { AutoHaulProducer } from "../domain/simulation/systems/producers/AutoHaulProducer";
import { RelocationProducer } from "../domain/simulation/systems/producers/RelocationProducer";
import { EasyStarPathfinder } from "../infrastructure/services/pathfinding/EasyStarPathfinder";
import type { WorldDimensions } from "../shared/types/simulation/world";

export interface SimulationContainerOptions {
  config?: Partial<SchedulerConfig>;
  dimensions?: WorldDimensions;
  seed?: string;
  /** Replaces the grid A* router. */
  pathfinder?: Pathfinder;
}

export function createSimulationContainer(
  options: SimulationContainerOptions = {},
): Container {
  const container = new Container({ defaultScope: "Singleton" });

  container
    .bind<SchedulerConfig>(TYPES.SchedulerConfig)
    .toConstantValue({ ...DEFAULT_SCHEDULER_CONFIG, ...options.config });
  container
    .bind<WorldDimensions>(TYPES.WorldDimensions)
    .toConstantValue(options.dimensions ?? CONFIG.WORLD);
  container
    .bind<string>(TYPES.SimulationSeed)
    .toConstantValue(options.seed ?? CONFIG.SIM_SEED);

  container.bind<BatchedEventEmitter>(TYPES.EventBus).to(BatchedEventEmitter);
  container.bind<SimulationClock>(TYPES.SimulationClock).to(SimulationClock);

  container.bind<JobRegistry>(TYPES.JobRegistry).to(JobRegistry);
  container.bind<ClaimProtocol>(TYPES.ClaimProtocol).to(ClaimProtocol);
  container.bind<StockpileSystem>(TYPES.StockpileSystem).to(StockpileSystem);
  container
    .bind<ResourceReservationSystem>(TYPES.ResourceReservationSystem)
    .to(ResourceReservationSystem);
  container.bind<ItemFactory>(TYPES.ItemFactory).to(ItemFactory);

  container.bind<AgentRegistry>(TYPES.AgentRegistry).to(AgentRegistry);
  container
    .bind<AgentExecutionSystem>(TYPES.AgentExecutionSystem)
    .to(AgentExecutionSystem);
  container.bind<MovementSystem>(TYPES.MovementSystem).to(MovementSystem);
  container.bind<NeedsSystem>(TYPES.NeedsSystem).to(NeedsSystem);
  container.bind<TraitGenerator>(TYPES.TraitGenerator).to(TraitGenerator);
  container.bind<TraitProvider>(TYPES.TraitProvider).to(AgentTraitProvider);

  if (options.pathfinder) {
    container
      .bind<Pathfinder>(TYPES.Pathfinder)
      .toConstantValue(options.pathfinder);
  } else {
    container.bind<Pathfinder>(TYPES.Pathfinder).to(EasyStarPathfinder);
  }

  container.bind<EngineRegistry>(TYPES.EngineRegistry).to(EngineRegistry);
  container
    .bind<ConstructionEngine>(TYPES.ConstructionEngine)
    .to(ConstructionEngine);
  container.bind<CraftingEngine>(TYPES.CraftingEngine).to(CraftingEngine);
  container.bind<HaulingEngine>(TYPES.HaulingEngine).to(HaulingEngine);
  container.bind<HarvestingEngine>(TYPES.HarvestingEngine).to(HarvestingEngine);
  container.bind<HuntingEngine>(TYPES.HuntingEngine).to(HuntingEngine);
  container.bind<EquipEngine>(TYPES.EquipEngine).to(EquipEngine);

  container.bind<WorldGrid>(TYPES.WorldGrid).to(WorldGrid);
  container
    .bind<ResourceNodeSystem>(TYPES.ResourceNodeSystem)
    .to(ResourceNodeSystem);
  container.bind<AnimalSystem>(TYPES.AnimalSystem).to(AnimalSystem);
  container
    .bind<ConstructionSystem>(TYPES.ConstructionSystem)
    .to(ConstructionSystem);
  container.bind<CraftOrderSystem>(TYPES.CraftOrderSystem).to(CraftOrderSystem);
  container.bind<AutoHaulProducer>(TYPES.AutoHaulProducer).to(AutoHaulProducer);
  container
    .bind<RelocationProducer>(TYPES.RelocationProducer)
    .to(RelocationProducer);

  container.bind<SimulationRunner>(TYPES.SimulationRunner).to(SimulationRunner);

  return container;
}

/** Process-wide container used by the server. */
export const container = createSimulationContainer({
  config: CONFIG.SCHEDULER,
});
