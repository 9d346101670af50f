import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { JobType } from "../../../../shared/constants/JobEnums";
import type { AnimalSpecies } from "../../../../shared/constants/ResourceEnums";
import { ANIMAL_DEFINITIONS } from "../../../../shared/constants/WorldConstants";
import type { Position3D } from "../../../../shared/types/geometry";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type {
  Animal,
  AnimalSnapshot,
} from "../../../../shared/types/simulation/world";
import { clonePosition } from "../../../../shared/utils/geometry";
import { JobRegistry } from "../jobs/JobRegistry";
import { WorldGrid } from "./WorldGrid";

export interface DamageResult {
  dealt: number;
  killed: boolean;
}

/**
 * Huntable animals. A kill removes the animal; the hunting engine drops
 * its corpse.
 */
@injectable()
export class AnimalSystem {
  private animals = new Map<string, Animal>();
  private nextSeq = 0;

  constructor(
    @inject(TYPES.WorldGrid) private readonly world: WorldGrid,
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
  ) {}

  public spawn(species: AnimalSpecies, position: Position3D): Animal | null {
    if (!this.world.isWalkable(position)) return null;

    const definition = ANIMAL_DEFINITIONS[species];
    this.nextSeq++;
    const animal: Animal = {
      id: `animal_${this.nextSeq}`,
      species,
      position: clonePosition(position),
      health: definition.maxHealth,
      maxHealth: definition.maxHealth,
      alive: true,
      corpseItemId: definition.corpseItemId,
    };
    this.animals.set(animal.id, animal);
    return animal;
  }

  public get(animalId: string): Animal | undefined {
    return this.animals.get(animalId);
  }

  public getAll(): Animal[] {
    return Array.from(this.animals.values());
  }

  public moveTo(animalId: string, position: Position3D): boolean {
    const animal = this.animals.get(animalId);
    if (!animal || !this.world.isWalkable(position)) return false;
    animal.position = clonePosition(position);
    return true;
  }

  /**
   * Opens a hunt job sized to the animal's current health.
   */
  public designateHunt(animalId: string, priority?: number): Job | null {
    const animal = this.animals.get(animalId);
    if (!animal || !animal.alive) {
      logger.warn(`Hunt designation of unknown animal ${animalId}`, LogCategory.WORLD);
      return null;
    }
    const existing = this.jobs.find(
      (job) => job.metadata.animalId === animalId,
    );
    if (existing) return existing;

    return this.jobs.insert({
      type: JobType.HUNT,
      location: animal.position,
      targetEntityId: animal.id,
      subtype: animal.species,
      priority,
      requiredProgress: animal.health,
      metadata: { animalId },
    });
  }

  public applyDamage(animalId: string, amount: number): DamageResult {
    const animal = this.animals.get(animalId);
    if (!animal || !animal.alive || amount <= 0) {
      return { dealt: 0, killed: false };
    }

    const dealt = Math.min(animal.health, amount);
    animal.health -= dealt;
    if (animal.health > 0) return { dealt, killed: false };

    animal.alive = false;
    this.animals.delete(animalId);
    logger.info(`Animal ${animalId} (${animal.species}) killed`, LogCategory.WORLD);
    return { dealt, killed: true };
  }

  public snapshot(): AnimalSnapshot {
    return structuredClone({ animals: this.getAll(), nextSeq: this.nextSeq });
  }

  public restore(snapshot: AnimalSnapshot): void {
    const data = structuredClone(snapshot);
    this.animals = new Map(data.animals.map((animal) => [animal.id, animal]));
    this.nextSeq = data.nextSeq;
  }
}
