import { inject, injectable } from "inversify";
import seedrandom from "seedrandom";
import { TYPES } from "../../../../config/Types";
import { ALL_JOB_TYPES } from "../../../../shared/constants/JobEnums";
import { JOB_DEFAULTS } from "../../../../shared/constants/SchedulerConstants";
import type {
  AgentTraits,
  TraitRngState,
} from "../../../../shared/types/simulation/agents";

const CATEGORY_BONUS_STEP = 5;
const CATEGORY_BONUS_STEPS = 3;

export function isTraitRngState(value: unknown): value is TraitRngState {
  if (typeof value !== "object" || value === null) return false;
  if (!("i" in value) || !("j" in value) || !("S" in value)) return false;
  const { i, j, S } = value;
  return (
    Number.isInteger(i) &&
    Number.isInteger(j) &&
    Array.isArray(S) &&
    S.every((entry) => Number.isInteger(entry))
  );
}

/**
 * Deterministic trait rolls from the simulation seed. The generator state
 * travels in snapshots, so a restored colony rolls the same traits as the
 * run it was captured from.
 */
@injectable()
export class TraitGenerator {
  private rng: seedrandom.StatefulPRNG<seedrandom.State.Arc4>;

  constructor(@inject(TYPES.SimulationSeed) seed: string) {
    this.rng = seedrandom(`traits-${seed}`, { state: true });
  }

  private between(min: number, max: number): number {
    return Math.round((min + this.rng() * (max - min)) * 100) / 100;
  }

  public roll(): AgentTraits {
    const categoryBonus: Record<string, number> = {};
    for (const type of ALL_JOB_TYPES) {
      const step = Math.floor(this.rng() * CATEGORY_BONUS_STEPS);
      if (step > 0) {
        categoryBonus[JOB_DEFAULTS[type].category] = step * CATEGORY_BONUS_STEP;
      }
    }
    return {
      workSpeed: this.between(0.8, 1.2),
      moveSpeed: this.between(0.8, 1.2),
      attackPower: this.between(1, 3),
      categoryBonus,
    };
  }

  public snapshot(): TraitRngState {
    const state: unknown = this.rng.state();
    if (!isTraitRngState(state)) {
      throw new Error("Trait generator state has an unexpected layout");
    }
    return { i: state.i, j: state.j, S: [...state.S] };
  }

  public restore(state: TraitRngState): void {
    const saved: TraitRngState = { i: state.i, j: state.j, S: [...state.S] };
    this.rng = seedrandom("", { state: saved });
  }
}
