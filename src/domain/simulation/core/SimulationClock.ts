import { injectable } from "inversify";

/**
 * Monotonic tick counter shared by every system.
 */
@injectable()
export class SimulationClock {
  private tick = 0;

  public get now(): number {
    return this.tick;
  }

  public advance(): number {
    this.tick++;
    return this.tick;
  }

  public restore(tick: number): void {
    this.tick = tick;
  }
}
