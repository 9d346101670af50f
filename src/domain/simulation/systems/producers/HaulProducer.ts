import { injectable } from "inversify";
import { ContentKind } from "../../../../shared/constants/ResourceEnums";
import { JobType } from "../../../../shared/constants/JobEnums";
import type { Position3D } from "../../../../shared/types/geometry";
import type { Job } from "../../../../shared/types/simulation/jobs";
import type { ContentRef } from "../../../../shared/types/simulation/stockpiles";
import { clonePosition, positionKey } from "../../../../shared/utils/geometry";
import type { SchedulerConfig } from "../../../../config/config";
import { SimulationClock } from "../../core/SimulationClock";
import { JobRegistry } from "../jobs/JobRegistry";
import { contentKey } from "../stockpiles/contentMatching";
import { ResourceReservationSystem } from "../stockpiles/ResourceReservationSystem";
import { StockpileSystem } from "../stockpiles/StockpileSystem";

export interface HaulCandidate {
  cellKey: string;
  position: Position3D;
  content: ContentRef;
}

/**
 * Shared scan for producers that turn stored content into haul jobs.
 *
 * A (cell, content) pair has at most one open haul. A pair with no legal
 * destination is skipped and retried on the next scan.
 */
@injectable()
export abstract class HaulProducer {
  constructor(
    protected readonly jobs: JobRegistry,
    protected readonly stockpiles: StockpileSystem,
    protected readonly reservations: ResourceReservationSystem,
    protected readonly clock: SimulationClock,
    protected readonly config: SchedulerConfig,
  ) {}

  protected abstract candidates(): HaulCandidate[];

  protected abstract readonly priority: number | undefined;

  protected abstract readonly relocation: boolean;

  private openHaulKeys(): Set<string> {
    const keys = new Set<string>();
    for (const job of this.jobs.getAll()) {
      const haul = job.metadata.haul;
      if (job.type !== JobType.HAUL || !haul) continue;
      keys.add(`${positionKey(haul.source)}|${contentKey(haul.content)}`);
    }
    return keys;
  }

  /** Runs the scan when the interval is due. Returns the inserted jobs. */
  public update(): Job[] {
    const interval = Math.max(1, this.config.autoHaulIntervalTicks);
    if (this.clock.now % interval !== 0) return [];
    return this.scan();
  }

  public scan(): Job[] {
    const open = this.openHaulKeys();
    const inserted: Job[] = [];

    for (const candidate of this.candidates()) {
      const key = `${candidate.cellKey}|${contentKey(candidate.content)}`;
      if (open.has(key)) continue;

      const available = this.reservations.availableAt(
        candidate.cellKey,
        candidate.content,
      );
      const quantity =
        candidate.content.kind === ContentKind.ITEM
          ? Math.min(1, available)
          : Math.min(available, this.config.haulCarryCapacity);
      if (quantity <= 0) continue;

      const preview = this.stockpiles.peekContent(
        candidate.cellKey,
        candidate.content,
        quantity,
      );
      if (!preview) continue;
      const destination = this.stockpiles.findStorageCell(preview, {
        near: candidate.position,
        excludeCellKey: candidate.cellKey,
      });
      if (!destination) continue;

      const job = this.jobs.insert({
        type: JobType.HAUL,
        location: candidate.position,
        priority: this.priority,
        metadata: {
          haul: {
            source: clonePosition(candidate.position),
            content: candidate.content,
            quantity,
            destination: clonePosition(destination.position),
            relocation: this.relocation || undefined,
          },
        },
      });
      if (job) {
        open.add(key);
        inserted.push(job);
      }
    }
    return inserted;
  }
}
