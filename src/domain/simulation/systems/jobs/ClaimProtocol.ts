import { inject, injectable, optional } from "inversify";
import { TYPES } from "../../../../config/Types";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
} from "../../../../config/config";
import { logger, LogLevel } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import type { Agent } from "../../../../shared/types/simulation/agents";
import type { Job } from "../../../../shared/types/simulation/jobs";
import { jobDistance } from "../../../../shared/utils/geometry";
import type { TraitProvider } from "../../ports/TraitProvider";
import { JobRegistry } from "./JobRegistry";
import { distanceWeight, priorityWeight, urgencyWeight } from "./scoring";

export interface ScoredJob {
  job: Job;
  score: number;
}

/**
 * Scores candidate jobs for an agent and claims the best one.
 *
 * score = priorityWeight + distanceWeight + categoryBonus + urgency.
 * Equal scores go to the oldest job, so no job starves behind newer ones
 * of the same score. A failed claim falls through to the next candidate,
 * up to `maxClaimAttemptsPerTick`.
 */
@injectable()
export class ClaimProtocol {
  constructor(
    @inject(TYPES.JobRegistry) private readonly jobs: JobRegistry,
    @inject(TYPES.TraitProvider) private readonly traits: TraitProvider,
    @inject(TYPES.SchedulerConfig)
    @optional()
    private readonly config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  ) {}

  public score(agent: Agent, job: Job): number {
    return (
      priorityWeight(job.priority) +
      distanceWeight(jobDistance(agent.position, job.location)) +
      this.traits.scoringBias(agent, job.category) +
      urgencyWeight(job.metadata.urgency)
    );
  }

  public rank(agent: Agent): ScoredJob[] {
    return this.jobs
      .queryCandidates(agent)
      .map((job) => ({ job, score: this.score(agent, job) }))
      .sort((a, b) => b.score - a.score || a.job.seq - b.job.seq);
  }

  /**
   * Claims the best-scoring candidate. Null when nothing was claimed.
   */
  public tryClaim(agent: Agent): Job | null {
    const ranked = this.rank(agent);
    const limit = Math.min(ranked.length, this.config.maxClaimAttemptsPerTick);

    for (let attempt = 0; attempt < limit; attempt++) {
      const { job, score } = ranked[attempt];
      if (this.jobs.claim(job.id, agent.id)) {
        logger.agentLog(
          LogLevel.DEBUG,
          LogCategory.JOBS,
          agent.id,
          `claimed ${job.id} (${job.type}) score ${score.toFixed(1)}`,
        );
        return job;
      }
    }
    return null;
  }
}
