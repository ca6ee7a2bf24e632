export interface JobStats {
  found: number;
  removed: number;
}

export interface Job {
  readonly name: string;
  readonly enabled: boolean;
  run(signal: AbortSignal): Promise<void>;
}

/** A job that reports what its last run found and acted on. */
export interface StatsJob extends Job {
  stats(): JobStats;
}

export const hasStats = (job: Job): job is StatsJob =>
  "stats" in job && typeof job.stats === "function";
