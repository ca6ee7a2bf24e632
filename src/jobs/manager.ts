import type { Logger } from "pino";
import type { ArrInstance, DownloadClient, QueueItem } from "../clients/types.js";
import type { Config } from "../config.js";
import { CycleError, errorMessage, toError } from "../errors.js";
import { RemovalPolicy } from "../policy.js";
import type { StrikeLedger } from "../strikes.js";
import { hasStats, type Job, type JobStats } from "./job.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CycleStats {
  cycle: number;
  startedAt: Date;
  durationMs: number;
  jobsRun: number;
  jobsFailed: number;
  totalFound: number;
  totalRemoved: number;
  strikesAdded: number;
  strikesCleared: number;
  totalStrikes: number;
  jobStats: Map<string, JobStats>;
  errors: string[];
}

export interface QueueSnapshot {
  queues: Map<string, QueueItem[]>;
  errors: Error[];
}

export interface ManagerOptions {
  config: Config;
  logger: Logger;
  strikes: StrikeLedger;
  policy?: RemovalPolicy;
}

/**
 * Owns the collaborators and the job list, and runs one cycle at a time:
 * every enabled job in registration order, then ledger bookkeeping.
 */
export class Manager {
  readonly config: Config;
  readonly logger: Logger;
  readonly strikes: StrikeLedger;
  readonly policy: RemovalPolicy;

  private readonly jobs: Job[] = [];
  private readonly arrInstances = new Map<string, ArrInstance>();
  private readonly downloadClients = new Map<string, DownloadClient>();
  private cycle = 0;
  private last: CycleStats | undefined;

  constructor(options: ManagerOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.strikes = options.strikes;
    this.policy =
      options.policy ??
      new RemovalPolicy({
        clients: () => this.getDownloadClients(),
        privateTrackerHandling: options.config.general.privateTrackerHandling,
        publicTrackerHandling: options.config.general.publicTrackerHandling,
        protectedTag: options.config.general.protectedTag,
        obsoleteTag: options.config.general.obsoleteTag,
        logger: options.logger,
      });
  }

  get testRun(): boolean {
    return this.config.general.testRun;
  }

  registerJob(job: Job): void {
    this.jobs.push(job);
  }

  registerArrInstance(instance: ArrInstance): void {
    this.arrInstances.set(instance.name, instance);
  }

  registerDownloadClient(client: DownloadClient): void {
    this.downloadClients.set(client.name, client);
  }

  getJobs(): Job[] {
    return [...this.jobs];
  }

  getArrInstance(name: string): ArrInstance | undefined {
    return this.arrInstances.get(name);
  }

  getArrInstances(): ArrInstance[] {
    return [...this.arrInstances.values()];
  }

  getDownloadClient(name: string): DownloadClient | undefined {
    return this.downloadClients.get(name);
  }

  getDownloadClients(): DownloadClient[] {
    return [...this.downloadClients.values()];
  }

  /** Fetches every instance's queue; failed instances are reported, not fatal. */
  async getAllQueues(signal?: AbortSignal): Promise<QueueSnapshot> {
    const queues = new Map<string, QueueItem[]>();
    const errors: Error[] = [];

    for (const instance of this.arrInstances.values()) {
      try {
        queues.set(instance.name, await instance.queue.getQueue(signal));
      } catch (err) {
        this.logger.error({ instance: instance.name }, `✗ Failed to fetch queue: ${errorMessage(err)}`);
        errors.push(new Error(`${instance.name}: ${errorMessage(err)}`));
      }
    }

    return { queues, errors };
  }

  lastStats(): CycleStats | undefined {
    return this.last;
  }

  async runAll(signal: AbortSignal): Promise<void> {
    const startedAt = new Date();
    const cycle = ++this.cycle;
    const ran: Job[] = [];
    const failed: string[] = [];
    const errors: Error[] = [];

    for (const job of this.jobs) {
      if (!job.enabled) {
        this.logger.debug({ job: job.name }, "Job disabled, skipping");
        continue;
      }
      if (signal.aborted) {
        this.logger.warn({ cycle }, "Cycle cancelled, skipping remaining jobs");
        break;
      }

      ran.push(job);
      this.logger.debug({ job: job.name }, "Running job");
      try {
        await job.run(signal);
      } catch (err) {
        const error = toError(err);
        failed.push(job.name);
        errors.push(new Error(`${job.name}: ${error.message}`));
        this.logger.error({ job: job.name }, `✗ Job failed: ${error.message}`);
      }
    }

    const jobStats = new Map<string, JobStats>();
    let totalFound = 0;
    let totalRemoved = 0;
    for (const job of ran) {
      if (!hasStats(job)) continue;
      const stats = job.stats();
      jobStats.set(job.name, stats);
      totalFound += stats.found;
      totalRemoved += stats.removed;
    }

    const counters = this.strikes.resetCycleCounters();

    try {
      await this.strikes.save();
    } catch (err) {
      this.logger.error(`✗ Failed to save strikes: ${errorMessage(err)}`);
    }

    const cleaned = this.strikes.cleanup(this.config.general.strikeMaxAgeDays * DAY_MS);
    if (cleaned > 0) {
      this.logger.info({ removed: cleaned }, "Removed stale strikes");
    }

    const stats: CycleStats = {
      cycle,
      startedAt,
      durationMs: Date.now() - startedAt.getTime(),
      jobsRun: ran.length,
      jobsFailed: failed.length,
      totalFound,
      totalRemoved,
      strikesAdded: counters.added,
      strikesCleared: counters.reset,
      totalStrikes: this.strikes.count(),
      jobStats,
      errors: errors.map((e) => e.message),
    };
    this.last = stats;
    this.logSummary(stats);

    if (failed.length > 0) {
      throw new CycleError(failed, errors);
    }
  }

  /** Persists the ledger before shutdown. */
  async close(): Promise<void> {
    try {
      await this.strikes.save();
    } catch (err) {
      this.logger.error(`✗ Failed to save strikes on shutdown: ${errorMessage(err)}`);
    }
  }

  private logSummary(stats: CycleStats): void {
    const jobs: Record<string, JobStats> = {};
    for (const [name, s] of stats.jobStats) {
      if (s.found > 0 || s.removed > 0) jobs[name] = s;
    }

    this.logger.info(
      {
        cycle: { number: stats.cycle, durationMs: stats.durationMs, jobsRun: stats.jobsRun, jobsFailed: stats.jobsFailed },
        totals: { found: stats.totalFound, removed: stats.totalRemoved },
        strikes: { added: stats.strikesAdded, cleared: stats.strikesCleared, tracked: stats.totalStrikes },
        jobs,
      },
      `✓ Cycle ${stats.cycle} complete`
    );

    if (stats.errors.length > 0) {
      this.logger.warn({ errors: stats.errors }, "Cycle errors");
    }
  }
}
