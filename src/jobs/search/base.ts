import pLimit, { type LimitFunction } from "p-limit";
import type { Logger } from "pino";
import type { ArrInstance } from "../../clients/types.js";
import type { SearchJobConfig } from "../../config.js";
import { errorMessage } from "../../errors.js";
import type { JobStats, StatsJob } from "../job.js";
import type { Manager } from "../manager.js";

export type SearchCommand = (ids: readonly number[]) => Promise<void>;

export type Enqueue = (label: string, ids: readonly number[], search: SearchCommand) => void;

/**
 * Fans out over every Sonarr and Radarr instance at once. Search commands from
 * all instances share one limiter of `maxConcurrentSearches`.
 */
export abstract class SearchJob implements StatsJob {
  protected readonly logger: Logger;
  protected found = 0;
  protected searched = 0;

  constructor(
    readonly name: string,
    protected readonly manager: Manager,
    protected readonly settings: SearchJobConfig
  ) {
    this.logger = manager.logger.child({ job: name });
  }

  get enabled(): boolean {
    return this.settings.enabled;
  }

  stats(): JobStats {
    return { found: this.found, removed: this.searched };
  }

  async run(signal: AbortSignal): Promise<void> {
    this.found = 0;
    this.searched = 0;

    const limit = pLimit(this.settings.maxConcurrentSearches);
    const instances = this.manager.getArrInstances().filter((i) => i.series || i.movies);
    const results = await Promise.allSettled(instances.map((i) => this.searchInstance(i, limit, signal)));

    const failures = results.flatMap((result, index) =>
      result.status === "rejected" ? [`${instances[index]?.name}: ${errorMessage(result.reason)}`] : []
    );
    for (const failure of failures) {
      this.logger.error(`✗ ${failure}`);
    }
    if (failures.length > 0) {
      throw new Error(`failed instances: ${failures.join("; ")}`);
    }
  }

  /** Lists an instance's candidates and hands each search to `enqueue`. */
  protected abstract collect(instance: ArrInstance, enqueue: Enqueue, signal: AbortSignal): Promise<void>;

  private async searchInstance(instance: ArrInstance, limit: LimitFunction, signal: AbortSignal): Promise<void> {
    const pending: Promise<void>[] = [];
    const failures: string[] = [];
    const enqueue: Enqueue = (label, ids, search) => {
      pending.push(
        this.trigger(instance, label, ids, search, limit).catch((err: unknown) => {
          failures.push(`${label}: ${errorMessage(err)}`);
        })
      );
    };

    try {
      await this.collect(instance, enqueue, signal);
    } finally {
      await Promise.all(pending);
    }
    if (failures.length > 0) {
      throw new Error(`${failures.length} search(es) failed: ${failures.join("; ")}`);
    }
  }

  /** Runs one search command under the limiter; in dry-run only logs it. */
  private trigger(
    instance: ArrInstance,
    label: string,
    ids: readonly number[],
    search: SearchCommand,
    limit: LimitFunction
  ): Promise<void> {
    if (this.manager.testRun) {
      this.logger.warn({ instance: instance.name }, `DRY_RUN enabled – would search ${label} (${ids.length} item(s))`);
      return Promise.resolve();
    }
    return limit(async () => {
      await search(ids);
      this.searched += ids.length;
      this.logger.info({ instance: instance.name }, `🔍 Searching ${label} (${ids.length} item(s))`);
    });
  }
}
