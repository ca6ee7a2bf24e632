import type { Logger } from "pino";
import type { ArrInstance, DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import { errorMessage } from "../../errors.js";
import type { RemovalAction } from "../../policy.js";
import type { StatsJob, JobStats } from "../job.js";
import type { Manager } from "../manager.js";

export interface RemovalJobOptions {
  name: string;
  manager: Manager;
  settings: RemovalJobConfig;
  /** Consult the removal policy (protected tag, tracker privacy) before acting. */
  trackerAware?: boolean;
}

export interface StrikeTarget {
  /** Ledger key: the download id or torrent hash. */
  id: string;
  title: string;
  /** Instance or client that owns the item, for logging. */
  source: string;
  remove: (signal: AbortSignal) => Promise<void>;
}

/**
 * Strike-then-act template shared by every removal job. A match adds a strike;
 * once the item reaches `maxStrikes` it is removed, tagged or skipped.
 */
export abstract class RemovalJob implements StatsJob {
  readonly name: string;
  protected readonly manager: Manager;
  protected readonly settings: RemovalJobConfig;
  protected readonly logger: Logger;
  private readonly trackerAware: boolean;
  protected found = 0;
  protected removed = 0;

  constructor(options: RemovalJobOptions) {
    this.name = options.name;
    this.manager = options.manager;
    this.settings = options.settings;
    this.trackerAware = options.trackerAware ?? true;
    this.logger = options.manager.logger.child({ job: options.name });
  }

  get enabled(): boolean {
    return this.settings.enabled;
  }

  stats(): JobStats {
    return { found: this.found, removed: this.removed };
  }

  async run(signal: AbortSignal): Promise<void> {
    this.found = 0;
    this.removed = 0;
    await this.execute(signal);
  }

  protected abstract execute(signal: AbortSignal): Promise<void>;

  protected async strike(target: StrikeTarget, signal: AbortSignal): Promise<void> {
    const { strikes, policy } = this.manager;
    const { maxStrikes } = this.settings;
    const log = this.logger.child({ id: target.id, source: target.source });

    const count = strikes.add(target.id, this.name, target.title);
    if (!strikes.hasExceeded(target.id, maxStrikes)) {
      log.info(`Strike ${count}/${maxStrikes}: ${target.title}`);
      return;
    }

    const action: RemovalAction = this.trackerAware ? await policy.resolve(target.id, signal) : "remove";
    if (action === "skip") {
      log.info(`Skipping ${target.title} (strikes: ${count})`);
      return;
    }

    if (this.manager.testRun) {
      log.warn(`DRY_RUN enabled – would ${action === "tag" ? "tag" : "remove"} ${target.title}`);
      this.removed++;
      return;
    }

    try {
      if (action === "tag") {
        await policy.applyObsoleteTag(target.id, signal);
      } else {
        await target.remove(signal);
      }
    } catch (err) {
      log.error(`✗ Failed to ${action} ${target.title}: ${errorMessage(err)}`);
      return;
    }

    strikes.reset(target.id);
    this.removed++;
    log.info(`✓ ${action === "tag" ? "Tagged" : "Removed"} ${target.title} after ${count} strikes`);
  }
}

/** Removal job that inspects *arr queue items and deletes through the *arr API. */
export abstract class QueueRemovalJob extends RemovalJob {
  protected abstract readonly deleteOptions: DeleteOptions;

  protected abstract matches(item: QueueItem): boolean;

  protected async execute(signal: AbortSignal): Promise<void> {
    const { queues, errors } = await this.manager.getAllQueues(signal);
    const failures = errors.map((e) => e.message);

    for (const [name, items] of queues) {
      const instance = this.manager.getArrInstance(name);
      if (!instance) continue;
      try {
        await this.processQueue(instance, items, signal);
      } catch (err) {
        this.logger.error({ instance: name }, `✗ ${errorMessage(err)}`);
        failures.push(`${name}: ${errorMessage(err)}`);
      }
    }

    if (failures.length > 0) {
      throw new Error(`failed instances: ${failures.join("; ")}`);
    }
  }

  protected async processQueue(instance: ArrInstance, items: readonly QueueItem[], signal: AbortSignal): Promise<void> {
    for (const item of items) {
      if (!item.downloadId || !this.matches(item)) continue;
      this.found++;
      await this.strikeQueueItem(instance, item, signal);
    }
  }

  protected strikeQueueItem(instance: ArrInstance, item: QueueItem, signal: AbortSignal): Promise<void> {
    return this.strike(
      {
        id: item.downloadId,
        title: item.title,
        source: instance.name,
        remove: (s) => instance.queue.deleteQueueItem(item.id, this.deleteOptions, s),
      },
      signal
    );
  }
}
