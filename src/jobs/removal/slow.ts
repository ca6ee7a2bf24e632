import type { ArrInstance, DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { QueueRemovalJob } from "./base.js";
import { downloadSpeed } from "./predicates.js";

export type SlowSettings = RemovalJobConfig & {
  /** KB/s */
  readonly minDownloadSpeed: number;
};

/**
 * Downloads averaging less than `minDownloadSpeed` since they were added.
 * An item that climbs back over the threshold has its strikes cleared.
 */
export class RemoveSlowJob extends QueueRemovalJob {
  protected readonly deleteOptions: DeleteOptions = { removeFromClient: true, blocklist: false, skipRedownload: false };
  private readonly thresholdBytes: number;

  constructor(manager: Manager, settings: SlowSettings) {
    super({ name: "remove_slow", manager, settings });
    this.thresholdBytes = settings.minDownloadSpeed * 1024;
  }

  protected matches(item: QueueItem): boolean {
    const speed = this.measure(item);
    return speed !== undefined && speed < this.thresholdBytes;
  }

  protected async processQueue(instance: ArrInstance, items: readonly QueueItem[], signal: AbortSignal): Promise<void> {
    if (this.thresholdBytes <= 0) return;

    await super.processQueue(instance, items, signal);

    for (const item of items) {
      if (!item.downloadId || this.matches(item) || this.measure(item) === undefined) continue;
      if (this.manager.strikes.get(item.downloadId) > 0) {
        this.manager.strikes.reset(item.downloadId);
        this.logger.info({ id: item.downloadId }, `Speed recovered, strikes cleared: ${item.title}`);
      }
    }
  }

  private measure(item: QueueItem): number | undefined {
    if (item.status !== "downloading") return undefined;
    return downloadSpeed(item, Date.now());
  }
}
