import type { ArrInstance, DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import { errorMessage } from "../../errors.js";
import type { Manager } from "../manager.js";
import { QueueRemovalJob } from "./base.js";

type EntityField = "seriesId" | "movieId" | "artistId" | "authorId";

const ENTITIES: Record<string, { type: string; field: EntityField }> = {
  sonarr: { type: "series", field: "seriesId" },
  radarr: { type: "movie", field: "movieId" },
  lidarr: { type: "artist", field: "artistId" },
  readarr: { type: "author", field: "authorId" },
};

/** Queue items whose series, movie, artist or author is no longer monitored. */
export class RemoveUnmonitoredJob extends QueueRemovalJob {
  protected readonly deleteOptions: DeleteOptions = { removeFromClient: true, blocklist: false, skipRedownload: true };
  private unmonitored = new Set<QueueItem>();

  constructor(manager: Manager, settings: RemovalJobConfig) {
    super({ name: "remove_unmonitored", manager, settings });
  }

  protected matches(item: QueueItem): boolean {
    return this.unmonitored.has(item);
  }

  protected async processQueue(instance: ArrInstance, items: readonly QueueItem[], signal: AbortSignal): Promise<void> {
    const status = await instance.queue.getSystemStatus(signal);
    const entity = ENTITIES[status.appName.toLowerCase()];
    if (!entity) {
      this.logger.warn({ instance: instance.name, app: status.appName }, "Unsupported application, skipping");
      return;
    }

    const monitored = new Map<number, boolean>();
    this.unmonitored = new Set();
    for (const item of items) {
      const entityId = item[entity.field];
      if (!item.downloadId || entityId === undefined || entityId <= 0) continue;

      if (!monitored.has(entityId)) {
        try {
          monitored.set(entityId, await instance.queue.getMonitoredStatus(entity.type, entityId, signal));
        } catch (err) {
          this.logger.error({ instance: instance.name, entityId }, `✗ Failed to check monitored status: ${errorMessage(err)}`);
          continue;
        }
      }
      if (monitored.get(entityId) === false) this.unmonitored.add(item);
    }

    await super.processQueue(instance, items, signal);
  }
}
