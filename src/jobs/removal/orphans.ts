import type { Torrent } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import { errorMessage } from "../../errors.js";
import type { Manager } from "../manager.js";
import { RemovalJob } from "./base.js";

/**
 * Download-client items that no *arr queue knows about. Needs a complete
 * queue snapshot: with any instance missing, nothing is struck.
 */
export class RemoveOrphansJob extends RemovalJob {
  constructor(manager: Manager, settings: RemovalJobConfig) {
    super({ name: "remove_orphans", manager, settings });
  }

  protected async execute(signal: AbortSignal): Promise<void> {
    const { queues, errors } = await this.manager.getAllQueues(signal);
    if (errors.length > 0) {
      throw new Error(`incomplete queue snapshot, skipping: ${errors.map((e) => e.message).join("; ")}`);
    }

    const tracked = new Set<string>();
    for (const items of queues.values()) {
      for (const item of items) {
        if (item.downloadId) tracked.add(item.downloadId.toLowerCase());
      }
    }

    const failures: string[] = [];
    for (const client of this.manager.getDownloadClients()) {
      let torrents: Torrent[];
      try {
        torrents = await client.getTorrents(signal);
      } catch (err) {
        this.logger.error({ client: client.name }, `✗ ${errorMessage(err)}`);
        failures.push(`${client.name}: ${errorMessage(err)}`);
        continue;
      }

      for (const torrent of torrents) {
        if (tracked.has(torrent.hash.toLowerCase())) continue;
        this.found++;
        await this.strike(
          {
            id: torrent.hash,
            title: torrent.name,
            source: client.name,
            remove: (s) => client.deleteTorrent(torrent.hash, false, s),
          },
          signal
        );
      }
    }

    if (failures.length > 0) {
      throw new Error(`failed clients: ${failures.join("; ")}`);
    }
  }
}
