import type { DownloadClient, Torrent, TorrentProperties } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import { errorMessage } from "../../errors.js";
import type { Manager } from "../manager.js";
import { RemovalJob } from "./base.js";

export type DoneSeedingSettings = RemovalJobConfig & {
  readonly targetTags: readonly string[];
  readonly targetCategories: readonly string[];
};

/**
 * Completed torrents that have reached the ratio or seeding-time limit their
 * client reports. Bypasses the removal policy.
 */
export class RemoveDoneSeedingJob extends RemovalJob {
  private readonly targetTags: readonly string[];
  private readonly targetCategories: readonly string[];

  constructor(manager: Manager, settings: DoneSeedingSettings) {
    super({ name: "remove_done_seeding", manager, settings, trackerAware: false });
    this.targetTags = settings.targetTags;
    this.targetCategories = settings.targetCategories;
  }

  protected async execute(signal: AbortSignal): Promise<void> {
    const failures: string[] = [];

    for (const client of this.manager.getDownloadClients()) {
      if (client.kind === "sabnzbd") continue;
      try {
        await this.processClient(client, signal);
      } catch (err) {
        this.logger.error({ client: client.name }, `✗ ${errorMessage(err)}`);
        failures.push(`${client.name}: ${errorMessage(err)}`);
      }
    }

    if (failures.length > 0) {
      throw new Error(`failed clients: ${failures.join("; ")}`);
    }
  }

  private async processClient(client: DownloadClient, signal: AbortSignal): Promise<void> {
    const torrents = await client.getTorrents(signal);

    for (const torrent of torrents) {
      if (!this.isCandidate(torrent)) continue;

      let props: TorrentProperties;
      try {
        props = await client.getTorrentProperties(torrent.hash, signal);
      } catch (err) {
        this.logger.warn({ client: client.name, id: torrent.hash }, `Skipping ${torrent.name}: ${errorMessage(err)}`);
        continue;
      }

      const ratioMet = props.ratioLimit > 0 && torrent.ratio >= props.ratioLimit;
      const timeMet = props.seedingTimeLimit > 0 && torrent.seedingTime >= props.seedingTimeLimit;
      if (!ratioMet && !timeMet) continue;

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

  private isCandidate(torrent: Torrent): boolean {
    if (torrent.progress < 1) return false;
    if (torrent.state !== "paused" && torrent.state !== "seeding") return false;
    if (this.targetTags.length === 0 && this.targetCategories.length === 0) return true;
    return (
      this.targetCategories.includes(torrent.category) ||
      torrent.tags.some((tag) => this.targetTags.includes(tag))
    );
  }
}
