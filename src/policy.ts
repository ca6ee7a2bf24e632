import type { Logger } from "pino";
import type { DownloadClient, Torrent } from "./clients/types.js";
import { errorMessage } from "./errors.js";

export type RemovalAction = "remove" | "tag" | "skip";

export interface RemovalPolicyOptions {
  /** Registered download clients, searched in order. */
  clients: () => readonly DownloadClient[];
  privateTrackerHandling: string;
  publicTrackerHandling: string;
  protectedTag?: string;
  obsoleteTag?: string;
  logger: Logger;
}

interface Located {
  client: DownloadClient;
  torrent: Torrent;
}

/**
 * Decides what happens to an item that has reached its strike limit, based on
 * the item's tags and whether its tracker is private.
 */
export class RemovalPolicy {
  private readonly logger: Logger;

  constructor(private readonly options: RemovalPolicyOptions) {
    this.logger = options.logger.child({ component: "policy" });
  }

  async resolve(id: string, signal?: AbortSignal): Promise<RemovalAction> {
    const located = await this.locate(id, signal);
    if (!located) return "remove";

    const { client, torrent } = located;
    const { protectedTag } = this.options;
    if (protectedTag && torrent.tags.includes(protectedTag)) {
      this.logger.info({ id, tag: protectedTag }, `Skipping protected item ${torrent.name}`);
      return "skip";
    }

    let isPrivate = false;
    try {
      isPrivate = await client.isPrivateTracker(id, signal);
    } catch (err) {
      this.logger.warn({ id, client: client.name }, `Tracker privacy unknown, treating as public: ${errorMessage(err)}`);
    }

    const mode = isPrivate ? this.options.privateTrackerHandling : this.options.publicTrackerHandling;
    return this.toAction(mode);
  }

  async applyObsoleteTag(id: string, signal?: AbortSignal): Promise<void> {
    const tag = this.options.obsoleteTag;
    if (!tag) {
      throw new Error("obsolete tag is not configured");
    }

    const located = await this.locate(id, signal);
    if (!located) {
      throw new Error(`item ${id} not found in any download client`);
    }

    const { client, torrent } = located;
    if (torrent.tags.includes(tag)) return;

    await client.addTags(id, [tag], signal);
    this.logger.info({ id, tag, client: client.name }, `Tagged ${torrent.name}`);
  }

  private async locate(id: string, signal?: AbortSignal): Promise<Located | undefined> {
    for (const client of this.options.clients()) {
      try {
        const torrent = await client.getTorrent(id, signal);
        if (torrent) return { client, torrent };
      } catch (err) {
        this.logger.debug({ id, client: client.name }, `Lookup failed: ${errorMessage(err)}`);
      }
    }
    return undefined;
  }

  private toAction(mode: string): RemovalAction {
    switch (mode) {
      case "remove":
        return "remove";
      case "skip":
        return "skip";
      case "obsolete_tag":
        return "tag";
      default:
        this.logger.warn({ mode }, "Unknown tracker handling mode, defaulting to remove");
        return "remove";
    }
  }
}
