import type { DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { QueueRemovalJob } from "./base.js";
import { isFailedDownload } from "./predicates.js";

export class RemoveFailedDownloadsJob extends QueueRemovalJob {
  protected readonly deleteOptions: DeleteOptions = { removeFromClient: true, blocklist: true, skipRedownload: true };

  constructor(manager: Manager, settings: RemovalJobConfig) {
    super({ name: "remove_failed_downloads", manager, settings });
  }

  protected matches(item: QueueItem): boolean {
    return isFailedDownload(item);
  }
}
