import type { DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { QueueRemovalJob } from "./base.js";
import { hasBadFiles } from "./predicates.js";

export class RemoveBadFilesJob extends QueueRemovalJob {
  protected readonly deleteOptions: DeleteOptions = { removeFromClient: true, blocklist: true, skipRedownload: false };

  constructor(manager: Manager, settings: RemovalJobConfig) {
    super({ name: "remove_bad_files", manager, settings });
  }

  protected matches(item: QueueItem): boolean {
    return hasBadFiles(item);
  }
}
