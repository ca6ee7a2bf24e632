import type { DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { QueueRemovalJob } from "./base.js";
import { hasMissingFiles } from "./predicates.js";

export class RemoveMissingFilesJob extends QueueRemovalJob {
  protected readonly deleteOptions: DeleteOptions = { removeFromClient: true, blocklist: false, skipRedownload: true };

  constructor(manager: Manager, settings: RemovalJobConfig) {
    super({ name: "remove_missing_files", manager, settings });
  }

  protected matches(item: QueueItem): boolean {
    return hasMissingFiles(item);
  }
}
