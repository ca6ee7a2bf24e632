import type { DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { QueueRemovalJob } from "./base.js";
import { isStalled } from "./predicates.js";

export class RemoveStalledJob extends QueueRemovalJob {
  protected readonly deleteOptions: DeleteOptions = { removeFromClient: true, blocklist: false, skipRedownload: true };

  constructor(manager: Manager, settings: RemovalJobConfig) {
    super({ name: "remove_stalled", manager, settings });
  }

  protected matches(item: QueueItem): boolean {
    return isStalled(item);
  }
}
