import type { DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { QueueRemovalJob } from "./base.js";
import { isMetadataMissing } from "./predicates.js";

/** Releases the *arr could not match to anything in its library. */
export class RemoveMetadataMissingJob extends QueueRemovalJob {
  protected readonly deleteOptions: DeleteOptions = { removeFromClient: true, blocklist: false, skipRedownload: true };

  constructor(manager: Manager, settings: RemovalJobConfig) {
    super({ name: "remove_metadata_missing", manager, settings });
  }

  protected matches(item: QueueItem): boolean {
    return isMetadataMissing(item);
  }
}
