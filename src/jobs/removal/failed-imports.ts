import type { DeleteOptions, QueueItem } from "../../clients/types.js";
import type { RemovalJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { QueueRemovalJob } from "./base.js";
import { globToRegExp, isFailedImport, matchesMessagePatterns } from "./predicates.js";

export type FailedImportsSettings = RemovalJobConfig & { readonly messagePatterns: readonly string[] };

/**
 * Import failures, optionally narrowed by glob patterns on the status and
 * error messages. Without patterns every failed import counts.
 */
export class RemoveFailedImportsJob extends QueueRemovalJob {
  protected readonly deleteOptions: DeleteOptions = { removeFromClient: true, blocklist: false, skipRedownload: true };
  private readonly patterns: readonly RegExp[];

  constructor(manager: Manager, settings: FailedImportsSettings) {
    super({ name: "remove_failed_imports", manager, settings });
    this.patterns = settings.messagePatterns.map(globToRegExp);
  }

  protected matches(item: QueueItem): boolean {
    return isFailedImport(item) && matchesMessagePatterns(item, this.patterns);
  }
}
