import type { Logger } from "pino";
import { ArrClient } from "./clients/arr.js";
import { QBittorrentClient } from "./clients/qbittorrent.js";
import { RadarrLibrary } from "./clients/radarr.js";
import { SABnzbdClient } from "./clients/sabnzbd.js";
import { SonarrLibrary } from "./clients/sonarr.js";
import { TransmissionClient } from "./clients/transmission.js";
import type { ArrInstance, DownloadClient } from "./clients/types.js";
import type { ArrInstanceConfig, Config, DownloadClientConfig } from "./config.js";
import { Manager } from "./jobs/manager.js";
import { RemoveBadFilesJob } from "./jobs/removal/bad-files.js";
import { RemoveDoneSeedingJob } from "./jobs/removal/done-seeding.js";
import { RemoveFailedDownloadsJob } from "./jobs/removal/failed-downloads.js";
import { RemoveFailedImportsJob } from "./jobs/removal/failed-imports.js";
import { RemoveMetadataMissingJob } from "./jobs/removal/metadata-missing.js";
import { RemoveMissingFilesJob } from "./jobs/removal/missing-files.js";
import { RemoveOrphansJob } from "./jobs/removal/orphans.js";
import { RemoveSlowJob } from "./jobs/removal/slow.js";
import { RemoveStalledJob } from "./jobs/removal/stalled.js";
import { RemoveUnmonitoredJob } from "./jobs/removal/unmonitored.js";
import { SearchCutoffUnmetJob } from "./jobs/search/cutoff.js";
import { SearchMissingJob } from "./jobs/search/missing.js";
import type { StrikeLedger } from "./strikes.js";

export function createArrInstance(config: ArrInstanceConfig, timeoutMs: number, logger: Logger): ArrInstance {
  const client = new ArrClient({
    name: config.name,
    kind: config.kind,
    url: config.url,
    apiKey: config.apiKey,
    timeoutMs,
    logger,
  });
  return {
    name: config.name,
    kind: config.kind,
    queue: client,
    series: config.kind === "sonarr" ? new SonarrLibrary(client) : undefined,
    movies: config.kind === "radarr" ? new RadarrLibrary(client) : undefined,
  };
}

export function createDownloadClient(config: DownloadClientConfig, timeoutMs: number, logger: Logger): DownloadClient {
  switch (config.kind) {
    case "qbittorrent":
      return new QBittorrentClient({ name: config.name, url: config.url, auth: config.auth, timeoutMs, logger });
    case "transmission":
      return new TransmissionClient({ name: config.name, url: config.url, auth: config.auth, timeoutMs, logger });
    case "sabnzbd":
      return new SABnzbdClient({ name: config.name, url: config.url, apiKey: config.apiKey, timeoutMs, logger });
  }
}

/** Registers every job. The order here is the order jobs run in each cycle. */
export function registerJobs(manager: Manager): void {
  const { jobs } = manager.config;
  manager.registerJob(new RemoveStalledJob(manager, jobs.removeStalled));
  manager.registerJob(new RemoveFailedImportsJob(manager, jobs.removeFailedImports));
  manager.registerJob(new RemoveFailedDownloadsJob(manager, jobs.removeFailedDownloads));
  manager.registerJob(new RemoveOrphansJob(manager, jobs.removeOrphans));
  manager.registerJob(new RemoveMissingFilesJob(manager, jobs.removeMissingFiles));
  manager.registerJob(new RemoveUnmonitoredJob(manager, jobs.removeUnmonitored));
  manager.registerJob(new RemoveSlowJob(manager, jobs.removeSlow));
  manager.registerJob(new RemoveBadFilesJob(manager, jobs.removeBadFiles));
  manager.registerJob(new RemoveMetadataMissingJob(manager, jobs.removeMetadataMissing));
  manager.registerJob(new RemoveDoneSeedingJob(manager, jobs.removeDoneSeeding));
  manager.registerJob(new SearchMissingJob(manager, jobs.searchMissing));
  manager.registerJob(new SearchCutoffUnmetJob(manager, jobs.searchCutoffUnmet));
}

/** Builds a manager with every enabled instance and client, and all jobs. */
export function createManager(config: Config, logger: Logger, strikes: StrikeLedger): Manager {
  const manager = new Manager({ config, logger, strikes });
  const timeoutMs = config.general.requestTimeoutMs;

  for (const instance of config.instances) {
    if (instance.enabled) manager.registerArrInstance(createArrInstance(instance, timeoutMs, logger));
  }
  for (const client of config.downloadClients) {
    if (client.enabled) manager.registerDownloadClient(createDownloadClient(client, timeoutMs, logger));
  }

  registerJobs(manager);
  return manager;
}
