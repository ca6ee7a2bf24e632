import type { Logger } from "pino";
import type { ArrKind } from "../config.js";
import { errorMessage } from "../errors.js";
import { HttpClient } from "./http.js";
import type { ArrSystemStatus, DeleteOptions, QueueItem, QueueSource, StatusMessage } from "./types.js";

interface RawQueueItem {
  id: number;
  title?: string;
  status?: string;
  trackedDownloadStatus?: string;
  trackedDownloadState?: string;
  statusMessages?: Array<{ title?: string; messages?: string[] }>;
  errorMessage?: string;
  downloadId?: string;
  protocol?: string;
  downloadClient?: string;
  indexer?: string;
  size?: number;
  sizeleft?: number;
  added?: string;
  seriesId?: number;
  episodeId?: number;
  seasonNumber?: number;
  movieId?: number;
  artistId?: number;
  albumId?: number;
  authorId?: number;
  bookId?: number;
}

interface PagedResponse<T> {
  page: number;
  pageSize: number;
  totalRecords: number;
  records: T[];
}

export interface ArrClientOptions {
  name: string;
  kind: ArrKind;
  url: string;
  apiKey: string;
  timeoutMs: number;
  logger: Logger;
}

export const API_VERSIONS: Record<ArrKind, string> = {
  sonarr: "v3",
  radarr: "v3",
  whisparr: "v3",
  lidarr: "v1",
  readarr: "v1",
};

const QUEUE_PAGE_SIZE = 1000;

const toQueueItem = (raw: RawQueueItem): QueueItem => ({
  ...raw,
  title: raw.title ?? "",
  status: raw.status ?? "",
  trackedDownloadStatus: raw.trackedDownloadStatus ?? "",
  trackedDownloadState: raw.trackedDownloadState ?? "",
  statusMessages: (raw.statusMessages ?? []).map(
    (m): StatusMessage => ({ title: m.title ?? "", messages: m.messages ?? [] })
  ),
  errorMessage: raw.errorMessage ?? "",
  downloadId: raw.downloadId ?? "",
  protocol: raw.protocol ?? "",
  downloadClient: raw.downloadClient ?? "",
  indexer: raw.indexer ?? "",
  size: raw.size ?? 0,
  sizeleft: raw.sizeleft ?? 0,
  added: raw.added,
});

/** Endpoints shared by Sonarr, Radarr, Lidarr, Readarr and Whisparr. */
export class ArrClient implements QueueSource {
  readonly name: string;
  readonly kind: ArrKind;
  readonly http: HttpClient;
  readonly apiPrefix: string;
  private readonly logger: Logger;

  constructor(options: ArrClientOptions) {
    this.name = options.name;
    this.kind = options.kind;
    this.apiPrefix = `/api/${API_VERSIONS[options.kind]}`;
    this.http = new HttpClient({
      baseUrl: options.url,
      timeoutMs: options.timeoutMs,
      headers: { "X-Api-Key": options.apiKey },
    });
    this.logger = options.logger.child({ instance: options.name });
  }

  async getQueue(signal?: AbortSignal): Promise<QueueItem[]> {
    try {
      const response = await this.http.getJson<PagedResponse<RawQueueItem>>(`${this.apiPrefix}/queue`, {
        query: { page: 1, pageSize: QUEUE_PAGE_SIZE },
        signal,
      });
      const items = (response.records ?? []).map(toQueueItem);
      this.logger.debug({ items: items.length, total: response.totalRecords }, "Fetched queue");
      return items;
    } catch (err) {
      throw new Error(`get queue: ${errorMessage(err)}`);
    }
  }

  async deleteQueueItem(id: number, options: DeleteOptions, signal?: AbortSignal): Promise<void> {
    try {
      await this.http.request("DELETE", `${this.apiPrefix}/queue/${id}`, {
        query: {
          removeFromClient: options.removeFromClient || undefined,
          blocklist: options.blocklist || undefined,
          skipRedownload: options.skipRedownload || undefined,
        },
        signal,
      });
    } catch (err) {
      throw new Error(`delete queue item ${id}: ${errorMessage(err)}`);
    }
  }

  async getMonitoredStatus(entityType: string, entityId: number, signal?: AbortSignal): Promise<boolean> {
    try {
      const entity = await this.http.getJson<{ monitored?: boolean }>(
        `${this.apiPrefix}/${entityType}/${entityId}`,
        { signal }
      );
      return entity.monitored === true;
    } catch (err) {
      throw new Error(`get ${entityType} ${entityId}: ${errorMessage(err)}`);
    }
  }

  async getSystemStatus(signal?: AbortSignal): Promise<ArrSystemStatus> {
    try {
      return await this.http.getJson<ArrSystemStatus>(`${this.apiPrefix}/system/status`, { signal });
    } catch (err) {
      throw new Error(`get system status: ${errorMessage(err)}`);
    }
  }

  async command(name: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<void> {
    try {
      await this.http.postJson(`${this.apiPrefix}/command`, { name, ...body }, { signal });
      this.logger.debug({ command: name }, "Command sent");
    } catch (err) {
      throw new Error(`command ${name}: ${errorMessage(err)}`);
    }
  }
}
