import type { Logger } from "pino";
import { errorMessage } from "../errors.js";
import { HttpClient, type Query } from "./http.js";
import type { DownloadClient, Torrent, TorrentProperties, TorrentState } from "./types.js";

interface QueueSlot {
  nzo_id: string;
  filename: string;
  status: string;
  mb: string;
  mbleft: string;
  cat: string;
}

interface QueueResponse {
  queue: { slots: QueueSlot[] };
}

interface ActionResponse {
  status?: boolean;
  error?: string;
}

const STATE_MAP: Record<string, TorrentState> = {
  Downloading: "downloading",
  Fetching: "downloading",
  Grabbing: "downloading",
  Paused: "paused",
  Queued: "queued",
  Propagating: "queued",
};

const MB = 1024 * 1024;

const toTorrent = (slot: QueueSlot): Torrent => {
  const size = Number(slot.mb) * MB || 0;
  const left = Number(slot.mbleft) * MB || 0;
  return {
    hash: slot.nzo_id,
    name: slot.filename,
    state: STATE_MAP[slot.status] ?? "queued",
    progress: size > 0 ? (size - left) / size : 0,
    size,
    ratio: 0,
    seedingTime: 0,
    category: slot.cat === "*" ? "" : slot.cat,
    tags: [],
  };
};

export interface SABnzbdClientOptions {
  name: string;
  url: string;
  apiKey: string;
  timeoutMs: number;
  logger: Logger;
}

/** SABnzbd queue access. Usenet jobs are never private and carry no tags. */
export class SABnzbdClient implements DownloadClient {
  readonly kind = "sabnzbd";
  readonly name: string;

  private readonly http: HttpClient;
  private readonly apiKey: string;
  private readonly logger: Logger;

  constructor(options: SABnzbdClientOptions) {
    this.name = options.name;
    this.apiKey = options.apiKey;
    this.http = new HttpClient({ baseUrl: options.url, timeoutMs: options.timeoutMs });
    this.logger = options.logger.child({ client: options.name });
  }

  private api<T>(query: Query, signal?: AbortSignal): Promise<T> {
    return this.http.getJson<T>("/api", { query: { ...query, apikey: this.apiKey, output: "json" }, signal });
  }

  async getTorrents(signal?: AbortSignal): Promise<Torrent[]> {
    try {
      const response = await this.api<QueueResponse>({ mode: "queue" }, signal);
      const items = (response.queue?.slots ?? []).map(toTorrent);
      this.logger.debug(`✓ Fetched ${items.length} queue slot(s)`);
      return items;
    } catch (err) {
      throw new Error(`get queue: ${errorMessage(err)}`);
    }
  }

  async getTorrent(id: string, signal?: AbortSignal): Promise<Torrent | null> {
    const items = await this.getTorrents(signal);
    return items.find((item) => item.hash.toLowerCase() === id.toLowerCase()) ?? null;
  }

  async deleteTorrent(id: string, deleteFiles: boolean, signal?: AbortSignal): Promise<void> {
    let response: ActionResponse;
    try {
      response = await this.api<ActionResponse>(
        { mode: "queue", name: "delete", value: id, del_files: deleteFiles ? 1 : undefined },
        signal
      );
    } catch (err) {
      throw new Error(`delete ${id}: ${errorMessage(err)}`);
    }
    if (response.status === false) {
      throw new Error(`delete ${id}: ${response.error ?? "rejected"}`);
    }
  }

  async addTags(id: string): Promise<void> {
    throw new Error(`add tags to ${id}: SABnzbd does not support tags`);
  }

  async isPrivateTracker(): Promise<boolean> {
    return false;
  }

  async getTorrentProperties(): Promise<TorrentProperties> {
    return { isPrivate: false, ratioLimit: -1, seedingTimeLimit: -1 };
  }
}
