import type { Logger } from "pino";
import type { Auth } from "../config.js";
import { HttpError, errorMessage } from "../errors.js";
import { HttpClient, type HttpResponse, type RequestOptions } from "./http.js";
import type { DownloadClient, Torrent, TorrentProperties, TorrentState } from "./types.js";

interface TorrentInfo {
  hash: string;
  name: string;
  size: number;
  progress: number;
  ratio: number;
  state: string;
  category?: string;
  tags?: string;
  seeding_time?: number;
  /** Effective limits after global defaults; -1 when unlimited. */
  max_ratio?: number;
  /** Minutes. */
  max_seeding_time?: number;
}

interface TorrentGeneralProperties {
  is_private?: boolean;
}

const STATE_MAP: Record<string, TorrentState> = {
  allocating: "downloading",
  downloading: "downloading",
  forcedDL: "downloading",
  forcedMetaDL: "downloading",
  metaDL: "downloading",
  forcedUP: "seeding",
  stalledUP: "seeding",
  uploading: "seeding",
  pausedDL: "paused",
  pausedUP: "paused",
  stoppedDL: "paused",
  stoppedUP: "paused",
  stalledDL: "stalled",
  error: "error",
  missingFiles: "error",
};

export interface QBittorrentClientOptions {
  name: string;
  url: string;
  auth: Auth;
  timeoutMs: number;
  logger: Logger;
}

export const parseTags = (tags: string | undefined): string[] =>
  (tags ?? "")
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);

const toTorrent = (t: TorrentInfo): Torrent => ({
  hash: t.hash.toLowerCase(),
  name: t.name,
  state: STATE_MAP[t.state] ?? "queued",
  progress: t.progress || 0,
  size: t.size || 0,
  ratio: t.ratio || 0,
  seedingTime: t.seeding_time ?? 0,
  category: t.category ?? "",
  tags: parseTags(t.tags),
});

/** qBittorrent Web API v2 with cookie session handling. */
export class QBittorrentClient implements DownloadClient {
  readonly kind = "qbittorrent";
  readonly name: string;

  private readonly http: HttpClient;
  private readonly auth: Auth;
  private readonly logger: Logger;
  private cookie: string | null = null;

  constructor(options: QBittorrentClientOptions) {
    this.name = options.name;
    this.auth = options.auth;
    this.http = new HttpClient({ baseUrl: options.url, timeoutMs: options.timeoutMs });
    this.logger = options.logger.child({ client: options.name });
  }

  private async login(signal?: AbortSignal): Promise<void> {
    const response = await this.http.send("POST", "/api/v2/auth/login", {
      form: { username: this.auth.username, password: this.auth.password },
      headers: { Referer: this.http.baseUrl },
      signal,
    });
    if (!response.ok || response.body.trim() !== "Ok.") {
      throw new Error(`qBittorrent login failed: [${response.status}] ${response.body.trim()}`);
    }

    const sid = /SID=([^;]+)/.exec(response.headers.get("set-cookie") ?? "");
    if (!sid) {
      throw new Error("qBittorrent login failed: no session cookie returned");
    }
    this.cookie = `SID=${sid[1]}`;
    this.logger.debug("✓ Logged in to qBittorrent");
  }

  /** Sends an authenticated request, logging in again once if the session expired. */
  private async call(method: string, path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    for (let attempt = 0; attempt < 2; attempt++) {
      if (!this.cookie) await this.login(options.signal);
      const response = await this.http.send(method, `/api/v2${path}`, {
        ...options,
        headers: { ...options.headers, Cookie: this.cookie ?? "" },
      });
      if (response.status === 403 && attempt === 0) {
        this.cookie = null;
        continue;
      }
      if (!response.ok) {
        throw new HttpError(response.status, response.body, path);
      }
      return response;
    }
    throw new Error(`qBittorrent ${path}: session rejected after re-login`);
  }

  private async info(hash?: string, signal?: AbortSignal): Promise<TorrentInfo[]> {
    const response = await this.call("GET", "/torrents/info", {
      query: { hashes: hash?.toLowerCase() },
      signal,
    });
    return JSON.parse(response.body) as TorrentInfo[];
  }

  async getTorrents(signal?: AbortSignal): Promise<Torrent[]> {
    try {
      const torrents = (await this.info(undefined, signal)).map(toTorrent);
      this.logger.debug(`✓ Fetched ${torrents.length} torrent(s)`);
      return torrents;
    } catch (err) {
      throw new Error(`get torrents: ${errorMessage(err)}`);
    }
  }

  async getTorrent(hash: string, signal?: AbortSignal): Promise<Torrent | null> {
    try {
      const [torrent] = await this.info(hash, signal);
      return torrent ? toTorrent(torrent) : null;
    } catch (err) {
      throw new Error(`get torrent ${hash}: ${errorMessage(err)}`);
    }
  }

  async deleteTorrent(hash: string, deleteFiles: boolean, signal?: AbortSignal): Promise<void> {
    try {
      await this.call("POST", "/torrents/delete", {
        form: { hashes: hash.toLowerCase(), deleteFiles: String(deleteFiles) },
        signal,
      });
    } catch (err) {
      throw new Error(`delete torrent ${hash}: ${errorMessage(err)}`);
    }
  }

  async addTags(hash: string, tags: readonly string[], signal?: AbortSignal): Promise<void> {
    try {
      await this.call("POST", "/torrents/addTags", {
        form: { hashes: hash.toLowerCase(), tags: tags.join(",") },
        signal,
      });
    } catch (err) {
      throw new Error(`add tags to ${hash}: ${errorMessage(err)}`);
    }
  }

  private async generalProperties(hash: string, signal?: AbortSignal): Promise<TorrentGeneralProperties> {
    const response = await this.call("GET", "/torrents/properties", { query: { hash: hash.toLowerCase() }, signal });
    return JSON.parse(response.body) as TorrentGeneralProperties;
  }

  async isPrivateTracker(hash: string, signal?: AbortSignal): Promise<boolean> {
    let props: TorrentGeneralProperties;
    try {
      props = await this.generalProperties(hash, signal);
    } catch (err) {
      throw new Error(`get properties of ${hash}: ${errorMessage(err)}`);
    }
    // Only reported by qBittorrent 5.0 and later
    if (props.is_private === undefined) {
      throw new Error(`${hash}: client does not report tracker privacy`);
    }
    return props.is_private;
  }

  async getTorrentProperties(hash: string, signal?: AbortSignal): Promise<TorrentProperties> {
    try {
      const [torrent] = await this.info(hash, signal);
      if (!torrent) throw new Error("not found");

      const props = await this.generalProperties(hash, signal);
      const maxSeedingMinutes = torrent.max_seeding_time ?? -1;
      return {
        isPrivate: props.is_private ?? false,
        ratioLimit: torrent.max_ratio ?? -1,
        seedingTimeLimit: maxSeedingMinutes > 0 ? maxSeedingMinutes * 60 : -1,
      };
    } catch (err) {
      throw new Error(`get properties of ${hash}: ${errorMessage(err)}`);
    }
  }
}
