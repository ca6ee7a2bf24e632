import path from "node:path";
import type { Logger } from "pino";
import type { Auth } from "../config.js";
import { HttpError, errorMessage } from "../errors.js";
import { HttpClient } from "./http.js";
import type { DownloadClient, Torrent, TorrentProperties, TorrentState } from "./types.js";

export interface RawTorrent {
  hashString: string;
  name: string;
  status: number;
  error: number;
  percentDone: number;
  totalSize: number;
  uploadRatio: number;
  secondsSeeding: number;
  downloadDir: string;
  labels: string[];
  isPrivate: boolean;
  isStalled: boolean;
  seedRatioLimit: number;
  seedRatioMode: number;
}

interface RPCResponse<T> {
  result: string;
  arguments?: T;
}

interface TorrentGetResponse {
  torrents: RawTorrent[];
}

interface SessionGetResponse {
  seedRatioLimit: number;
  seedRatioLimited: boolean;
}

const FIELDS = [
  "hashString",
  "name",
  "status",
  "error",
  "percentDone",
  "totalSize",
  "uploadRatio",
  "secondsSeeding",
  "downloadDir",
  "labels",
  "isPrivate",
  "isStalled",
  "seedRatioLimit",
  "seedRatioMode",
] as const;

// tr_torrent_activity
const STATUS_STOPPED = 0;
const STATUS_DOWNLOADING = 4;
const STATUS_SEED_WAIT = 5;
const STATUS_SEEDING = 6;

// tr_ratiolimit
const RATIO_GLOBAL = 0;
const RATIO_SINGLE = 1;

const toState = (t: RawTorrent): TorrentState => {
  if (t.error) return "error";
  switch (t.status) {
    case STATUS_STOPPED:
      return "paused";
    case STATUS_DOWNLOADING:
      return t.isStalled ? "stalled" : "downloading";
    case STATUS_SEED_WAIT:
    case STATUS_SEEDING:
      return "seeding";
    default:
      return "queued";
  }
};

const toTorrent = (t: RawTorrent): Torrent => {
  const labels = t.labels || [];
  return {
    hash: t.hashString.toLowerCase(),
    name: t.name,
    state: toState(t),
    progress: t.percentDone || 0,
    size: t.totalSize || 0,
    ratio: Math.max(t.uploadRatio || 0, 0),
    seedingTime: t.secondsSeeding || 0,
    // Transmission has no categories; the first label or the download folder stands in
    category: labels[0] ?? path.basename(t.downloadDir || ""),
    tags: labels,
  };
};

export interface TransmissionClientOptions {
  name: string;
  url: string;
  auth: Auth | undefined;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Transmission RPC client. Labels play the role of tags.
 */
export class TransmissionClient implements DownloadClient {
  readonly kind = "transmission";
  readonly name: string;

  private readonly http: HttpClient;
  private readonly rpcPath: string;
  private readonly auth: Auth | undefined;
  private readonly logger: Logger;
  private sessionId: string | null = null;

  constructor(options: TransmissionClientOptions) {
    const url = new URL(options.url);
    this.name = options.name;
    this.rpcPath = url.pathname === "/" ? "/transmission/rpc" : url.pathname;
    this.http = new HttpClient({ baseUrl: url.origin, timeoutMs: options.timeoutMs });
    this.auth = options.auth;
    this.logger = options.logger.child({ client: options.name });
  }

  /** Encodes credentials to Base64 for Basic Auth. */
  private toBase64(input: string): string {
    return Buffer.from(input, "utf-8").toString("base64");
  }

  /** Creates Basic Auth header if credentials are provided. */
  private getAuthHeader(): string | undefined {
    if (this.auth?.username || this.auth?.password) {
      return `Basic ${this.toBase64(`${this.auth.username}:${this.auth.password}`)}`;
    }
    return undefined;
  }

  /** Makes an RPC request, negotiating the session id on 409. */
  private async rpc<T>(
    method: string,
    args: Record<string, unknown>,
    signal?: AbortSignal,
    retryCount = 0
  ): Promise<T> {
    const headers: Record<string, string> = {};
    const authHeader = this.getAuthHeader();
    if (authHeader) headers.Authorization = authHeader;
    if (this.sessionId) headers["X-Transmission-Session-Id"] = this.sessionId;

    try {
      const response = await this.http.send("POST", this.rpcPath, {
        json: { method, arguments: args },
        headers,
        signal,
      });

      const newSessionId = response.headers.get("X-Transmission-Session-Id");
      if (newSessionId) this.sessionId = newSessionId;

      if (response.status === 409) {
        if (retryCount >= 2) {
          throw new Error("Failed to negotiate Transmission session after multiple attempts (409).");
        }
        return this.rpc<T>(method, args, signal, retryCount + 1);
      }

      if (!response.ok) {
        throw new HttpError(response.status, response.body, this.rpcPath);
      }

      const json = JSON.parse(response.body) as RPCResponse<T>;
      if (json.result !== "success" || json.arguments === undefined) {
        throw new Error(`RPC error: ${json.result}`);
      }
      return json.arguments;
    } catch (err: unknown) {
      const message = errorMessage(err);
      if (message.startsWith("Transmission RPC call failed")) throw err;
      throw new Error(`Transmission RPC call failed: ${message}`);
    }
  }

  private async fetchTorrents(hashes: readonly string[] | undefined, signal?: AbortSignal): Promise<RawTorrent[]> {
    const response = await this.rpc<TorrentGetResponse>(
      "torrent-get",
      { fields: FIELDS, ...(hashes ? { ids: hashes.map((h) => h.toLowerCase()) } : {}) },
      signal
    );
    return response.torrents || [];
  }

  private async findTorrent(hash: string, signal?: AbortSignal): Promise<RawTorrent> {
    const [torrent] = await this.fetchTorrents([hash], signal);
    if (!torrent) throw new Error(`torrent ${hash} not found`);
    return torrent;
  }

  async getTorrents(signal?: AbortSignal): Promise<Torrent[]> {
    const torrents = (await this.fetchTorrents(undefined, signal)).map(toTorrent);
    this.logger.debug(`✓ Fetched ${torrents.length} torrent(s)`);
    return torrents;
  }

  async getTorrent(hash: string, signal?: AbortSignal): Promise<Torrent | null> {
    const [torrent] = await this.fetchTorrents([hash], signal);
    return torrent ? toTorrent(torrent) : null;
  }

  async deleteTorrent(hash: string, deleteFiles: boolean, signal?: AbortSignal): Promise<void> {
    await this.rpc<Record<string, never>>(
      "torrent-remove",
      { ids: [hash.toLowerCase()], "delete-local-data": deleteFiles },
      signal
    );
  }

  async addTags(hash: string, tags: readonly string[], signal?: AbortSignal): Promise<void> {
    const torrent = await this.findTorrent(hash, signal);
    const labels = [...new Set([...(torrent.labels || []), ...tags])];
    await this.rpc<Record<string, never>>("torrent-set", { ids: [hash.toLowerCase()], labels }, signal);
  }

  async isPrivateTracker(hash: string, signal?: AbortSignal): Promise<boolean> {
    return (await this.findTorrent(hash, signal)).isPrivate === true;
  }

  async getTorrentProperties(hash: string, signal?: AbortSignal): Promise<TorrentProperties> {
    const torrent = await this.findTorrent(hash, signal);

    let ratioLimit = -1;
    if (torrent.seedRatioMode === RATIO_SINGLE) {
      ratioLimit = torrent.seedRatioLimit;
    } else if (torrent.seedRatioMode === RATIO_GLOBAL) {
      const session = await this.rpc<SessionGetResponse>(
        "session-get",
        { fields: ["seedRatioLimit", "seedRatioLimited"] },
        signal
      );
      ratioLimit = session.seedRatioLimited ? session.seedRatioLimit : -1;
    }

    // Transmission only limits idle time, not total seeding time
    return { isPrivate: torrent.isPrivate === true, ratioLimit, seedingTimeLimit: -1 };
  }
}
