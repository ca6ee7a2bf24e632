import pino from "pino";
import { vi } from "vitest";
import type {
  ArrInstance,
  ArrSystemStatus,
  DeleteOptions,
  DownloadClient,
  QueueItem,
  QueueSource,
  Torrent,
  TorrentProperties,
} from "../clients/types.js";
import { parseConfig, type Config } from "../config.js";
import { Manager } from "../jobs/manager.js";
import { StrikeLedger } from "../strikes.js";

export const silentLogger = pino({ level: "silent" });

type Section = Record<string, unknown>;

/** A valid config with one Sonarr instance; sections are merged over the defaults. */
export function createTestConfig(sections: { general?: Section; job_defaults?: Section; jobs?: Section } = {}): Config {
  return parseConfig({
    instances: { sonarr: [{ name: "sonarr", url: "http://sonarr:8989", api_key: "test-key" }] },
    ...sections,
  });
}

export function createQueueItem(overrides: Partial<QueueItem> = {}): QueueItem {
  return {
    id: 1,
    title: "Some.Show.S01E01.1080p",
    status: "downloading",
    trackedDownloadStatus: "ok",
    trackedDownloadState: "downloading",
    statusMessages: [],
    errorMessage: "",
    downloadId: "ABC123",
    protocol: "torrent",
    downloadClient: "qbit",
    indexer: "indexer",
    size: 1_000_000_000,
    sizeleft: 500_000_000,
    added: new Date(Date.now() - 60 * 60 * 1000).toISOString(),
    seriesId: 10,
    episodeId: 100,
    ...overrides,
  };
}

export class FakeQueueSource implements QueueSource {
  items: QueueItem[] = [];
  appName = "Sonarr";
  monitored = new Map<number, boolean>();
  failQueue: Error | undefined;

  readonly deleteQueueItem = vi.fn(async (id: number, _options: DeleteOptions): Promise<void> => {
    this.items = this.items.filter((item) => item.id !== id);
  });

  readonly getMonitoredStatus = vi.fn(
    async (_entityType: string, entityId: number): Promise<boolean> => this.monitored.get(entityId) ?? true
  );

  async getQueue(): Promise<QueueItem[]> {
    if (this.failQueue) throw this.failQueue;
    return [...this.items];
  }

  async getSystemStatus(): Promise<ArrSystemStatus> {
    return { appName: this.appName, version: "4.0.0" };
  }
}

export function createTorrent(overrides: Partial<Torrent> = {}): Torrent {
  return {
    hash: "abc123",
    name: "Some.Show.S01E01.1080p",
    state: "downloading",
    progress: 0.5,
    size: 1_000_000_000,
    ratio: 0,
    seedingTime: 0,
    category: "tv",
    tags: [],
    ...overrides,
  };
}

export class FakeDownloadClient implements DownloadClient {
  readonly kind = "qbittorrent";
  torrents: Torrent[] = [];
  privateHashes = new Set<string>();
  properties = new Map<string, TorrentProperties>();
  failPrivacy = false;

  constructor(readonly name = "qbit") {}

  readonly deleteTorrent = vi.fn(async (hash: string, _deleteFiles: boolean): Promise<void> => {
    this.torrents = this.torrents.filter((t) => t.hash !== hash);
  });

  readonly addTags = vi.fn(async (hash: string, tags: readonly string[]): Promise<void> => {
    this.torrents = this.torrents.map((t) => (t.hash === hash ? { ...t, tags: [...t.tags, ...tags] } : t));
  });

  async getTorrents(): Promise<Torrent[]> {
    return [...this.torrents];
  }

  async getTorrent(hash: string): Promise<Torrent | null> {
    return this.torrents.find((t) => t.hash.toLowerCase() === hash.toLowerCase()) ?? null;
  }

  async isPrivateTracker(hash: string): Promise<boolean> {
    if (this.failPrivacy) throw new Error("privacy unavailable");
    return this.privateHashes.has(hash.toLowerCase());
  }

  async getTorrentProperties(hash: string): Promise<TorrentProperties> {
    const props = this.properties.get(hash);
    if (!props) throw new Error(`no properties for ${hash}`);
    return props;
  }
}

export function createArrInstance(queue: QueueSource, name = "sonarr"): ArrInstance {
  return { name, kind: "sonarr", queue };
}

export function createTestManager(config: Config = createTestConfig(), strikes?: StrikeLedger): Manager {
  return new Manager({
    config,
    logger: silentLogger,
    strikes: strikes ?? new StrikeLedger({ logger: silentLogger }),
  });
}

export const signal = (): AbortSignal => new AbortController().signal;

export type FetchHandler = (url: URL, init: RequestInit) => Response | Promise<Response>;

export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: string | undefined;
}

/** Replaces global fetch for the current test; every call is answered by `handler`. */
export function stubFetch(handler: FetchHandler) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init: RequestInit = {}) =>
    handler(new URL(String(input)), init)
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function recordedRequests(fetchMock: ReturnType<typeof stubFetch>): RecordedRequest[] {
  return fetchMock.mock.calls.map(([input, init]) => ({
    url: String(input),
    method: init?.method ?? "GET",
    headers: new Headers(init?.headers),
    body: typeof init?.body === "string" ? init.body : undefined,
  }));
}

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
