import type { ArrKind, DownloadClientKind } from "../config.js";

export interface StatusMessage {
  readonly title: string;
  readonly messages: readonly string[];
}

/** A record from an *arr download queue. */
export interface QueueItem {
  readonly id: number;
  readonly title: string;
  readonly status: string;
  readonly trackedDownloadStatus: string;
  readonly trackedDownloadState: string;
  readonly statusMessages: readonly StatusMessage[];
  readonly errorMessage: string;
  readonly downloadId: string;
  readonly protocol: string;
  readonly downloadClient: string;
  readonly indexer: string;
  readonly size: number;
  readonly sizeleft: number;
  readonly added: string | undefined;
  readonly seriesId?: number;
  readonly episodeId?: number;
  readonly seasonNumber?: number;
  readonly movieId?: number;
  readonly artistId?: number;
  readonly albumId?: number;
  readonly authorId?: number;
  readonly bookId?: number;
}

export interface DeleteOptions {
  readonly removeFromClient: boolean;
  readonly blocklist: boolean;
  readonly skipRedownload: boolean;
}

export interface ArrSystemStatus {
  readonly appName: string;
  readonly version: string;
}

/** What every *arr instance offers the removal jobs. */
export interface QueueSource {
  getQueue(signal?: AbortSignal): Promise<QueueItem[]>;
  deleteQueueItem(id: number, options: DeleteOptions, signal?: AbortSignal): Promise<void>;
  getMonitoredStatus(entityType: string, entityId: number, signal?: AbortSignal): Promise<boolean>;
  getSystemStatus(signal?: AbortSignal): Promise<ArrSystemStatus>;
}

export interface Series {
  readonly id: number;
  readonly title: string;
  readonly monitored: boolean;
}

export interface Episode {
  readonly id: number;
  readonly seriesId: number;
  readonly seasonNumber: number;
  readonly episodeNumber: number;
  readonly title: string;
  readonly monitored: boolean;
  readonly hasFile: boolean;
  readonly airDateUtc?: string;
  readonly lastSearchTime?: string;
}

export interface Movie {
  readonly id: number;
  readonly title: string;
  readonly monitored: boolean;
  readonly hasFile: boolean;
  readonly isAvailable: boolean;
  readonly lastSearchTime?: string;
}

export interface SeriesLibrary {
  getAllSeries(signal?: AbortSignal): Promise<Series[]>;
  getEpisodes(seriesId: number, signal?: AbortSignal): Promise<Episode[]>;
  getCutoffUnmetEpisodes(signal?: AbortSignal): Promise<Episode[]>;
  searchEpisodes(episodeIds: readonly number[], signal?: AbortSignal): Promise<void>;
}

export interface MovieLibrary {
  getAllMovies(signal?: AbortSignal): Promise<Movie[]>;
  getCutoffUnmetMovies(signal?: AbortSignal): Promise<Movie[]>;
  searchMovies(movieIds: readonly number[], signal?: AbortSignal): Promise<void>;
}

/** A registered *arr instance together with the libraries its kind supports. */
export interface ArrInstance {
  readonly name: string;
  readonly kind: ArrKind;
  readonly queue: QueueSource;
  readonly series?: SeriesLibrary;
  readonly movies?: MovieLibrary;
}

export type TorrentState = "downloading" | "seeding" | "paused" | "stalled" | "error" | "queued";

export interface Torrent {
  /** Info hash, or the job id for usenet clients. */
  readonly hash: string;
  readonly name: string;
  readonly state: TorrentState;
  /** 0 to 1 */
  readonly progress: number;
  readonly size: number;
  readonly ratio: number;
  readonly seedingTime: number;
  readonly category: string;
  readonly tags: readonly string[];
}

export interface TorrentProperties {
  readonly isPrivate: boolean;
  /** Negative or zero means no limit. */
  readonly ratioLimit: number;
  /** Seconds; negative or zero means no limit. */
  readonly seedingTimeLimit: number;
}

export interface DownloadClient {
  readonly name: string;
  readonly kind: DownloadClientKind;

  getTorrents(signal?: AbortSignal): Promise<Torrent[]>;
  /** Resolves to null when the client does not hold the item. */
  getTorrent(hash: string, signal?: AbortSignal): Promise<Torrent | null>;
  deleteTorrent(hash: string, deleteFiles: boolean, signal?: AbortSignal): Promise<void>;
  addTags(hash: string, tags: readonly string[], signal?: AbortSignal): Promise<void>;
  isPrivateTracker(hash: string, signal?: AbortSignal): Promise<boolean>;
  getTorrentProperties(hash: string, signal?: AbortSignal): Promise<TorrentProperties>;
}
