import type { ArrClient } from "./arr.js";
import type { Episode, Series, SeriesLibrary } from "./types.js";

interface PagedRecords<T> {
  records: T[];
}

const CUTOFF_PAGE_SIZE = 1000;

/** Series and episode endpoints, on top of an instance's shared client. */
export class SonarrLibrary implements SeriesLibrary {
  constructor(private readonly arr: ArrClient) {}

  getAllSeries(signal?: AbortSignal): Promise<Series[]> {
    return this.arr.http.getJson<Series[]>(`${this.arr.apiPrefix}/series`, { signal });
  }

  getEpisodes(seriesId: number, signal?: AbortSignal): Promise<Episode[]> {
    return this.arr.http.getJson<Episode[]>(`${this.arr.apiPrefix}/episode`, {
      query: { seriesId },
      signal,
    });
  }

  async getCutoffUnmetEpisodes(signal?: AbortSignal): Promise<Episode[]> {
    const response = await this.arr.http.getJson<PagedRecords<Episode>>(`${this.arr.apiPrefix}/wanted/cutoff`, {
      query: { page: 1, pageSize: CUTOFF_PAGE_SIZE, monitored: true },
      signal,
    });
    return response.records ?? [];
  }

  searchEpisodes(episodeIds: readonly number[], signal?: AbortSignal): Promise<void> {
    return this.arr.command("EpisodeSearch", { episodeIds }, signal);
  }
}
