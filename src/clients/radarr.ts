import type { ArrClient } from "./arr.js";
import type { Movie, MovieLibrary } from "./types.js";

interface PagedRecords<T> {
  records: T[];
}

const CUTOFF_PAGE_SIZE = 1000;

export class RadarrLibrary implements MovieLibrary {
  constructor(private readonly arr: ArrClient) {}

  getAllMovies(signal?: AbortSignal): Promise<Movie[]> {
    return this.arr.http.getJson<Movie[]>(`${this.arr.apiPrefix}/movie`, { signal });
  }

  async getCutoffUnmetMovies(signal?: AbortSignal): Promise<Movie[]> {
    const response = await this.arr.http.getJson<PagedRecords<Movie>>(`${this.arr.apiPrefix}/wanted/cutoff`, {
      query: { page: 1, pageSize: CUTOFF_PAGE_SIZE, monitored: true },
      signal,
    });
    return response.records ?? [];
  }

  searchMovies(movieIds: readonly number[], signal?: AbortSignal): Promise<void> {
    return this.arr.command("MoviesSearch", { movieIds }, signal);
  }
}
