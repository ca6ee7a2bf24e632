import type { ArrInstance, MovieLibrary, SeriesLibrary } from "../../clients/types.js";
import type { SearchJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { SearchJob, type Enqueue } from "./base.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Searches monitored episodes and movies that have no file yet. */
export class SearchMissingJob extends SearchJob {
  constructor(manager: Manager, settings: SearchJobConfig) {
    super("search_missing", manager, settings);
  }

  protected async collect(instance: ArrInstance, enqueue: Enqueue, signal: AbortSignal): Promise<void> {
    if (instance.series) await this.collectEpisodes(instance.series, enqueue, signal);
    if (instance.movies) await this.collectMovies(instance.movies, enqueue, signal);
  }

  private async collectEpisodes(library: SeriesLibrary, enqueue: Enqueue, signal: AbortSignal): Promise<void> {
    const now = Date.now();
    const series = (await library.getAllSeries(signal)).filter((s) => s.monitored);

    for (const show of series) {
      const episodes = await library.getEpisodes(show.id, signal);
      const eligible = episodes.filter(
        (e) =>
          e.monitored &&
          !e.hasFile &&
          e.airDateUtc !== undefined &&
          Date.parse(e.airDateUtc) < now &&
          this.isDue(e.lastSearchTime, now)
      );
      if (eligible.length === 0) continue;

      this.found += eligible.length;
      enqueue(
        show.title,
        eligible.map((e) => e.id),
        (ids) => library.searchEpisodes(ids, signal)
      );
    }
  }

  private async collectMovies(library: MovieLibrary, enqueue: Enqueue, signal: AbortSignal): Promise<void> {
    const now = Date.now();
    const movies = (await library.getAllMovies(signal)).filter(
      (m) => m.monitored && !m.hasFile && m.isAvailable && this.isDue(m.lastSearchTime, now)
    );

    this.found += movies.length;
    for (const movie of movies) {
      enqueue(movie.title, [movie.id], (ids) => library.searchMovies(ids, signal));
    }
  }

  private isDue(lastSearchTime: string | undefined, now: number): boolean {
    const minDays = this.settings.minDaysBetweenSearches;
    if (minDays <= 0 || !lastSearchTime) return true;
    const last = Date.parse(lastSearchTime);
    return Number.isNaN(last) || now - last >= minDays * DAY_MS;
  }
}
