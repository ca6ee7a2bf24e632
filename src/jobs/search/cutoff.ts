import type { ArrInstance, Episode } from "../../clients/types.js";
import type { SearchJobConfig } from "../../config.js";
import type { Manager } from "../manager.js";
import { SearchJob, type Enqueue } from "./base.js";

/** Searches for upgrades of files below their quality cutoff. Episodes are searched per season. */
export class SearchCutoffUnmetJob extends SearchJob {
  constructor(manager: Manager, settings: SearchJobConfig) {
    super("search_cutoff_unmet", manager, settings);
  }

  protected async collect(instance: ArrInstance, enqueue: Enqueue, signal: AbortSignal): Promise<void> {
    const { series, movies } = instance;

    if (series) {
      const episodes = (await series.getCutoffUnmetEpisodes(signal)).filter(
        (e) => e.monitored && e.id > 0 && e.seriesId > 0
      );
      this.found += episodes.length;

      for (const [label, group] of groupBySeason(episodes)) {
        enqueue(
          label,
          group.map((e) => e.id),
          (ids) => series.searchEpisodes(ids, signal)
        );
      }
    }

    if (movies) {
      const records = (await movies.getCutoffUnmetMovies(signal)).filter((m) => m.monitored && m.id > 0);
      this.found += records.length;

      for (const movie of records) {
        enqueue(movie.title, [movie.id], (ids) => movies.searchMovies(ids, signal));
      }
    }
  }
}

function groupBySeason(episodes: readonly Episode[]): Map<string, Episode[]> {
  const groups = new Map<string, Episode[]>();
  for (const episode of episodes) {
    const key = `series ${episode.seriesId} season ${episode.seasonNumber}`;
    const group = groups.get(key);
    if (group) {
      group.push(episode);
    } else {
      groups.set(key, [episode]);
    }
  }
  return groups;
}
