import type { QueueItem } from "../../clients/types.js";

const STALLED_TITLES = new Set(["Download stalled", "No files found", "Sample"]);

const FAILED_IMPORT_TITLES = new Set([
  "Import failed",
  "No files found are eligible for import",
  "Not a valid video file",
  "Not an upgrade for existing file",
  "Sample",
]);

const FAILED_DOWNLOAD_TITLES = new Set([
  "Download client unavailable",
  "No files found are eligible for import",
  "Unable to determine if file is a sample",
]);

const MISSING_FILES_PHRASES = ["no files found", "missing files", "files are missing", "download folder doesn't contain"];

const BAD_FILE_KEYWORDS = [
  "sample",
  "corrupt",
  "wrong format",
  "invalid",
  "damaged",
  "incomplete",
  "verification failed",
  "crc mismatch",
  "checksum",
];

const METADATA_KEYWORDS = [
  "unable to parse",
  "unknown series",
  "unknown movie",
  "unknown artist",
  "unknown author",
  "not found in library",
  "no match found",
  "parsing failed",
  "cannot identify",
  "metadata error",
  "series not found",
  "movie not found",
];

const includesAny = (text: string, needles: readonly string[]): boolean =>
  needles.some((needle) => text.includes(needle));

/** Every status title, status message line and the error message, lower-cased. */
export const messageTexts = (item: QueueItem): string[] =>
  [...item.statusMessages.flatMap((m) => [m.title, ...m.messages]), item.errorMessage]
    .filter(Boolean)
    .map((text) => text.toLowerCase());

export function isStalled(item: QueueItem): boolean {
  if (item.trackedDownloadState === "importPending") return true;
  if (item.trackedDownloadStatus === "warning" && item.statusMessages.some((m) => STALLED_TITLES.has(m.title))) {
    return true;
  }
  return item.status === "warning" || item.status === "stalled";
}

export function isFailedImport(item: QueueItem): boolean {
  if (item.trackedDownloadState === "importFailed") return true;

  for (const { title } of item.statusMessages) {
    const lower = title.toLowerCase();
    if (lower.includes("import") && includesAny(lower, ["failed", "error", "unable"])) return true;
    if (FAILED_IMPORT_TITLES.has(title)) return true;
  }

  const error = item.errorMessage.toLowerCase();
  return error.includes("import") && error.includes("failed");
}

export function isFailedDownload(item: QueueItem): boolean {
  const trackedProblem = item.trackedDownloadStatus === "error" || item.trackedDownloadStatus === "warning";
  if (trackedProblem && item.trackedDownloadState !== "importFailed") return true;

  for (const { title } of item.statusMessages) {
    const lower = title.toLowerCase();
    if (lower.includes("download") && includesAny(lower, ["failed", "error", "missing", "corrupt"])) return true;
    if (FAILED_DOWNLOAD_TITLES.has(title)) return true;
  }

  const error = item.errorMessage.toLowerCase();
  return error.includes("download") && error.includes("failed");
}

export function hasMissingFiles(item: QueueItem): boolean {
  for (const { title, messages } of item.statusMessages) {
    if (messages.some((m) => includesAny(m.toLowerCase(), MISSING_FILES_PHRASES))) return true;
    if (title.toLowerCase().includes("no files found")) return true;
  }
  return includesAny(item.errorMessage.toLowerCase(), ["no files found", "missing files"]);
}

export function hasBadFiles(item: QueueItem): boolean {
  return messageTexts(item).some((text) => includesAny(text, BAD_FILE_KEYWORDS));
}

export function isMetadataMissing(item: QueueItem): boolean {
  const ids = [item.seriesId, item.movieId, item.artistId, item.authorId];
  if (ids.some((id) => id !== undefined && id > 0)) return false;
  if (item.trackedDownloadStatus !== "warning" && item.trackedDownloadStatus !== "error") return false;
  return messageTexts(item).some((text) => includesAny(text, METADATA_KEYWORDS));
}

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** `[abc]`, `[a-z]`, `[!a-z]` or `[^a-z]`; null when `[` at `start` opens no class. */
function translateClass(pattern: string, start: number): { source: string; end: number } | null {
  const end = pattern.indexOf("]", start + 1);
  if (end === -1) return null;
  let body = pattern.slice(start + 1, end);
  const negated = body.startsWith("!") || body.startsWith("^");
  if (negated) body = body.slice(1);
  if (!body) return null;
  return { source: `[${negated ? "^" : ""}${body.replace(/[\\^]/g, "\\$&")}]`, end };
}

/**
 * Case-insensitive whole-string match. `*` matches any run of characters and
 * `?` any single one, line breaks included; `[...]` is a character class.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = "";
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    if (char === "*") {
      source += "[\\s\\S]*";
    } else if (char === "?") {
      source += "[\\s\\S]";
    } else if (char === "[") {
      const klass = translateClass(pattern, i);
      if (klass) {
        source += klass.source;
        i = klass.end;
      } else {
        source += "\\[";
      }
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`, "i");
}

/** True when no patterns are given or any pattern matches one of the item's messages. */
export function matchesMessagePatterns(item: QueueItem, patterns: readonly RegExp[]): boolean {
  if (patterns.length === 0) return true;
  const texts = [...item.statusMessages.flatMap((m) => [m.title, ...m.messages]), item.errorMessage].filter(Boolean);
  return texts.some((text) => patterns.some((pattern) => pattern.test(text)));
}

/** Bytes per second since the item was added, or undefined within the first minute. */
export function downloadSpeed(item: QueueItem, now: number): number | undefined {
  if (!item.added) return undefined;
  const added = Date.parse(item.added);
  if (Number.isNaN(added)) return undefined;

  const elapsedSeconds = (now - added) / 1000;
  if (elapsedSeconds < 60) return undefined;
  return (item.size - item.sizeleft) / elapsedSeconds;
}
