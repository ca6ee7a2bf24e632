import { describe, expect, it } from "vitest";
import {
  downloadSpeed,
  globToRegExp,
  hasBadFiles,
  hasMissingFiles,
  isFailedDownload,
  isFailedImport,
  isMetadataMissing,
  isStalled,
  matchesMessagePatterns,
} from "../../jobs/removal/predicates.js";
import { createQueueItem } from "../setup.js";

const withMessage = (title: string, messages: string[] = []) => ({ statusMessages: [{ title, messages }] });

describe("isStalled", () => {
  it("matches import pending items", () => {
    expect(isStalled(createQueueItem({ trackedDownloadState: "importPending" }))).toBe(true);
  });

  it("matches a warning with a known stall title", () => {
    const item = createQueueItem({ trackedDownloadStatus: "warning", ...withMessage("Download stalled") });
    expect(isStalled(item)).toBe(true);
  });

  it("ignores a warning with an unrelated title", () => {
    const item = createQueueItem({ trackedDownloadStatus: "warning", ...withMessage("Something else") });
    expect(isStalled(item)).toBe(false);
  });

  it("matches warning and stalled statuses", () => {
    expect(isStalled(createQueueItem({ status: "warning" }))).toBe(true);
    expect(isStalled(createQueueItem({ status: "stalled" }))).toBe(true);
    expect(isStalled(createQueueItem())).toBe(false);
  });
});

describe("isFailedImport", () => {
  it("matches the importFailed state", () => {
    expect(isFailedImport(createQueueItem({ trackedDownloadState: "importFailed" }))).toBe(true);
  });

  it("matches import failure language in titles", () => {
    expect(isFailedImport(createQueueItem(withMessage("Unable to import: permission denied")))).toBe(true);
    expect(isFailedImport(createQueueItem(withMessage("Not an upgrade for existing file")))).toBe(true);
  });

  it("matches an import failure in the error message", () => {
    expect(isFailedImport(createQueueItem({ errorMessage: "Import failed, path does not exist" }))).toBe(true);
  });

  it("ignores healthy items", () => {
    expect(isFailedImport(createQueueItem())).toBe(false);
  });
});

describe("isFailedDownload", () => {
  it("matches tracked error and warning statuses", () => {
    expect(isFailedDownload(createQueueItem({ trackedDownloadStatus: "error" }))).toBe(true);
    expect(isFailedDownload(createQueueItem({ trackedDownloadStatus: "warning" }))).toBe(true);
  });

  it("does not claim import failures through the status rule", () => {
    const item = createQueueItem({ trackedDownloadStatus: "warning", trackedDownloadState: "importFailed" });
    expect(isFailedDownload(item)).toBe(false);
    expect(isFailedImport(item)).toBe(true);
  });

  it("matches download failure language", () => {
    expect(isFailedDownload(createQueueItem(withMessage("Download is corrupt")))).toBe(true);
    expect(isFailedDownload(createQueueItem(withMessage("Download client unavailable")))).toBe(true);
    expect(isFailedDownload(createQueueItem({ errorMessage: "Download failed: no seeders" }))).toBe(true);
  });
});

describe("hasMissingFiles", () => {
  it("matches missing file phrases in message lines", () => {
    const item = createQueueItem(withMessage("Import issue", ["The download folder doesn't contain any video files"]));
    expect(hasMissingFiles(item)).toBe(true);
  });

  it("matches a no files found title", () => {
    expect(hasMissingFiles(createQueueItem(withMessage("No files found are eligible for import")))).toBe(true);
  });

  it("matches the error message", () => {
    expect(hasMissingFiles(createQueueItem({ errorMessage: "Missing files in torrent" }))).toBe(true);
    expect(hasMissingFiles(createQueueItem({ errorMessage: "Disk full" }))).toBe(false);
  });
});

describe("hasBadFiles", () => {
  it("matches any keyword in titles, lines or the error message", () => {
    expect(hasBadFiles(createQueueItem(withMessage("Sample file detected")))).toBe(true);
    expect(hasBadFiles(createQueueItem(withMessage("Problem", ["CRC mismatch on part 3"])))).toBe(true);
    expect(hasBadFiles(createQueueItem({ errorMessage: "Checksum error" }))).toBe(true);
    expect(hasBadFiles(createQueueItem(withMessage("Waiting for import")))).toBe(false);
  });
});

describe("isMetadataMissing", () => {
  const unmatched = {
    seriesId: undefined,
    episodeId: undefined,
    trackedDownloadStatus: "warning",
    ...withMessage("Unknown Series", ["Unable to parse release title"]),
  };

  it("matches unmatched items with a metadata keyword", () => {
    expect(isMetadataMissing(createQueueItem(unmatched))).toBe(true);
  });

  it("ignores items linked to the library", () => {
    expect(isMetadataMissing(createQueueItem({ ...unmatched, seriesId: 4 }))).toBe(false);
  });

  it("requires a warning or error status", () => {
    expect(isMetadataMissing(createQueueItem({ ...unmatched, trackedDownloadStatus: "ok" }))).toBe(false);
  });
});

describe("message patterns", () => {
  it("matches whole strings case-insensitively with wildcards", () => {
    expect(globToRegExp("*not a valid*").test("Not a valid video file")).toBe(true);
    expect(globToRegExp("import fail?d").test("Import failed")).toBe(true);
    expect(globToRegExp("import").test("Import failed")).toBe(false);
    expect(globToRegExp("file (1).mkv").test("file (1).mkv")).toBe(true);
  });

  it("treats an empty pattern list as match-all", () => {
    expect(matchesMessagePatterns(createQueueItem(), [])).toBe(true);
  });

  it("checks titles, lines and the error message", () => {
    const patterns = [globToRegExp("*permission*")];
    expect(matchesMessagePatterns(createQueueItem(withMessage("Import failed", ["Permission denied"])), patterns)).toBe(
      true
    );
    expect(matchesMessagePatterns(createQueueItem({ errorMessage: "no permission" }), patterns)).toBe(true);
    expect(matchesMessagePatterns(createQueueItem(withMessage("Import failed")), patterns)).toBe(false);
  });

  it("lets wildcards span line breaks in multi-line messages", () => {
    const item = createQueueItem({ errorMessage: "Import failed\nnot a valid video file" });

    expect(matchesMessagePatterns(item, [globToRegExp("*not a valid*")])).toBe(true);
    expect(matchesMessagePatterns(item, [globToRegExp("import failed?not*")])).toBe(true);
  });

  it("supports character classes and their negation", () => {
    expect(globToRegExp("sample[0-9].mkv").test("Sample7.mkv")).toBe(true);
    expect(globToRegExp("sample[0-9].mkv").test("SampleX.mkv")).toBe(false);
    expect(globToRegExp("[!a]bc").test("xbc")).toBe(true);
    expect(globToRegExp("[!a]bc").test("abc")).toBe(false);
    expect(globToRegExp("[^a]bc").test("abc")).toBe(false);
  });

  it("keeps an unclosed bracket literal", () => {
    expect(globToRegExp("[unpacking*").test("[Unpacking] failed")).toBe(true);
    expect(globToRegExp("[]").test("[]")).toBe(true);
  });
});

describe("downloadSpeed", () => {
  const now = Date.parse("2024-01-01T12:00:00Z");

  it("is undefined during the first minute", () => {
    const item = createQueueItem({ added: "2024-01-01T11:59:30Z" });
    expect(downloadSpeed(item, now)).toBeUndefined();
  });

  it("divides downloaded bytes by elapsed seconds", () => {
    const item = createQueueItem({ added: "2024-01-01T11:58:00Z", size: 1_200_000, sizeleft: 0 });
    expect(downloadSpeed(item, now)).toBe(10_000);
  });

  it("is undefined without a valid added time", () => {
    expect(downloadSpeed(createQueueItem({ added: undefined }), now)).toBeUndefined();
    expect(downloadSpeed(createQueueItem({ added: "yesterday" }), now)).toBeUndefined();
  });
});
