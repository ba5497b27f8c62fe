/**
 * Types for master-recording resolution.
 */

/** A catalog search hit; only lives for one resolution */
export interface MasterCandidate {
  url: string;
  title: string;
  /** Missing when the catalog did not report one; such candidates are rejected */
  durationSeconds?: number;
}

export type MasterOutcome =
  | { status: "SKIPPED"; reason: string }
  | { status: "NOT_FOUND"; query: string; candidates: number }
  | { status: "DOWNLOADED"; query: string; candidate: MasterCandidate; filePath: string; tagged: boolean }
  | { status: "FAILED"; query: string; reason: string };

/** Searches a catalog and downloads audio from it */
export interface CatalogClient {
  search(query: string, count: number): Promise<MasterCandidate[]>;

  /**
   * Download best audio for the candidate into dir as `<baseName>.<ext>`.
   * @returns Path of the downloaded file
   */
  downloadAudio(candidate: MasterCandidate, dir: string, baseName: string): Promise<string>;
}

/** Writes artist/title tags into an audio file */
export interface AudioTagger {
  tag(filePath: string, tags: { artist?: string; title: string }): Promise<void>;
}
