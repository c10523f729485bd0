export interface Target {
  url: string;
}

export interface Snapshot {
  url: string;
  contentHash: string; // sha256 of the full normalized text
  capturedAt: string; // ISO
  normalizedExcerpt: string; // display truncation only
  rawLength: number; // bytes of the fetched body
  title?: string;
}

export interface FetchedPage {
  url: string;
  status: number;
  contentType?: string;
  body: Uint8Array;
}

export interface NormalizedPage {
  text: string;
  digest: string;
  rawLength: number;
  title?: string;
}

export type RunStatus = "FIRST_RUN" | "UNCHANGED" | "CHANGED" | "FETCH_ERROR";

export interface RunResult {
  status: RunStatus;
  target: Target;
  previous?: Snapshot;
  current?: Snapshot;
  errorDetail?: string;
}

/** What the fetch and normalize stages produced for one run. */
export type PageOutcome =
  | { ok: true; page: NormalizedPage }
  | { ok: false; error: string };

export interface RenderedFile {
  path: string; // relative to the output directory, forward slashes
  contents: string;
}

export interface WrittenFile {
  path: string;
  bytes: number;
  sha256: string;
}
