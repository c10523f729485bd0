import { diffWords } from "diff";
import type { NormalizedPage, PageOutcome, RunResult, Snapshot, Target } from "./types.js";
import { truncate } from "./utils.js";

export function buildSnapshot(target: Target, page: NormalizedPage, capturedAt: string, excerptChars: number): Snapshot {
  const snapshot: Snapshot = {
    url: target.url,
    contentHash: page.digest,
    capturedAt,
    normalizedExcerpt: truncate(page.text, excerptChars),
    rawLength: page.rawLength,
  };
  if (page.title !== undefined) snapshot.title = page.title;
  return snapshot;
}

/**
 * Classifies one run against the stored snapshot. The digest is the only
 * criterion: length and timestamp differences never count as a change.
 */
export function classifyRun(
  target: Target,
  outcome: PageOutcome,
  previous: Snapshot | null,
  capturedAt: string,
  excerptChars: number
): RunResult {
  const prev = previous ?? undefined;
  if (!outcome.ok) {
    return { status: "FETCH_ERROR", target, previous: prev, errorDetail: outcome.error };
  }

  const current = buildSnapshot(target, outcome.page, capturedAt, excerptChars);
  if (!prev) return { status: "FIRST_RUN", target, current };
  if (prev.contentHash === current.contentHash) return { status: "UNCHANGED", target, previous: prev, current };
  return { status: "CHANGED", target, previous: prev, current };
}

export interface ExcerptPart {
  kind: "same" | "added" | "removed";
  value: string;
}

export interface ExcerptDiff {
  parts: ExcerptPart[];
  additions: number;
  deletions: number;
  truncated: boolean;
}

/** Word-level diff of two excerpts for display, cut after `maxChangedParts` changes. */
export function diffExcerpts(previous: string, current: string, maxChangedParts = 200): ExcerptDiff {
  const parts: ExcerptPart[] = [];
  let additions = 0;
  let deletions = 0;
  let changed = 0;
  let truncated = false;

  for (const change of diffWords(previous, current)) {
    const kind = change.added ? "added" : change.removed ? "removed" : "same";
    if (kind !== "same") {
      if (changed >= maxChangedParts) {
        truncated = true;
        break;
      }
      changed++;
      if (kind === "added") additions++;
      else deletions++;
    }
    parts.push({ kind, value: change.value });
  }

  return { parts, additions, deletions, truncated };
}
