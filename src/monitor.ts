import type { MonitorConfig } from "./config.js";
import { classifyRun } from "./diff.js";
import { DecodeError, FetchError } from "./errors.js";
import type { PageFetcher } from "./fetcher.js";
import { normalizeContent } from "./normalize.js";
import { renderSite } from "./report.js";
import { writeSite } from "./site.js";
import type { SnapshotStore } from "./store.js";
import type { PageOutcome, RunResult, Target, WrittenFile } from "./types.js";
import { nowIso } from "./utils.js";

export interface MonitorDeps {
  config: MonitorConfig;
  fetcher: PageFetcher;
  store: SnapshotStore;
  outputDir: string;
  now?: () => string;
}

export interface MonitorRun {
  result: RunResult;
  files: WrittenFile[];
}

async function fetchAndNormalize(target: Target, deps: MonitorDeps): Promise<PageOutcome> {
  try {
    const fetched = await deps.fetcher.fetch(target.url);
    return { ok: true, page: normalizeContent(fetched, deps.config.normalize) };
  } catch (err) {
    // Only fetch and decode failures become a report; anything else is a bug
    if (err instanceof FetchError || err instanceof DecodeError) {
      return { ok: false, error: err.message };
    }
    throw err;
  }
}

/**
 * One pass of fetch, normalize, compare, persist and render. The stored
 * snapshot is replaced only after a successful fetch.
 */
export async function runMonitorOnce(deps: MonitorDeps): Promise<MonitorRun> {
  const now = deps.now ?? nowIso;
  const target: Target = { url: deps.config.targetUrl };

  // An unreadable state file aborts here, before any network traffic
  const previous = await deps.store.load(target);

  const outcome = await fetchAndNormalize(target, deps);
  if (!outcome.ok) console.error(`[MONITOR] ${outcome.error}`);
  const result = classifyRun(target, outcome, previous, now(), deps.config.excerptChars);

  if (result.current) {
    await deps.store.save(target, result.current);
  }

  const files = await writeSite(
    renderSite(result, { siteTitle: deps.config.siteTitle, siteUrl: deps.config.siteUrl, generatedAt: now() }),
    deps.outputDir
  );
  console.log(`[REPORT] Wrote ${files.length} files to ${deps.outputDir}`);

  return { result, files };
}
