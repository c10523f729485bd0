import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { DEFAULT_NORMALIZE_OPTIONS, type MonitorConfig, type NormalizeOptions } from "./config.js";
import { errorMessage, FetchError } from "./errors.js";
import { StaticFetcher, type PageFetcher } from "./fetcher.js";
import { runMonitorOnce } from "./monitor.js";
import { SnapshotStore } from "./store.js";
import type { FetchedPage, RunStatus } from "./types.js";

export const SELFTEST_URL = "https://selftest.invalid/fixture";

const FIXTURE_A = `<!doctype html>
<html>
  <head><title>Selftest fixture</title><script>window.rendered = Date.now();</script></head>
  <body>
    <h1>Catalogue</h1>
    <p>Widget: $10</p>
    <p>Gadget: $25</p>
  </body>
</html>`;

const FIXTURE_B = FIXTURE_A.replace("Widget: $10", "Widget: $12");

class FailingFetcher implements PageFetcher {
  async fetch(url: string): Promise<FetchedPage> {
    throw new FetchError("connection", `connection error fetching ${url}: selftest`);
  }
}

export interface SelftestOptions {
  normalize?: NormalizeOptions;
  /** Defaults to a fresh directory under the OS temp dir. */
  workDir?: string;
}

/**
 * Runs the whole pipeline against embedded fixtures in a scratch directory.
 * Returns 0 when every stage completed, 3 otherwise.
 */
export async function runSelftest(options: SelftestOptions = {}): Promise<number> {
  const workDir = options.workDir ?? (await fs.mkdtemp(path.join(os.tmpdir(), "site-monitor-selftest-")));
  const config: MonitorConfig = {
    targetUrl: SELFTEST_URL,
    timeoutMs: 1000,
    retries: 0,
    userAgent: "SiteChangeMonitor/selftest",
    excerptChars: 5000,
    siteTitle: "Selftest",
    normalize: options.normalize ?? DEFAULT_NORMALIZE_OPTIONS,
  };
  const store = new SnapshotStore(path.join(workDir, "data", "state.json"));
  const outputDir = path.join(workDir, "site");

  const steps: Array<[string, PageFetcher]> = [
    ["fixture A", new StaticFetcher(FIXTURE_A)],
    ["fixture A again", new StaticFetcher(FIXTURE_A)],
    ["fixture B", new StaticFetcher(FIXTURE_B)],
    ["failing fetch", new FailingFetcher()],
  ];

  const seen: RunStatus[] = [];
  try {
    for (const [label, fetcher] of steps) {
      const { result, files } = await runMonitorOnce({ config, fetcher, store, outputDir });
      if (!files.some((f) => f.path === "index.html")) {
        throw new Error(`${label}: index.html was not written`);
      }
      seen.push(result.status);
      console.log(`[SELFTEST] ${label}: ${result.status}`);
    }
    console.log(`[SELFTEST] OK (${seen.join(", ")})`);
    return 0;
  } catch (err) {
    console.error(`[SELFTEST] Failed: ${errorMessage(err)}`);
    return 3;
  } finally {
    if (!options.workDir) {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }
}
