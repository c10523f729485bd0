import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseConfig } from "./config.js";
import { FetchError, RenderError, StoreError } from "./errors.js";
import type { PageFetcher } from "./fetcher.js";
import { runMonitorOnce } from "./monitor.js";
import { SnapshotStore } from "./store.js";
import type { FetchedPage } from "./types.js";

const TARGET_URL = "https://example.test/page";

class ScriptedFetcher implements PageFetcher {
  constructor(private readonly replies: Array<string | Error | Uint8Array>) {}

  async fetch(url: string): Promise<FetchedPage> {
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("no scripted reply left");
    if (reply instanceof Error) throw reply;
    const body = typeof reply === "string" ? new TextEncoder().encode(reply) : reply;
    return { url, status: 200, contentType: "text/html; charset=utf-8", body };
  }
}

function hex(text: string): string {
  return crypto.createHash("sha256").update(text, "utf8").digest("hex");
}

let tmpDir: string;
let statePath: string;
let outputDir: string;
let clock: number;

const config = parseConfig({ target_url: TARGET_URL, site_title: "Price Watch" });

function now(): string {
  clock += 1000;
  return new Date(Date.UTC(2026, 0, 1) + clock).toISOString();
}

async function runWith(...replies: Array<string | Error | Uint8Array>) {
  const fetcher = new ScriptedFetcher([...replies]);
  const store = new SnapshotStore(statePath);
  const statuses: string[] = [];
  for (let i = 0; i < replies.length; i++) {
    const run = await runMonitorOnce({ config, fetcher, store, outputDir, now });
    statuses.push(run.result.status);
  }
  return statuses;
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "site-monitor-run-"));
  statePath = path.join(tmpDir, "data", "state.json");
  outputDir = path.join(tmpDir, "site");
  clock = 0;
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("runMonitorOnce", () => {
  it("tracks the price page across three runs", async () => {
    const store = new SnapshotStore(statePath);
    const fetcher = new ScriptedFetcher(["<html>Price: $10</html>", "<html>Price: $10</html>", "<html>Price: $12</html>"]);
    const deps = { config, fetcher, store, outputDir, now };

    const first = await runMonitorOnce(deps);
    expect(first.result.status).toBe("FIRST_RUN");
    expect(first.result.current?.contentHash).toBe(hex("Price: $10"));

    const second = await runMonitorOnce(deps);
    expect(second.result.status).toBe("UNCHANGED");
    expect(second.result.current?.contentHash).toBe(hex("Price: $10"));

    const third = await runMonitorOnce(deps);
    expect(third.result.status).toBe("CHANGED");
    expect(third.result.previous?.contentHash).toBe(hex("Price: $10"));
    expect(third.result.current?.contentHash).toBe(hex("Price: $12"));

    const stored = await store.load({ url: TARGET_URL });
    expect(stored?.contentHash).toBe(hex("Price: $12"));
    expect(stored?.normalizedExcerpt).toBe("Price: $12");

    const html = await fs.readFile(path.join(outputDir, "index.html"), "utf8");
    expect(html).toContain(">Change detected</span>");
    expect(html).toContain("<pre>Price: $12</pre>");
    expect(third.files.map((f) => f.path)).toEqual(["index.html", "sitemap.xml", "robots.txt", "assets/style.css"]);
  });

  it("classifies A then B as FIRST_RUN then CHANGED", async () => {
    expect(await runWith("<p>A</p>", "<p>B</p>")).toEqual(["FIRST_RUN", "CHANGED"]);
  });

  it("classifies A, A, B as FIRST_RUN, UNCHANGED, CHANGED", async () => {
    expect(await runWith("<p>A</p>", "<p>A</p>", "<p>B</p>")).toEqual(["FIRST_RUN", "UNCHANGED", "CHANGED"]);
  });

  it("ignores markup-only differences that normalize to the same text", async () => {
    expect(await runWith("<p>Price:   $10</p>", "<div>Price: $10</div>")).toEqual(["FIRST_RUN", "UNCHANGED"]);
  });

  it("leaves the stored snapshot byte-for-byte intact when the fetch fails", async () => {
    const store = new SnapshotStore(statePath);
    const fetcher = new ScriptedFetcher([
      "<html>Price: $10</html>",
      new FetchError("http_status", `HTTP 503 from ${TARGET_URL}`, { status: 503 }),
    ]);
    await runMonitorOnce({ config, fetcher, store, outputDir, now });
    const before = await fs.readFile(statePath);

    const failed = await runMonitorOnce({ config, fetcher, store, outputDir, now });
    expect(failed.result.status).toBe("FETCH_ERROR");
    expect(failed.result.errorDetail).toBe(`HTTP 503 from ${TARGET_URL}`);
    expect(failed.result.current).toBeUndefined();
    expect(await fs.readFile(statePath)).toEqual(before);

    const html = await fs.readFile(path.join(outputDir, "index.html"), "utf8");
    expect(html).toContain(">Fetch failed</span>");
    expect(html).toContain(`<pre>HTTP 503 from ${TARGET_URL}</pre>`);
  });

  it("does not create state when the first fetch fails", async () => {
    const statuses = await runWith(new FetchError("timeout", "timeout error fetching page"));
    expect(statuses).toEqual(["FETCH_ERROR"]);
    await expect(fs.access(statePath)).rejects.toThrow();
  });

  it("reports undecodable content as FETCH_ERROR and keeps going", async () => {
    const statuses = await runWith("<p>A</p>", new Uint8Array([0xc3, 0x28]), "<p>A</p>");
    expect(statuses).toEqual(["FIRST_RUN", "FETCH_ERROR", "UNCHANGED"]);
  });

  it("starts over after a corrupt state file", async () => {
    await runWith("<p>A</p>");
    await fs.writeFile(statePath, '{"schema": "site-change', "utf8");
    expect(await runWith("<p>A</p>")).toEqual(["FIRST_RUN"]);
  });

  it("propagates unexpected fetcher errors", async () => {
    await expect(runWith(new TypeError("boom"))).rejects.toThrow("boom");
  });

  it("fails with StoreError before fetching when the state file cannot be read", async () => {
    await fs.mkdir(statePath, { recursive: true });
    const fetcher = new ScriptedFetcher(["<p>A</p>"]);
    const store = new SnapshotStore(statePath);
    await expect(runMonitorOnce({ config, fetcher, store, outputDir, now })).rejects.toBeInstanceOf(StoreError);
    await expect(fs.access(outputDir)).rejects.toThrow();
    expect(await fetcher.fetch(TARGET_URL)).toMatchObject({ status: 200 });
  });

  it("fails with StoreError when the snapshot cannot be saved", async () => {
    const rename = vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("EIO: i/o error, rename"));
    const fetcher = new ScriptedFetcher(["<p>A</p>"]);
    const store = new SnapshotStore(statePath);
    await expect(runMonitorOnce({ config, fetcher, store, outputDir, now })).rejects.toThrow(
      `Cannot write state file ${statePath}: EIO: i/o error, rename`
    );
    expect(rename).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(path.dirname(statePath))).toEqual([]);
  });

  it("fails with RenderError when the output cannot be written", async () => {
    const blocker = path.join(tmpDir, "blocker");
    await fs.writeFile(blocker, "file", "utf8");
    const fetcher = new ScriptedFetcher(["<p>A</p>"]);
    const store = new SnapshotStore(statePath);
    await expect(runMonitorOnce({ config, fetcher, store, outputDir: blocker, now })).rejects.toBeInstanceOf(
      RenderError
    );
  });
});
