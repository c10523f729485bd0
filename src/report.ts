import { diffExcerpts } from "./diff.js";
import { STYLE_CSS } from "./styles.js";
import type { RenderedFile, RunResult, RunStatus, Snapshot } from "./types.js";
import { escapeHtml, truncate } from "./utils.js";

export interface RenderOptions {
  siteTitle: string;
  siteUrl?: string;
  /** The only value allowed to differ between two renders of the same result. */
  generatedAt: string;
}

const SNIPPET_CHARS = 500;

export const STATUS_LABELS: Record<RunStatus, string> = {
  FIRST_RUN: "First snapshot recorded",
  UNCHANGED: "No change detected",
  CHANGED: "Change detected",
  FETCH_ERROR: "Fetch failed",
};

const BADGE_CLASSES: Record<RunStatus, string> = {
  FIRST_RUN: "first",
  UNCHANGED: "ok",
  CHANGED: "changed",
  FETCH_ERROR: "error",
};

function kvRow(label: string, valueHtml: string): string {
  return `        <div>${escapeHtml(label)}</div>\n        <div>${valueHtml}</div>`;
}

function hashHtml(hash: string | undefined): string {
  return hash ? `<code>${escapeHtml(hash)}</code>` : "-";
}

function summaryCard(result: RunResult): string {
  const shown = result.current ?? result.previous;
  const rows = [
    kvRow("Status", `<span class="badge ${BADGE_CLASSES[result.status]}">${escapeHtml(STATUS_LABELS[result.status])}</span>`),
    kvRow("Checked at", result.current ? `${escapeHtml(result.current.capturedAt)} (UTC)` : "-"),
    kvRow("Page title", escapeHtml(shown?.title ?? "(no title found)")),
    kvRow("Previous hash", hashHtml(result.previous?.contentHash)),
    kvRow("Current hash", hashHtml(result.current?.contentHash)),
    kvRow("Content length", result.current ? `${result.current.rawLength} bytes` : "-"),
  ];
  return `    <div class="card">
      <div class="kv">
${rows.join("\n")}
      </div>
    </div>`;
}

function snippetCard(heading: string, snapshot: Snapshot): string {
  return `    <div class="card">
      <h2>${escapeHtml(heading)}</h2>
      <p class="small">First ${SNIPPET_CHARS} characters of the normalized text.</p>
      <pre>${escapeHtml(truncate(snapshot.normalizedExcerpt, SNIPPET_CHARS))}</pre>
    </div>`;
}

function comparisonCard(result: RunResult): string {
  let body: string;
  if (result.status === "CHANGED" && result.previous && result.current) {
    const diff = diffExcerpts(result.previous.normalizedExcerpt, result.current.normalizedExcerpt);
    const html = diff.parts
      .map((p) => {
        const text = escapeHtml(p.value);
        if (p.kind === "added") return `<ins>${text}</ins>`;
        if (p.kind === "removed") return `<del>${text}</del>`;
        return text;
      })
      .join("");
    let note = "";
    if (diff.truncated) {
      note = "\n      <p class=\"small\">Comparison truncated.</p>";
    } else if (diff.additions + diff.deletions === 0) {
      note = "\n      <p class=\"small\">The change lies outside the displayed excerpt.</p>";
    }
    body = `      <p class="small">${diff.additions} added, ${diff.deletions} removed (excerpt comparison).</p>
      <pre>${html}</pre>${note}`;
  } else if (result.status === "UNCHANGED") {
    body = `      <p class="small">The normalized content matches the previous run.</p>`;
  } else {
    body = `      <p class="small">No previous snapshot yet. Run again to compare.</p>`;
  }
  return `    <div class="card">
      <h2>Changes (previous to current)</h2>
${body}
    </div>`;
}

function errorCards(result: RunResult): string {
  const last = result.previous
    ? `      <div class="kv">
${[
  kvRow("Captured at", `${escapeHtml(result.previous.capturedAt)} (UTC)`),
  kvRow("Hash", hashHtml(result.previous.contentHash)),
].join("\n")}
      </div>
      <pre>${escapeHtml(truncate(result.previous.normalizedExcerpt, SNIPPET_CHARS))}</pre>`
    : `      <p class="small">No earlier snapshot is stored.</p>`;

  return `    <div class="card">
      <h2>Error</h2>
      <pre>${escapeHtml(result.errorDetail ?? "unknown error")}</pre>
      <p class="small">The stored snapshot was left untouched.</p>
    </div>

    <div class="card">
      <h2>Last known good</h2>
${last}
    </div>`;
}

export function renderIndexHtml(result: RunResult, options: RenderOptions): string {
  const title = escapeHtml(options.siteTitle);
  const url = escapeHtml(result.target.url);

  const sections = [summaryCard(result)];
  if (result.status === "FETCH_ERROR") {
    sections.push(errorCards(result));
  } else if (result.current) {
    sections.push(snippetCard("Current snippet", result.current));
    sections.push(comparisonCard(result));
  }

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${title}: ${escapeHtml(STATUS_LABELS[result.status])}</title>
  <link rel="stylesheet" href="assets/style.css" />
</head>
<body>
  <div class="container">
    <h1>${title}</h1>
    <p class="small">Target: <a href="${url}">${url}</a></p>

${sections.join("\n\n")}

    <p class="small">Generated at: <time>${escapeHtml(options.generatedAt)}</time></p>
  </div>
</body>
</html>
`;
}

export function renderSitemap(siteUrl?: string): string {
  const loc = siteUrl ? new URL("index.html", siteUrl).href : "./index.html";
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc>${escapeHtml(loc)}</loc></url>
</urlset>
`;
}

export function renderRobots(siteUrl?: string): string {
  const lines = ["User-agent: *", "Allow: /"];
  if (siteUrl) lines.push(`Sitemap: ${new URL("sitemap.xml", siteUrl).href}`);
  return lines.join("\n") + "\n";
}

/** Renders every site file for a run. Same result and options, same bytes. */
export function renderSite(result: RunResult, options: RenderOptions): RenderedFile[] {
  return [
    { path: "index.html", contents: renderIndexHtml(result, options) },
    { path: "sitemap.xml", contents: renderSitemap(options.siteUrl) },
    { path: "robots.txt", contents: renderRobots(options.siteUrl) },
    { path: "assets/style.css", contents: STYLE_CSS },
  ];
}
