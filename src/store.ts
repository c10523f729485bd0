import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { z } from "zod";
import { StoreError, errorMessage } from "./errors.js";
import type { Snapshot, Target } from "./types.js";
import { sha256 } from "./utils.js";

export const STATE_SCHEMA = "site-change-monitor/snapshot";
export const STATE_VERSION = 1;

const snapshotSchema = z.object({
  url: z.string(),
  contentHash: z.string().regex(/^[0-9a-f]{64}$/),
  capturedAt: z.string().datetime(),
  normalizedExcerpt: z.string(),
  rawLength: z.number().int().nonnegative(),
  title: z.string().optional(),
});

const envelopeHeader = z.object({
  schema: z.string(),
  version: z.number(),
});

const envelopeSchema = envelopeHeader.extend({
  checksum: z.string(),
  snapshot: snapshotSchema,
});

export type SnapshotLookup =
  | { kind: "found"; snapshot: Snapshot }
  | { kind: "absent" }
  | { kind: "corrupt"; reason: string }
  | { kind: "incompatible"; schema: string; version: number }
  | { kind: "other-target"; url: string };

/** Fixed key order, so the checksum does not depend on how the object was built. */
function orderedSnapshot(s: Snapshot): Snapshot {
  const ordered: Snapshot = {
    url: s.url,
    contentHash: s.contentHash,
    capturedAt: s.capturedAt,
    normalizedExcerpt: s.normalizedExcerpt,
    rawLength: s.rawLength,
  };
  if (s.title !== undefined) ordered.title = s.title;
  return ordered;
}

function canonicalSnapshot(s: Snapshot): string {
  return JSON.stringify(orderedSnapshot(s));
}

export function serializeState(snapshot: Snapshot): string {
  const envelope = {
    schema: STATE_SCHEMA,
    version: STATE_VERSION,
    checksum: sha256(canonicalSnapshot(snapshot)),
    snapshot: orderedSnapshot(snapshot),
  };
  return JSON.stringify(envelope, null, 2) + "\n";
}

export function parseState(raw: string): Exclude<SnapshotLookup, { kind: "absent" } | { kind: "other-target" }> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return { kind: "corrupt", reason: `invalid JSON (${errorMessage(err)})` };
  }

  const header = envelopeHeader.safeParse(data);
  if (!header.success) {
    return { kind: "corrupt", reason: "missing schema header" };
  }
  if (header.data.schema !== STATE_SCHEMA || header.data.version !== STATE_VERSION) {
    return { kind: "incompatible", schema: header.data.schema, version: header.data.version };
  }

  const envelope = envelopeSchema.safeParse(data);
  if (!envelope.success) {
    const fields = envelope.error.errors.map((e) => e.path.join(".")).join(", ");
    return { kind: "corrupt", reason: `invalid fields: ${fields}` };
  }
  const { snapshot, checksum } = envelope.data;
  if (sha256(canonicalSnapshot(snapshot)) !== checksum) {
    return { kind: "corrupt", reason: "checksum mismatch" };
  }
  return { kind: "found", snapshot };
}

/**
 * Single-target snapshot persistence in one JSON file.
 *
 * Writes go to a temp file in the same directory and are renamed over the
 * state file, so a reader sees either the old or the new document.
 */
export class SnapshotStore {
  constructor(public readonly statePath: string) {}

  async inspect(target: Target): Promise<SnapshotLookup> {
    let raw: string;
    try {
      raw = await fs.readFile(this.statePath, "utf8");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return { kind: "absent" };
      // An unreadable file says nothing about its contents; overwriting it could hide a change
      throw new StoreError(`Cannot read state file ${this.statePath}: ${errorMessage(err)}`, {
        cause: err,
        details: { path: this.statePath },
      });
    }

    const result = parseState(raw);
    if (result.kind === "found" && result.snapshot.url !== target.url) {
      return { kind: "other-target", url: result.snapshot.url };
    }
    return result;
  }

  async load(target: Target): Promise<Snapshot | null> {
    const result = await this.inspect(target);
    switch (result.kind) {
      case "found":
        return result.snapshot;
      case "absent":
        console.log(`[STORE] No state file at ${this.statePath}; treating as first run`);
        return null;
      case "corrupt":
        console.warn(`[STORE] Corrupt state file ${this.statePath}: ${result.reason}; ignoring it`);
        return null;
      case "incompatible":
        console.warn(
          `[STORE] State file ${this.statePath} has unsupported format ${result.schema} v${result.version}; ignoring it`
        );
        return null;
      case "other-target":
        console.warn(`[STORE] State file ${this.statePath} tracks ${result.url}, not ${target.url}; ignoring it`);
        return null;
    }
  }

  async save(target: Target, snapshot: Snapshot): Promise<void> {
    if (snapshot.url !== target.url) {
      throw new StoreError(`Snapshot for ${snapshot.url} cannot be saved as ${target.url}`);
    }

    const dir = path.dirname(this.statePath);
    const tempPath = path.join(dir, `.${path.basename(this.statePath)}.${process.pid}.${crypto.randomUUID()}.tmp`);
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tempPath, serializeState(snapshot), "utf8");
      await fs.rename(tempPath, this.statePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        console.warn(`[STORE] Could not remove ${tempPath}: ${errorMessage(cleanupErr)}`);
      });
      throw new StoreError(`Cannot write state file ${this.statePath}: ${errorMessage(err)}`, {
        cause: err,
        details: { path: this.statePath },
      });
    }
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
