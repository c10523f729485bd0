import fs from "node:fs/promises";
import path from "node:path";
import { RenderError, errorMessage } from "./errors.js";
import type { RenderedFile, WrittenFile } from "./types.js";
import { sha256 } from "./utils.js";

/** Overwrites every rendered file under `outputDir` and reports what was written. */
export async function writeSite(files: RenderedFile[], outputDir: string): Promise<WrittenFile[]> {
  const written: WrittenFile[] = [];
  for (const file of files) {
    const target = path.join(outputDir, ...file.path.split("/"));
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, file.contents, "utf8");
    } catch (err) {
      throw new RenderError(`Cannot write ${target}: ${errorMessage(err)}`, { cause: err, details: { path: target } });
    }
    written.push({ path: file.path, bytes: Buffer.byteLength(file.contents, "utf8"), sha256: sha256(file.contents) });
  }
  return written;
}
