import crypto from "node:crypto";

export function sha256(input: string | Uint8Array): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function collapseWhitespace(input: string): string {
  return input.split(/\s+/).filter(Boolean).join(" ");
}

/** Cuts at a code point boundary so a surrogate pair is never split. */
export function truncate(input: string, maxChars: number): string {
  if (input.length <= maxChars) return input;
  const chars = Array.from(input);
  if (chars.length <= maxChars) return input;
  return chars.slice(0, maxChars).join("");
}

export function nowIso(): string {
  return new Date().toISOString();
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((r) => setTimeout(r, ms));
}
