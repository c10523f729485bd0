import { load } from "cheerio";
import type { NormalizeOptions } from "./config.js";
import { DecodeError } from "./errors.js";
import type { FetchedPage, NormalizedPage } from "./types.js";
import { collapseWhitespace, sha256 } from "./utils.js";

const SNIFF_BYTES = 1024;

function charsetFromContentType(contentType: string | undefined): string | undefined {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match?.[1].toLowerCase();
}

function charsetFromBom(bytes: Uint8Array): string | undefined {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return "utf-8";
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return "utf-16be";
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return "utf-16le";
  return undefined;
}

function charsetFromMeta(bytes: Uint8Array): string | undefined {
  // The head of an HTML document is ASCII-compatible in every charset we can sniff this way
  const head = Buffer.from(bytes.subarray(0, SNIFF_BYTES)).toString("latin1");
  const match = head.match(/<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i);
  return match?.[1].toLowerCase();
}

/** Picks the charset: header, then BOM, then `<meta charset>`, then UTF-8. */
export function detectCharset(bytes: Uint8Array, contentType?: string): string {
  return charsetFromContentType(contentType) ?? charsetFromBom(bytes) ?? charsetFromMeta(bytes) ?? "utf-8";
}

export function decodeBody(bytes: Uint8Array, contentType?: string): string {
  const charset = detectCharset(bytes, contentType);
  try {
    return new TextDecoder(charset, { fatal: true }).decode(bytes);
  } catch (err) {
    // An unknown label is a RangeError, malformed bytes a TypeError
    if (err instanceof RangeError) {
      throw new DecodeError(`Unsupported character encoding "${charset}"`, { cause: err });
    }
    throw new DecodeError(`Content is not valid ${charset}`, { cause: err });
  }
}

function looksLikeHtml(text: string, contentType: string | undefined): boolean {
  if (contentType) return /\b(?:text\/html|application\/xhtml\+xml)\b/i.test(contentType);
  return /<html[\s>]/i.test(text.slice(0, SNIFF_BYTES));
}

/** Visible text of an HTML document, without scripts, styles and noscript blocks. */
export function extractHtmlText(html: string): { title?: string; text: string } {
  const $ = load(html);
  $("script, style, noscript, template").remove();
  const title = collapseWhitespace($("title").first().text()) || undefined;
  $("head").remove();

  // Pad every element so adjacent blocks never run together
  $("*").each((_, el) => {
    $(el).prepend(" ").append(" ");
  });
  return { title, text: $.root().text() };
}

export function applyStripPatterns(text: string, options: NormalizeOptions): string {
  let out = text;
  for (const { regex, replacement } of options.stripPatterns) {
    regex.lastIndex = 0;
    out = out.replace(regex, replacement);
  }
  return out;
}

export function normalizeContent(page: FetchedPage, options: NormalizeOptions): NormalizedPage {
  const decoded = decodeBody(page.body, page.contentType);

  let title: string | undefined;
  let text = decoded;
  if (options.extractText && looksLikeHtml(decoded, page.contentType)) {
    ({ title, text } = extractHtmlText(decoded));
  }

  text = applyStripPatterns(text, options);
  if (options.whitespaceCollapse) text = collapseWhitespace(text);

  return { text, digest: sha256(text), rawLength: page.body.byteLength, title };
}
