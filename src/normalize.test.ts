import { describe, it, expect } from "vitest";
import crypto from "node:crypto";
import { parseConfig } from "./config.js";
import { DecodeError } from "./errors.js";
import { decodeBody, detectCharset, extractHtmlText, normalizeContent } from "./normalize.js";
import type { FetchedPage } from "./types.js";

const defaults = parseConfig({ target_url: "https://example.test/page" }).normalize;

function page(body: string | Uint8Array, contentType?: string): FetchedPage {
  const bytes = typeof body === "string" ? new TextEncoder().encode(body) : body;
  return { url: "https://example.test/page", status: 200, contentType, body: bytes };
}

function hex(text: string): string {
  return crypto.createHash("sha256").update(text, "utf8").digest("hex");
}

describe("detectCharset", () => {
  it("prefers the Content-Type header", () => {
    const bytes = new TextEncoder().encode('<meta charset="iso-8859-1">');
    expect(detectCharset(bytes, "text/html; charset=UTF-8")).toBe("utf-8");
  });

  it("falls back to a meta tag, then UTF-8", () => {
    expect(detectCharset(new TextEncoder().encode('<head><meta charset="ISO-8859-1"></head>'))).toBe("iso-8859-1");
    expect(detectCharset(new TextEncoder().encode("<p>plain</p>"))).toBe("utf-8");
  });

  it("recognizes a UTF-8 byte order mark", () => {
    expect(detectCharset(new Uint8Array([0xef, 0xbb, 0xbf, 0x41]))).toBe("utf-8");
  });
});

describe("decodeBody", () => {
  it("decodes latin-1 when declared", () => {
    expect(decodeBody(new Uint8Array([0x63, 0x61, 0x66, 0xe9]), "text/plain; charset=iso-8859-1")).toBe("café");
  });

  it("fails on bytes that are not valid UTF-8", () => {
    expect(() => decodeBody(new Uint8Array([0x41, 0xff, 0xfe, 0x42]), "text/html; charset=utf-8")).toThrow(
      "Content is not valid utf-8"
    );
  });

  it("fails on an unknown charset label", () => {
    expect(() => decodeBody(new Uint8Array([0x41]), "text/html; charset=x-made-up")).toThrow(
      'Unsupported character encoding "x-made-up"'
    );
  });
});

describe("extractHtmlText", () => {
  it("drops scripts, styles and the head and keeps the title", () => {
    const { title, text } = extractHtmlText(
      "<html><head><title> Deals  Page </title><style>p{}</style></head>" +
        "<body><script>var x = 1;</script><h1>Deals</h1><p>Price: $10</p><noscript>js off</noscript></body></html>"
    );
    expect(title).toBe("Deals Page");
    expect(text.split(/\s+/).filter(Boolean)).toEqual(["Deals", "Price:", "$10"]);
  });
});

describe("normalizeContent", () => {
  it("hashes the visible text of an HTML page", () => {
    const out = normalizeContent(page("<html>Price: $10</html>", "text/html"), defaults);
    expect(out.text).toBe("Price: $10");
    expect(out.digest).toBe(hex("Price: $10"));
    expect(out.rawLength).toBe(23);
    expect(out.title).toBeUndefined();
  });

  it("is deterministic for byte-identical input", () => {
    const raw = "<html><body><div>One</div>\n<div>Two</div></body></html>";
    const a = normalizeContent(page(raw, "text/html"), defaults);
    const b = normalizeContent(page(raw, "text/html"), defaults);
    expect(a).toEqual(b);
    expect(a.text).toBe("One Two");
  });

  it("strips configured volatile patterns before hashing", () => {
    const options = parseConfig({
      target_url: "https://example.test/",
      strip_patterns: ["Updated \\d{2}:\\d{2}"],
    }).normalize;
    const first = normalizeContent(page("<p>Stock: 4</p><p>Updated 10:15</p>", "text/html"), options);
    const second = normalizeContent(page("<p>Stock: 4</p><p>Updated 11:42</p>", "text/html"), options);
    expect(first.text).toBe("Stock: 4");
    expect(second.digest).toBe(first.digest);
  });

  it("keeps whitespace when collapsing is disabled", () => {
    const options = parseConfig({
      target_url: "https://example.test/",
      whitespace_collapse: false,
      extract_text: false,
    }).normalize;
    const out = normalizeContent(page("a  b\n", "text/plain"), options);
    expect(out.text).toBe("a  b\n");
  });

  it("leaves non-HTML content untouched apart from whitespace", () => {
    const out = normalizeContent(page('{"price": 10}', "application/json"), defaults);
    expect(out.text).toBe('{"price": 10}');
  });

  it("hashes the full text, not a truncated excerpt", () => {
    const long = "x".repeat(6000);
    const a = normalizeContent(page(long + "A", "text/plain"), defaults);
    const b = normalizeContent(page(long + "B", "text/plain"), defaults);
    expect(a.digest).not.toBe(b.digest);
  });

  it("propagates decode failures", () => {
    expect(() => normalizeContent(page(new Uint8Array([0xc3, 0x28]), "text/html; charset=utf-8"), defaults)).toThrow(
      DecodeError
    );
  });
});
