import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import fs from "node:fs";
import { ConfigError, errorMessage } from "./errors.js";

const envSchema = z.object({
  SITE_MONITOR_CONFIG: z.string().min(1).default("config.json"),
  SITE_MONITOR_STATE: z.string().min(1).default("data/state.json"),
  SITE_MONITOR_OUTPUT: z.string().min(1).default("."),
});

export type EnvSettings = z.infer<typeof envSchema>;

function isHttpUrl(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
}

const httpUrl = z.string().refine(isHttpUrl, { message: "must be an http:// or https:// URL" });

const stripRule = z.union([
  z.string().min(1),
  z.object({
    pattern: z.string().min(1),
    flags: z.string().regex(/^[imsu]*$/, "only i, m, s and u flags are allowed").optional(),
    replacement: z.string().default(""),
  }),
]);

const fileSchema = z.object({
  target_url: httpUrl,
  timeout_seconds: z.number().positive().max(300).default(30),
  strip_patterns: z.array(stripRule).default([]),
  whitespace_collapse: z.boolean().default(true),
  extract_text: z.boolean().default(true),
  excerpt_chars: z.number().int().min(100).max(100_000).default(5000),
  retries: z.number().int().min(0).max(5).default(2),
  site_title: z.string().min(1).default("Site Change Monitor"),
  site_url: httpUrl.optional(),
  user_agent: z.string().min(1).default("SiteChangeMonitor/1.0"),
});

export interface StripPattern {
  regex: RegExp;
  replacement: string;
}

export interface NormalizeOptions {
  stripPatterns: StripPattern[];
  whitespaceCollapse: boolean;
  extractText: boolean;
}

export interface MonitorConfig {
  targetUrl: string;
  timeoutMs: number;
  retries: number;
  userAgent: string;
  excerptChars: number;
  siteTitle: string;
  siteUrl?: string;
  normalize: NormalizeOptions;
}

function formatIssues(error: z.ZodError): string {
  // Paths and messages only, never values
  return error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join(", ");
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Loads `.env` into `process.env`, then validates the path settings. */
export function loadEnvWithDotenv(): EnvSettings {
  loadDotenv();
  return loadEnv(process.env);
}

function compileStripRule(rule: z.infer<typeof stripRule>, index: number): StripPattern {
  const source = typeof rule === "string" ? rule : rule.pattern;
  const flags = typeof rule === "string" ? "" : rule.flags ?? "";
  try {
    return {
      regex: new RegExp(source, `g${flags}`),
      replacement: typeof rule === "string" ? "" : rule.replacement,
    };
  } catch (err) {
    throw new ConfigError(`strip_patterns.${index}: invalid regular expression (${errorMessage(err)})`, {
      cause: err,
    });
  }
}

export function parseConfig(input: unknown): MonitorConfig {
  const parsed = fileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const c = parsed.data;
  return {
    targetUrl: c.target_url,
    timeoutMs: Math.round(c.timeout_seconds * 1000),
    retries: c.retries,
    userAgent: c.user_agent,
    excerptChars: c.excerpt_chars,
    siteTitle: c.site_title,
    siteUrl: c.site_url,
    normalize: {
      stripPatterns: c.strip_patterns.map(compileStripRule),
      whitespaceCollapse: c.whitespace_collapse,
      extractText: c.extract_text,
    },
  };
}

export function loadConfig(configPath: string): MonitorConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(
      `${configPath} not found. Copy config.example.json to config.json and edit it.`,
      { details: { path: configPath } }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`${configPath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${configPath} must be a JSON object.`);
  }
  return parseConfig(raw);
}

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  stripPatterns: [],
  whitespaceCollapse: true,
  extractText: true,
};
