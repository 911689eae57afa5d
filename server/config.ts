import { readFileSync } from "node:fs";
import { isRecord } from "./guards.js";
import {
  NS_HELP,
  NS_HELP_TALK,
  NS_MAIN,
  NS_MEDIAWIKI,
  NS_MEDIAWIKI_TALK,
  NS_PROJECT,
  NS_PROJECT_TALK,
  NS_TALK,
  NS_USER,
  NS_USER_TALK,
} from "./title.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CollectionConfig {
  /** Namespaces whose pages can be added to a book (Category is always eligible) */
  collectibleNamespaces: ReadonlySet<number>;
  /** Export writer id → display label, e.g. "rl" → "PDF" */
  exportFormats: ReadonlyMap<string, string>;
  /** Writers offered as "Download as …" links in the sidebar */
  sidebarFormats: readonly string[];
  portletRequiresLogin: boolean;
  disableSidebarStartLink: boolean;
  suggestionsEnabled: boolean;
  /** Upper bound on items a category add may grow the book to */
  maxArticles: number;
  /** URL prefix of the extension's images and stylesheets */
  assetsPath: string;
  /** URL prefix of page views, e.g. "/wiki" */
  articlePath: string;
  /** Trusted request header carrying the authenticated user name */
  userHeader: string;
  /** Message overrides merged over the bundled catalog */
  messages: Readonly<Record<string, string>>;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_PORT = 3480;

export const DEFAULT_CONFIG: CollectionConfig = {
  collectibleNamespaces: new Set([
    NS_MAIN,
    NS_TALK,
    NS_USER,
    NS_USER_TALK,
    NS_PROJECT,
    NS_PROJECT_TALK,
    NS_MEDIAWIKI,
    NS_MEDIAWIKI_TALK,
    NS_HELP,
    NS_HELP_TALK,
  ]),
  exportFormats: new Map([["rl", "PDF"]]),
  sidebarFormats: ["rl"],
  portletRequiresLogin: false,
  disableSidebarStartLink: false,
  suggestionsEnabled: true,
  maxArticles: 500,
  assetsPath: "/static/collection",
  articlePath: "/wiki",
  userHeader: "x-remote-user",
  messages: {},
};

// ─── Parsing ─────────────────────────────────────────────────────────────────

function expectBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new ConfigError(`${key} must be a boolean`);
  return value;
}

function expectString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || !value) throw new ConfigError(`${key} must be a non-empty string`);
  return value;
}

function expectStringMap(raw: Record<string, unknown>, key: string): Map<string, string> | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new ConfigError(`${key} must be an object of strings`);
  const out = new Map<string, string>();
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== "string") throw new ConfigError(`${key}.${k} must be a string`);
    out.set(k, v);
  }
  return out;
}

/**
 * Validate a raw (JSON) configuration object and merge it over `base`.
 * Sidebar formats that name an unknown writer are dropped with a warning.
 */
export function parseConfig(raw: unknown, base: CollectionConfig = DEFAULT_CONFIG): CollectionConfig {
  if (!isRecord(raw)) throw new ConfigError("configuration must be a JSON object");

  let collectibleNamespaces = base.collectibleNamespaces;
  if (raw.collectibleNamespaces !== undefined) {
    const list = raw.collectibleNamespaces;
    if (!Array.isArray(list) || !list.every((n): n is number => Number.isInteger(n))) {
      throw new ConfigError("collectibleNamespaces must be an array of integers");
    }
    collectibleNamespaces = new Set(list);
  }

  const exportFormats = expectStringMap(raw, "exportFormats") ?? base.exportFormats;

  let sidebarFormats = base.sidebarFormats;
  if (raw.sidebarFormats !== undefined) {
    const list = raw.sidebarFormats;
    if (!Array.isArray(list) || !list.every((f): f is string => typeof f === "string")) {
      throw new ConfigError("sidebarFormats must be an array of strings");
    }
    sidebarFormats = list;
  }
  const unknown = sidebarFormats.filter((writer) => !exportFormats.has(writer));
  if (unknown.length > 0) {
    console.warn(`[config] Ignoring sidebar formats without an export format: ${unknown.join(", ")}`);
    sidebarFormats = sidebarFormats.filter((writer) => exportFormats.has(writer));
  }

  let maxArticles = base.maxArticles;
  if (raw.maxArticles !== undefined) {
    if (typeof raw.maxArticles !== "number" || !Number.isInteger(raw.maxArticles) || raw.maxArticles < 1) {
      throw new ConfigError("maxArticles must be a positive integer");
    }
    maxArticles = raw.maxArticles;
  }

  const overrides = expectStringMap(raw, "messages");

  return {
    collectibleNamespaces,
    exportFormats,
    sidebarFormats,
    portletRequiresLogin: expectBoolean(raw, "portletRequiresLogin", base.portletRequiresLogin),
    disableSidebarStartLink: expectBoolean(raw, "disableSidebarStartLink", base.disableSidebarStartLink),
    suggestionsEnabled: expectBoolean(raw, "suggestionsEnabled", base.suggestionsEnabled),
    maxArticles,
    assetsPath: expectString(raw, "assetsPath", base.assetsPath).replace(/\/+$/, ""),
    articlePath: expectString(raw, "articlePath", base.articlePath).replace(/\/+$/, ""),
    userHeader: expectString(raw, "userHeader", base.userHeader).toLowerCase(),
    messages: overrides ? { ...base.messages, ...Object.fromEntries(overrides) } : base.messages,
  };
}

function envFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name]?.trim().toLowerCase();
  if (value === undefined || value === "") return undefined;
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false") return false;
  throw new ConfigError(`${name} must be one of 1, 0, true, false`);
}

/**
 * Load the configuration: defaults, then the JSON file named by
 * BOOK_CREATOR_CONFIG, then the BOOK_CREATOR_* env flags.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectionConfig {
  let config = DEFAULT_CONFIG;

  const file = env.BOOK_CREATOR_CONFIG;
  if (file) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, "utf-8"));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Cannot read ${file}: ${msg}`);
    }
    config = parseConfig(raw, config);
    console.log(`[config] Loaded ${file}`);
  }

  const requireLogin = envFlag(env, "BOOK_CREATOR_REQUIRE_LOGIN");
  const disableStartLink = envFlag(env, "BOOK_CREATOR_DISABLE_START_LINK");
  const suggestions = envFlag(env, "BOOK_CREATOR_SUGGESTIONS");

  return {
    ...config,
    portletRequiresLogin: requireLogin ?? config.portletRequiresLogin,
    disableSidebarStartLink: disableStartLink ?? config.disableSidebarStartLink,
    suggestionsEnabled: suggestions ?? config.suggestionsEnabled,
  };
}
