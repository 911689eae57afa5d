// Wiki page titles: namespace number + text, and their prefixed form

// ─── Namespaces ──────────────────────────────────────────────────────────────

export const NS_SPECIAL = -1;
export const NS_MAIN = 0;
export const NS_TALK = 1;
export const NS_USER = 2;
export const NS_USER_TALK = 3;
export const NS_PROJECT = 4;
export const NS_PROJECT_TALK = 5;
export const NS_FILE = 6;
export const NS_FILE_TALK = 7;
export const NS_MEDIAWIKI = 8;
export const NS_MEDIAWIKI_TALK = 9;
export const NS_TEMPLATE = 10;
export const NS_TEMPLATE_TALK = 11;
export const NS_HELP = 12;
export const NS_HELP_TALK = 13;
export const NS_CATEGORY = 14;
export const NS_CATEGORY_TALK = 15;

const NAMESPACE_NAMES: ReadonlyMap<number, string> = new Map([
  [NS_SPECIAL, "Special"],
  [NS_MAIN, ""],
  [NS_TALK, "Talk"],
  [NS_USER, "User"],
  [NS_USER_TALK, "User talk"],
  [NS_PROJECT, "Project"],
  [NS_PROJECT_TALK, "Project talk"],
  [NS_FILE, "File"],
  [NS_FILE_TALK, "File talk"],
  [NS_MEDIAWIKI, "MediaWiki"],
  [NS_MEDIAWIKI_TALK, "MediaWiki talk"],
  [NS_TEMPLATE, "Template"],
  [NS_TEMPLATE_TALK, "Template talk"],
  [NS_HELP, "Help"],
  [NS_HELP_TALK, "Help talk"],
  [NS_CATEGORY, "Category"],
  [NS_CATEGORY_TALK, "Category talk"],
]);

const NAMESPACE_BY_NAME = new Map(
  Array.from(NAMESPACE_NAMES.entries())
    .filter(([, name]) => name !== "")
    .map(([ns, name]) => [name.toLowerCase(), ns] as const),
);

/** Characters that can never appear in a page title */
const ILLEGAL_TITLE_CHARS = /[#<>[\]|{}\u0000-\u001f\u007f]/;
const MAX_TITLE_LENGTH = 255;

export function namespaceName(namespace: number): string | null {
  return NAMESPACE_NAMES.get(namespace) ?? null;
}

function normalizeText(text: string): string {
  const collapsed = text.replace(/_/g, " ").replace(/\s+/g, " ").trim();
  if (!collapsed) return "";
  return collapsed.charAt(0).toUpperCase() + collapsed.slice(1);
}

// ─── Title ───────────────────────────────────────────────────────────────────

export class Title {
  readonly namespace: number;
  readonly text: string;

  private constructor(namespace: number, text: string) {
    this.namespace = namespace;
    this.text = text;
  }

  /**
   * Parse user or URL input such as "Category:Cooking" or "main_page".
   * Returns null for empty, overlong or otherwise invalid titles.
   */
  static newFromText(input: string | null | undefined, defaultNamespace = NS_MAIN): Title | null {
    if (input == null) return null;
    const cleaned = normalizeText(input);
    if (!cleaned || ILLEGAL_TITLE_CHARS.test(cleaned)) return null;

    let namespace = defaultNamespace;
    let text = cleaned;
    const colonIdx = cleaned.indexOf(":");
    if (colonIdx > 0) {
      const prefix = cleaned.slice(0, colonIdx).trim().toLowerCase();
      const ns = NAMESPACE_BY_NAME.get(prefix);
      if (ns !== undefined) {
        namespace = ns;
        text = normalizeText(cleaned.slice(colonIdx + 1));
      }
    }

    if (!text || text.length > MAX_TITLE_LENGTH) return null;
    return new Title(namespace, text);
  }

  /** Build a title from an already-known namespace and text */
  static makeTitle(namespace: number, text: string): Title | null {
    if (!NAMESPACE_NAMES.has(namespace)) return null;
    const normalized = normalizeText(text);
    if (!normalized || ILLEGAL_TITLE_CHARS.test(normalized)) return null;
    return new Title(namespace, normalized);
  }

  /** The title of a special page, e.g. `Title.special("Book")` */
  static special(name: string): Title {
    return new Title(NS_SPECIAL, normalizeText(name));
  }

  get prefixedText(): string {
    const name = NAMESPACE_NAMES.get(this.namespace) ?? "";
    return name ? `${name}:${this.text}` : this.text;
  }

  /** Prefixed text with underscores, as used in URL paths */
  get urlKey(): string {
    return this.prefixedText.replace(/ /g, "_");
  }

  isSpecial(name: string): boolean {
    return this.namespace === NS_SPECIAL && this.text === normalizeText(name);
  }

  equals(other: Title): boolean {
    return this.namespace === other.namespace && this.text === other.text;
  }

  toString(): string {
    return this.prefixedText;
  }
}
