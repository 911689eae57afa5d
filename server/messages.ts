import { readFileSync } from "node:fs";
import { MESSAGES_FILE } from "./paths.js";

export type MessageParam = string | number;

const numberFormat = new Intl.NumberFormat("en-US");

function toNumber(value: MessageParam | undefined): number {
  if (typeof value === "number") return value;
  if (value === undefined) return Number.NaN;
  return Number(value.replace(/,/g, ""));
}

/**
 * Localized interface messages.
 *
 * Templates take positional parameters (`$1`, `$2`, …) and
 * `{{PLURAL:$n|singular|plural}}`. Numeric parameters are formatted with
 * thousands separators. Unknown keys render as `⧼key⧽` so they stand out.
 */
export class MessageLookup {
  private catalog: Readonly<Record<string, string>>;

  constructor(catalog: Readonly<Record<string, string>>) {
    this.catalog = catalog;
  }

  /** Load the bundled catalog, with overrides from configuration on top */
  static load(overrides: Readonly<Record<string, string>> = {}, file = MESSAGES_FILE): MessageLookup {
    const raw: unknown = JSON.parse(readFileSync(file, "utf-8"));
    const catalog: Record<string, string> = {};
    if (typeof raw === "object" && raw !== null) {
      for (const [key, value] of Object.entries(raw)) {
        if (typeof value === "string") catalog[key] = value;
      }
    }
    return new MessageLookup({ ...catalog, ...overrides });
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.catalog, key);
  }

  text(key: string, ...params: MessageParam[]): string {
    const template = this.has(key) ? this.catalog[key] : undefined;
    if (template === undefined) return `⧼${key}⧽`;

    const withPlurals = template.replace(
      /\{\{PLURAL:\$(\d+)\|([^}]*)\}\}/g,
      (_match, idx: string, forms: string) => {
        const n = toNumber(params[Number(idx) - 1]);
        const [singular, plural] = forms.split("|");
        return n === 1 ? singular : (plural ?? singular);
      },
    );

    return withPlurals.replace(/\$(\d+)/g, (match, idx: string) => {
      const value = params[Number(idx) - 1];
      if (value === undefined) return match;
      return typeof value === "number" ? numberFormat.format(value) : value;
    });
  }
}
