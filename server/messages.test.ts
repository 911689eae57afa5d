import { describe, it, expect } from "vitest";
import { MessageLookup } from "./messages.js";

describe("MessageLookup", () => {
  const lookup = new MessageLookup({
    "coll-n_pages": "$1 {{PLURAL:$1|page|pages}}",
    pair: "$1 and $2",
    "only-form": "{{PLURAL:$1|item}}",
  });

  it("chooses the plural form from the numeric parameter", () => {
    expect(lookup.text("coll-n_pages", 1)).toBe("1 page");
    expect(lookup.text("coll-n_pages", 0)).toBe("0 pages");
    expect(lookup.text("coll-n_pages", 2)).toBe("2 pages");
  });

  it("formats large numbers with thousands separators", () => {
    expect(lookup.text("coll-n_pages", 1500)).toBe("1,500 pages");
  });

  it("falls back to the single form when no plural form is given", () => {
    expect(lookup.text("only-form", 3)).toBe("item");
  });

  it("leaves placeholders without a parameter untouched", () => {
    expect(lookup.text("pair", "bread")).toBe("bread and $2");
  });

  it("marks unknown keys", () => {
    expect(lookup.has("missing")).toBe(false);
    expect(lookup.text("missing")).toBe("⧼missing⧽");
  });

  it("loads the bundled catalog with overrides on top", () => {
    const loaded = MessageLookup.load({ "coll-helppage": "Help:Making books" });
    expect(loaded.text("coll-helppage")).toBe("Help:Making books");
    expect(loaded.text("coll-download_as", "PDF")).toBe("Download as PDF");
    expect(loaded.text("coll-create_a_book")).toBe("Create a book");
  });
});
