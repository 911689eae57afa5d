import { describe, it, expect } from "vitest";
import {
  BOX_MODES,
  getBookCreatorBoxAddRemoveLink,
  getBookCreatorBoxContent,
  getBookCreatorBoxShowBookLink,
  getBookCreatorBoxSuggestLink,
  resolveAddRemoveAction,
  type BoxDeps,
} from "./book-creator-box.js";
import { CollectionSession } from "./collection-session.js";
import { boxDeps } from "./site-notice.js";
import { makeContext, parseHtml, title } from "./test-helpers.js";

const NBSP = "\u00a0";
const bread = title("Sourdough bread");
const baking = title("Category:Baking");

/** Box dependencies over a book holding the given (title, revision, latest) items */
function depsWith(items: Array<[string, number, number]> = [], overrides: Partial<BoxDeps> = {}): BoxDeps {
  const ctx = makeContext();
  const collection = new CollectionSession({}, () => 0);
  collection.enable();
  for (const [text, revision, latest] of items) {
    collection.addArticle(
      { title: title(text), exists: true, latestRevisionId: latest },
      revision === latest ? 0 : revision,
    );
  }
  return { ...boxDeps({ ...ctx, collection }), ...overrides };
}

describe("resolveAddRemoveAction", () => {
  const empty = new CollectionSession({});

  it.each(["suggest", "showbook"] as const)("is not addable in %s mode, even for categories", (mode) => {
    expect(resolveAddRemoveAction(mode, bread, 0, empty)).toEqual({ kind: "not-addable" });
    expect(resolveAddRemoveAction(mode, baking, 0, empty)).toEqual({ kind: "not-addable" });
  });

  it("adds the page's category in addcategory mode", () => {
    expect(resolveAddRemoveAction("addcategory", bread, 0, empty)).toEqual({
      kind: "add-category",
      query: { bookcmd: "add_category", cattitle: "Sourdough bread" },
    });
  });

  it("adds an article or category in addarticle mode", () => {
    expect(resolveAddRemoveAction("addarticle", bread, 40, empty)).toEqual({
      kind: "add-article",
      query: { bookcmd: "add_article", arttitle: "Sourdough bread", oldid: 40 },
    });
    expect(resolveAddRemoveAction("addarticle", baking, 0, empty).kind).toBe("add-category");
  });

  it("offers the category add on category pages whatever the book holds", () => {
    const deps = depsWith([["Category:Baking", 3, 3]]);
    expect(resolveAddRemoveAction("none", baking, 0, deps.collection)).toEqual({
      kind: "add-category",
      query: { bookcmd: "add_category", cattitle: "Baking" },
    });
  });
});

describe("getBookCreatorBoxAddRemoveLink", () => {
  it("renders the add link for a page outside the book", () => {
    const html = getBookCreatorBoxAddRemoveLink(depsWith(), "none", bread, 0);
    const link = parseHtml(html).querySelector("a");

    expect(link?.id).toBe("coll-add_article");
    expect(link?.getAttribute("href")).toBe("/wiki/Special:Book?bookcmd=add_article&arttitle=Sourdough+bread&oldid=0");
    expect(link?.getAttribute("rel")).toBe("nofollow");
    expect(link?.getAttribute("title")).toBe("Add the current wiki page to your book");
    expect(link?.textContent).toBe(`${NBSP}Add this page to your book`);
    expect(link?.querySelector("img")?.getAttribute("src")).toBe("/static/collection/images/silk-add.svg");
    expect(link?.dataset.collectionAction).toBe("addarticle");
    expect(link?.dataset.namespace).toBe("0");
    expect(link?.dataset.title).toBe("Sourdough bread");
    expect(link?.dataset.oldid).toBe("0");
  });

  it("renders the remove link for a page in the book", () => {
    const html = getBookCreatorBoxAddRemoveLink(depsWith([["Sourdough bread", 48, 48]]), "none", bread, 0);
    const link = parseHtml(html).querySelector("a");

    expect(link?.id).toBe("coll-remove_article");
    expect(link?.getAttribute("href")).toBe(
      "/wiki/Special:Book?bookcmd=remove_article&arttitle=Sourdough+bread&oldid=0",
    );
    expect(link?.textContent).toBe(`${NBSP}Remove this page from your book`);
    expect(link?.querySelector("img")?.getAttribute("src")).toBe("/static/collection/images/silk-remove.svg");
    expect(link?.dataset.collectionAction).toBe("removearticle");
  });

  it("renders the category add link without an oldid", () => {
    const html = getBookCreatorBoxAddRemoveLink(depsWith(), "none", baking, 0);
    const link = parseHtml(html).querySelector("a");

    expect(link?.id).toBe("coll-add_category");
    expect(link?.getAttribute("href")).toBe("/wiki/Special:Book?bookcmd=add_category&cattitle=Baking");
    expect(link?.textContent).toBe(`${NBSP}Add this category to your book`);
    expect(link?.dataset.namespace).toBe("14");
    expect(link?.dataset.title).toBe("Baking");
    expect(link?.hasAttribute("data-oldid")).toBe(false);
  });

  it("renders the not-addable indicator on Special:Book subpages", () => {
    const fragment = parseHtml(getBookCreatorBoxAddRemoveLink(depsWith(), "showbook", bread, 0));
    const span = fragment.querySelector("span");

    expect(fragment.querySelector("a")).toBeNull();
    expect(span?.getAttribute("style")).toBe("color:#777");
    expect(span?.textContent).toBe(`${NBSP}This page cannot be added`);
    expect(span?.querySelector("img")?.getAttribute("src")).toBe("/static/collection/images/disabled.svg");
  });

  it("is a pure function of its inputs", () => {
    const deps = depsWith([["Sourdough bread", 48, 48]]);
    for (const mode of BOX_MODES) {
      expect(getBookCreatorBoxAddRemoveLink(deps, mode, bread, 0)).toBe(
        getBookCreatorBoxAddRemoveLink(deps, mode, bread, 0),
      );
    }
  });

  it.each([
    { items: [], oldid: 0, expected: "coll-add_article" },
    { items: [["Sourdough bread", 48, 48]], oldid: 0, expected: "coll-remove_article" },
    { items: [["Sourdough bread", 40, 48]], oldid: 0, expected: "coll-add_article" },
    { items: [["Sourdough bread", 40, 48]], oldid: 40, expected: "coll-remove_article" },
    { items: [["Sourdough bread", 48, 48]], oldid: 40, expected: "coll-add_article" },
    { items: [["Rye crackers", 21, 21]], oldid: 0, expected: "coll-add_article" },
  ] satisfies Array<{ items: Array<[string, number, number]>; oldid: number; expected: string }>)(
    "follows findArticle membership ($expected for oldid $oldid)",
    ({ items, oldid, expected }) => {
      const deps = depsWith(items);
      const member = deps.collection.findArticle("Sourdough bread", oldid) !== null;
      const link = parseHtml(getBookCreatorBoxAddRemoveLink(deps, "none", bread, oldid)).querySelector("a");

      expect(link?.id).toBe(expected);
      expect(link?.id === "coll-remove_article").toBe(member);
    },
  );
});

describe("getBookCreatorBoxShowBookLink", () => {
  it("links to the book with the page count", () => {
    const deps = depsWith([
      ["Sourdough bread", 48, 48],
      ["Rye crackers", 21, 21],
    ]);
    const link = parseHtml(getBookCreatorBoxShowBookLink(deps, "none")).querySelector("a");

    expect(link?.getAttribute("href")).toBe("/wiki/Special:Book");
    expect(link?.className).toBe("collection-creatorbox-iconlink");
    expect(link?.textContent).toBe(`${NBSP}Show book (2 pages)`);
    expect(link?.querySelector("img")?.getAttribute("src")).toBe("/static/collection/images/silk-book_open.svg");
  });

  it("is plain bold text on the book page itself", () => {
    const fragment = parseHtml(getBookCreatorBoxShowBookLink(depsWith([["Focaccia", 33, 33]]), "showbook"));
    expect(fragment.querySelector("a")).toBeNull();
    expect(fragment.querySelector("strong")?.textContent).toBe(`${NBSP}Show book (1 page)`);
  });
});

describe("getBookCreatorBoxSuggestLink", () => {
  it("is empty when suggestions are disabled", () => {
    expect(getBookCreatorBoxSuggestLink(depsWith([], { suggestionsEnabled: false }), "none")).toBe("");
  });

  it("links to the suggestion page", () => {
    const link = parseHtml(getBookCreatorBoxSuggestLink(depsWith(), "none")).querySelector("a");
    expect(link?.getAttribute("href")).toBe("/wiki/Special:Book?bookcmd=suggest");
    expect(link?.textContent).toBe(`${NBSP}Suggest pages`);
  });

  it("is plain bold text on the suggestion page", () => {
    const fragment = parseHtml(getBookCreatorBoxSuggestLink(depsWith(), "suggest"));
    expect(fragment.querySelector("a")).toBeNull();
    expect(fragment.querySelector("strong")?.textContent).toBe(`${NBSP}Suggest pages`);
  });
});

describe("getBookCreatorBoxContent", () => {
  it("joins the three fragments in order", () => {
    const fragment = parseHtml(getBookCreatorBoxContent(depsWith(), bread));
    const ids = Array.from(fragment.children).map((el) => el.id || el.getAttribute("href"));
    expect(ids).toEqual(["coll-add_article", "/wiki/Special:Book", "/wiki/Special:Book?bookcmd=suggest"]);
  });

  it("defaults to the ordinary page view", () => {
    const deps = depsWith();
    expect(getBookCreatorBoxContent(deps, bread)).toBe(getBookCreatorBoxContent(deps, bread, "none", 0));
  });
});
