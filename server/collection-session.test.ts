import { describe, it, expect, beforeEach } from "vitest";
import { CollectionSession, type CollectionHolder } from "./collection-session.js";
import type { PageRef } from "./page-store.js";
import { title } from "./test-helpers.js";

function ref(text: string, latestRevisionId: number): PageRef {
  return { title: title(text), exists: true, latestRevisionId };
}

const bread = ref("Sourdough bread", 48);
const crackers = ref("Rye crackers", 21);
const focaccia = ref("Focaccia", 33);

let holder: CollectionHolder;
let clock: number;
let session: CollectionSession;

beforeEach(() => {
  holder = {};
  clock = 1_000;
  session = new CollectionSession(holder, () => clock);
});

describe("a session that never used the book creator", () => {
  it("reads as disabled and empty without creating a record", () => {
    expect(session.isEnabled()).toBe(false);
    expect(session.timestamp).toBeNull();
    expect(session.countArticles()).toBe(0);
    expect(session.findArticle("Sourdough bread")).toBeNull();
    expect(holder.collection).toBeUndefined();
  });

  it("ignores disable and clear", () => {
    session.disable();
    session.clear();
    expect(holder.collection).toBeUndefined();
  });
});

describe("enable / disable", () => {
  it("enables and stamps the book", () => {
    session.enable();
    expect(session.isEnabled()).toBe(true);
    expect(session.timestamp).toBe(1_000);
  });

  it("keeps the items when disabled", () => {
    session.enable();
    session.addArticle(bread);
    clock = 2_000;
    session.disable();
    expect(session.isEnabled()).toBe(false);
    expect(session.countArticles()).toBe(1);
    expect(session.timestamp).toBe(2_000);
  });
});

describe("articles", () => {
  beforeEach(() => session.enable());

  it("appends a page at its latest revision", () => {
    clock = 5_000;
    expect(session.addArticle(bread)).toBe(true);
    expect(session.articles()).toEqual([
      {
        type: "article",
        namespace: 0,
        title: "Sourdough bread",
        revision: 48,
        latest: 48,
        timestamp: 5_000,
        currentVersion: true,
      },
    ]);
    expect(session.timestamp).toBe(5_000);
  });

  it("refuses a page that is already in the book", () => {
    session.addArticle(bread);
    expect(session.addArticle(bread)).toBe(false);
    expect(session.countArticles()).toBe(1);
  });

  it("keeps a pinned revision apart from the latest one", () => {
    session.addArticle(bread);
    expect(session.addArticle(bread, 40)).toBe(true);

    expect(session.findArticle("Sourdough bread")).toBe(0);
    expect(session.findArticle("Sourdough bread", 40)).toBe(1);
    expect(session.findArticle("Sourdough bread", 41)).toBeNull();
    expect(session.articles()[1]).toMatchObject({ revision: 40, latest: 48, currentVersion: false });
  });

  it("does not count a pinned revision as the latest one", () => {
    session.addArticle(bread, 40);
    expect(session.findArticle("Sourdough bread")).toBeNull();
  });

  it("removes the matching item only", () => {
    session.addArticle(bread);
    session.addArticle(bread, 40);
    expect(session.removeArticle("Sourdough bread", 40)).toBe(true);
    expect(session.articles().map((item) => item.revision)).toEqual([48]);
    expect(session.removeArticle("Sourdough bread", 40)).toBe(false);
  });

  it("moves items within range", () => {
    session.addArticle(bread);
    session.addArticle(crackers);
    session.addArticle(focaccia);

    expect(session.moveArticle(2, 0)).toBe(true);
    expect(session.articles().map((item) => item.title)).toEqual(["Focaccia", "Sourdough bread", "Rye crackers"]);
    expect(session.moveArticle(0, 3)).toBe(false);
    expect(session.moveArticle(-1, 0)).toBe(false);
  });

  it("clears the items and stays enabled", () => {
    session.addArticle(bread);
    clock = 9_000;
    session.clear();
    expect(session.countArticles()).toBe(0);
    expect(session.isEnabled()).toBe(true);
    expect(session.timestamp).toBe(9_000);
  });
});

describe("addCategory", () => {
  beforeEach(() => session.enable());

  it("adds members that are not in the book yet", () => {
    session.addArticle(crackers);
    expect(session.addCategory([crackers, bread, focaccia], 500)).toBe(2);
    expect(session.articles().map((item) => item.title)).toEqual(["Rye crackers", "Sourdough bread", "Focaccia"]);
  });

  it("stops once the book reaches the limit", () => {
    session.addArticle(crackers);
    expect(session.addCategory([bread, focaccia], 2)).toBe(1);
    expect(session.countArticles()).toBe(2);
  });
});
