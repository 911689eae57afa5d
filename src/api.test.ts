// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach } from "vitest";
import { api, ApiError } from "./api.js";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function mockResponse(data: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Conflict",
    json: () => Promise.resolve(data),
  };
}

beforeEach(() => {
  mockFetch.mockReset();
});

// ===========================================================================
// addArticle / removeArticle
// ===========================================================================
describe("addArticle", () => {
  it("sends POST to /api/collection/add-article with the article", async () => {
    mockFetch.mockResolvedValueOnce(mockResponse({ html: "<a></a>", count: 1 }));

    const result = await api.addArticle({ namespace: 0, title: "Focaccia", oldid: 0 });

    const [url, opts] = mockFetch.mock.calls[0];
    expect(url).toBe("/api/collection/add-article");
    expect(opts.method).toBe("POST");
    expect(opts.headers["Content-Type"]).toBe("application/json");
    expect(JSON.parse(opts.body)).toEqual({ namespace: 0, title: "Focaccia", oldid: 0 });
    expect(result).toEqual({ html: "<a></a>", count: 1 });
  });

  it("throws the server's error message", async () => {
    mockFetch.mockResolvedValueOnce(mockResponse({ error: "The book creator is not enabled for this session." }, 409));

    const error = await api.addArticle({ namespace: 0, title: "Focaccia", oldid: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 409, message: "The book creator is not enabled for this session." });
  });

  it("falls back to the status text when the body has no error", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 409,
      statusText: "Conflict",
      json: () => Promise.reject(new Error("not json")),
    });

    await expect(api.addArticle({ namespace: 0, title: "Focaccia", oldid: 0 })).rejects.toThrow("Conflict");
  });
});

describe("removeArticle", () => {
  it("sends POST to /api/collection/remove-article", async () => {
    mockFetch.mockResolvedValueOnce(mockResponse({ html: "", count: 0 }));

    await api.removeArticle({ namespace: 0, title: "Focaccia", oldid: 30 });

    const [url, opts] = mockFetch.mock.calls[0];
    expect(url).toBe("/api/collection/remove-article");
    expect(JSON.parse(opts.body)).toEqual({ namespace: 0, title: "Focaccia", oldid: 30 });
  });
});

// ===========================================================================
// addCategory
// ===========================================================================
describe("addCategory", () => {
  it("sends POST to /api/collection/add-category with the category name", async () => {
    mockFetch.mockResolvedValueOnce(mockResponse({ html: "", count: 2 }));

    const result = await api.addCategory("Bread");

    const [url, opts] = mockFetch.mock.calls[0];
    expect(url).toBe("/api/collection/add-category");
    expect(JSON.parse(opts.body)).toEqual({ title: "Bread" });
    expect(result.count).toBe(2);
  });
});
