const BASE = "/api";

function errorMessage(body: unknown): string | null {
  if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return null;
}

/** Thrown for non-2xx responses; carries the HTTP status */
export class ApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

async function post<T = unknown>(path: string, body?: object): Promise<T> {
  const res = await fetch(`${BASE}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    credentials: "same-origin",
    body: body ? JSON.stringify(body) : undefined,
  });
  if (!res.ok) {
    const err: unknown = await res.json().catch(() => null);
    throw new ApiError(errorMessage(err) || res.statusText, res.status);
  }
  return res.json();
}

// ─── Types ───────────────────────────────────────────────────────────────────

/** Fresh box content after a change */
export interface BoxUpdate {
  html: string;
  count: number;
}

export interface ArticleRef {
  namespace: number;
  /** Title text without the namespace prefix */
  title: string;
  oldid: number;
}

// ─── API ─────────────────────────────────────────────────────────────────────

export const api = {
  addArticle: (article: ArticleRef) => post<BoxUpdate>("/collection/add-article", article),
  removeArticle: (article: ArticleRef) => post<BoxUpdate>("/collection/remove-article", article),
  addCategory: (title: string) => post<BoxUpdate>("/collection/add-category", { title }),
};
