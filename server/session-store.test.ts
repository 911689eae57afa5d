import { describe, it, expect, beforeEach } from "vitest";
import { Hono } from "hono";
import { CollectionSession } from "./collection-session.js";
import { SessionStore } from "./session-store.js";
import { COOKIE_NAME, parseSessionCookie, sessionMiddleware, type AppEnv } from "./session-middleware.js";

let clock: number;
let store: SessionStore;

beforeEach(() => {
  clock = 0;
  store = new SessionStore({ idleMs: 1_000, now: () => clock });
});

describe("SessionStore", () => {
  it("creates sessions with opaque hex ids", () => {
    const session = store.create();
    expect(session.id).toMatch(/^[a-f0-9]{48}$/);
    expect(store.get(session.id)).toBe(session);
    expect(store.size).toBe(1);
  });

  it("ignores unknown and malformed ids", () => {
    expect(store.get(null)).toBeNull();
    expect(store.get("not-a-session")).toBeNull();
    expect(store.get("a".repeat(48))).toBeNull();
  });

  it("expires sessions after the idle time", () => {
    const session = store.create();
    clock = 900;
    expect(store.get(session.id)).toBe(session);
    clock = 1_800;
    expect(store.get(session.id)).toBe(session);
    clock = 2_801;
    expect(store.get(session.id)).toBeNull();
    expect(store.size).toBe(0);
  });

  it("prunes expired sessions", () => {
    store.create();
    clock = 500;
    const fresh = store.create();
    clock = 1_200;
    expect(store.prune()).toBe(1);
    expect(store.get(fresh.id)).toBe(fresh);
  });
});

describe("parseSessionCookie", () => {
  it("finds the session cookie among others", () => {
    expect(parseSessionCookie(`theme=dark; ${COOKIE_NAME}=abc123; lang=en`)).toBe("abc123");
    expect(parseSessionCookie("theme=dark")).toBeNull();
    expect(parseSessionCookie("")).toBeNull();
  });
});

describe("sessionMiddleware", () => {
  function createTestApp() {
    const app = new Hono<AppEnv>();
    app.use("*", sessionMiddleware(store, "x-remote-user"));
    app.get("/whoami", (c) => c.json({ id: c.get("session").id, user: c.get("user") }));
    app.post("/start", (c) => {
      new CollectionSession(c.get("session"), () => clock).enable();
      return c.json({ id: c.get("session").id });
    });
    return app;
  }

  it("keeps reads without a cookie transient", async () => {
    const app = createTestApp();
    for (let i = 0; i < 5; i++) {
      const res = await app.request("/whoami");
      expect(res.headers.get("set-cookie")).toBeNull();
      expect((await res.json()).id).toBeNull();
    }
    expect(store.size).toBe(0);
  });

  it("stores the session and sets the cookie on the first write", async () => {
    const res = await createTestApp().request("/start", { method: "POST" });
    const body = await res.json();

    expect(body.id).toMatch(/^[a-f0-9]{48}$/);
    expect(res.headers.get("set-cookie")).toBe(
      `${COOKIE_NAME}=${body.id}; HttpOnly; SameSite=Lax; Path=/; Max-Age=86400`,
    );
    expect(store.size).toBe(1);
    expect(store.get(body.id)?.collection?.enabled).toBe(true);
  });

  it("reuses the session named by the cookie", async () => {
    const existing = store.create();
    const res = await createTestApp().request("/start", {
      method: "POST",
      headers: { Cookie: `${COOKIE_NAME}=${existing.id}` },
    });
    const body = await res.json();

    expect(body.id).toBe(existing.id);
    expect(res.headers.get("set-cookie")).toBeNull();
    expect(store.size).toBe(1);
    expect(existing.collection?.enabled).toBe(true);
  });

  it("starts over when the cookie names an unknown session", async () => {
    const res = await createTestApp().request("/whoami", {
      headers: { Cookie: `${COOKIE_NAME}=${"c".repeat(48)}` },
    });
    expect((await res.json()).id).toBeNull();
  });

  it("marks the cookie secure behind an HTTPS proxy", async () => {
    const res = await createTestApp().request("/start", {
      method: "POST",
      headers: { "X-Forwarded-Proto": "https" },
    });
    expect(res.headers.get("set-cookie")).toContain("; HttpOnly; Secure; SameSite=Lax");
  });

  it("takes the user name from the trusted header", async () => {
    const res = await createTestApp().request("/whoami", { headers: { "X-Remote-User": " Alice " } });
    const body = await res.json();
    expect(body.user).toEqual({ name: "Alice", isRegistered: true });
  });
});
