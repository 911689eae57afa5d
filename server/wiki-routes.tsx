import { Hono } from "hono";
import { createRenderContext, type AppDeps } from "./app-context.js";
import { checkLastModified, onOutputPageCheckLastModified, type ModifiedTimes } from "./last-modified.js";
import { respondWithPage } from "./page-response.js";
import type { PageStore, WikiPage } from "./page-store.js";
import { WikiRequest, type RenderContext } from "./render-context.js";
import type { AppEnv } from "./session-middleware.js";
import { handleSpecialBook } from "./special-book.js";
import { NS_CATEGORY, NS_SPECIAL, Title } from "./title.js";

// ─── Page bodies ─────────────────────────────────────────────────────────────

function Paragraphs({ content }: { content: string }) {
  const paragraphs = content
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter(Boolean);
  return (
    <>
      {paragraphs.map((text, i) => (
        <p key={i}>{text}</p>
      ))}
    </>
  );
}

function CategoryMembers({ ctx, members }: { ctx: RenderContext; members: WikiPage[] }) {
  return (
    <ul id="mw-pages">
      {members.map((member) => (
        <li key={member.title.prefixedText}>
          <a href={ctx.urls.localUrl(member.title)}>{member.title.prefixedText}</a>
        </li>
      ))}
    </ul>
  );
}

function CategoryLinks({ ctx, categories }: { ctx: RenderContext; categories: string[] }) {
  const titles = categories.flatMap((name) => Title.makeTitle(NS_CATEGORY, name) ?? []);
  if (titles.length === 0) return null;
  return (
    <div id="catlinks">
      {titles.map((title) => (
        <a key={title.prefixedText} href={ctx.urls.localUrl(title)}>
          {title.text}
        </a>
      ))}
    </div>
  );
}

function ArticleBody({ ctx, page, pages }: { ctx: RenderContext; page: WikiPage; pages: PageStore }) {
  return (
    <>
      <Paragraphs content={page.content} />
      {page.title.namespace === NS_CATEGORY && (
        <CategoryMembers ctx={ctx} members={pages.categoryMembers(page.title.text)} />
      )}
      <CategoryLinks ctx={ctx} categories={page.categories} />
    </>
  );
}

// ─── Routes ──────────────────────────────────────────────────────────────────

/** Page views under the article path, Special:Book included */
export function createWikiRoutes(deps: AppDeps) {
  const wiki = new Hono<AppEnv>();

  wiki.on(["GET", "POST"], "/:title{.+}", async (c) => {
    const title = Title.newFromText(c.req.param("title"));
    if (!title) {
      return c.text(deps.messages.text("coll-bad_title"), 400);
    }

    if (title.isSpecial("Book")) {
      return handleSpecialBook(c, deps);
    }

    const request = WikiRequest.fromUrl(c.req.url);
    const ctx = createRenderContext(c, deps, deps.pages.lookup(title), request);
    const { messages } = ctx;

    if (title.namespace === NS_SPECIAL) {
      return respondWithPage(c, ctx, title.prefixedText, <p>{messages.text("coll-no_such_special", title.text)}</p>, 404);
    }

    const page = deps.pages.get(title);
    if (!page) {
      return respondWithPage(c, ctx, title.prefixedText, <p>{messages.text("coll-noarticle")}</p>, 404);
    }

    const modifiedTimes: ModifiedTimes = { page: page.touched, epoch: deps.startedAt };
    onOutputPageCheckLastModified(ctx.collection, modifiedTimes);
    const { lastModified, etag, notModified } = checkLastModified(
      modifiedTimes,
      { ifModifiedSince: c.req.header("if-modified-since"), ifNoneMatch: c.req.header("if-none-match") },
      { session: c.get("session").id, user: ctx.user.name },
    );
    c.header("Last-Modified", new Date(lastModified).toUTCString());
    c.header("ETag", etag);
    c.header("Cache-Control", "private, must-revalidate, max-age=0");
    if (notModified) {
      return c.body(null, 304);
    }

    return respondWithPage(c, ctx, title.prefixedText, <ArticleBody ctx={ctx} page={page} pages={deps.pages} />);
  });

  return wiki;
}
