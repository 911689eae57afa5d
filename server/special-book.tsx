import type { ReactNode } from "react";
import { createRenderContext, type AppContext, type AppDeps } from "./app-context.js";
import type { CollectionItem } from "./collection-session.js";
import { respondWithPage, type PageStatus } from "./page-response.js";
import { WikiRequest, type RenderContext } from "./render-context.js";
import { suggestPages } from "./suggestions.js";
import { NS_CATEGORY, Title } from "./title.js";
import { BOOK_PAGE, type QueryParams } from "./urls.js";

// ─── Commands ────────────────────────────────────────────────────────────────

/** Commands that change the book's items; they need an enabled book creator */
const ITEM_COMMANDS = new Set(["add_article", "remove_article", "add_category", "clear_collection", "move"]);

/** Query parameters merged with the fields of a submitted form */
export async function readBookRequest(c: AppContext): Promise<WikiRequest> {
  const params = new URL(c.req.url).searchParams;
  if (c.req.method === "POST") {
    const body = await c.req.parseBody();
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === "string") params.set(key, value);
    }
  }
  return new WikiRequest(params);
}

function shortId(c: AppContext): string {
  return (c.get("session").id ?? "none").slice(0, 8);
}

/** Where to send the browser after a command: the named title, else Special:Book */
function redirectTo(c: AppContext, ctx: RenderContext, target: string | null, query: QueryParams = {}): Response {
  const title = target ? Title.newFromText(target) : null;
  return c.redirect(ctx.urls.localUrl(title ?? BOOK_PAGE, title ? query : {}), 302);
}

/** Revision query for an article link; empty when the item follows the latest revision */
function revisionQuery(oldid: number): { oldid?: number } {
  return oldid ? { oldid } : {};
}

// ─── Page bodies ─────────────────────────────────────────────────────────────

function ErrorBody({ message }: { message: string }) {
  return <p className="error">{message}</p>;
}

function BookItems({ ctx, items }: { ctx: RenderContext; items: readonly CollectionItem[] }) {
  const { messages, urls } = ctx;
  return (
    <ol id="coll-items">
      {items.map((item, index) => {
        const title = Title.newFromText(item.title);
        const oldid = item.currentVersion ? 0 : item.revision;
        return (
          <li key={`${item.title}@${item.revision}`} data-index={index}>
            <a href={title ? urls.localUrl(title, revisionQuery(oldid)) : undefined}>{item.title}</a>
            {index > 0 && (
              <a className="coll-move" href={urls.bookUrl({ bookcmd: "move", index, delta: -1 })} rel="nofollow">
                {messages.text("coll-move_up")}
              </a>
            )}
            {index < items.length - 1 && (
              <a className="coll-move" href={urls.bookUrl({ bookcmd: "move", index, delta: 1 })} rel="nofollow">
                {messages.text("coll-move_down")}
              </a>
            )}
            <a
              className="coll-remove"
              href={urls.bookUrl({
                bookcmd: "remove_article",
                arttitle: item.title,
                oldid,
                returnto: BOOK_PAGE.prefixedText,
              })}
              rel="nofollow"
            >
              {messages.text("coll-remove")}
            </a>
          </li>
        );
      })}
    </ol>
  );
}

function DownloadForm({ ctx }: { ctx: RenderContext }) {
  const { messages, urls, config } = ctx;
  return (
    <form id="coll-download" method="get" action={urls.bookUrl()}>
      <h2>{messages.text("coll-download_title")}</h2>
      <p>{messages.text("coll-download_text")}</p>
      <input type="hidden" name="bookcmd" value="render" />
      <select name="writer">
        {Array.from(config.exportFormats, ([writer, label]) => (
          <option key={writer} value={writer}>
            {label}
          </option>
        ))}
      </select>
      <button type="submit">{messages.text("coll-download")}</button>
    </form>
  );
}

function ShowBookBody({ ctx }: { ctx: RenderContext }) {
  const { messages, urls } = ctx;
  const items = ctx.collection.articles();
  if (items.length === 0) {
    return <p id="coll-empty">{messages.text("coll-empty_collection")}</p>;
  }
  return (
    <>
      <p>{messages.text("coll-book_text")}</p>
      <BookItems ctx={ctx} items={items} />
      <p>
        <a id="coll-clear_collection" href={urls.bookUrl({ bookcmd: "clear_collection" })} rel="nofollow">
          {messages.text("coll-clear_collection")}
        </a>
      </p>
      <DownloadForm ctx={ctx} />
    </>
  );
}

function IntroBody({ ctx, referer }: { ctx: RenderContext; referer: string }) {
  const { messages, urls } = ctx;
  const refererTitle = Title.newFromText(referer);
  return (
    <>
      <p>{messages.text("coll-book_creator_intro")}</p>
      <form id="coll-start" method="post" action={urls.bookUrl()}>
        <input type="hidden" name="bookcmd" value="start_book_creator" />
        <input type="hidden" name="referer" value={referer} />
        <button type="submit">{messages.text("coll-start_book_creator")}</button>
      </form>
      {refererTitle && <a href={urls.localUrl(refererTitle)}>{messages.text("coll-cancel")}</a>}
    </>
  );
}

function StopBody({ ctx, referer }: { ctx: RenderContext; referer: string }) {
  const { messages, urls } = ctx;
  const count = ctx.collection.countArticles();
  return (
    <form id="coll-stop" method="post" action={urls.bookUrl()}>
      <p>{messages.text("coll-stop_book_creator_text", messages.text("coll-n_pages", count))}</p>
      <input type="hidden" name="bookcmd" value="stop_book_creator" />
      <input type="hidden" name="referer" value={referer} />
      <button type="submit" name="disable" value="1">
        {messages.text("coll-disable_book_creator")}
      </button>
      <button type="submit" name="continue" value="1">
        {messages.text("coll-continue_book_creator")}
      </button>
    </form>
  );
}

function SuggestBody({ ctx, deps }: { ctx: RenderContext; deps: AppDeps }) {
  const { messages, urls } = ctx;
  const suggestions = suggestPages(ctx.collection.articles(), deps.pages, deps.config);
  if (suggestions.length === 0) {
    return <p id="coll-suggest-none">{messages.text("coll-suggest_none")}</p>;
  }
  return (
    <>
      <p>{messages.text("coll-suggest_text")}</p>
      <ul id="coll-suggestions">
        {suggestions.map(({ page, shared }) => (
          <li key={page.title.prefixedText}>
            <a href={urls.localUrl(page.title)}>{page.title.prefixedText}</a>
            {` (${shared.join(", ")}) `}
            <a
              href={urls.bookUrl({
                bookcmd: "add_article",
                arttitle: page.title.prefixedText,
                returnto: BOOK_PAGE.prefixedText,
              })}
              rel="nofollow"
            >
              {messages.text("coll-add")}
            </a>
          </li>
        ))}
      </ul>
    </>
  );
}

// ─── Handler ─────────────────────────────────────────────────────────────────

/** Handle GET and POST on Special:Book, dispatching on `bookcmd` */
export async function handleSpecialBook(c: AppContext, deps: AppDeps): Promise<Response> {
  const request = await readBookRequest(c);
  const ctx = createRenderContext(c, deps, deps.pages.lookup(BOOK_PAGE), request);
  const { messages, collection, config } = ctx;
  const cmd = request.getVal("bookcmd", "");

  const errorPage = (message: string, status: PageStatus) =>
    respondWithPage(c, ctx, messages.text("coll-error"), <ErrorBody message={message} />, status);
  const page = (heading: string, body: ReactNode) => respondWithPage(c, ctx, heading, body);

  if (ITEM_COMMANDS.has(cmd) && !collection.isEnabled()) {
    const referer = request.getVal("returnto") ?? request.getVal("arttitle") ?? "";
    return c.redirect(ctx.urls.bookUrl({ bookcmd: "book_creator", referer: referer || undefined }), 302);
  }

  switch (cmd) {
    case "":
      return page(messages.text("coll-book_title"), <ShowBookBody ctx={ctx} />);

    case "book_creator":
      return page(
        messages.text("coll-book_creator"),
        <IntroBody ctx={ctx} referer={request.getVal("referer", "")} />,
      );

    case "start_book_creator": {
      collection.enable();
      console.log(`[book] Book creator enabled for session ${shortId(c)}`);
      return redirectTo(c, ctx, request.getVal("referer"));
    }

    case "stop_book_creator": {
      const referer = request.getVal("referer");
      if (request.getVal("continue")) return redirectTo(c, ctx, referer);
      if (request.getVal("disable") || collection.countArticles() === 0) {
        collection.disable();
        console.log(`[book] Book creator disabled for session ${shortId(c)}`);
        return redirectTo(c, ctx, referer);
      }
      return page(
        messages.text("coll-stop_book_creator_title"),
        <StopBody ctx={ctx} referer={referer ?? ""} />,
      );
    }

    case "add_article": {
      const arttitle = request.getVal("arttitle", "");
      const title = Title.newFromText(arttitle);
      if (!title) return errorPage(messages.text("coll-bad_title"), 400);
      const target = deps.pages.get(title);
      if (!target) return errorPage(messages.text("coll-page_not_found", title.prefixedText), 404);
      if (!config.collectibleNamespaces.has(title.namespace)) {
        return errorPage(messages.text("coll-not_addable_namespace"), 400);
      }
      const requested = request.getInt("oldid", 0);
      const oldid = requested > 0 && requested !== target.latestRevisionId ? requested : 0;
      const inBook = collection.findArticle(title.prefixedText, oldid) !== null;
      if (!inBook && collection.countArticles() >= config.maxArticles) {
        return errorPage(messages.text("coll-book_full", messages.text("coll-n_pages", config.maxArticles)), 400);
      }

      if (collection.addArticle(deps.pages.lookup(title), oldid)) {
        console.log(`[book] Added "${title.prefixedText}" (revision ${oldid || target.latestRevisionId})`);
      }
      const returnto = request.getVal("returnto");
      return returnto ? redirectTo(c, ctx, returnto) : redirectTo(c, ctx, title.prefixedText, revisionQuery(oldid));
    }

    case "remove_article": {
      const title = Title.newFromText(request.getVal("arttitle", ""));
      if (!title) return errorPage(messages.text("coll-bad_title"), 400);
      const latest = deps.pages.get(title)?.latestRevisionId ?? 0;
      const requested = request.getInt("oldid", 0);
      const oldid = requested > 0 && requested !== latest ? requested : 0;
      if (collection.removeArticle(title.prefixedText, oldid)) {
        console.log(`[book] Removed "${title.prefixedText}"`);
      }
      const returnto = request.getVal("returnto");
      return returnto ? redirectTo(c, ctx, returnto) : redirectTo(c, ctx, title.prefixedText, revisionQuery(oldid));
    }

    case "add_category": {
      const category = Title.makeTitle(NS_CATEGORY, request.getVal("cattitle", ""));
      if (!category) return errorPage(messages.text("coll-bad_title"), 400);
      const members = deps.pages
        .categoryMembers(category.text)
        .filter((member) => config.collectibleNamespaces.has(member.title.namespace))
        .map((member) => deps.pages.lookup(member.title));
      const added = collection.addCategory(members, config.maxArticles);
      console.log(`[book] Added ${added} of ${members.length} pages from "${category.prefixedText}"`);
      return redirectTo(c, ctx, request.getVal("returnto") ?? category.prefixedText);
    }

    case "clear_collection":
      collection.clear();
      console.log(`[book] Cleared book for session ${shortId(c)}`);
      return redirectTo(c, ctx, null);

    case "move": {
      const index = request.getInt("index", -1);
      const delta = request.getInt("delta", 0);
      if (delta === -1 || delta === 1) collection.moveArticle(index, index + delta);
      return redirectTo(c, ctx, null);
    }

    case "suggest":
      return page(messages.text("coll-suggest_title"), <SuggestBody ctx={ctx} deps={deps} />);

    case "render_article":
    case "render": {
      const writer = request.getVal("writer", "");
      const label = config.exportFormats.get(writer);
      if (label === undefined) return errorPage(messages.text("coll-unknown_writer", writer), 400);
      const subject = request.getVal("arttitle") ?? messages.text("coll-book_title");
      console.log(`[book] Export of "${subject}" as ${writer} requested; no export backend configured`);
      return errorPage(messages.text("coll-rendering_unavailable", subject, label), 501);
    }

    default:
      return errorPage(messages.text("coll-unknown_command", cmd), 400);
  }
}
