import { renderToStaticMarkup } from "react-dom/server";
import {
  BookCreatorBoxContent,
  CreateBookBox,
  type BoxDeps,
  type BoxMode,
} from "./book-creator-box.js";
import type { RenderContext } from "./render-context.js";
import { BOOK_CREATOR_MODULE, BOOK_CREATOR_STYLES } from "./resource-modules.js";
import { NS_CATEGORY, Title } from "./title.js";

export function boxDeps(ctx: Pick<RenderContext, "config" | "messages" | "collection" | "urls">): BoxDeps {
  return {
    imagePath: `${ctx.config.assetsPath}/images`,
    messages: ctx.messages,
    collection: ctx.collection,
    urls: ctx.urls,
    suggestionsEnabled: ctx.config.suggestionsEnabled,
  };
}

/** The request's oldid, or 0 when absent or equal to the latest revision */
export function normalizedOldid(ctx: Pick<RenderContext, "request" | "page">): number {
  const oldid = ctx.request.getInt("oldid", 0);
  return oldid === ctx.page.latestRevisionId ? 0 : oldid;
}

/**
 * Render the book creator box for the current page and register the client
 * module and styles it needs on the output page.
 */
export function renderBookCreatorBox(ctx: RenderContext, mode: BoxMode = "none"): string {
  const { config, messages, urls, page } = ctx;
  const deps = boxDeps(ctx);
  const oldid = normalizedOldid(ctx);

  ctx.output.addModules(BOOK_CREATOR_MODULE);
  ctx.output.addModuleStyles(BOOK_CREATOR_STYLES);

  const helpPage = Title.newFromText(messages.text("coll-helppage"));

  return renderToStaticMarkup(
    <CreateBookBox
      imagePath={deps.imagePath}
      title={messages.text("coll-book_creator")}
      disable={{
        url: urls.bookUrl({ bookcmd: "stop_book_creator", referer: page.title.prefixedText }),
        title: messages.text("coll-book_creator_disable_tooltip"),
        label: messages.text("coll-disable"),
      }}
      help={{
        url: helpPage ? urls.localUrl(helpPage) : "",
        label: messages.text("coll-help"),
        title: messages.text("coll-help_tooltip"),
        icon: `${config.assetsPath}/images/silk-help.svg`,
      }}
    >
      <BookCreatorBoxContent deps={deps} mode={mode} page={page.title} oldid={oldid} />
    </CreateBookBox>,
  );
}

function isViewAction(action: string | null): boolean {
  return !action || action === "view" || action === "purge";
}

/**
 * The site notice contribution for this request: the box, or null when book
 * creation is off or the page cannot take part.
 */
export function onSiteNoticeAfter(ctx: RenderContext): string | null {
  const { request, page, config } = ctx;

  if (!isViewAction(request.getVal("action"))) return null;
  if (!ctx.collection.isEnabled()) return null;

  if (page.title.isSpecial("Book")) {
    const cmd = request.getVal("bookcmd", "");
    if (cmd === "suggest") return renderBookCreatorBox(ctx, "suggest");
    if (cmd === "") return renderBookCreatorBox(ctx, "showbook");
    return null;
  }

  if (!page.exists) return null;

  const namespace = page.title.namespace;
  if (!config.collectibleNamespaces.has(namespace) && namespace !== NS_CATEGORY) return null;

  return renderBookCreatorBox(ctx);
}
