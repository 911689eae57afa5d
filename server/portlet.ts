import type { RenderContext } from "./render-context.js";
import { NS_CATEGORY } from "./title.js";
import { BOOK_PAGE } from "./urls.js";

export interface LinkDescriptor {
  text: string;
  id: string;
  href: string;
}

/** Sidebar sections in display order, keyed by section name */
export type Sidebar = Record<string, LinkDescriptor[]>;

/** Element id of the generic "Printable version" tool */
export const PRINT_LINK_ID = "t-print";

export const PORTLET_KEY = "coll-print_export";

/**
 * Whether the book section belongs on this page view: an existing page in a
 * collectible namespace (or a category), viewed or purged.
 */
export function shouldShowPortlet(ctx: Pick<RenderContext, "page" | "config" | "request">): boolean {
  const { page, config, request } = ctx;
  if (!page.exists) return false;

  const namespace = page.title.namespace;
  if (!config.collectibleNamespaces.has(namespace) && namespace !== NS_CATEGORY) return false;

  const action = request.getVal("action", "view");
  return action === "view" || action === "purge";
}

/** The link that turns book creation on or off */
export function getSessionSwitch(ctx: RenderContext): LinkDescriptor[] {
  const { messages, urls, page, config } = ctx;
  const referer = page.title.prefixedText;

  if (!ctx.collection.isEnabled()) {
    if (config.disableSidebarStartLink) return [];
    return [
      {
        text: messages.text("coll-create_a_book"),
        id: "coll-create_a_book",
        href: urls.localUrl(BOOK_PAGE, { bookcmd: "book_creator", referer }),
      },
    ];
  }

  return [
    {
      text: messages.text("coll-book_creator_disable"),
      id: "coll-book_creator_disable",
      href: urls.localUrl(BOOK_PAGE, { bookcmd: "stop_book_creator", referer }),
    },
  ];
}

export interface RenderParams {
  bookcmd: "render_article";
  arttitle: string;
  returnto: string;
  oldid: number;
}

/** Query shared by the "Download as" links; falls back to the latest revision */
export function initializeParams(ctx: Pick<RenderContext, "page" | "request">): RenderParams {
  const { page } = ctx;
  const oldid = ctx.request.getInt("oldid", 0);
  return {
    bookcmd: "render_article",
    arttitle: page.title.prefixedText,
    returnto: page.title.prefixedText,
    oldid: oldid > 0 ? oldid : page.latestRevisionId,
  };
}

/**
 * The `coll-print_export` sidebar section, or null when it is not shown on
 * this page or to this user.
 */
export function getPortlet(ctx: RenderContext): LinkDescriptor[] | null {
  if (ctx.config.portletRequiresLogin && !ctx.user.isRegistered) return null;
  if (!shouldShowPortlet(ctx)) return null;

  const { config, messages, urls, page } = ctx;
  const out = getSessionSwitch(ctx);

  const params = initializeParams(ctx);
  for (const writer of config.sidebarFormats) {
    const label = config.exportFormats.get(writer);
    if (label === undefined) continue;
    out.push({
      text: messages.text("coll-download_as", label),
      id: `coll-download-as-${writer}`,
      href: urls.localUrl(BOOK_PAGE, { ...params, writer }),
    });
  }

  // The printable link moves from the toolbox into this section
  if (!ctx.output.isPrintable()) {
    out.push({
      text: messages.text("printableversion"),
      id: PRINT_LINK_ID,
      href: urls.localUrl(page.title, { printable: "yes" }),
    });
  }

  return out;
}

/** Replace the toolbox print link with the book section, when it has any links */
export function onSidebarBeforeOutput(ctx: RenderContext, sidebar: Sidebar): void {
  const portlet = getPortlet(ctx);
  if (!portlet || portlet.length === 0) return;

  const toolbox = sidebar.TOOLBOX;
  if (toolbox) {
    sidebar.TOOLBOX = toolbox.filter((link) => link.id !== PRINT_LINK_ID);
  }

  sidebar[PORTLET_KEY] = portlet;
}
