import type { ReactNode } from "react";
import type { AppContext } from "./app-context.js";
import { onSidebarBeforeOutput } from "./portlet.js";
import type { RenderContext } from "./render-context.js";
import { onSiteNoticeAfter } from "./site-notice.js";
import { baseSidebar, renderDocument } from "./skin.js";

export type PageStatus = 200 | 400 | 404 | 501;

/**
 * Run the sidebar and site notice hooks for the current page and answer with
 * the rendered document. The notice runs first: it registers the client
 * modules the document links to.
 */
export function respondWithPage(
  c: AppContext,
  ctx: RenderContext,
  heading: string,
  body: ReactNode,
  status: PageStatus = 200,
): Response | Promise<Response> {
  const siteNotice = onSiteNoticeAfter(ctx);
  const sidebar = baseSidebar(ctx);
  onSidebarBeforeOutput(ctx, sidebar);

  return c.html(renderDocument({ ctx, heading, siteNotice, sidebar, children: body }), status);
}
