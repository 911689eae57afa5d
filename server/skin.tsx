import type { ReactNode } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import type { MessageLookup } from "./messages.js";
import { PORTLET_KEY, PRINT_LINK_ID, type Sidebar } from "./portlet.js";
import type { RenderContext } from "./render-context.js";
import { resourceModules } from "./resource-modules.js";
import { Title } from "./title.js";

const MAIN_PAGE = "Main Page";

const SECTION_LABELS: Record<string, string> = {
  navigation: "sidebar-navigation",
  TOOLBOX: "sidebar-toolbox",
  [PORTLET_KEY]: "coll-print_export",
};

/** The sidebar every page starts from, before hooks adjust it */
export function baseSidebar(ctx: Pick<RenderContext, "messages" | "urls" | "output" | "page">): Sidebar {
  const { messages, urls, page } = ctx;
  const mainPage = Title.newFromText(MAIN_PAGE);
  const sidebar: Sidebar = {
    navigation: mainPage
      ? [{ text: messages.text("mainpage-description"), id: "n-mainpage", href: urls.localUrl(mainPage) }]
      : [],
    TOOLBOX: [],
  };
  if (page.exists && !ctx.output.isPrintable()) {
    sidebar.TOOLBOX.push({
      text: messages.text("printableversion"),
      id: PRINT_LINK_ID,
      href: urls.localUrl(page.title, { printable: "yes" }),
    });
  }
  return sidebar;
}

function SidebarSections({ sidebar, messages }: { sidebar: Sidebar; messages: MessageLookup }) {
  return (
    <nav id="sidebar">
      {Object.entries(sidebar)
        .filter(([, links]) => links.length > 0)
        .map(([key, links]) => (
          <div className="portal" id={`p-${key}`} key={key}>
            <h3>{messages.text(SECTION_LABELS[key] ?? key)}</h3>
            <ul>
              {links.map((link) => (
                <li key={link.id} id={link.id}>
                  <a href={link.href}>{link.text}</a>
                </li>
              ))}
            </ul>
          </div>
        ))}
    </nav>
  );
}

export interface PageLayout {
  ctx: Pick<RenderContext, "messages" | "output" | "config">;
  heading: string;
  siteNotice: string | null;
  sidebar: Sidebar;
  children: ReactNode;
}

export function Skin({ ctx, heading, siteNotice, sidebar, children }: PageLayout) {
  const { messages, output, config } = ctx;
  const modules = resourceModules(config.assetsPath);
  const styles = output.getModuleStyles().flatMap((name) => modules[name]?.styles ?? []);
  const scripts = output.getModules().flatMap((name) => modules[name]?.scripts ?? []);

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{heading}</title>
        {styles.map((href) => (
          <link rel="stylesheet" href={href} key={href} />
        ))}
      </head>
      <body className={output.isPrintable() ? "printable" : undefined}>
        {siteNotice !== null && <div id="siteNotice" dangerouslySetInnerHTML={{ __html: siteNotice }} />}
        <main id="content">
          <h1 id="firstHeading">{heading}</h1>
          <div id="bodyContent">{children}</div>
        </main>
        {!output.isPrintable() && <SidebarSections sidebar={sidebar} messages={messages} />}
        {scripts.map((src) => (
          <script type="module" src={src} key={src} />
        ))}
      </body>
    </html>
  );
}

/** Render a complete HTML document */
export function renderDocument(layout: PageLayout): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<Skin {...layout} />)}`;
}
