import type { ReactNode } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import type { CollectionSession } from "./collection-session.js";
import type { MessageLookup } from "./messages.js";
import { NS_CATEGORY, type Title } from "./title.js";
import type { UrlBuilder } from "./urls.js";

// ─── Box mode ────────────────────────────────────────────────────────────────

export const BOX_MODES = ["none", "suggest", "showbook", "addcategory", "addarticle"] as const;

/**
 * Which variant of the box to render. "none" is the ordinary page view;
 * "suggest" and "showbook" are the Special:Book subpages.
 */
export type BoxMode = (typeof BOX_MODES)[number];

function assertNever(value: never): never {
  throw new Error(`Unhandled box mode: ${String(value)}`);
}

// ─── Dependencies ────────────────────────────────────────────────────────────

export interface BoxDeps {
  /** URL prefix of the box icons */
  imagePath: string;
  messages: MessageLookup;
  collection: Pick<CollectionSession, "findArticle" | "countArticles">;
  urls: UrlBuilder;
  suggestionsEnabled: boolean;
}

// ─── Add / remove decision ───────────────────────────────────────────────────

export type AddRemoveAction =
  | { kind: "not-addable" }
  | { kind: "add-category"; query: { bookcmd: "add_category"; cattitle: string } }
  | { kind: "add-article"; query: { bookcmd: "add_article"; arttitle: string; oldid: number } }
  | { kind: "remove-article"; query: { bookcmd: "remove_article"; arttitle: string; oldid: number } };

function addCategory(page: Title): AddRemoveAction {
  return { kind: "add-category", query: { bookcmd: "add_category", cattitle: page.text } };
}

function addArticle(page: Title, oldid: number): AddRemoveAction {
  return { kind: "add-article", query: { bookcmd: "add_article", arttitle: page.prefixedText, oldid } };
}

/**
 * Decide what the add/remove fragment offers. The mode is checked before
 * the namespace, so a category page on a Special:Book subpage is not addable.
 */
export function resolveAddRemoveAction(
  mode: BoxMode,
  page: Title,
  oldid: number,
  collection: Pick<CollectionSession, "findArticle">,
): AddRemoveAction {
  switch (mode) {
    case "suggest":
    case "showbook":
      return { kind: "not-addable" };
    case "addcategory":
      return addCategory(page);
    case "addarticle":
      return page.namespace === NS_CATEGORY ? addCategory(page) : addArticle(page, oldid);
    case "none":
      if (page.namespace === NS_CATEGORY) return addCategory(page);
      if (collection.findArticle(page.prefixedText, oldid) === null) return addArticle(page, oldid);
      return {
        kind: "remove-article",
        query: { bookcmd: "remove_article", arttitle: page.prefixedText, oldid },
      };
    default:
      return assertNever(mode);
  }
}

// ─── Fragments ───────────────────────────────────────────────────────────────

const NBSP = "\u00a0";

const LINK_VARIANTS = {
  "add-category": {
    id: "coll-add_category",
    icon: "silk-add.svg",
    caption: "coll-add_category",
    tooltip: "coll-add_category_tooltip",
    clientAction: "addcategory",
  },
  "add-article": {
    id: "coll-add_article",
    icon: "silk-add.svg",
    caption: "coll-add_this_page",
    tooltip: "coll-add_page_tooltip",
    clientAction: "addarticle",
  },
  "remove-article": {
    id: "coll-remove_article",
    icon: "silk-remove.svg",
    caption: "coll-remove_this_page",
    tooltip: "coll-remove_page_tooltip",
    clientAction: "removearticle",
  },
} as const;

// Low fetch priority keeps the server renderer from emitting image preload links
function Icon({ src, alignText = false }: { src: string; alignText?: boolean }) {
  return (
    <img
      src={src}
      alt=""
      width="16"
      height="16"
      fetchPriority="low"
      style={alignText ? { verticalAlign: "text-bottom" } : undefined}
    />
  );
}

interface FragmentProps {
  deps: BoxDeps;
  mode: BoxMode;
}

interface AddRemoveProps extends FragmentProps {
  page: Title;
  oldid: number;
}

export function AddRemoveLink({ deps, mode, page, oldid }: AddRemoveProps) {
  const { imagePath, messages, urls } = deps;
  const action = resolveAddRemoveAction(mode, page, oldid, deps.collection);

  if (action.kind === "not-addable") {
    return (
      <span style={{ color: "#777" }}>
        <Icon src={`${imagePath}/disabled.svg`} alignText />
        {`${NBSP}${messages.text("coll-not_addable")}`}
      </span>
    );
  }

  const variant = LINK_VARIANTS[action.kind];
  return (
    <a
      href={urls.bookUrl(action.query)}
      id={variant.id}
      rel="nofollow"
      title={messages.text(variant.tooltip)}
      data-collection-action={variant.clientAction}
      data-namespace={page.namespace}
      data-title={page.text}
      data-oldid={action.kind === "add-category" ? undefined : oldid}
    >
      <Icon src={`${imagePath}/${variant.icon}`} />
      {`${NBSP}${messages.text(variant.caption)}`}
    </a>
  );
}

export function ShowBookLink({ deps, mode }: FragmentProps) {
  const { imagePath, messages, urls } = deps;
  const count = deps.collection.countArticles();
  const icon = <Icon src={`${imagePath}/silk-book_open.svg`} />;
  const label = `${NBSP}${messages.text("coll-show_collection")} (${messages.text("coll-n_pages", count)})`;

  if (mode === "showbook") {
    return (
      <strong className="collection-creatorbox-iconlink">
        {icon}
        {label}
      </strong>
    );
  }
  return (
    <a
      href={urls.bookUrl()}
      rel="nofollow"
      title={messages.text("coll-show_collection_tooltip")}
      className="collection-creatorbox-iconlink"
    >
      {icon}
      {label}
    </a>
  );
}

export function SuggestLink({ deps, mode }: FragmentProps) {
  if (!deps.suggestionsEnabled) return null;

  const { imagePath, messages, urls } = deps;
  const icon = <Icon src={`${imagePath}/silk-wand.svg`} alignText />;
  const label = `${NBSP}${messages.text("coll-make_suggestions")}`;

  if (mode === "suggest") {
    return (
      <strong className="collection-creatorbox-iconlink">
        {icon}
        {label}
      </strong>
    );
  }
  return (
    <a
      href={urls.bookUrl({ bookcmd: "suggest" })}
      rel="nofollow"
      title={messages.text("coll-make_suggestions_tooltip")}
      className="collection-creatorbox-iconlink"
    >
      {icon}
      {label}
    </a>
  );
}

export function BookCreatorBoxContent({ deps, mode, page, oldid }: AddRemoveProps) {
  return (
    <>
      <AddRemoveLink deps={deps} mode={mode} page={page} oldid={oldid} />
      <ShowBookLink deps={deps} mode={mode} />
      <SuggestLink deps={deps} mode={mode} />
    </>
  );
}

// ─── Box template ────────────────────────────────────────────────────────────

export interface CreateBookBoxProps {
  imagePath: string;
  title: string;
  disable: { url: string; title: string; label: string };
  /** An empty url renders the help link without a target */
  help: { url: string; label: string; title: string; icon: string };
  children: ReactNode;
}

export function CreateBookBox({ imagePath, title, disable, help, children }: CreateBookBoxProps) {
  return (
    <div className="collection-creatorbox">
      <div className="collection-creatorbox-title">
        <div className="collection-creatorbox-controls">
          <a className="collection-creatorbox-iconlink" href={disable.url} rel="nofollow" title={disable.title}>
            {disable.label}
          </a>
          <a className="collection-creatorbox-iconlink" href={help.url || undefined} title={help.title}>
            <Icon src={help.icon} alignText />
            {`${NBSP}${help.label}`}
          </a>
        </div>
        <img src={`${imagePath}/book.svg`} alt="" width="24" height="24" fetchPriority="low" />
        <strong className="collection-creatorbox-heading">{title}</strong>
      </div>
      <div id="coll-book_creator_box" className="collection-creatorbox-row">
        {children}
      </div>
    </div>
  );
}

// ─── String renderers ────────────────────────────────────────────────────────

export function getBookCreatorBoxAddRemoveLink(deps: BoxDeps, mode: BoxMode, page: Title, oldid: number): string {
  return renderToStaticMarkup(<AddRemoveLink deps={deps} mode={mode} page={page} oldid={oldid} />);
}

export function getBookCreatorBoxShowBookLink(deps: BoxDeps, mode: BoxMode): string {
  return renderToStaticMarkup(<ShowBookLink deps={deps} mode={mode} />);
}

/** Empty when suggestions are disabled */
export function getBookCreatorBoxSuggestLink(deps: BoxDeps, mode: BoxMode): string {
  return renderToStaticMarkup(<SuggestLink deps={deps} mode={mode} />);
}

/** The actions row of the box: add/remove, show book, suggest */
export function getBookCreatorBoxContent(deps: BoxDeps, page: Title, mode: BoxMode = "none", oldid = 0): string {
  return renderToStaticMarkup(<BookCreatorBoxContent deps={deps} mode={mode} page={page} oldid={oldid} />);
}
