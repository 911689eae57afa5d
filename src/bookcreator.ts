import { api, type BoxUpdate } from "./api.js";
import { bookCreatorStore } from "./store.js";

export const BOX_ID = "coll-book_creator_box";
const ERROR_CLASS = "collection-creatorbox-error";

type ClientAction = "addarticle" | "removearticle" | "addcategory";

function isClientAction(value: string | undefined): value is ClientAction {
  return value === "addarticle" || value === "removearticle" || value === "addcategory";
}

function toInt(value: string | undefined): number {
  const n = Number(value);
  return Number.isInteger(n) ? n : 0;
}

function perform(action: ClientAction, data: DOMStringMap): Promise<BoxUpdate> {
  const title = data.title ?? "";
  switch (action) {
    case "addcategory":
      return api.addCategory(title);
    case "addarticle":
      return api.addArticle({ namespace: toInt(data.namespace), title, oldid: toInt(data.oldid) });
    case "removearticle":
      return api.removeArticle({ namespace: toInt(data.namespace), title, oldid: toInt(data.oldid) });
  }
}

function renderError(doc: Document, error: string | null): void {
  const box = doc.getElementById(BOX_ID);
  let notice = box?.parentElement?.querySelector<HTMLElement>(`.${ERROR_CLASS}`) ?? null;
  if (!error) {
    notice?.remove();
    return;
  }
  if (!box) return;
  if (!notice) {
    notice = doc.createElement("div");
    notice.className = ERROR_CLASS;
    notice.setAttribute("role", "alert");
    box.after(notice);
  }
  notice.textContent = error;
}

/**
 * Swap the add/remove links of the book creator box for in-place requests.
 * Links keep working as plain navigation when this module is not loaded.
 * Returns a function that detaches the listeners.
 */
export function initBookCreator(doc: Document = document): () => void {
  const unsubscribe = bookCreatorStore.subscribe((state, prev) => {
    if (state.error !== prev.error) renderError(doc, state.error);
  });

  async function onClick(event: MouseEvent): Promise<void> {
    if (event.defaultPrevented || event.button !== 0 || event.metaKey || event.ctrlKey || event.shiftKey) return;
    if (!(event.target instanceof Element)) return;

    const link = event.target.closest<HTMLElement>("[data-collection-action]");
    const box = doc.getElementById(BOX_ID);
    if (!link || !box || !box.contains(link)) return;

    const action = link.dataset.collectionAction;
    if (!isClientAction(action)) return;
    event.preventDefault();

    const store = bookCreatorStore.getState();
    if (store.busy) return;
    store.setBusy(true);
    store.setError(null);

    try {
      const update = await perform(action, link.dataset);
      box.innerHTML = update.html;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error("[bookcreator] Request failed:", msg);
      bookCreatorStore.getState().setError(msg);
    } finally {
      bookCreatorStore.getState().setBusy(false);
    }
  }

  const listener = (event: MouseEvent) => {
    onClick(event).catch((err: unknown) => console.error("[bookcreator]", err));
  };
  doc.addEventListener("click", listener);

  return () => {
    doc.removeEventListener("click", listener);
    unsubscribe();
  };
}
