/** Client modules the hooks can register on an output page */
export const BOOK_CREATOR_MODULE = "ext.collection.bookcreator";
export const BOOK_CREATOR_STYLES = "ext.collection.bookcreator.styles";

export interface ResourceModule {
  scripts?: string[];
  styles?: string[];
}

/** Asset URLs of every known module, given the extension's assets path */
export function resourceModules(assetsPath: string): Record<string, ResourceModule> {
  return {
    [BOOK_CREATOR_MODULE]: { scripts: ["/static/modules/bookcreator.js"] },
    [BOOK_CREATOR_STYLES]: { styles: [`${assetsPath}/bookcreator.css`] },
  };
}
