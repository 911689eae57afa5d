import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Package root, so data files resolve regardless of CWD */
export const PACKAGE_ROOT = process.env.BOOK_CREATOR_PACKAGE_ROOT || resolve(__dirname, "..");

export const MESSAGES_FILE = resolve(PACKAGE_ROOT, "i18n", "en.json");
export const PAGES_FILE = resolve(PACKAGE_ROOT, "data", "pages.json");
export const CLIENT_DIST_DIR = resolve(PACKAGE_ROOT, "dist", "client");
