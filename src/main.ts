import { initBookCreator } from "./bookcreator.js";

if (document.readyState === "loading") {
  document.addEventListener("DOMContentLoaded", () => initBookCreator(), { once: true });
} else {
  initBookCreator();
}
