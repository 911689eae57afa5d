import { defineConfig } from "vite";

// Bundles the browser module served as `ext.collection.bookcreator`.
export default defineConfig({
  build: {
    outDir: "dist/client",
    emptyOutDir: true,
    lib: {
      entry: "src/main.ts",
      formats: ["es"],
      fileName: () => "bookcreator.js",
    },
  },
});
