import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": src,
    },
  },
  build: {
    target: "node20",
    outDir: "dist",
    lib: {
      entry: "src/index.ts",
      formats: ["es"],
      fileName: "index",
    },
    rollupOptions: {
      external: [
        /^node:/,
        "citty",
        "jsonc-parser",
      ],
    },
    minify: false,
    sourcemap: true,
  },
  test: {
    alias: {
      "@": src,
    },
  },
});
