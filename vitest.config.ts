import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const srcDir = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
  resolve: {
    // Mirrors the "#/*" path alias in tsconfig.json
    alias: [{ find: /^#\/(.*)$/, replacement: `${srcDir}/$1` }],
  },
  test: {
    include: ["src/**/*.test.ts"],
  },
});
