import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    include: ["tests/**/*_test.ts", "tests/**/*_test.tsx"],
    environment: "node",
    server: {
      deps: {
        // Workspace packages export TypeScript sources.
        inline: [/@cloud-study\//],
      },
    },
  },
});
