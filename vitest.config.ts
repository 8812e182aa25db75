import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const root = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // Resolve the db workspace to its TypeScript sources so tests need no build step
      {
        find: /^@lenslink\/db$/,
        replacement: path.join(root, "packages/db/src/index.ts"),
      },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/tests/**/*.test.ts"],
    environment: "node",
  },
});
