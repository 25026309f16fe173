import { fileURLToPath } from "node:url";

// Keep this config dependency-free (no `vitest/config` import); Vitest reads the
// plain object at runtime.
const root = fileURLToPath(new URL(".", import.meta.url));

export default {
  resolve: {
    alias: [
      // "@/lib/..." imports resolve from the repository root
      { find: /^@\//, replacement: root },
    ],
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
};
