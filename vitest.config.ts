import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@worldtalk/schemas": pkg("schemas"),
      "@worldtalk/world": pkg("world"),
      "@worldtalk/actions": pkg("actions"),
      "@worldtalk/knowledge": pkg("knowledge"),
      "@worldtalk/policies": pkg("policies"),
      "@worldtalk/dialogue": pkg("dialogue"),
      "@worldtalk/journal": pkg("journal"),
    },
  },
  test: {
    globals: false,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    testTimeout: 30000,
  },
});
