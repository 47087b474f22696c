import { defineConfig } from "vitest/config";

const workspaceProjects = [
  ["./packages/types/vitest.config.ts", "./packages/types"],
  ["./packages/config/vitest.config.ts", "./packages/config"],
  ["./packages/io/vitest.config.ts", "./packages/io"],
  ["./packages/templates/vitest.config.ts", "./packages/templates"],
  ["./packages/definitions/vitest.config.ts", "./packages/definitions"],
  ["./packages/schemas/vitest.config.ts", "./packages/schemas"],
  ["./packages/providers/vitest.config.ts", "./packages/providers"],
  ["./packages/engine/vitest.config.ts", "./packages/engine"],
  ["./apps/cli/vitest.config.ts", "./apps/cli"],
] as const;

export default defineConfig({
  test: {
    projects: workspaceProjects.map(([configPath, root]) => ({
      root,
      extends: configPath,
    })),
  },
});
