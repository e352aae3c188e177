import { defineConfig } from "vitest/config";

const workspaceProjects = [
  ["./packages/options/vitest.config.ts", "./packages/options"],
  ["./packages/io/vitest.config.ts", "./packages/io"],
  ["./packages/config/vitest.config.ts", "./packages/config"],
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
