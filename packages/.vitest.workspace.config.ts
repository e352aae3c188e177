import path from "path";
import { defineConfig } from "vitest/config";

const workspaceRoot = path.resolve(__dirname, "..");

const packageNames = ["config", "io", "options"];

const packageAliases = packageNames.flatMap((name) => {
  const basePath = path.resolve(workspaceRoot, "packages", name, "src");
  return [
    { find: `@repokit/${name}`, replacement: basePath },
    { find: `@repokit/${name}/`, replacement: `${basePath}/` },
  ];
});

const coverageIncludeGlobs = ["src/**/*.ts"];

// process.chdir is unavailable inside worker threads.
export const createPackageVitestConfig = (packageName: string) =>
  defineConfig({
    resolve: {
      alias: packageAliases,
    },
    test: {
      globals: true,
      include: ["test/**/*.test.ts"],
      environment: "node",
      pool: "forks",
      coverage: {
        reporter: ["text", "json-summary"],
        include: coverageIncludeGlobs,
        reportsDirectory: path.resolve(
          workspaceRoot,
          "coverage",
          packageName
        ),
        reportOnFailure: true,
      },
    },
  });

export default createPackageVitestConfig;
