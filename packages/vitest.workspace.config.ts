import path from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const workspaceRoot = path.resolve(
  fileURLToPath(new URL(".", import.meta.url)),
  ".."
);

const packageNames = [
  "config",
  "definitions",
  "engine",
  "io",
  "providers",
  "schemas",
  "templates",
  "types",
];

const packageAliases = packageNames.flatMap((name) => {
  const basePath = path.resolve(workspaceRoot, "packages", name, "src");
  return [
    { find: `@agentmd/${name}`, replacement: basePath },
    { find: `@agentmd/${name}/`, replacement: `${basePath}/` },
  ];
});

const coverageIncludeGlobs = ["src/**/*.ts"];

export const createPackageVitestConfig = (packageName: string) =>
  defineConfig({
    resolve: {
      alias: packageAliases,
    },
    test: {
      globals: true,
      include: ["test/**/*.test.ts"],
      environment: "node",
      pool: "threads",
      passWithNoTests: true,
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
