import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const PACKAGES = [
  "agent-runtime-core",
  "agent-runtime-telemetry",
  "agent-runtime-tools",
  "agent-runtime-persistence",
  "agent-runtime-control",
  "agent-runtime-execution",
] as const;

function source(path: string): string {
  return fileURLToPath(new URL(`./packages/${path}`, import.meta.url));
}

// Subpaths first so they are matched before their parent packages
const aliases = [
  {
    find: "@tasklane/agent-runtime-telemetry/logging",
    replacement: source("agent-runtime-telemetry/src/logging/index.ts"),
  },
  ...PACKAGES.map((name) => ({
    find: `@tasklane/${name}`,
    replacement: source(`${name}/src/index.ts`),
  })),
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
  },
});
