import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    testTimeout: 20_000,
    server: {
      deps: {
        // clipanion 3.x ships an ESM build with a directory import that
        // Node's native ESM loader rejects; let Vite resolve it instead.
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/program.ts",
        "src/cli/commands/schedule.ts",
        "src/cli/commands/serve.ts",
        "src/cli/commands/doctor.ts",
        "src/config/types.ts",
        "src/notify/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
