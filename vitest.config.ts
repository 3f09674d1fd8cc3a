import { tmpdir } from "node:os";
import { searchForWorkspaceRoot } from "vite";
import { defineConfig } from "vitest/config";

export default defineConfig({
  server: {
    // tests build books in temporary directories and import their site configs
    fs: { allow: [searchForWorkspaceRoot(process.cwd()), tmpdir()] },
  },
  test: {
    include: ["packages/*/tests/**/*.spec.ts"],
    environment: "node",
  },
});
