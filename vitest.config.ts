// vitest.config.ts
// Reader, config and CLI specs under test/

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // unprefixed, so LISP_READER_* from .env reaches configFromEnv
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      env,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
