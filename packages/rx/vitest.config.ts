import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@sublex/rx",
    environment: "node",
  },
});
