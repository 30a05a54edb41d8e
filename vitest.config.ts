import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: [
        "client.ts",
        "dates.ts",
        "errors.ts",
        "http.ts",
        "scrapers.ts",
        "session.ts",
        "web-client.ts",
      ],
    },
  },
});
