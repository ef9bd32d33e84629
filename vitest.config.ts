import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "jsdom",
    environmentOptions: {
      jsdom: {
        url: "https://example.com/posts/hello-world",
      },
    },
    include: ["client/src/**/*.test.ts"],
  },
});
