import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["tests/integration/**"],
    alias: {
      // Alias external packages to allow mocking
      "@pulumi/pulumi": new URL(
        "./tests/__mocks__/@pulumi/pulumi.ts",
        import.meta.url
      ).pathname,
      "@pulumi/aws": new URL(
        "./tests/__mocks__/@pulumi/aws.ts",
        import.meta.url
      ).pathname,
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts"],
    },
  },
});
