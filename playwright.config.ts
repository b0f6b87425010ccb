import { defineConfig } from "@playwright/test";

// Unit and session tests only: none of them opens a browser
export default defineConfig({
  testDir: "./tests",
  testMatch: "**/*.spec.ts",
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
});
