import { defineConfig } from '@playwright/test'

// Specs call the route handlers in process with their own config; no browser or dev server is started.
export default defineConfig({
  testDir: './e2e',
  testMatch: '**/*.spec.ts',
  timeout: 30_000,
  fullyParallel: true,
})
