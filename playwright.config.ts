import { defineConfig } from '@playwright/test';

// Tests exercise the reconciliation engine against in-process fakes; no browser project is needed.
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.test.ts',
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  retries: 0,
  timeout: 15000,
});
