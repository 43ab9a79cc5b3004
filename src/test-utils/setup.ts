import { beforeEach } from 'vitest'

// Global test setup
// Note: Mock cleanup (clearMocks, resetMocks, restoreMocks) is handled by vitest.config.ts
beforeEach(() => {
  // Debug output is driven by this variable in the CLI preAction hook
  delete process.env.JIRA2MD_DEBUG
})
