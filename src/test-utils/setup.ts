import { beforeEach } from 'vitest'

// Global test setup
// Note: Mock cleanup (clearMocks, resetMocks, restoreMocks) is handled by vitest.config.ts
beforeEach(() => {
	// Entries pick their default mode and the CLI its debug flag from these
	delete process.env.DOCFMT_SHORT_DOCSTRINGS
	delete process.env.DOCFMT_DEBUG
})
