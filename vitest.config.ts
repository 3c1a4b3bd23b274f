import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		include: ['*.test.ts', 'scrub/**/*.test.ts'],
		environment: 'node',
	},
})
