import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		projects: [
			// One project per workspace package: schemas, platform, envelope
			'packages/*/vitest.config.ts',
		],
	},
})
