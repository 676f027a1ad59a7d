import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		include: ['packages/*/src/**/*.test.ts', 'loggers/*/src/**/*.test.ts'],
		testTimeout: 10_000,
		pool: 'forks',
	},
});
