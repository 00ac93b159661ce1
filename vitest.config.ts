import { defineConfig } from 'vitest/config';
import { svelte } from '@sveltejs/vite-plugin-svelte';

export default defineConfig({
	// Compiles runes in *.svelte.ts modules, including the tests themselves
	plugins: [svelte()],

	resolve: {
		// Load Svelte's client runtime so $state and $derived are reactive under test
		conditions: ['browser']
	},

	test: {
		expect: { requireAssertions: true },
		environment: 'jsdom',
		include: ['src/**/*.{test,spec}.ts']
	}
});
