import { defineConfig } from 'tsdown/config'

export default defineConfig({
	entry: ['src/index.ts'],
	format: ['esm'],
	dts: {
		sourcemap: true,
	},
	hash: false,
	clean: true,
	minify: false,
	platform: 'node',
	target: 'node20',
	sourcemap: true,
	treeshake: true,
})
