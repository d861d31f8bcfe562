import { defineConfig } from 'tsup'

export default defineConfig({
	entry: ['src/index.ts', 'src/workflow.ts'],
	format: ['esm'],
	target: 'node20',
	dts: true,
	clean: true,
	sourcemap: true,
	treeshake: true,
	minify: false,
})
