import { defineConfig } from 'tsdown';

export default defineConfig({
	entry: [
		'./src/index.ts',
		'./src/cli.ts',
	],
	outDir: 'dist',
	format: 'esm',
	clean: true,
	sourcemap: false,
	minify: 'dce-only',
	treeshake: true,
	dts: true,
	define: {
		'import.meta.vitest': 'undefined',
	},
});
