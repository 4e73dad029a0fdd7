import { defineConfig } from 'tsup';

export default defineConfig({
	entry: ['src/index.ts', 'src/cli.ts'],
	format: ['esm'],
	dts: true,
	splitting: true,
	sourcemap: true,
	clean: true,
	treeshake: true,
	outDir: 'dist',
	noExternal: ['pagebench-browser', 'pagebench-runner'],
});
