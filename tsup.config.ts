import { defineConfig } from 'tsup';

export default defineConfig([
  // CLI entry — self-contained bundle (the source carries the shebang)
  {
    entry: { cli: 'src/cli.ts' },
    outDir: 'bundle',
    format: ['cjs'],
    target: 'node20',
    sourcemap: true,
    clean: true,
  },
]);
