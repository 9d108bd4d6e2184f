import { defineConfig } from 'tsup';

export default defineConfig([
  // CLI build
  {
    entry: ['src/cli.ts'],
    format: ['cjs'],
    target: 'node20',
    outDir: 'dist',
    clean: true,
    minify: false,
    sourcemap: true
  },
  // Library build
  {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    target: 'node20',
    outDir: 'dist',
    dts: true,
    sourcemap: true,
    external: [
      'typescript',
      'ts-morph'
    ]
  }
]);
