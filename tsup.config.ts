import { readFileSync } from 'fs';
import { defineConfig } from 'tsup';

const pkg: unknown = JSON.parse(readFileSync(new URL('./package.json', import.meta.url), 'utf-8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0-dev';

export default defineConfig([
  {
    entry: { index: 'src/index.ts' },
    format: ['esm'],
    // Declarations come from the TypeScript sources (see "types" in package.json)
    dts: false,
    splitting: false,
    sourcemap: true,
    minify: false,
    target: 'es2022',
    outDir: 'dist',
  },
  {
    entry: { 'cli/index': 'src/cli/index.ts' },
    format: ['esm'],
    dts: false,
    splitting: false,
    sourcemap: true,
    minify: false,
    target: 'es2022',
    outDir: 'dist',
    banner: { js: '#!/usr/bin/env node' },
    define: { __CLI_VERSION__: JSON.stringify(version) },
  },
]);
