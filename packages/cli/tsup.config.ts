import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  outDir: 'dist',
  format: ['esm'],
  sourcemap: true,
  clean: true,
  dts: false,
  treeshake: true,
  target: 'es2022',
  // workspace packages ship TypeScript sources, so they are bundled in
  noExternal: [/^@rulehub\//],
  external: [
    '@fastify/cors',
    '@octokit/rest',
    'ajv',
    'ajv-formats',
    'colorette',
    'commander',
    'dotenv',
    'fastify',
    'yaml',
  ],
  banner: {
    js: '#!/usr/bin/env node'
  }
})
