import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  bundle: true,
  external: ['@cucumber/cucumber', 'ajv', 'ajv-draft-04', 'debug', 'jsonpath-plus'],
  // inline the meta-schema JSON files
  noExternal: [/\.json$/],
  sourcemap: true,
  dts: true,
  clean: true,
  treeshake: true,
});
