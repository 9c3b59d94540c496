import { defineConfig } from 'tsup';

export default defineConfig([
  // Library entry: widget constructors for pages that mount by hand
  {
    entry: { index: 'src/index.ts' },
    format: ['esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    platform: 'browser',
  },
  // Client entry: self-mounting script, fully bundled into a single file
  {
    entry: { client: 'src/client/index.ts' },
    format: ['esm'],
    dts: false,
    sourcemap: true,
    // Bundle everything into one file, no external deps in the browser
    noExternal: [/.*/],
    platform: 'browser',
  },
]);
