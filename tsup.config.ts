import { defineConfig } from 'tsup';
import type { Options } from 'tsup';
import { readFileSync } from 'fs';
import { join } from 'path';

interface PackageJson {
  version: string;
  name: string;
  [key: string]: unknown;
}

const packageJson: PackageJson = JSON.parse(readFileSync(join(__dirname, 'package.json'), 'utf-8'));

// Runtime dependencies stay external; @core/* and @cli/* resolve through tsconfig paths
const externalDependencies = [
  'chalk',
  'minimatch',
  'shell-quote',
  'winston'
];

const shared: Options = {
  dts: false,
  sourcemap: true,
  outDir: 'dist',
  platform: 'node',
  target: 'node20',
  external: externalDependencies,
  define: {
    __VERSION__: JSON.stringify(packageJson.version)
  }
};

export default defineConfig([
  // Library build
  {
    ...shared,
    entry: {
      index: 'core/index.ts'
    },
    format: ['esm', 'cjs'],
    clean: true,
    splitting: false,
    outExtension({ format }) {
      return {
        js: format === 'esm' ? '.mjs' : '.cjs'
      };
    }
  },
  // CLI build
  {
    ...shared,
    entry: {
      cli: 'cli/cli-entry.ts'
    },
    format: 'cjs',
    clean: false,
    outExtension() {
      return {
        js: '.cjs'
      };
    },
    banner: {
      js: '#!/usr/bin/env node'
    }
  }
]);
