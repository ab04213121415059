import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// Runtime dependencies stay external; everything under the path aliases is bundled
const externalDependencies = [
  'chalk',
  'minimatch',
  'peggy',
  'winston',
  'zod'
];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const configureEsbuild = (options: EsbuildOptions) => {
  options.alias = {
    '@core': './core',
    '@services': './services',
    '@interpreter': './interpreter',
    '@graph': './graph',
    '@grammar': './grammar',
    '@api': './api',
    '@cli': './cli',
    '@tests': './tests'
  };
  options.platform = 'node';
  options.mainFields = ['module', 'main'];
  options.conditions = ['import', 'module', 'default'];
  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'node20';
  return options;
};

export default defineConfig([
  // API build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['esm'],
    dts: false,
    clean: true,
    sourcemap: true,
    splitting: true,
    treeshake: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.mjs' };
    },
    external: externalDependencies,
    esbuildOptions: configureEsbuild
  },
  // CLI build
  {
    entry: {
      recscope: 'bin/recscope.ts'
    },
    format: ['esm'],
    dts: false,
    clean: false,
    sourcemap: true,
    treeshake: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.mjs' };
    },
    external: externalDependencies,
    esbuildOptions: configureEsbuild
  }
]);
