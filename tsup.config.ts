import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  target: 'node20',
  outDir: 'dist',
  splitting: false,
  external: [
    // Dependencies stay external for the CLI build
    '@anthropic-ai/sdk',
    '@google/generative-ai',
    '@perplexity-ai/perplexity_ai',
    'chalk',
    'cheerio',
    'commander',
    'node-fetch',
    'openai',
    'pino',
    'yaml',
    'zod'
  ]
});
