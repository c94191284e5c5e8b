#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from './errors/index';
import { ENV_FILES } from './config/constants';
import { PACKAGE_INFO } from './config/package-info';
import { registerResearchCommand } from './cli/commands';
import { registerCheckCommand } from './cli/check-command';
import { warn } from './output/logger';
import { parseDotEnv } from './boundaries/dotenv';

/*
 * Loads .env or .env.local from the working directory; variables already set
 * in the environment win.
 */
function loadDotEnv(): void {
  for (const filename of ENV_FILES) {
    const full = path.resolve(process.cwd(), filename);
    if (!existsSync(full)) continue;
    try {
      const vars = parseDotEnv(readFileSync(full, 'utf-8'));
      for (const [key, value] of Object.entries(vars)) {
        if (process.env[key] === undefined) {
          process.env[key] = value;
        }
      }
    } catch (e: unknown) {
      // rely on the existing environment
      const err = handleUnknownError(e, 'Loading .env file');
      warn(`[factweave] Warning: ${err.message}`);
    }
  }
}

// Load environment variables at startup
loadDotEnv();

program
  .name('factweave')
  .description('Research a question on the web and synthesize a sourced answer')
  .version(PACKAGE_INFO.version);

registerResearchCommand(program);
registerCheckCommand(program);

program.parseAsync(process.argv).catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
