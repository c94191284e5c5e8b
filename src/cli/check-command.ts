import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../boundaries/config-loader';
import { parseCheckOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import { createSearchSelector } from '../providers/search-selector';
import { error, log } from '../output/logger';
import { describeFailure } from './failure-messages';

/*
 * Registers the 'check' command: validates environment and configuration
 * and shows which providers a run would use, without calling any of them.
 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Validate environment and configuration without running research')
    .option('--config <path>', 'Path to a factweave.yaml config file')
    .action((rawOpts: unknown) => {
      try {
        const options = parseCheckOptions(rawOpts);
        const env = parseEnvironment();
        const config = loadConfig(process.cwd(), options.config);
        const selector = createSearchSelector(config.search, env);

        log(`${chalk.green('✓')} Environment valid (LLM provider: ${chalk.cyan(env.LLM_PROVIDER)})`);
        log(`${chalk.green('✓')} Configuration valid`);
        log(`  Search mode: ${config.search.provider} (${selector.providerNames.join(' → ')})`);
        log(`  Sub-queries: ${config.agent.minSubqueries}-${config.agent.maxSubqueries}, results per query: ${config.search.maxResultsPerQuery}`);
        log(`  Reports: ${config.output.reportDir}`);
      } catch (e: unknown) {
        for (const line of describeFailure(e)) error(line);
        process.exit(1);
      }
    });
}
