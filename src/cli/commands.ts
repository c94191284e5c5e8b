import type { Command } from 'commander';
import { loadConfig } from '../boundaries/config-loader';
import { parseCliOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import type { CliOptions } from '../schemas/cli-schemas';
import type { EnvConfig } from '../schemas/env-schemas';
import type { Config } from '../schemas/config-schemas';
import { configureLogging } from '../logging/index';
import { createResearchOrchestrator, type ResearchRuntime } from '../research/factory';
import type { ResearchProgressEvent, ResearchReport } from '../research/types';
import { UsageTracker } from '../types/token-usage';
import { ReportWriter } from '../output/report-writer';
import { renderMarkdownReport } from '../output/markdown-report';
import { formatReportJson } from '../output/json-formatter';
import { describeProgress, printReportSummary, printTokenUsage } from '../output/reporter';
import { error, log, setSilentMode, status } from '../output/logger';
import { describeFailure } from './failure-messages';

function fail(e: unknown): never {
  for (const line of describeFailure(e)) error(line);
  process.exit(1);
}

/*
 * Registers the research command with Commander. It is the default command,
 * so `factweave "question"` runs research.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerResearchCommand(program: Command): void {
  program
    .command('research', { isDefault: true })
    .description('Research a question and write a report')
    .argument('<question...>', 'the question to research')
    .option('-v, --verbose', 'Show progress and debug logging')
    .option('--show-prompt', 'Log full prompts instead of previews (with --verbose)')
    .option('--output <format>', 'Output format: summary (default), markdown, or json', 'summary')
    .option('--config <path>', 'Path to a factweave.yaml config file')
    .option('--max-results <n>', 'Search results per sub-query (overrides config)')
    .option('--no-save', 'Do not write the report to disk')
    .action(async (words: string[], rawOpts: unknown) => {
      const question = words.join(' ').trim();
      if (!question) {
        error('Error: A question is required.');
        process.exit(1);
      }

      // Parse and validate CLI options, environment and config before any run
      let runtime: ResearchRuntime;
      let usage: UsageTracker;
      let options: CliOptions;
      let env: EnvConfig;
      let config: Config;
      try {
        options = parseCliOptions(rawOpts);
        env = parseEnvironment();
        config = loadConfig(process.cwd(), options.config);
        setSilentMode(options.output === 'json');
        configureLogging({
          level: options.verbose ? 'debug' : config.logging.level,
          ...(config.logging.file !== null && { file: config.logging.file }),
          console: config.logging.console,
        });

        usage = new UsageTracker();
        runtime = createResearchOrchestrator(config, env, {
          provider: { debug: options.verbose, showPrompt: options.showPrompt },
          usage,
          ...(options.maxResults !== undefined && { maxResultsPerQuery: options.maxResults }),
        });
      } catch (e: unknown) {
        fail(e);
      }

      if (options.verbose) {
        status(`Model: ${runtime.model.providerName}; search: ${runtime.search.providerNames.join(' → ')}`);
      }

      let report: ResearchReport;
      try {
        const onProgress = options.verbose
          ? (event: ResearchProgressEvent) => status(describeProgress(event))
          : undefined;
        report = await runtime.orchestrator.research(question, onProgress ? { onProgress } : {});
      } catch (e: unknown) {
        fail(e);
      }

      let reportPath: string | undefined;
      if (options.save) {
        try {
          const writer = new ReportWriter(config.output.reportDir);
          reportPath = writer.saveReport(report);
          if (config.output.saveIntermediate) {
            writer.saveSources(question, report.sources, report.timestamp);
          }
        } catch (e: unknown) {
          fail(e);
        }
      }

      const stats = usage.stats({
        inputPricePerMillion: env.INPUT_PRICE_PER_MILLION,
        outputPricePerMillion: env.OUTPUT_PRICE_PER_MILLION,
      });

      switch (options.output) {
        case 'json':
          console.log(
            formatReportJson(report, { ...(reportPath !== undefined && { reportPath }), usage: stats })
          );
          break;
        case 'markdown':
          log(renderMarkdownReport(report));
          break;
        case 'summary':
          printReportSummary(report);
          if (reportPath) log(`\nReport saved to ${reportPath}`);
          printTokenUsage(stats);
          break;
      }
      process.exit(0);
    });
}
