import chalk from 'chalk';
import type { Confidence, ResearchProgressEvent, ResearchReport } from '../research/types';
import type { TokenUsageStats } from '../types/token-usage';
import { log } from './logger';

function colorConfidence(confidence: Confidence): string {
  switch (confidence) {
    case 'high':
      return chalk.green(confidence);
    case 'medium':
      return chalk.yellow(confidence);
    case 'low':
      return chalk.red(confidence);
  }
}

export function describeProgress(event: ResearchProgressEvent): string {
  switch (event.stage) {
    case 'decomposed':
      return `Sub-queries (${event.subQueries.length}): ${event.subQueries.join(' | ')}`;
    case 'searched':
      return `Search "${event.query}": ${event.resultCount} result${event.resultCount !== 1 ? 's' : ''}`;
    case 'fetched':
      return `Fetched ${event.url} (${event.words} words)`;
    case 'fetch-skipped':
      return `Skipped ${event.url}`;
    case 'extracted':
      return `Extracted ${event.factCount} fact${event.factCount !== 1 ? 's' : ''} from ${event.url}`;
    case 'synthesized':
      return event.skipped ? 'No facts to synthesize' : `Synthesized ${event.factCount} facts`;
  }
}

export function printReportSummary(report: ResearchReport) {
  log(chalk.bold(`\n${report.question}`));
  log(chalk.dim(`${report.subQueries.length} sub-queries, ${report.sources.length} sources, ${report.facts.length} facts`));

  log(chalk.bold('\nAnswer:'));
  log(report.synthesis.answer);

  const counts = { high: 0, medium: 0, low: 0 };
  for (const fact of report.facts) counts[fact.confidence] += 1;
  log(chalk.bold('\nFindings:'));
  log(`  ${colorConfidence('high')} ${counts.high}  ${colorConfidence('medium')} ${counts.medium}  ${colorConfidence('low')} ${counts.low}`);

  if (report.synthesis.agreements.length > 0) {
    log(chalk.bold('\nAgreements:'));
    for (const a of report.synthesis.agreements) log(`  ${chalk.green('✓')} ${a}`);
  }
  if (report.synthesis.contradictions.length > 0) {
    log(chalk.bold('\nContradictions:'));
    for (const c of report.synthesis.contradictions) {
      log(`  ${chalk.red('✖')} ${c.issue}`);
      if (c.explanation) log(`    ${chalk.dim(c.explanation)}`);
    }
  }
  if (report.synthesis.gaps.length > 0) {
    log(chalk.bold('\nGaps:'));
    for (const g of report.synthesis.gaps) log(`  ${chalk.yellow('?')} ${g}`);
  }

  log(chalk.bold('\nSources:'));
  report.sources.forEach((s, i) => log(`  ${i + 1}. ${s.title} ${chalk.underline(s.url)}`));
}

export function printTokenUsage(stats: TokenUsageStats) {
  log(chalk.bold('\nToken Usage:'));
  log(`  - Model calls: ${stats.calls}`);
  log(`  - Input tokens: ${stats.totalInputTokens.toLocaleString()}`);
  log(`  - Output tokens: ${stats.totalOutputTokens.toLocaleString()}`);
  if (stats.totalCost !== undefined) {
    log(`  - Total cost: $${stats.totalCost.toFixed(4)}`);
  }
}
