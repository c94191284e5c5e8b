import { mkdirSync, writeFileSync } from 'fs';
import * as path from 'path';
import type { ResearchReport, Source } from '../research/types';
import { renderMarkdownReport } from './markdown-report';
import { displayTime, fileStamp } from './time-format';
import { createChildLogger, type Logger } from '../logging/index';

const SOURCE_PREVIEW_CHARS = 1000;
const RULE_WIDTH = 80;

export function renderSourcesDump(question: string, sources: readonly Readonly<Source>[], at: Date): string {
  const out: string[] = [
    `Sources for: ${question}`,
    `Collected at: ${displayTime(at)}`,
    '='.repeat(RULE_WIDTH),
    '',
  ];
  sources.forEach((source, i) => {
    out.push(
      `Source ${i + 1}: ${source.title}`,
      `URL: ${source.url}`,
      `Content length: ${source.content.length} characters`,
      '-'.repeat(RULE_WIDTH),
      `${source.content.slice(0, SOURCE_PREVIEW_CHARS)}...`,
      ''
    );
  });
  return out.join('\n');
}

/*
 * Writes reports under one directory, creating it on first use.
 */
export class ReportWriter {
  private log: Logger;

  constructor(private readonly reportDir: string) {
    this.log = createChildLogger('report');
  }

  saveReport(report: ResearchReport): string {
    const filePath = this.write(`research_report_${fileStamp(report.timestamp)}.md`, renderMarkdownReport(report));
    this.log.info({ path: filePath }, 'Report saved');
    return filePath;
  }

  saveSources(question: string, sources: readonly Readonly<Source>[], at: Date = new Date()): string {
    const filePath = this.write(`sources_${fileStamp(at)}.txt`, renderSourcesDump(question, sources, at));
    this.log.info({ path: filePath }, 'Sources saved');
    return filePath;
  }

  private write(filename: string, content: string): string {
    mkdirSync(this.reportDir, { recursive: true });
    const filePath = path.join(this.reportDir, filename);
    writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }
}
