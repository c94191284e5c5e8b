import type { ResearchReport } from '../research/types';
import type { TokenUsageStats } from '../types/token-usage';
import { PACKAGE_INFO } from '../config/package-info';

export interface JsonReportOptions {
  reportPath?: string;
  usage?: TokenUsageStats;
}

/**
 * Serialises a report for `--output json`. Dates become ISO strings.
 */
export function formatReportJson(report: ResearchReport, options: JsonReportOptions = {}): string {
  const document = {
    version: PACKAGE_INFO.version,
    question: report.question,
    timestamp: report.timestamp.toISOString(),
    subQueries: report.subQueries,
    answer: report.synthesis.answer,
    synthesis: report.synthesis,
    facts: report.facts.map((f) => ({
      claim: f.claim,
      caveat: f.caveat ?? null,
      confidence: f.confidence,
      sourceUrl: f.sourceUrl,
    })),
    sources: report.sources.map((s) => ({
      url: s.url,
      title: s.title,
      fetchTime: s.fetchTime.toISOString(),
      contentLength: s.content.length,
    })),
    ...(options.reportPath !== undefined && { reportPath: options.reportPath }),
    ...(options.usage !== undefined && { usage: options.usage }),
  };
  return JSON.stringify(document, null, 2);
}
