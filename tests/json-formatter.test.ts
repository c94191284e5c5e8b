import { describe, it, expect } from 'vitest';
import { formatReportJson } from '../src/output/json-formatter';
import { PACKAGE_INFO } from '../src/config/package-info';
import { sampleReport } from './report-fixture';

describe('formatReportJson', () => {
  it('serialises dates as ISO strings and omits page content', () => {
    const report = sampleReport();
    const parsed: unknown = JSON.parse(formatReportJson(report));

    expect(parsed).toEqual({
      version: PACKAGE_INFO.version,
      question: 'What is X?',
      timestamp: report.timestamp.toISOString(),
      subQueries: ['q1', 'q2'],
      answer: 'X is Y.',
      synthesis: report.synthesis,
      facts: [
        {
          claim: 'Water boils at 100 C at sea level.',
          caveat: null,
          confidence: 'high',
          sourceUrl: 'https://example.com/a',
        },
        { claim: 'Low claim', caveat: 'Only in lab tests', confidence: 'low', sourceUrl: 'https://example.com/b' },
      ],
      sources: [
        {
          url: 'https://example.com/a',
          title: 'Example A',
          fetchTime: report.timestamp.toISOString(),
          contentLength: 34,
        },
        { url: 'https://example.com/b', title: 'Example B', fetchTime: report.timestamp.toISOString(), contentLength: 3 },
      ],
    });
  });

  it('adds the report path and usage when given', () => {
    const usage = { totalInputTokens: 10, totalOutputTokens: 4, calls: 2 };
    const parsed: unknown = JSON.parse(formatReportJson(sampleReport(), { reportPath: 'reports/r.md', usage }));

    expect(parsed).toMatchObject({ reportPath: 'reports/r.md', usage });
  });
});
