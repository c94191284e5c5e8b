import { describe, it, expect } from 'vitest';
import { renderMarkdownReport } from '../src/output/markdown-report';
import { sampleReport } from './report-fixture';

describe('renderMarkdownReport', () => {
  it('renders every section in order', () => {
    expect(renderMarkdownReport(sampleReport())).toBe(
      [
        '# Research Report',
        '',
        '**Question:** What is X?',
        '',
        '**Generated:** 2024-01-02 03:04:05',
        '',
        '## Sub-queries',
        '',
        '1. q1',
        '2. q2',
        '',
        '## Answer',
        '',
        'X is Y.',
        '',
        '## Key Findings',
        '',
        '### High Confidence',
        '',
        '- Water boils at 100 C at sea level.',
        '  - *Source:* https://example.com/a',
        '',
        '### Low Confidence',
        '',
        '- Low claim',
        '  - *Caveat:* Only in lab tests',
        '  - *Source:* https://example.com/b',
        '',
        '## Agreements',
        '',
        '- Both agree',
        '',
        '## Contradictions',
        '',
        '### Speed',
        '',
        '**Sources:** https://example.com/a, https://example.com/b',
        '',
        'Different setups',
        '',
        '## Knowledge Gaps',
        '',
        '_None identified._',
        '',
        '## Sources',
        '',
        '1. [Example A](https://example.com/a) (accessed 2024-01-02 03:04:05)',
        '2. [Example B](https://example.com/b) (accessed 2024-01-02 03:04:05)',
        '',
      ].join('\n')
    );
  });

  it('marks empty findings and contradictions', () => {
    const report = {
      ...sampleReport(),
      facts: [],
      synthesis: { agreements: [], contradictions: [], gaps: ['Nothing on cost'], answer: 'Unknown.' },
    };
    const markdown = renderMarkdownReport(report);

    expect(markdown).toContain('## Key Findings\n\n_No facts were extracted._\n\n## Agreements\n\n_None identified._\n');
    expect(markdown).toContain('## Contradictions\n\n_None identified._\n\n## Knowledge Gaps\n\n- Nothing on cost\n');
  });
});
