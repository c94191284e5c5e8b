import type { Confidence, Fact, ResearchReport } from '../research/types';
import { CONFIDENCE_LEVELS } from '../research/types';
import { displayTime } from './time-format';

const CONFIDENCE_HEADINGS: Record<Confidence, string> = {
  high: 'High Confidence',
  medium: 'Medium Confidence',
  low: 'Low Confidence',
};

function factLines(fact: Readonly<Fact>): string[] {
  const lines = [`- ${fact.claim}`];
  if (fact.caveat) lines.push(`  - *Caveat:* ${fact.caveat}`);
  lines.push(`  - *Source:* ${fact.sourceUrl}`);
  return lines;
}

function bulletList(items: readonly string[], empty: string): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : [`_${empty}_`];
}

/**
 * Renders a research report as a standalone Markdown document.
 */
export function renderMarkdownReport(report: ResearchReport): string {
  const out: string[] = [];

  out.push('# Research Report', '');
  out.push(`**Question:** ${report.question}`, '');
  out.push(`**Generated:** ${displayTime(report.timestamp)}`, '');

  out.push('## Sub-queries', '');
  report.subQueries.forEach((q, i) => out.push(`${i + 1}. ${q}`));
  out.push('');

  out.push('## Answer', '', report.synthesis.answer, '');

  out.push('## Key Findings', '');
  if (report.facts.length === 0) {
    out.push('_No facts were extracted._', '');
  }
  for (const level of CONFIDENCE_LEVELS) {
    const facts = report.facts.filter((f) => f.confidence === level);
    if (facts.length === 0) continue;
    out.push(`### ${CONFIDENCE_HEADINGS[level]}`, '');
    for (const fact of facts) out.push(...factLines(fact));
    out.push('');
  }

  out.push('## Agreements', '');
  out.push(...bulletList(report.synthesis.agreements, 'None identified.'), '');

  out.push('## Contradictions', '');
  if (report.synthesis.contradictions.length === 0) {
    out.push('_None identified._', '');
  }
  for (const c of report.synthesis.contradictions) {
    out.push(`### ${c.issue || 'Unspecified issue'}`, '');
    if (c.sources.length > 0) out.push(`**Sources:** ${c.sources.join(', ')}`, '');
    if (c.explanation) out.push(c.explanation, '');
  }

  out.push('## Knowledge Gaps', '');
  out.push(...bulletList(report.synthesis.gaps, 'None identified.'), '');

  out.push('## Sources', '');
  report.sources.forEach((s, i) => {
    out.push(`${i + 1}. [${s.title}](${s.url}) (accessed ${displayTime(s.fetchTime)})`);
  });
  out.push('');

  return out.join('\n');
}
