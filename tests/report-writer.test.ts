import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { ReportWriter, renderSourcesDump } from '../src/output/report-writer';
import { renderMarkdownReport } from '../src/output/markdown-report';
import { sampleReport } from './report-fixture';
import { makeSource } from './utils';

describe('renderSourcesDump', () => {
  it('lists each source with a preview', () => {
    const at = new Date(2024, 5, 7, 8, 9, 10);
    const dump = renderSourcesDump('What is X?', [makeSource({ content: 'abc' })], at);

    expect(dump).toBe(
      [
        'Sources for: What is X?',
        'Collected at: 2024-06-07 08:09:10',
        '='.repeat(80),
        '',
        'Source 1: Example A',
        'URL: https://example.com/a',
        'Content length: 3 characters',
        '-'.repeat(80),
        'abc...',
        '',
      ].join('\n')
    );
  });

  it('cuts the preview at 1000 characters', () => {
    const dump = renderSourcesDump('q', [makeSource({ content: 'x'.repeat(1500) })], new Date(2024, 0, 1));
    expect(dump).toContain('Content length: 1500 characters');
    expect(dump).toContain(`\n${'x'.repeat(1000)}...\n`);
    expect(dump).not.toContain('x'.repeat(1001));
  });
});

describe('ReportWriter', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'factweave-reports-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates the report directory and names the file after the report time', () => {
    const reportDir = path.join(tempDir, 'nested', 'reports');
    const report = sampleReport();

    const filePath = new ReportWriter(reportDir).saveReport(report);

    expect(filePath).toBe(path.join(reportDir, 'research_report_20240102_030405.md'));
    expect(readFileSync(filePath, 'utf-8')).toBe(renderMarkdownReport(report));
  });

  it('writes the sources dump', () => {
    const report = sampleReport();
    const at = new Date(2024, 0, 2, 3, 4, 6);

    const filePath = new ReportWriter(tempDir).saveSources(report.question, report.sources, at);

    expect(filePath).toBe(path.join(tempDir, 'sources_20240102_030406.txt'));
    expect(readFileSync(filePath, 'utf-8')).toBe(renderSourcesDump(report.question, report.sources, at));
  });
});
