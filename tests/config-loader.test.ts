import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { loadConfig, parseConfig, substituteEnvVars } from '../src/boundaries/config-loader';
import { DEFAULT_CONFIG_FILENAME } from '../src/config/constants';
import { ConfigError, ValidationError } from '../src/errors/index';

describe('Config Loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'factweave-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns defaults when the default file is absent', () => {
    const config = loadConfig(tempDir, undefined, {});

    expect(config.search).toEqual({
      provider: 'auto',
      maxResultsPerQuery: 5,
      timeoutSeconds: 10,
      userAgent: 'Mozilla/5.0 (compatible; factweave/1.0)',
    });
    expect(config.fetching).toEqual({ timeoutSeconds: 10, retryAttempts: 2, maxContentWords: 5000 });
    expect(config.agent).toEqual({ minSubqueries: 3, maxSubqueries: 5, factsPerSource: 5, maxSourceChars: 10000 });
    expect(config.llm).toEqual({ maxAttempts: 3, baseDelayMs: 1000, multiplier: 2 });
    expect(config.output).toEqual({ reportDir: 'reports', saveIntermediate: false });
    expect(config.logging).toEqual({ level: 'info', file: 'logs/research.log', console: false });
  });

  it('fails when an explicit path is missing', () => {
    expect(() => loadConfig(tempDir, 'custom.yaml', {})).toThrow(ConfigError);
  });

  it('loads the default file and merges it with defaults', () => {
    writeFileSync(
      path.join(tempDir, DEFAULT_CONFIG_FILENAME),
      ['search:', '  provider: duckduckgo', '  maxResultsPerQuery: 3', 'output:', '  saveIntermediate: true'].join('\n')
    );

    const config = loadConfig(tempDir, undefined, {});

    expect(config.search.provider).toBe('duckduckgo');
    expect(config.search.maxResultsPerQuery).toBe(3);
    expect(config.search.timeoutSeconds).toBe(10);
    expect(config.output).toEqual({ reportDir: 'reports', saveIntermediate: true });
  });

  it('substitutes environment variables before validation', () => {
    writeFileSync(
      path.join(tempDir, 'research.yaml'),
      ['output:', '  reportDir: ${REPORT_ROOT}/out', 'search:', '  maxResultsPerQuery: "${MAX_RESULTS}"'].join('\n')
    );

    const config = loadConfig(tempDir, 'research.yaml', { REPORT_ROOT: '/srv/reports', MAX_RESULTS: '7' });

    expect(config.output.reportDir).toBe('/srv/reports/out');
    expect(config.search.maxResultsPerQuery).toBe(7);
  });

  it('allows disabling the log file with null', () => {
    expect(parseConfig('logging:\n  file: null\n', {}).logging.file).toBeNull();
  });

  it('rejects inverted sub-query bounds', () => {
    expect(() => parseConfig('agent:\n  minSubqueries: 6\n  maxSubqueries: 4\n', {})).toThrow(
      'agent.minSubqueries: agent.minSubqueries must not exceed agent.maxSubqueries'
    );
  });

  it('rejects invalid values with a ValidationError', () => {
    expect(() => parseConfig('search:\n  provider: bing\n', {})).toThrow(ValidationError);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseConfig('search: [unclosed', {})).toThrow(ConfigError);
  });

  it('treats an empty file as all defaults', () => {
    expect(parseConfig('', {}).agent.maxSubqueries).toBe(5);
  });
});

describe('substituteEnvVars', () => {
  it('replaces references in nested strings and leaves unknown ones', () => {
    const env = { HOME_DIR: '/home/test' };
    expect(substituteEnvVars({ a: ['${HOME_DIR}/x', 1], b: { c: '${MISSING}' } }, env)).toEqual({
      a: ['/home/test/x', 1],
      b: { c: '${MISSING}' },
    });
  });
});
