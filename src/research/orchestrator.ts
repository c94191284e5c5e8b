import type { Decomposer } from '../analysis/query-decomposer';
import type { Extractor } from '../analysis/fact-extractor';
import type { SynthesisStage } from '../analysis/synthesizer';
import { emptySynthesis } from '../analysis/synthesizer';
import type { SearchClient } from '../providers/search-selector';
import type { PageFetcher } from '../fetch/content-fetcher';
import type { Fact, ResearchOptions, ResearchProgressEvent, ResearchReport, SearchResult, Source, Synthesis } from './types';
import { NoSourcesError, handleUnknownError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export type Clock = () => Date;

export interface ResearchStages {
  decomposer: Decomposer;
  search: SearchClient;
  fetcher: PageFetcher;
  extractor: Extractor;
  synthesizer: SynthesisStage;
}

export interface OrchestratorSettings {
  maxResultsPerQuery: number;
  clock?: Clock;
}

function freezeReport(report: ResearchReport): ResearchReport {
  for (const source of report.sources) Object.freeze(source);
  for (const fact of report.facts) Object.freeze(fact);
  for (const contradiction of report.synthesis.contradictions) {
    Object.freeze(contradiction.sources);
    Object.freeze(contradiction);
  }
  Object.freeze(report.synthesis.agreements);
  Object.freeze(report.synthesis.contradictions);
  Object.freeze(report.synthesis.gaps);
  Object.freeze(report.synthesis);
  Object.freeze(report.subQueries);
  Object.freeze(report.sources);
  Object.freeze(report.facts);
  return Object.freeze(report);
}

/**
 * Runs the research pipeline: decompose, search, fetch, extract, synthesize.
 * Holds no per-run state, so one instance can serve any number of runs.
 */
export class ResearchOrchestrator {
  private clock: Clock;
  private maxResultsPerQuery: number;
  private log: Logger;

  constructor(
    private readonly stages: ResearchStages,
    settings: OrchestratorSettings
  ) {
    this.maxResultsPerQuery = settings.maxResultsPerQuery;
    this.clock = settings.clock ?? (() => new Date());
    this.log = createChildLogger('orchestrator');
  }

  /**
   * @throws NoSourcesError when no page yielded content for any sub-query
   */
  async research(question: string, options: ResearchOptions = {}): Promise<ResearchReport> {
    // A failing listener is logged; it never ends the run
    const emit = (event: ResearchProgressEvent): void => {
      try {
        options.onProgress?.(event);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Progress listener');
        this.log.warn({ err, stage: event.stage }, 'Progress listener failed');
      }
    };
    this.log.info({ question }, 'Starting research');

    const subQueries = await this.decompose(question);
    emit({ stage: 'decomposed', subQueries });

    const sources = await this.gatherSources(subQueries, emit);
    if (sources.length === 0) {
      this.log.error({ question, subQueries }, 'No sources gathered');
      throw new NoSourcesError(question, subQueries);
    }
    this.log.info({ count: sources.length }, 'Gathered sources');

    const facts: Fact[] = [];
    for (const source of sources) {
      let extracted: Fact[];
      try {
        extracted = await this.stages.extractor.extract(source, question);
      } catch (e: unknown) {
        const err = handleUnknownError(e, `Extracting facts from ${source.url}`);
        this.log.error({ url: source.url, err }, 'Fact extraction failed');
        extracted = [];
      }
      facts.push(...extracted);
      emit({ stage: 'extracted', url: source.url, factCount: extracted.length });
    }

    let synthesis: Synthesis;
    if (facts.length === 0) {
      this.log.warn('No facts extracted, skipping synthesis');
      synthesis = emptySynthesis();
    } else {
      synthesis = await this.stages.synthesizer.synthesize(question, facts);
    }
    emit({ stage: 'synthesized', factCount: facts.length, skipped: facts.length === 0 });

    this.log.info({ sources: sources.length, facts: facts.length }, 'Research completed');
    return freezeReport({
      question,
      subQueries,
      sources,
      facts,
      synthesis,
      timestamp: this.clock(),
    });
  }

  private async decompose(question: string): Promise<string[]> {
    try {
      const subQueries = await this.stages.decomposer.decompose(question);
      return subQueries.length > 0 ? subQueries : [question];
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Decomposition');
      this.log.error({ err }, 'Decomposition failed, using the original question');
      return [question];
    }
  }

  private async gatherSources(
    subQueries: readonly string[],
    emit: (event: ResearchProgressEvent) => void
  ): Promise<Source[]> {
    const sources: Source[] = [];
    for (const query of subQueries) {
      this.log.info({ query }, 'Searching');
      let results: SearchResult[];
      try {
        results = await this.stages.search.search(query, this.maxResultsPerQuery);
      } catch (e: unknown) {
        const err = handleUnknownError(e, `Searching for ${query}`);
        this.log.error({ query, err }, 'Search failed');
        results = [];
      }
      emit({ stage: 'searched', query, resultCount: results.length });
      if (results.length === 0) {
        this.log.warn({ query }, 'No search results');
        continue;
      }

      for (const result of results) {
        let content: string | null;
        try {
          content = await this.stages.fetcher.fetch(result.url);
        } catch (e: unknown) {
          const err = handleUnknownError(e, `Fetching ${result.url}`);
          this.log.error({ url: result.url, err }, 'Fetch failed');
          content = null;
        }
        if (!content) {
          this.log.warn({ url: result.url }, 'Failed to fetch content');
          emit({ stage: 'fetch-skipped', url: result.url });
          continue;
        }
        sources.push({ url: result.url, title: result.title, content, fetchTime: this.clock() });
        emit({ stage: 'fetched', url: result.url, words: content.split(/\s+/).length });
      }
    }
    return sources;
  }
}
