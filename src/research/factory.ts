import { ResearchOrchestrator, type Clock } from './orchestrator';
import { QueryDecomposer } from '../analysis/query-decomposer';
import { FactExtractor } from '../analysis/fact-extractor';
import { Synthesizer } from '../analysis/synthesizer';
import { ContentFetcher } from '../fetch/content-fetcher';
import { createProvider } from '../providers/provider-factory';
import type { ProviderOptions } from '../providers/provider-options';
import { ModelClient } from '../providers/model-client';
import { createSearchSelector, type SearchSelector } from '../providers/search-selector';
import { BackoffPolicy, type Sleeper } from '../retry/backoff';
import type { Config } from '../schemas/config-schemas';
import type { EnvConfig } from '../schemas/env-schemas';
import type { UsageTracker } from '../types/token-usage';

export interface CreateOrchestratorOptions {
  provider?: ProviderOptions;
  usage?: UsageTracker;
  maxResultsPerQuery?: number;
  sleep?: Sleeper;
  clock?: Clock;
}

export interface ResearchRuntime {
  orchestrator: ResearchOrchestrator;
  search: SearchSelector;
  model: ModelClient;
}

/**
 * Wires the production collaborators. Configuration problems (a search mode
 * without credentials, bad bounds) surface here, before any run.
 */
export function createResearchOrchestrator(
  config: Config,
  env: EnvConfig,
  options: CreateOrchestratorOptions = {}
): ResearchRuntime {
  const sleep = options.sleep;
  const model = new ModelClient(createProvider(env, options.provider), {
    policy: new BackoffPolicy(config.llm),
    ...(sleep && { sleep }),
    ...(options.usage && { usage: options.usage }),
  });

  const search = createSearchSelector(config.search, env, sleep ? { sleep } : {});
  const fetcher = new ContentFetcher({
    userAgent: config.search.userAgent,
    timeoutMs: config.fetching.timeoutSeconds * 1000,
    retryAttempts: config.fetching.retryAttempts,
    maxContentWords: config.fetching.maxContentWords,
    ...(sleep && { sleep }),
  });

  const orchestrator = new ResearchOrchestrator(
    {
      decomposer: new QueryDecomposer(model, {
        minQueries: config.agent.minSubqueries,
        maxQueries: config.agent.maxSubqueries,
      }),
      search,
      fetcher,
      extractor: new FactExtractor(model, {
        factsPerSource: config.agent.factsPerSource,
        maxSourceChars: config.agent.maxSourceChars,
      }),
      synthesizer: new Synthesizer(model),
    },
    {
      maxResultsPerQuery: options.maxResultsPerQuery ?? config.search.maxResultsPerQuery,
      ...(options.clock && { clock: options.clock }),
    }
  );

  return { orchestrator, search, model };
}
