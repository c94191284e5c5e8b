import type { CompletionClient } from '../providers/model-client';
import { parseStructuredOutput } from './structured-output';
import { buildDecomposePrompt } from '../prompts/research-prompts';
import { SUB_QUERIES_SCHEMA } from '../schemas/research-schemas';
import { handleUnknownError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export interface Decomposer {
  decompose(question: string): Promise<string[]>;
}

export interface QueryDecomposerOptions {
  minQueries: number;
  maxQueries: number;
}

/**
 * Splits a question into searchable sub-queries. Falls back to the question
 * itself when the model fails or returns fewer than `minQueries`.
 */
export class QueryDecomposer implements Decomposer {
  private log: Logger;

  constructor(
    private readonly client: CompletionClient,
    private readonly options: QueryDecomposerOptions
  ) {
    if (options.minQueries > options.maxQueries) {
      throw new RangeError(`minQueries (${options.minQueries}) exceeds maxQueries (${options.maxQueries})`);
    }
    this.log = createChildLogger('decomposer');
  }

  async decompose(question: string): Promise<string[]> {
    const { minQueries, maxQueries } = this.options;
    this.log.info({ question }, 'Decomposing question');

    let queries: string[];
    try {
      const text = await this.client.call(buildDecomposePrompt(question, minQueries, maxQueries));
      queries = parseStructuredOutput(text, SUB_QUERIES_SCHEMA, { open: '[', close: ']', label: 'sub-queries' })
        .map((q) => (q ?? '').trim())
        .filter((q) => q.length > 0);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Query decomposition');
      this.log.error({ err }, 'Query decomposition failed, using the original question');
      return [question];
    }

    if (queries.length < minQueries) {
      this.log.warn({ got: queries.length, minQueries }, 'Too few sub-queries, using the original question');
      return [question];
    }
    if (queries.length > maxQueries) {
      this.log.info({ got: queries.length, maxQueries }, 'Truncating sub-queries');
      queries = queries.slice(0, maxQueries);
    }
    this.log.info({ count: queries.length }, 'Decomposed question');
    return queries;
  }
}
