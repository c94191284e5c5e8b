import type { CompletionClient } from '../providers/model-client';
import { parseStructuredOutput } from './structured-output';
import { buildExtractPrompt } from '../prompts/research-prompts';
import { FACTS_RESPONSE_SCHEMA, RAW_FACT_SCHEMA } from '../schemas/research-schemas';
import { normalizeConfidence, type Fact, type Source } from '../research/types';
import { createChildLogger, type Logger } from '../logging/index';

export interface Extractor {
  extract(source: Readonly<Source>, question: string): Promise<Fact[]>;
}

export interface FactExtractorOptions {
  factsPerSource: number;
  maxSourceChars: number;
}

export class FactExtractor implements Extractor {
  private log: Logger;

  constructor(
    private readonly client: CompletionClient,
    private readonly options: FactExtractorOptions
  ) {
    this.log = createChildLogger('extractor');
  }

  /**
   * Facts from one source. Malformed entries are dropped; a failed call or an
   * unparseable response throws.
   */
  async extract(source: Readonly<Source>, question: string): Promise<Fact[]> {
    const content = source.content.slice(0, this.options.maxSourceChars);
    const prompt = buildExtractPrompt(question, source.url, content, this.options.factsPerSource);

    const text = await this.client.call(prompt);
    const response = parseStructuredOutput(text, FACTS_RESPONSE_SCHEMA, { open: '{', close: '}', label: 'facts' });

    const facts: Fact[] = [];
    for (const entry of response.facts) {
      const parsed = RAW_FACT_SCHEMA.safeParse(entry);
      if (!parsed.success || !parsed.data.claim.trim()) {
        this.log.warn({ url: source.url }, 'Dropping fact without a claim');
        continue;
      }
      const caveat = parsed.data.caveat?.trim();
      facts.push({
        claim: parsed.data.claim.trim(),
        ...(caveat ? { caveat } : {}),
        confidence: normalizeConfidence(parsed.data.confidence),
        sourceUrl: source.url,
      });
    }

    if (facts.length > this.options.factsPerSource) {
      this.log.debug({ url: source.url, got: facts.length }, 'Capping facts per source');
    }
    const kept = facts.slice(0, this.options.factsPerSource);
    this.log.info({ url: source.url, count: kept.length }, 'Extracted facts');
    return kept;
  }
}
