import type { CompletionClient } from '../providers/model-client';
import { parseStructuredOutput } from './structured-output';
import { buildSynthesizePrompt, type PromptFact } from '../prompts/research-prompts';
import { SYNTHESIS_RESPONSE_SCHEMA } from '../schemas/research-schemas';
import type { Fact, Synthesis } from '../research/types';
import { handleUnknownError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export interface SynthesisStage {
  synthesize(question: string, facts: readonly Readonly<Fact>[]): Promise<Synthesis>;
}

export const NO_SOURCES_GAP = 'No sources found with relevant information';
export const NO_SOURCES_ANSWER = 'Unable to answer the question due to lack of sources.';

export function emptySynthesis(): Synthesis {
  return {
    agreements: [],
    contradictions: [],
    gaps: [NO_SOURCES_GAP],
    answer: NO_SOURCES_ANSWER,
  };
}

/**
 * Deterministic synthesis built from the facts alone, used when the model's
 * answer cannot be obtained.
 */
export function fallbackSynthesis(facts: readonly Readonly<Fact>[]): Synthesis {
  const high = facts.filter((f) => f.confidence === 'high');
  const answer =
    high.length > 0
      ? `Based on ${high.length} high-confidence sources: ${high
          .slice(0, 3)
          .map((f) => f.claim)
          .join(' ')}`
      : `Multiple sources discuss this topic, but confidence levels vary. Key points include: ${
          facts[0]?.claim ?? 'No clear consensus.'
        }`;
  return {
    agreements: ['Multiple sources found'],
    contradictions: [],
    gaps: ['Detailed analysis unavailable due to synthesis error'],
    answer,
  };
}

export class Synthesizer implements SynthesisStage {
  private log: Logger;

  constructor(private readonly client: CompletionClient) {
    this.log = createChildLogger('synthesizer');
  }

  async synthesize(question: string, facts: readonly Readonly<Fact>[]): Promise<Synthesis> {
    if (facts.length === 0) {
      this.log.warn('No facts to synthesize');
      return emptySynthesis();
    }

    const numSources = new Set(facts.map((f) => f.sourceUrl)).size;
    const promptFacts: PromptFact[] = facts.map((f) => ({
      claim: f.claim,
      caveat: f.caveat ?? null,
      confidence: f.confidence,
      source: f.sourceUrl,
    }));
    this.log.info({ facts: facts.length, sources: numSources }, 'Synthesizing');

    try {
      const text = await this.client.call(buildSynthesizePrompt(question, numSources, promptFacts));
      const parsed = parseStructuredOutput(text, SYNTHESIS_RESPONSE_SCHEMA, {
        open: '{',
        close: '}',
        label: 'synthesis',
      });
      return {
        agreements: parsed.agreements,
        contradictions: parsed.contradictions,
        gaps: parsed.gaps,
        answer: parsed.answer.trim(),
      };
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Synthesis');
      this.log.error({ err }, 'Synthesis failed, using fallback');
      return fallbackSynthesis(facts);
    }
  }
}
