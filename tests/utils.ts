import type { CompletionClient } from '../src/providers/model-client';
import type { Sleeper } from '../src/retry/backoff';
import type { Fact, Source } from '../src/research/types';

/**
 * Completion client that answers from a queue. An Error entry is thrown
 * instead of returned. Prompts are recorded for assertions.
 */
export class ScriptedClient implements CompletionClient {
  readonly prompts: string[] = [];
  private queue: Array<string | Error>;

  constructor(responses: Array<string | Error>) {
    this.queue = [...responses];
  }

  call(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.queue.shift();
    if (next === undefined) {
      return Promise.reject(new Error('ScriptedClient: no response queued'));
    }
    if (next instanceof Error) {
      return Promise.reject(next);
    }
    return Promise.resolve(next);
  }
}

export function recordingSleep(): { sleep: Sleeper; delays: number[] } {
  const delays: number[] = [];
  const sleep: Sleeper = (ms: number) => {
    delays.push(ms);
    return Promise.resolve();
  };
  return { sleep, delays };
}

export function makeSource(overrides: Partial<Source> = {}): Source {
  return {
    url: 'https://example.com/a',
    title: 'Example A',
    content: 'Some page content about the topic.',
    fetchTime: new Date(2024, 0, 2, 3, 4, 5),
    ...overrides,
  };
}

export function makeFact(overrides: Partial<Fact> = {}): Fact {
  return {
    claim: 'Water boils at 100 C at sea level.',
    confidence: 'high',
    sourceUrl: 'https://example.com/a',
    ...overrides,
  };
}
