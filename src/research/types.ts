export type Confidence = 'high' | 'medium' | 'low';

export const CONFIDENCE_LEVELS: readonly Confidence[] = ['high', 'medium', 'low'];

export interface SearchResult {
  url: string;
  title: string;
  snippet: string;
}

/*
 * A fetched page. Only created for non-empty extracted content.
 */
export interface Source {
  url: string;
  title: string;
  content: string;
  fetchTime: Date;
}

export interface Fact {
  claim: string;
  caveat?: string;
  confidence: Confidence;
  sourceUrl: string;
}

export interface Contradiction {
  issue: string;
  sources: string[];
  explanation: string;
}

export interface Synthesis {
  agreements: string[];
  contradictions: Contradiction[];
  gaps: string[];
  answer: string;
}

export interface ResearchReport {
  readonly question: string;
  readonly subQueries: readonly string[];
  readonly sources: readonly Readonly<Source>[];
  readonly facts: readonly Readonly<Fact>[];
  readonly synthesis: Readonly<Synthesis>;
  readonly timestamp: Date;
}

/*
 * Progress notifications for a presentation layer. Emitted in pipeline order.
 */
export type ResearchProgressEvent =
  | { stage: 'decomposed'; subQueries: readonly string[] }
  | { stage: 'searched'; query: string; resultCount: number }
  | { stage: 'fetched'; url: string; words: number }
  | { stage: 'fetch-skipped'; url: string }
  | { stage: 'extracted'; url: string; factCount: number }
  | { stage: 'synthesized'; factCount: number; skipped: boolean };

export interface ResearchOptions {
  onProgress?: (event: ResearchProgressEvent) => void;
}

export function isConfidence(value: unknown): value is Confidence {
  return typeof value === 'string' && CONFIDENCE_LEVELS.some((level) => level === value);
}

/**
 * Lower-cases and trims a model-supplied confidence; anything outside the
 * three levels becomes `medium`.
 */
export function normalizeConfidence(value: unknown): Confidence {
  if (typeof value !== 'string') return 'medium';
  const normalized = value.trim().toLowerCase();
  return isConfidence(normalized) ? normalized : 'medium';
}
