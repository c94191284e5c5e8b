import { renderTemplate } from './template-renderer';

export const DECOMPOSE_TEMPLATE = `You help break research questions down into web-searchable sub-queries.

Question: {{question}}

Write between {{minQueries}} and {{maxQueries}} distinct search queries that together cover what is needed to answer the question. Each query should:
1. Target one aspect of the question
2. Be answerable by an ordinary web search
3. Be specific enough to return focused results

Think about definitions of the core concepts, related methods or technologies, competing viewpoints, the current state of the field and practical consequences.

Respond with a JSON array of strings and nothing else, for example:
["first query", "second query", "third query"]
`;

export const EXTRACT_TEMPLATE = `You extract factual claims from a single source for a research task.

Research question: {{question}}

Source URL: {{url}}
Source content:
{{content}}

List up to {{factsPerSource}} facts from this source that help answer the research question. For each fact:
1. State the claim plainly in one sentence
2. Give any condition or limitation the source attaches to it, or null
3. Rate your confidence as "high", "medium" or "low", considering whether the source backs the claim with evidence, whether it is a primary source, and whether the claim is opinion

Prefer claims that bear directly on the question. Skip opinions and marketing language.

Respond with JSON only, in this shape:
{
  "facts": [
    { "claim": "A concise factual statement", "caveat": "A limitation or null", "confidence": "high" }
  ]
}

If the source has nothing relevant, respond with {"facts": []}
`;

export const SYNTHESIZE_TEMPLATE = `You combine research findings gathered from several sources.

Question: {{question}}

Facts collected from {{numSources}} sources:
{{facts}}

Analyse the facts and report:
1. agreements: points that more than one source supports
2. contradictions: claims where sources disagree, with the URLs on each side and a likely reason (different context, outdated information, and so on)
3. gaps: important parts of the question the facts leave open
4. answer: a direct answer of at most two paragraphs that gives more weight to high-confidence facts

Respond with JSON only, in this shape:
{
  "agreements": ["..."],
  "contradictions": [
    { "issue": "What is disputed", "sources": ["https://a.example", "https://b.example"], "explanation": "Why the sources may differ" }
  ],
  "gaps": ["..."],
  "answer": "..."
}

Use empty arrays when there are no contradictions or gaps.
`;

export function buildDecomposePrompt(question: string, minQueries: number, maxQueries: number): string {
  return renderTemplate(DECOMPOSE_TEMPLATE, { question, minQueries, maxQueries });
}

export function buildExtractPrompt(question: string, url: string, content: string, factsPerSource: number): string {
  return renderTemplate(EXTRACT_TEMPLATE, { question, url, content, factsPerSource });
}

export interface PromptFact {
  claim: string;
  caveat: string | null;
  confidence: string;
  source: string;
}

export function buildSynthesizePrompt(question: string, numSources: number, facts: readonly PromptFact[]): string {
  return renderTemplate(SYNTHESIZE_TEMPLATE, { question, numSources, facts: JSON.stringify(facts, null, 2) });
}
