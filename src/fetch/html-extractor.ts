import * as cheerio from 'cheerio';

const NOISE_SELECTORS =
  'script, style, noscript, template, iframe, svg, nav, footer, header, aside, form, .sidebar, .menu, .nav, .advertisement, .ad, .ads, .cookie-banner';

// First match wins
const CONTENT_SELECTORS = [
  'article',
  'main',
  "[role='main']",
  '.post-content',
  '.article-content',
  '.entry-content',
  '.content',
  '#content',
  '.post',
  '.article',
];

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Readable text of an HTML document: boilerplate removed, main content
 * preferred over the whole body, whitespace collapsed.
 */
export function extractReadableText(html: string): string {
  const $ = cheerio.load(html);
  $(NOISE_SELECTORS).remove();

  for (const selector of CONTENT_SELECTORS) {
    const el = $(selector);
    if (el.length === 0) continue;
    const text = collapseWhitespace(el.text());
    if (text) return text;
  }

  return collapseWhitespace($('body').text());
}
