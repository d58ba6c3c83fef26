import * as cheerio from 'cheerio';
import type { HtmlFetcher } from '../utils/http.ts';
import { errorMessageOf } from '../utils/retry.ts';

/** Upper bound on article text handed to the LLM. */
export const MAX_ARTICLE_CHARS = 12_000;

const MIN_PARAGRAPH_CHARS = 40;

/**
 * Pulls readable body text out of an article page: the paragraphs inside
 * <article> when there is one, otherwise every paragraph on the page.
 */
export function extractArticleText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, nav, header, footer, aside, form').remove();

  const scope = $('article').length > 0 ? $('article p') : $('p');
  const paragraphs = scope
    .map((_, p) => $(p).text().replace(/\s+/g, ' ').trim())
    .get()
    .filter(text => text.length >= MIN_PARAGRAPH_CHARS);

  return paragraphs.join('\n\n').slice(0, MAX_ARTICLE_CHARS);
}

/**
 * Fetches an article page and returns its body text, or null when the page
 * cannot be fetched or has no readable paragraphs.
 */
export async function fetchArticleText(fetchHtml: HtmlFetcher, url: string): Promise<string | null> {
  try {
    const text = extractArticleText(await fetchHtml(url));
    return text || null;
  } catch (error) {
    console.warn(`[Collator] Could not fetch article body from ${url}: ${errorMessageOf(error)}`);
    return null;
  }
}
