import type { PageRequest } from './http.js';
import { scrape } from './scraper.js';
import type { SearchParams } from './types.js';

export const PAGE_SIZE = 10;

export interface PageSource {
  html(url: string, req?: PageRequest): Promise<string>;
}

/**
 * Requests result pages at start = 0, 10, 20, ... below `limit` and returns the first `limit` scraped links,
 * page by page in scrape order. Pages that come back short or empty simply contribute fewer links.
 */
export async function getLinks(
  source: PageSource,
  searchUrl: string,
  limit: number,
  params: SearchParams,
  headers: Record<string, string>
): Promise<string[]> {
  const links: string[] = [];
  for (let start = 0; start < limit; start += PAGE_SIZE) {
    const html = await source.html(searchUrl, { searchParams: { ...params, start }, headers });
    links.push(...scrape(html));
  }
  return links.slice(0, limit);
}
