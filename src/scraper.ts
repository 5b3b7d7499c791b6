import * as cheerio from 'cheerio';

// Organic results on the classic results page: <h3 class="r"><a href="/url?q=<target>&sa=...">
export const RESULT_SELECTOR = 'h3.r';
export const REDIRECT_PREFIX_LENGTH = '/url?q='.length;

export type ScrapeOptions = {
  resultSelector?: string;
  prefixLength?: number;
};

export function cleanResultHref(href: string, prefixLength = REDIRECT_PREFIX_LENGTH): string {
  return href.slice(prefixLength).split('&')[0];
}

/** Result links of one search page, in document order. A page without results yields []. */
export function scrape(html: string, opts: ScrapeOptions = {}): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];
  $(opts.resultSelector ?? RESULT_SELECTOR).each((_, el) => {
    const href = $(el).find('a').first().attr('href');
    if (href === undefined) return;
    links.push(cleanResultHref(href, opts.prefixLength));
  });
  return links;
}
