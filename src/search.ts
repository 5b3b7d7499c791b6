import { DEFAULT_SEARCH_URL, DEFAULT_USER_AGENT } from './config.js';
import { getLinks, type PageSource } from './pager.js';
import type { AcceptancePolicy, LineSink, SchemeCheck, SearchParams } from './types.js';
import { validateLinks, type Prober } from './validator.js';

export type SearcherConfig = {
  client: PageSource & Prober;
  searchUrl?: string;
  userAgent?: string;
  schemeCheck?: SchemeCheck;
  acceptance?: AcceptancePolicy;
  probeConcurrency?: number;
  report?: LineSink;
};

export function buildQuery(topic: string, fileType: string): string {
  return `filetype:${fileType} ${topic}`;
}

/** Pages through search results for a topic and keeps the links that answer a liveness probe. */
export class Searcher {
  private cfg: Required<Omit<SearcherConfig, 'report'>> & Pick<SearcherConfig, 'report'>;

  constructor(cfg: SearcherConfig) {
    this.cfg = {
      client: cfg.client,
      searchUrl: cfg.searchUrl ?? DEFAULT_SEARCH_URL,
      userAgent: cfg.userAgent ?? DEFAULT_USER_AGENT,
      schemeCheck: cfg.schemeCheck ?? 'prefix',
      acceptance: cfg.acceptance ?? 'probe-reachable',
      probeConcurrency: cfg.probeConcurrency ?? 1,
      report: cfg.report
    };
  }

  async search(query: string, fileType = 'pdf', limit = 10): Promise<string[]> {
    const params: SearchParams = { q: buildQuery(query, fileType), start: 0 };
    const headers = { 'user-agent': this.cfg.userAgent };
    const links = await getLinks(this.cfg.client, this.cfg.searchUrl, limit, params, headers);
    return validateLinks(links, this.cfg.client, {
      schemeCheck: this.cfg.schemeCheck,
      acceptance: this.cfg.acceptance,
      concurrency: this.cfg.probeConcurrency,
      report: this.cfg.report
    });
  }
}
