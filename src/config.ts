import 'dotenv/config';
import { filesRoot } from './paths.js';
import { parseIntOr } from './utils.js';

export const DEFAULT_SEARCH_URL = 'https://www.google.com/search';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:53.0) Gecko/20100101 Firefox/53.0';

export type AppConfig = {
  searchUrl: string;
  userAgent: string;
  timeoutMs: number;
  delayMs: number;
  concurrency: number;
  probeConcurrency: number;
  retryLimit: number;
  retryBackoffMs: number;
  filesRoot: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    searchUrl: env.SEARCH_URL || DEFAULT_SEARCH_URL,
    userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
    timeoutMs: positive(parseIntOr(env.TIMEOUT_MS, 30000), 30000),
    delayMs: Math.max(0, parseIntOr(env.DELAY_MS, 0)),
    concurrency: positive(parseIntOr(env.CONCURRENCY, 4), 4),
    probeConcurrency: positive(parseIntOr(env.PROBE_CONCURRENCY, 1), 1),
    retryLimit: Math.max(0, parseIntOr(env.RETRY_LIMIT, 5)),
    retryBackoffMs: Math.max(0, parseIntOr(env.RETRY_BACKOFF_MS, 100)),
    filesRoot: filesRoot(env)
  };
}

function positive(n: number, fallback: number): number {
  return n > 0 ? n : fallback;
}
