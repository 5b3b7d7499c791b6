import pLimit from 'p-limit';
import type { AcceptancePolicy, LineSink, SchemeCheck, ValidatedLink } from './types.js';

export interface Prober {
  probe(url: string): Promise<number>;
}

export type ValidateOptions = {
  schemeCheck?: SchemeCheck;
  acceptance?: AcceptancePolicy;
  concurrency?: number;
  report?: LineSink;
};

export function passesScheme(link: string, check: SchemeCheck = 'prefix'): boolean {
  if (check === 'legacy-substring') {
    // The old rule: the leading slice only has to occur somewhere inside the scheme literal,
    // so "", "h" and "http" all pass.
    return 'http://'.includes(link.slice(0, 7)) || 'https://'.includes(link.slice(0, 8));
  }
  return link.startsWith('http://') || link.startsWith('https://');
}

export function isAccepted(statusCode: number, policy: AcceptancePolicy = 'probe-reachable'): boolean {
  if (policy === 'http-ok') return statusCode >= 200 && statusCode < 300;
  return statusCode !== 0;
}

export function formatReport(link: ValidatedLink): string {
  return `code: ${link.statusCode}\turl: ${link.url}`;
}

/** Scheme-filters and de-duplicates `links`, then probes each survivor. Results keep input order. */
export async function probeLinks(links: string[], prober: Prober, opts: ValidateOptions = {}): Promise<ValidatedLink[]> {
  const candidates = [...new Set(links.filter((l) => passesScheme(l, opts.schemeCheck)))];
  const limit = pLimit(Math.max(1, opts.concurrency ?? 1));
  const codes = await Promise.all(candidates.map((url) => limit(() => prober.probe(url))));
  return candidates.map((url, i) => ({ url, statusCode: codes[i] }));
}

export async function validateLinks(links: string[], prober: Prober, opts: ValidateOptions = {}): Promise<string[]> {
  const report = opts.report ?? console.log;
  const probed = await probeLinks(links, prober, opts);
  const available: string[] = [];
  for (const link of probed) {
    report(formatReport(link));
    if (isAccepted(link.statusCode, opts.acceptance)) available.push(link.url);
  }
  return available;
}
