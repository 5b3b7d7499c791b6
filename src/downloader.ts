import fs from 'node:fs';
import path from 'node:path';
import pLimit from 'p-limit';
import type { TransferOptions } from './http.js';
import { resolveDownloadDir } from './paths.js';
import type { DownloadJob, DownloadOutcome, DownloadSummary } from './types.js';
import { sanitizeFilename, urlBasename, withSuffix } from './utils.js';

export interface Transfer {
  download(url: string, outDir: string, filename: string, opts: TransferOptions): Promise<DownloadOutcome>;
}

export type DispatchOptions = {
  concurrency?: number;
  signal?: AbortSignal;
  root?: string; // base for a relative job directory, FILES_ROOT by default
  exists?: (filePath: string) => boolean;
};

/**
 * One distinct filename per link, from the last path segment. Clashes with earlier links
 * or with files already in `dir` become "name-1.ext", "name-2.ext", ...
 */
export function assignFilenames(
  links: string[],
  dir: string,
  exists: (filePath: string) => boolean = fs.existsSync
): Map<string, string> {
  const names = new Map<string, string>();
  const taken = new Set<string>();
  for (const url of links) {
    if (names.has(url)) continue;
    const base = sanitizeFilename(urlBasename(url));
    let n = 0;
    let candidate = base;
    while (taken.has(candidate) || exists(path.join(dir, candidate))) {
      n++;
      candidate = withSuffix(base, n);
    }
    taken.add(candidate);
    names.set(url, candidate);
  }
  return names;
}

function summarize(outcomes: DownloadOutcome[]): DownloadSummary {
  return {
    saved: outcomes.filter((o) => o.status === 'saved').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    outcomes
  };
}

async function downloadOne(
  http: Transfer,
  url: string,
  dir: string,
  filename: string,
  job: DownloadJob,
  signal?: AbortSignal
): Promise<DownloadOutcome> {
  if (signal?.aborted) return { status: 'skipped', url, reason: 'cancelled' };
  try {
    const outcome = await http.download(url, dir, filename, {
      minSizeKB: job.minSizeKB,
      maxSizeKB: job.maxSizeKB,
      noRedirects: job.noRedirects
    });
    if (outcome.status === 'saved') console.log(`[download] ok: ${outcome.path}`);
    else if (outcome.status === 'skipped') console.log(`[download] skip (${outcome.reason}): ${url}`);
    return outcome;
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    console.warn(`[download] fail: ${url} (${error})`);
    return { status: 'failed', url, error };
  }
}

function prepare(job: DownloadJob, opts: DispatchOptions) {
  const dir = resolveDownloadDir(job.directory, opts.root);
  fs.mkdirSync(dir, { recursive: true });
  const links = [...new Set(job.links)];
  const names = assignFilenames(links, dir, opts.exists);
  return { dir, links, names };
}

function nameFor(names: Map<string, string>, url: string): string {
  return names.get(url) ?? sanitizeFilename(urlBasename(url));
}

export async function downloadSeries(http: Transfer, job: DownloadJob, opts: DispatchOptions = {}): Promise<DownloadSummary> {
  const { dir, links, names } = prepare(job, opts);
  const outcomes: DownloadOutcome[] = [];
  for (const url of links) {
    outcomes.push(await downloadOne(http, url, dir, nameFor(names, url), job, opts.signal));
  }
  return summarize(outcomes);
}

// Every link gets its own task; the returned promise settles only after all of them have.
export async function downloadParallel(
  http: Transfer,
  job: DownloadJob,
  opts: DispatchOptions = {}
): Promise<DownloadSummary> {
  const { dir, links, names } = prepare(job, opts);
  const limit = pLimit(Math.max(1, opts.concurrency ?? 4));
  const outcomes = await Promise.all(
    links.map((url) => limit(() => downloadOne(http, url, dir, nameFor(names, url), job, opts.signal)))
  );
  return summarize(outcomes);
}
