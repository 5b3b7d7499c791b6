import { Command, CommanderError, InvalidArgumentError } from 'commander';
import readline from 'node:readline';
import { catalogs, formatCatalog, isHighThreat } from './catalog.js';
import { loadConfig, type AppConfig } from './config.js';
import { confirmHighThreat, type Ask } from './confirm.js';
import { downloadParallel, downloadSeries, type Transfer } from './downloader.js';
import { HttpClient } from './http.js';
import type { PageSource } from './pager.js';
import { defaultDirectory } from './paths.js';
import { Searcher } from './search.js';
import type { DownloadJob, LineSink } from './types.js';
import type { Prober } from './validator.js';

export type RunClient = PageSource & Prober & Transfer & { close(): void };

export type CliDeps = {
  print?: LineSink;
  printErr?: LineSink;
  ask?: Ask;
  env?: NodeJS.ProcessEnv;
  createClient?: (cfg: AppConfig) => RunClient;
  signal?: AbortSignal;
};

type CliOptions = {
  file_type: string;
  limit: number;
  directory?: string;
  parallel?: boolean;
  available?: boolean;
  threats?: boolean;
  minFileSize: number;
  maxFileSize: number;
  redirects: boolean;
  yes?: boolean;
  requireOk?: boolean;
  legacySchemeCheck?: boolean;
  concurrency?: number;
};

function integer(min: number) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    return n;
  };
}

export function buildProgram(): Command {
  return new Command()
    .name('docseek')
    .description('Content Downloader')
    .addHelpText('after', '\nNow download files on any topic in bulk!')
    .argument('[query]', 'Specify the query.')
    .option('-f, --file_type <type>', 'Specify the extension of files to download.', 'pdf')
    .option('-l, --limit <n>', 'Limit the number of search results (in multiples of 10).', integer(0), 10)
    .option('-d, --directory <dir>', 'Specify directory where files will be stored.')
    .option('-p, --parallel', 'For parallel downloading.')
    .option('-a, --available', 'Get list of all available filetypes.')
    .option('-t, --threats', 'Get list of all common virus carrier filetypes.')
    .option('--min-file-size <kb>', 'Specify minimum file size to download in Kilobytes (KB).', integer(0), 0)
    .option('--max-file-size <kb>', 'Specify maximum file size to download in Kilobytes (KB), -1 for no limit.', integer(-1), -1)
    .option('--no-redirects', 'Prevent download redirects.')
    .option('-y, --yes', 'Skip the confirmation prompt for high-risk file types.')
    .option('--require-ok', 'Only keep links whose probe returns a 2xx status.')
    .option('--legacy-scheme-check', 'Use the loose substring scheme filter instead of a prefix test.')
    .option('--concurrency <n>', 'Number of parallel downloads.', integer(1));
}

export const INTERRUPT_MESSAGE = '[docseek] interrupted, no new downloads will start';

/**
 * Questions answered line by line from one readline interface. Lines that arrive before a question
 * is asked wait in a queue, so piped answers ("x\ny\n") are not lost; null once input has ended.
 */
export function lineAsk(rl: readline.Interface, write: (s: string) => void): Ask {
  const lines: string[] = [];
  const waiting: ((line: string | null) => void)[] = [];
  let closed = false;
  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next) next(line);
    else lines.push(line);
  });
  rl.on('close', () => {
    closed = true;
    for (const next of waiting.splice(0)) next(null);
  });
  return async (question) => {
    write(question);
    const buffered = lines.shift();
    if (buffered !== undefined) return buffered;
    if (closed) return null;
    return new Promise<string | null>((resolve) => waiting.push(resolve));
  };
}

async function confirmOnTerminal(print: LineSink): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  try {
    return await confirmHighThreat(lineAsk(rl, (s) => process.stdout.write(s)), print);
  } finally {
    rl.close();
  }
}

// SIGINT: downloads not yet started are skipped, the search and transfers in flight run to their end
export function onInterrupt(controller: AbortController, warn: LineSink = console.warn): () => void {
  return () => {
    warn(INTERRUPT_MESSAGE);
    controller.abort();
  };
}

function defaultClient(cfg: AppConfig): RunClient {
  return new HttpClient({
    userAgent: cfg.userAgent,
    timeoutMs: cfg.timeoutMs,
    delayMs: cfg.delayMs,
    concurrency: Math.max(cfg.concurrency, cfg.probeConcurrency),
    retryLimit: cfg.retryLimit,
    retryBackoffMs: cfg.retryBackoffMs
  });
}

/** Runs one invocation with `argv` (arguments only, no node/script path). Resolves to the exit code. */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? console.log;
  const printErr = deps.printErr ?? console.error;

  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (s) => print(s.trimEnd()),
      writeErr: (s) => printErr(s.trimEnd())
    });
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  const opts = program.opts<CliOptions>();
  const query: string | undefined = program.args[0];

  if (opts.available) {
    formatCatalog(catalogs().fileTypes).forEach((line) => print(line));
    return 0;
  }
  if (opts.threats) {
    formatCatalog(catalogs().threats).forEach((line) => print(line));
    return 0;
  }

  if (!query) {
    printErr('Missing required query argument.');
    return 1;
  }

  const fileType = opts.file_type;
  if (isHighThreat(fileType) && !opts.yes) {
    const proceed = deps.ask ? await confirmHighThreat(deps.ask, print) : await confirmOnTerminal(print);
    if (!proceed) return 0;
  }

  const loaded = loadConfig(deps.env);
  // --concurrency overrides CONCURRENCY for the dispatcher pool and the client's own request limit alike
  const cfg: AppConfig = { ...loaded, concurrency: opts.concurrency ?? loaded.concurrency };
  const job: DownloadJob = {
    links: [],
    directory: opts.directory ?? defaultDirectory(query),
    minSizeKB: opts.minFileSize,
    maxSizeKB: opts.maxFileSize,
    noRedirects: !opts.redirects
  };
  print(
    `Downloading ${opts.limit} ${fileType} files on topic ${query} and saving to directory: ${job.directory}`
  );

  const client = (deps.createClient ?? defaultClient)(cfg);
  try {
    const searcher = new Searcher({
      client,
      searchUrl: cfg.searchUrl,
      userAgent: cfg.userAgent,
      schemeCheck: opts.legacySchemeCheck ? 'legacy-substring' : 'prefix',
      acceptance: opts.requireOk ? 'http-ok' : 'probe-reachable',
      probeConcurrency: cfg.probeConcurrency,
      report: print
    });

    try {
      job.links = await searcher.search(query, fileType, opts.limit);
    } catch (err) {
      printErr(`[search] failed: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }
    print(`[search] available: ${job.links.length}`);

    const dispatchOpts = { concurrency: cfg.concurrency, signal: deps.signal, root: cfg.filesRoot };
    const summary = opts.parallel
      ? await downloadParallel(client, job, dispatchOpts)
      : await downloadSeries(client, job, dispatchOpts);
    print(`[download] completed: ${summary.saved}/${job.links.length}`);
    return 0;
  } finally {
    client.close();
  }
}
