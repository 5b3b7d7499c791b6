export type SearchQuery = {
  topic: string;
  fileType: string;
  limit: number; // >= 0, paged in steps of PAGE_SIZE
};

export type SearchParams = {
  q: string; // "filetype:<fileType> <topic>"
  start: number;
};

export type ValidatedLink = {
  url: string;
  statusCode: number; // 0 = probe failed outright
};

// Which candidates survive the scheme filter
export type SchemeCheck = 'prefix' | 'legacy-substring';

// Which probe results count as "available"
export type AcceptancePolicy = 'probe-reachable' | 'http-ok';

export type DownloadJob = {
  links: string[];
  directory: string;
  minSizeKB: number;
  maxSizeKB: number; // -1 = unbounded
  noRedirects: boolean;
};

export type SkipReason = 'redirect' | 'too-small' | 'too-large' | 'cancelled';

export type DownloadOutcome =
  | { status: 'saved'; url: string; path: string; bytes: number }
  | { status: 'skipped'; url: string; reason: SkipReason }
  | { status: 'failed'; url: string; error: string };

export type DownloadSummary = {
  saved: number;
  skipped: number;
  failed: number;
  outcomes: DownloadOutcome[];
};

export type LineSink = (line: string) => void;
