import path from 'node:path';

export function sleep(ms: number) {
  return new Promise((res) => setTimeout(res, ms));
}

export function sanitizeFilename(input: string): string {
  const base = input
    .replace(/[\/\\:*?"<>|\x00-\x1f]/g, '-')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '');
  return base || 'file';
}

export function urlBasename(urlStr: string): string {
  try {
    const u = new URL(urlStr);
    const last = path.posix.basename(u.pathname);
    return safeDecode(last) || 'file';
  } catch {
    return 'file';
  }
}

function safeDecode(s: string): string {
  try {
    return decodeURIComponent(s);
  } catch {
    return s;
  }
}

// "report.pdf" + 2 -> "report-2.pdf"
export function withSuffix(filename: string, n: number): string {
  if (n <= 0) return filename;
  const ext = path.extname(filename);
  const stem = ext ? filename.slice(0, -ext.length) : filename;
  return `${stem}-${n}${ext}`;
}

export function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  return Number.isInteger(n) ? n : fallback;
}
