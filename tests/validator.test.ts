import { describe, it, expect } from 'vitest';
import { isAccepted, passesScheme, probeLinks, validateLinks, type Prober } from '../src/validator.js';
import { sleep } from '../src/utils.js';

function fakeProber(codes: Record<string, number>) {
  const probed: string[] = [];
  const prober: Prober = {
    probe: async (url) => {
      probed.push(url);
      return codes[url] ?? 0;
    }
  };
  return { prober, probed };
}

describe('passesScheme', () => {
  it('accepts only http and https prefixes by default', () => {
    expect(passesScheme('http://example.com/a.pdf')).toBe(true);
    expect(passesScheme('https://example.com/a.pdf')).toBe(true);
    expect(passesScheme('ftp://example.com/a.pdf')).toBe(false);
    expect(passesScheme('httpx://example.com')).toBe(false);
    expect(passesScheme('/search?q=more')).toBe(false);
    expect(passesScheme('')).toBe(false);
  });

  it('reproduces the substring-membership rule in legacy mode', () => {
    expect(passesScheme('http://example.com/a.pdf', 'legacy-substring')).toBe(true);
    expect(passesScheme('https://example.com/a.pdf', 'legacy-substring')).toBe(true);
    expect(passesScheme('ftp://example.com/a.pdf', 'legacy-substring')).toBe(false);
    expect(passesScheme('/search?q=more', 'legacy-substring')).toBe(false);
    // short or truncated strings are slices of the literal, so they slip through
    expect(passesScheme('', 'legacy-substring')).toBe(true);
    expect(passesScheme('h', 'legacy-substring')).toBe(true);
    expect(passesScheme('http', 'legacy-substring')).toBe(true);
    expect(passesScheme('https:/', 'legacy-substring')).toBe(true);
  });
});

describe('isAccepted', () => {
  it('treats any nonzero status as reachable', () => {
    expect(isAccepted(200)).toBe(true);
    expect(isAccepted(404)).toBe(true);
    expect(isAccepted(500)).toBe(true);
    expect(isAccepted(0)).toBe(false);
  });

  it('requires a 2xx status under http-ok', () => {
    expect(isAccepted(200, 'http-ok')).toBe(true);
    expect(isAccepted(204, 'http-ok')).toBe(true);
    expect(isAccepted(302, 'http-ok')).toBe(false);
    expect(isAccepted(404, 'http-ok')).toBe(false);
    expect(isAccepted(0, 'http-ok')).toBe(false);
  });
});

describe('validateLinks', () => {
  const links = ['http://a.example/1.pdf', 'https://b.example/2.pdf', 'http://c.example/3.pdf'];
  const codes = { 'http://a.example/1.pdf': 200, 'https://b.example/2.pdf': 0, 'http://c.example/3.pdf': 404 };

  it('keeps every link whose probe did not fail outright and reports each probe', async () => {
    const { prober } = fakeProber(codes);
    const lines: string[] = [];
    const accepted = await validateLinks(links, prober, { report: (l) => lines.push(l) });

    expect(accepted).toEqual(['http://a.example/1.pdf', 'http://c.example/3.pdf']);
    expect(lines).toEqual([
      'code: 200\turl: http://a.example/1.pdf',
      'code: 0\turl: https://b.example/2.pdf',
      'code: 404\turl: http://c.example/3.pdf'
    ]);
  });

  it('drops error statuses under http-ok', async () => {
    const { prober } = fakeProber(codes);
    const accepted = await validateLinks(links, prober, { acceptance: 'http-ok', report: () => {} });
    expect(accepted).toEqual(['http://a.example/1.pdf']);
  });

  it('never probes links that fail the scheme filter', async () => {
    const { prober, probed } = fakeProber({ 'http://a.example/1.pdf': 200 });
    const accepted = await validateLinks(['/images?q=x', 'http://a.example/1.pdf', 'mailto:x@example.com'], prober, {
      report: () => {}
    });
    expect(probed).toEqual(['http://a.example/1.pdf']);
    expect(accepted).toEqual(['http://a.example/1.pdf']);
  });

  it('probes and reports a repeated link once', async () => {
    const { prober, probed } = fakeProber(codes);
    const lines: string[] = [];
    await validateLinks([links[0], links[2], links[0]], prober, { report: (l) => lines.push(l) });
    expect(probed).toEqual([links[0], links[2]]);
    expect(lines).toHaveLength(2);
  });

  it('gives the same answer when run twice on the same links', async () => {
    const { prober } = fakeProber(codes);
    const first: string[] = [];
    const second: string[] = [];
    const a = await validateLinks(links, prober, { report: (l) => first.push(l) });
    const b = await validateLinks(links, prober, { report: (l) => second.push(l) });
    expect(b).toEqual(a);
    expect(second).toEqual(first);
  });
});

describe('probeLinks', () => {
  it('keeps input order when concurrent probes finish out of order', async () => {
    const delays: Record<string, number> = { 'http://a.example/': 30, 'http://b.example/': 1, 'http://c.example/': 10 };
    const prober: Prober = {
      probe: async (url) => {
        await sleep(delays[url]);
        return url === 'http://b.example/' ? 0 : 200;
      }
    };
    const probed = await probeLinks(Object.keys(delays), prober, { concurrency: 3 });
    expect(probed).toEqual([
      { url: 'http://a.example/', statusCode: 200 },
      { url: 'http://b.example/', statusCode: 0 },
      { url: 'http://c.example/', statusCode: 200 }
    ]);
  });
});
