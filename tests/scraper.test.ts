import { describe, it, expect } from 'vitest';
import { cleanResultHref, scrape } from '../src/scraper.js';
import { resultsPage } from './helpers.js';

describe('cleanResultHref', () => {
  it('drops the redirect wrapper and tracking parameters', () => {
    expect(cleanResultHref('/url?q=http://example.com/notes.pdf&sa=U&ved=0ah')).toBe('http://example.com/notes.pdf');
  });

  it('keeps the whole target when there is no ampersand', () => {
    expect(cleanResultHref('/url?q=https://example.org/a/b.pdf')).toBe('https://example.org/a/b.pdf');
  });

  it('cuts a query string of the target itself at its first ampersand', () => {
    expect(cleanResultHref('/url?q=http://example.com/get?id=1&part=2&sa=U')).toBe('http://example.com/get?id=1');
  });
});

describe('scrape', () => {
  it('returns result links in document order', () => {
    const html = resultsPage(['http://example.com/a.pdf', 'https://example.org/docs/b.pdf', 'http://example.net/c.pdf']);
    expect(scrape(html)).toEqual([
      'http://example.com/a.pdf',
      'https://example.org/docs/b.pdf',
      'http://example.net/c.pdf'
    ]);
  });

  it('ignores headings that are not organic results', () => {
    const html = `<html><body>
      <h3>People also ask</h3>
      <h3 class="r"><a href="/url?q=http://example.com/only.pdf&amp;sa=U">only</a></h3>
      <div class="r"><a href="/url?q=http://example.com/ad.pdf">ad</a></div>
    </body></html>`;
    expect(scrape(html)).toEqual(['http://example.com/only.pdf']);
  });

  it('skips result headings without a link', () => {
    const html = `<h3 class="r">no anchor</h3><h3 class="r"><a href="/url?q=http://example.com/x.pdf">x</a></h3>`;
    expect(scrape(html)).toEqual(['http://example.com/x.pdf']);
  });

  it('yields nothing for a page without results', () => {
    expect(scrape('<html><body><p>No results found.</p></body></html>')).toEqual([]);
    expect(scrape('')).toEqual([]);
  });

  it('accepts another result selector and prefix length', () => {
    const html = `<div class="result"><a href="/l/?u=http://example.com/y.pdf&amp;rut=abc">y</a></div>`;
    expect(scrape(html, { resultSelector: 'div.result', prefixLength: '/l/?u='.length })).toEqual([
      'http://example.com/y.pdf'
    ]);
  });
});
