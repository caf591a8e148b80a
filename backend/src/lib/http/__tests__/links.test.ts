import { describe, test } from 'node:test';
import assert from 'node:assert';
import { buildPageLinks, buildQueryString, pageLinkList, resourceUrl, withQuery } from '../links.js';

const baseUrl = 'http://api.test/jobs';

describe('buildPageLinks', () => {
  test('middle page has prev and next', () => {
    const links = buildPageLinks({ baseUrl, query: {}, total: 25, limit: 10, offset: 10 });
    assert.deepStrictEqual(links, {
      self: { href: `${baseUrl}?limit=10&offset=10`, rel: 'self', type: 'application/json' },
      prev: { href: `${baseUrl}?limit=10&offset=0`, rel: 'prev', type: 'application/json' },
      next: { href: `${baseUrl}?limit=10&offset=20`, rel: 'next', type: 'application/json' },
    });
  });

  test('first page has no prev', () => {
    const links = buildPageLinks({ baseUrl, query: {}, total: 25, limit: 10, offset: 0 });
    assert.strictEqual(links.prev, undefined);
    assert.strictEqual(links.next?.href, `${baseUrl}?limit=10&offset=10`);
  });

  test('last page has no next', () => {
    const links = buildPageLinks({ baseUrl, query: {}, total: 25, limit: 10, offset: 20 });
    assert.strictEqual(links.next, undefined);
    assert.strictEqual(links.prev?.href, `${baseUrl}?limit=10&offset=10`);
  });

  test('prev never goes below zero', () => {
    const links = buildPageLinks({ baseUrl, query: {}, total: 25, limit: 10, offset: 4 });
    assert.strictEqual(links.prev?.href, `${baseUrl}?limit=10&offset=0`);
    assert.strictEqual(links.next?.href, `${baseUrl}?limit=10&offset=14`);
  });

  test('an exact fit leaves no next page', () => {
    const links = buildPageLinks({ baseUrl, query: {}, total: 20, limit: 10, offset: 10 });
    assert.strictEqual(links.next, undefined);
  });

  test('an empty listing has only self', () => {
    const links = buildPageLinks({ baseUrl, query: {}, total: 0, limit: 10, offset: 0 });
    assert.deepStrictEqual(pageLinkList(links).map(link => link.rel), ['self']);
  });

  test('keeps unrelated parameters and replaces limit and offset', () => {
    const links = buildPageLinks({
      baseUrl,
      query: { processID: 'echo', limit: '999', status: ['running', 'accepted'], offset: '3' },
      total: 30,
      limit: 10,
      offset: 10,
    });
    assert.strictEqual(
      links.next?.href,
      `${baseUrl}?processID=echo&status=running&status=accepted&limit=10&offset=20`
    );
  });

  test('next and prev are inverse moves across the whole listing', () => {
    const total = 47;
    const limit = 10;
    const seen: number[] = [];
    let href: string | undefined = withQuery(baseUrl, { limit, offset: 0 });
    while (href) {
      const offset = Number(new URL(href).searchParams.get('offset'));
      seen.push(offset);
      const links = buildPageLinks({ baseUrl, query: {}, total, limit, offset });
      if (links.next) {
        const back = buildPageLinks({
          baseUrl,
          query: {},
          total,
          limit,
          offset: Number(new URL(links.next.href).searchParams.get('offset')),
        });
        assert.strictEqual(back.prev?.href, links.self.href);
      }
      href = links.next?.href;
    }
    assert.deepStrictEqual(seen, [0, 10, 20, 30, 40]);
  });
});

describe('query strings', () => {
  test('serializes in key order, repeating array values and skipping undefined', () => {
    assert.strictEqual(
      buildQueryString({ b: '2', a: ['x', 'y z'], skipped: undefined, flag: true, n: 3 }),
      'b=2&a=x&a=y+z&flag=true&n=3'
    );
  });

  test('withQuery leaves the URL alone when nothing is set', () => {
    assert.strictEqual(withQuery(baseUrl, { skipped: undefined }), baseUrl);
  });

  test('resourceUrl escapes each segment', () => {
    assert.strictEqual(
      resourceUrl('http://api.test/', 'jobs', 'a/b c', 'results'),
      'http://api.test/jobs/a%2Fb%20c/results'
    );
  });
});
