import { describe, expect, it } from 'vitest';
import { ApiWalkError } from '../src/errors.js';
import { toBody } from '../src/links/body.js';
import { LinkResolver, createDefaultLinkResolver } from '../src/links/resolver.js';
import {
  halStrategy,
  jsonApiStrategy,
  linkHeaderStrategy,
  simpleJsonStrategy,
  sirenStrategy,
} from '../src/links/strategies/index.js';
import { defineStrategy, type LinkStrategy } from '../src/links/strategy.js';

describe('toBody', () => {
  it('converts decoded values into tagged bodies', () => {
    expect(toBody({ a: [1, true, null] })).toEqual({
      kind: 'mapping',
      entries: [
        [
          'a',
          {
            kind: 'sequence',
            items: [
              { kind: 'number', value: 1 },
              { kind: 'boolean', value: true },
              { kind: 'null' },
            ],
          },
        ],
      ],
    });
  });

  it('keeps non-string map keys', () => {
    expect(toBody(new Map([[7, 'x']]))).toEqual({
      kind: 'mapping',
      entries: [[7, { kind: 'string', value: 'x' }]],
    });
  });
});

describe('link-header strategy', () => {
  it('accumulates URIs per relation in header order', () => {
    const result = linkHeaderStrategy.extract(toBody(null), {
      Link: '</self>; rel="self", </foo>; rel="item", </bar>; rel="item"',
    });

    expect(result).toEqual({
      links: [
        { rel: 'self', uri: '/self' },
        { rel: 'item', uri: '/foo' },
        { rel: 'item', uri: '/bar' },
      ],
    });
  });

  it('fails the whole header on an entry without a URI', () => {
    const result = linkHeaderStrategy.extract(toBody(null), {
      Link: '</ok>; rel="next", bad value',
    });

    expect(result.links).toEqual([]);
    expect(result.error).toMatchObject({
      code: 'LINK_ERROR',
      message: 'link-header: Malformed Link header entry: bad value',
    });
  });

  it('matches the header name case-insensitively and joins values', () => {
    const result = linkHeaderStrategy.extract(toBody(null), {
      link: ['</a>; rel="next last"', '</search?q=a,b>; rel=search'],
    });

    expect(result.links).toEqual([
      { rel: 'next', uri: '/a' },
      { rel: 'last', uri: '/a' },
      { rel: 'search', uri: '/search?q=a,b' },
    ]);
  });

  it('skips entries without a rel', () => {
    const result = linkHeaderStrategy.extract(toBody(null), {
      Link: '</a>; title="A"',
    });

    expect(result).toEqual({ links: [] });
  });
});

describe('hal strategy', () => {
  it('reads _links and ignores curies', () => {
    const result = halStrategy.extract(
      toBody({
        _links: {
          curies: null,
          self: { href: '/self' },
          item: [{ href: '/one' }, { href: '/two' }],
        },
      }),
      {},
    );

    expect(result.links).toEqual([
      { rel: 'self', uri: '/self' },
      { rel: 'item', uri: '/one' },
      { rel: 'item', uri: '/two' },
    ]);
  });

  it('processes list bodies element by element', () => {
    const result = halStrategy.extract(
      toBody([
        { _links: { self: { href: '/one' } } },
        { _links: { self: { href: '/two' } } },
      ]),
      {},
    );

    expect(result.links).toEqual([
      { rel: 'self', uri: '/one' },
      { rel: 'self', uri: '/two' },
    ]);
  });

  it('reports malformed links', () => {
    expect(halStrategy.extract(toBody({ _links: 'nope' }), {}).error).toMatchObject({
      code: 'LINK_ERROR',
      details: { strategy: 'hal' },
    });
    expect(
      halStrategy.extract(toBody({ _links: { self: {} } }), {}).error?.message,
    ).toBe("hal: Link 'self' has no string href");
  });
});

describe('siren strategy', () => {
  it('maps every rel to the entry href and skips entries without one', () => {
    const result = sirenStrategy.extract(
      toBody({
        links: [
          { rel: ['self'], href: '/self' },
          { rel: ['one', 'two'], href: '/multi' },
          { rel: ['invalid'] },
        ],
      }),
      {},
    );

    expect(result).toEqual({
      links: [
        { rel: 'self', uri: '/self' },
        { rel: 'one', uri: '/multi' },
        { rel: 'two', uri: '/multi' },
      ],
    });
  });

  it('ignores non-list links and rejects a scalar rel', () => {
    expect(sirenStrategy.extract(toBody({ links: { self: '/x' } }), {})).toEqual({
      links: [],
    });
    expect(
      sirenStrategy.extract(toBody({ links: [{ rel: 'self', href: '/x' }] }), {})
        .error?.code,
    ).toBe('LINK_ERROR');
  });
});

describe('jsonapi strategy', () => {
  it('maps top-level self and item links', () => {
    const result = jsonApiStrategy.extract(
      toBody({
        links: { self: 'https://api.test/articles' },
        data: [
          { id: '1', links: { self: { href: 'https://api.test/articles/1' } } },
          { id: '2', links: { self: 'https://api.test/articles/2' } },
          { id: '3' },
        ],
      }),
      {},
    );

    expect(result.links).toEqual([
      { rel: 'self', uri: 'https://api.test/articles' },
      { rel: 'item', uri: 'https://api.test/articles/1' },
      { rel: 'item', uri: 'https://api.test/articles/2' },
    ]);
  });

  it('rejects a self link of another shape', () => {
    expect(
      jsonApiStrategy.extract(toBody({ links: { self: 42 } }), {}).error?.code,
    ).toBe('LINK_ERROR');
  });
});

describe('simple-json strategy', () => {
  it('walks nested self links and stringifies keys', () => {
    const result = simpleJsonStrategy.extract(
      toBody({
        self: '/self',
        things: [
          { self: '/foo', name: 'Foo' },
          { self: '/bar', name: 'Bar' },
          new Map<number, unknown>([[5, { self: '/weird' }]]),
        ],
        other: { self: { foo: 'bar' } },
      }),
      {},
    );

    expect(result.links).toEqual([
      { rel: 'self', uri: '/self' },
      { rel: 'things-item', uri: '/foo' },
      { rel: 'things-item', uri: '/bar' },
      { rel: '5', uri: '/weird' },
    ]);
  });
});

describe('LinkResolver', () => {
  it('registers the default strategies in order', () => {
    expect(createDefaultLinkResolver().names()).toEqual([
      'link-header',
      'hal',
      'siren',
      'jsonapi',
      'simple-json',
    ]);
  });

  it('merges links from every strategy', () => {
    const { links, errors } = createDefaultLinkResolver().resolve(
      { Link: '</next>; rel="next"' },
      { _links: { self: { href: '/self' } } },
    );

    expect(links).toEqual(
      new Map([
        ['next', ['/next']],
        ['self', ['/self']],
      ]),
    );
    expect(errors).toEqual([]);
  });

  it('resolves relative URIs against the base', () => {
    const { links } = createDefaultLinkResolver().resolve(
      { Link: '</items?page=2>; rel="next"' },
      null,
      { base: 'https://api.test/items' },
    );

    expect(links.get('next')).toEqual(['https://api.test/items?page=2']);
  });

  it('isolates a failing strategy', () => {
    const broken: LinkStrategy = {
      name: 'broken',
      extract() {
        throw new Error('boom');
      },
    };
    const resolver = new LinkResolver([linkHeaderStrategy, broken, simpleJsonStrategy]);

    const { links, errors } = resolver.resolve(
      { Link: 'bad value' },
      { self: '/self' },
    );

    expect(links).toEqual(new Map([['self', ['/self']]]));
    expect(errors.map((error) => error.message)).toEqual([
      'link-header: Malformed Link header entry: bad value',
      'broken: boom',
    ]);
    expect(errors.every((error) => error.code === 'LINK_ERROR')).toBe(true);
  });

  it('rethrows unexpected collector errors for the resolver to wrap', () => {
    const strategy = defineStrategy('typo', () => {
      throw new TypeError('not a function');
    });

    expect(() => strategy.extract(toBody(null), {})).toThrow(TypeError);
    expect(new LinkResolver([strategy]).resolve({}, null).errors[0]).toBeInstanceOf(
      ApiWalkError,
    );
  });

  it('rejects duplicate strategy names', () => {
    expect(() => createDefaultLinkResolver().register(halStrategy)).toThrow(
      "Link strategy 'hal' is already registered",
    );
  });
});
