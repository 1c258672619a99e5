import { describe, it, expect } from 'vitest';
import {
  decodeCollection,
  decodeItem,
  encodeTemplate,
  errorMessageFromBody,
  extractLink,
  isEnvelope,
} from '../../src/lib/envelope.js';
import { MalformedEnvelopeError } from '../../src/lib/errors.js';
import type { FieldValue } from '../../src/types/envelope.js';

const memberItem = (id: number, firstName: string, lastName: string) => ({
  href: `https://api.teamsnap.com/v3/members/${id}`,
  data: [
    { name: 'id', value: id },
    { name: 'first_name', value: firstName },
    { name: 'last_name', value: lastName },
  ],
  links: [{ rel: 'team', href: 'https://api.teamsnap.com/v3/teams/456' }],
});

describe('decodeItem', () => {
  it('should flatten name/value pairs into a record', () => {
    const record = decodeItem(memberItem(1, 'Ana', 'Lopez'));

    expect(record.data).toEqual({ id: 1, first_name: 'Ana', last_name: 'Lopez' });
    expect(record.links).toEqual({ team: 'https://api.teamsnap.com/v3/teams/456' });
    expect(record.href).toBe('https://api.teamsnap.com/v3/members/1');
  });

  it('should keep the field order of the item', () => {
    const record = decodeItem({
      data: [
        { name: 'zeta', value: 1 },
        { name: 'alpha', value: 2 },
        { name: 'mid', value: 3 },
      ],
    });

    expect(Object.keys(record.data)).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('should keep unknown fields verbatim', () => {
    const record = decodeItem({
      data: [
        { name: 'id', value: 7 },
        { name: 'brand_new_field', value: { nested: [1, 'two', true] } },
      ],
    });

    expect(record.data.brand_new_field).toEqual({ nested: [1, 'two', true] });
  });

  it('should distinguish explicit null from an omitted field', () => {
    const record = decodeItem({
      data: [
        { name: 'id', value: 7 },
        { name: 'email', value: null },
      ],
    });

    expect(record.data.email).toBeNull();
    expect('phone' in record.data).toBe(false);
  });

  it('should treat a datum without value as null', () => {
    const record = decodeItem({ data: [{ name: 'notes' }] });

    expect(record.data).toEqual({ notes: null });
  });

  it('should return empty links and no href when the item has none', () => {
    const record = decodeItem({ data: [{ name: 'id', value: 1 }] });

    expect(record.links).toEqual({});
    expect(record.href).toBeUndefined();
  });

  it('should reject duplicate field names', () => {
    const item = {
      data: [
        { name: 'id', value: 1 },
        { name: 'id', value: 2 },
      ],
    };

    expect(() => decodeItem(item)).toThrow(MalformedEnvelopeError);
    expect(() => decodeItem(item)).toThrow('Envelope item repeats the field "id"');
  });

  it('should reject data that is not a list of name/value pairs', () => {
    expect(() => decodeItem({ data: { id: 1 } })).toThrow(MalformedEnvelopeError);
    expect(() => decodeItem({ data: [{ value: 1 }] })).toThrow(MalformedEnvelopeError);
    expect(() => decodeItem('not an item')).toThrow(
      /^Envelope item is not a list of name\/value pairs/
    );
  });

  it('should keep the first href when a rel repeats', () => {
    const record = decodeItem({
      data: [],
      links: [
        { rel: 'team', href: '/teams/1' },
        { rel: 'team', href: '/teams/2' },
      ],
    });

    expect(record.links).toEqual({ team: '/teams/1' });
  });
});

describe('decodeCollection', () => {
  it('should decode an empty items list to an empty sequence', () => {
    const decoded = decodeCollection({ collection: { items: [] } });

    expect(decoded.records).toEqual([]);
  });

  it('should decode a collection without items to an empty sequence', () => {
    const decoded = decodeCollection({ collection: { version: '3.867.0' } });

    expect(decoded.records).toEqual([]);
    expect(decoded.version).toBe('3.867.0');
  });

  it('should decode N items into N records in order', () => {
    const decoded = decodeCollection({
      collection: {
        items: [memberItem(1, 'Ana', 'Lopez'), memberItem(2, 'Ben', 'Kim'), memberItem(3, 'Cy', 'Ng')],
      },
    });

    expect(decoded.records).toHaveLength(3);
    expect(decoded.records.map((record) => record.data.id)).toEqual([1, 2, 3]);
  });

  it('should expose collection links and deprecated links', () => {
    const decoded = decodeCollection({
      collection: {
        href: 'https://api.teamsnap.com/v3/teams/search',
        links: [
          { rel: 'next', href: 'https://api.teamsnap.com/v3/teams/search?page=2' },
          { rel: 'legacy_root', href: 'https://api.teamsnap.com/v3/legacy', deprecated: true, prompt: 'Use root' },
        ],
        items: [],
      },
    });

    expect(decoded.href).toBe('https://api.teamsnap.com/v3/teams/search');
    expect(decoded.links).toEqual({
      next: 'https://api.teamsnap.com/v3/teams/search?page=2',
      legacy_root: 'https://api.teamsnap.com/v3/legacy',
    });
    expect(decoded.deprecatedLinks).toEqual([
      { rel: 'legacy_root', href: 'https://api.teamsnap.com/v3/legacy', deprecated: true, prompt: 'Use root' },
    ]);
  });

  it('should name the failing item index', () => {
    expect(() =>
      decodeCollection({ collection: { items: [{ data: [] }, { data: 'broken' }] } })
    ).toThrow(/^items\[1\]: Envelope item is not a list of name\/value pairs/);
  });

  it('should reject payloads without a collection', () => {
    expect(() => decodeCollection({ items: [] })).toThrow(MalformedEnvelopeError);
    expect(() => decodeCollection(null)).toThrow(MalformedEnvelopeError);
    expect(() => decodeCollection({ collection: { items: 'x' } })).toThrow(
      /^Response is not a Collection\+JSON envelope/
    );
  });
});

describe('extractLink', () => {
  it('should find a link on a decoded record', () => {
    const record = decodeItem(memberItem(1, 'Ana', 'Lopez'));

    expect(extractLink(record, 'team')).toBe('https://api.teamsnap.com/v3/teams/456');
  });

  it('should find a link on a decoded collection', () => {
    const decoded = decodeCollection({
      collection: { links: [{ rel: 'next', href: '/members/search?page=2' }], items: [] },
    });

    expect(extractLink(decoded, 'next')).toBe('/members/search?page=2');
  });

  it('should find a link on a raw item', () => {
    expect(extractLink({ links: [{ rel: 'self', href: '/events/9' }] }, 'self')).toBe('/events/9');
  });

  it('should return undefined when the rel is absent', () => {
    expect(extractLink(decodeItem({ data: [] }), 'next')).toBeUndefined();
    expect(extractLink({}, 'next')).toBeUndefined();
  });

  it('should not resolve inherited object properties', () => {
    expect(extractLink(decodeItem({ data: [] }), 'toString')).toBeUndefined();
  });
});

describe('encodeTemplate', () => {
  it('should build a template body and drop undefined fields', () => {
    const body = encodeTemplate({ team_id: 456, name: 'Practice', notes: undefined, location_id: null });

    expect(body).toEqual({
      template: {
        data: [
          { name: 'team_id', value: 456 },
          { name: 'name', value: 'Practice' },
          { name: 'location_id', value: null },
        ],
      },
    });
  });

  it('should round-trip through decodeItem', () => {
    const samples: Array<Record<string, FieldValue>> = [
      {},
      { name: 'Practice', start_date: '2025-01-15T14:00:00Z', is_game: false, location_id: 12, notes: null },
      { tags: ['a', 'b'], settings: { reminders: true, minutes: 30 } },
    ];

    for (const fields of samples) {
      expect(decodeItem({ data: encodeTemplate(fields).template.data }).data).toEqual(fields);
    }
  });
});

describe('isEnvelope', () => {
  it('should recognize objects with a collection', () => {
    expect(isEnvelope({ collection: {} })).toBe(true);
    expect(isEnvelope({ data: [] })).toBe(false);
    expect(isEnvelope(null)).toBe(false);
    expect(isEnvelope('collection')).toBe(false);
  });
});

describe('errorMessageFromBody', () => {
  it('should prefer the collection error message', () => {
    expect(
      errorMessageFromBody({ collection: { error: { title: 'Bad Request', message: 'name is required' } } })
    ).toBe('name is required');
  });

  it('should fall back to the error title', () => {
    expect(errorMessageFromBody({ collection: { error: { title: 'Not Found' } } })).toBe('Not Found');
  });

  it('should truncate long text bodies', () => {
    const text = 'x'.repeat(250);

    expect(errorMessageFromBody(text)).toBe(`${'x'.repeat(200)}...`);
    expect(errorMessageFromBody('Service Unavailable')).toBe('Service Unavailable');
  });

  it('should return undefined when nothing describes the error', () => {
    expect(errorMessageFromBody(null)).toBeUndefined();
    expect(errorMessageFromBody({ unexpected: true })).toBeUndefined();
    expect(errorMessageFromBody('')).toBeUndefined();
  });
});
