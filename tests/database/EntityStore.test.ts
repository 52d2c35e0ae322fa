/**
 * EntityStore tests - dispatch by kind, cascade and forbidden word precedence
 */

import { EntityStore } from '../../src/database/EntityStore';
import {
  EntityNotFoundError,
  ForeignKeyViolationError,
  InvalidEnumError,
  UniqueConstraintViolationError,
} from '../../src/database/errors';
import { createTestStore } from '../helpers/store';

describe('EntityStore', () => {
  let store: EntityStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.close();
  });

  it('should create, list and delete a channel end to end', () => {
    const id = store.create('channel', {
      name: 'news',
      url: 'https://x',
      post_times: ['09:00', '18:00'],
      forbidden_words: ['spam'],
    });

    expect(store.list('channel')).toEqual([
      {
        id,
        name: 'news',
        url: 'https://x',
        post_times: ['09:00', '18:00'],
        forbidden_words: ['spam'],
      },
    ]);
    expect(id).toEqual(expect.any(Number));

    store.delete('channel', id);

    expect(store.list('channel')).toEqual([]);
  });

  it('should cascade a channel delete to its sources and their sites', () => {
    const channelId = store.create('channel', {
      name: 'news',
      url: 'https://x',
      post_times: [],
      forbidden_words: [],
    });
    const sourceIds = ['https://a', 'https://b', 'https://c'].map((source_url) =>
      store.create('source', {
        channel_id: channelId,
        source_url,
        parse_media: false,
        forbidden_words: [],
      }),
    );
    for (const sourceId of sourceIds) {
      store.create('site', { source_id: sourceId, site_url: `https://site/${sourceId}`, site_type: 'BUY' });
    }

    const otherChannel = store.create('channel', {
      name: 'sport',
      url: 'https://sport',
      post_times: [],
      forbidden_words: [],
    });
    const otherSource = store.create('source', {
      channel_id: otherChannel,
      source_url: 'https://scores',
      parse_media: true,
      forbidden_words: [],
    });
    const otherSite = store.create('site', {
      source_id: otherSource,
      site_url: 'https://scores/live',
      site_type: 'FREE',
    });

    store.delete('channel', channelId);

    expect(store.list('source').map((source) => source.id)).toEqual([otherSource]);
    expect(store.list('site').map((site) => site.id)).toEqual([otherSite]);
  });

  it('should keep the first channel when a second reuses its url', () => {
    store.create('channel', { name: 'a', url: 'https://x', post_times: [], forbidden_words: [] });

    expect(() =>
      store.create('channel', { name: 'b', url: 'https://x', post_times: [], forbidden_words: [] }),
    ).toThrow(UniqueConstraintViolationError);
    expect(store.list('channel').map((channel) => channel.name)).toEqual(['a']);
  });

  it('should not insert a source for a missing channel', () => {
    expect(() =>
      store.create('source', {
        channel_id: 404,
        source_url: 'https://a',
        parse_media: false,
        forbidden_words: [],
      }),
    ).toThrow(ForeignKeyViolationError);
    expect(store.list('source')).toEqual([]);
  });

  it('should reject a LEASE site on create and update', () => {
    const channelId = store.create('channel', {
      name: 'homes',
      url: 'https://homes',
      post_times: [],
      forbidden_words: [],
    });
    const sourceId = store.create('source', {
      channel_id: channelId,
      source_url: 'https://a',
      parse_media: false,
      forbidden_words: [],
    });

    expect(() =>
      store.create('site', { source_id: sourceId, site_url: 'https://s', site_type: 'LEASE' }),
    ).toThrow(InvalidEnumError);
    expect(store.list('site')).toEqual([]);

    const siteId = store.create('site', { source_id: sourceId, site_url: 'https://s', site_type: 'RENT' });
    expect(() =>
      store.update('site', siteId, { source_id: sourceId, site_url: 'https://s', site_type: 'LEASE' }),
    ).toThrow(InvalidEnumError);
    expect(store.getById('site', siteId).site_type).toBe('RENT');
  });

  it('should report NotFound for update and delete of a missing id without changes', () => {
    store.create('channel', { name: 'a', url: 'https://a', post_times: [], forbidden_words: [] });
    const before = store.list('channel');

    expect(() =>
      store.update('channel', 999, { name: 'z', url: 'https://z', post_times: [], forbidden_words: [] }),
    ).toThrow(EntityNotFoundError);
    expect(() => store.delete('channel', 999)).toThrow(EntityNotFoundError);
    expect(store.list('channel')).toEqual(before);
  });

  it('should return the same repository as the typed accessor', () => {
    expect(store.repository('channel')).toBe(store.channels);
    expect(store.repository('source')).toBe(store.sources);
    expect(store.repository('site')).toBe(store.sites);
  });

  describe('effectiveForbiddenWords', () => {
    it('should return the channel words followed by new source words', () => {
      const channelId = store.create('channel', {
        name: 'news',
        url: 'https://x',
        post_times: [],
        forbidden_words: ['spam', 'casino'],
      });
      const sourceId = store.create('source', {
        channel_id: channelId,
        source_url: 'https://feed',
        parse_media: false,
        forbidden_words: ['casino', 'crypto'],
      });

      expect(store.effectiveForbiddenWords(sourceId)).toEqual(['spam', 'casino', 'crypto']);
    });

    it('should fail with EntityNotFoundError for a missing source', () => {
      expect(() => store.effectiveForbiddenWords(1)).toThrow('source 1 not found');
    });
  });

  describe('status and close', () => {
    it('should report the connection closed after close', () => {
      expect(store.status().open).toBe(true);

      store.close();

      expect(store.status()).toEqual({ open: false });
    });
  });
});
