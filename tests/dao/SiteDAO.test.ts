/**
 * SiteDAO tests
 */

import { DatabaseConnection } from '../../src/database/connection';
import { EntityStore } from '../../src/database/EntityStore';
import {
  CorruptValueError,
  ForeignKeyViolationError,
  InvalidEnumError,
} from '../../src/database/errors';
import { catchError } from '../helpers/errors';
import { createTestStore } from '../helpers/store';

describe('SiteDAO', () => {
  let store: EntityStore;
  let sourceId: number;

  beforeEach(() => {
    store = createTestStore();
    const channelId = store.channels.create({
      name: 'homes',
      url: 'https://homes',
      post_times: ['08:00'],
      forbidden_words: [],
    });
    sourceId = store.sources.create({
      channel_id: channelId,
      source_url: 'https://listings',
      parse_media: false,
      forbidden_words: [],
    });
  });

  afterEach(() => {
    store.close();
  });

  describe('create', () => {
    it('should store each listing category', () => {
      for (const site_type of ['AUTO', 'RENT', 'BUY', 'FREE']) {
        store.sites.create({ source_id: sourceId, site_url: `https://${site_type}`, site_type });
      }

      expect(store.sites.list().map((site) => site.site_type)).toEqual([
        'AUTO',
        'RENT',
        'BUY',
        'FREE',
      ]);
    });

    it('should expose the parent as source_id', () => {
      const id = store.sites.create({
        source_id: sourceId,
        site_url: 'https://cars',
        site_type: 'AUTO',
      });

      expect(store.sites.getById(id)).toEqual({
        id,
        source_id: sourceId,
        site_url: 'https://cars',
        site_type: 'AUTO',
      });
    });

    it('should fail with InvalidEnumError for an unknown site_type', () => {
      const caught = catchError(() =>
        store.sites.create({ source_id: sourceId, site_url: 'https://x', site_type: 'LEASE' }),
      );

      expect(caught).toBeInstanceOf(InvalidEnumError);
      expect(caught).toMatchObject({ entity: 'site', field: 'site_type', value: 'LEASE' });
      expect(caught).toHaveProperty(
        'message',
        'site.site_type must be one of AUTO, RENT, BUY, FREE, got "LEASE"',
      );
      expect(store.sites.list()).toEqual([]);
    });

    it('should fail with ForeignKeyViolationError for a missing source', () => {
      const caught = catchError(() =>
        store.sites.create({ source_id: 999, site_url: 'https://x', site_type: 'BUY' }),
      );

      expect(caught).toBeInstanceOf(ForeignKeyViolationError);
      expect(caught).toMatchObject({ field: 'source_id', id: 999 });
    });
  });

  describe('update', () => {
    it('should leave the row unchanged when site_type is invalid', () => {
      const id = store.sites.create({
        source_id: sourceId,
        site_url: 'https://cars',
        site_type: 'AUTO',
      });

      expect(() =>
        store.sites.update(id, { source_id: sourceId, site_url: 'https://new', site_type: 'LEASE' }),
      ).toThrow(InvalidEnumError);
      expect(store.sites.getById(id)).toEqual({
        id,
        source_id: sourceId,
        site_url: 'https://cars',
        site_type: 'AUTO',
      });
    });

    it('should replace url and category', () => {
      const id = store.sites.create({
        source_id: sourceId,
        site_url: 'https://cars',
        site_type: 'AUTO',
      });

      store.sites.update(id, { source_id: sourceId, site_url: 'https://free', site_type: 'FREE' });

      expect(store.sites.getById(id).site_type).toBe('FREE');
      expect(store.sites.getById(id).site_url).toBe('https://free');
    });
  });

  describe('listBySource', () => {
    it('should return only the sites of that source', () => {
      const first = store.sites.create({
        source_id: sourceId,
        site_url: 'https://one',
        site_type: 'RENT',
      });

      expect(store.sites.listBySource(sourceId).map((site) => site.id)).toEqual([first]);
      expect(store.sites.listBySource(999)).toEqual([]);
    });
  });

  describe('decode', () => {
    it('should fail with CorruptValueError on a site_type written around the store', () => {
      // A row that bypassed the CHECK constraint
      const connection = new DatabaseConnection({ filename: ':memory:' });
      connection.open();
      connection.ensureSchema();
      const legacy = new EntityStore(connection);
      const channelId = legacy.channels.create({
        name: 'legacy',
        url: 'https://legacy',
        post_times: [],
        forbidden_words: [],
      });
      const legacySourceId = legacy.sources.create({
        channel_id: channelId,
        source_url: 'https://legacy/feed',
        parse_media: false,
        forbidden_words: [],
      });
      connection.run('PRAGMA ignore_check_constraints = ON');
      connection.run('INSERT INTO sites (parent_id, site_url, site_type) VALUES (?, ?, ?)', [
        legacySourceId,
        'https://legacy/site',
        'LEASE',
      ]);

      expect(() => legacy.sites.list()).toThrow(CorruptValueError);
      legacy.close();
    });
  });
});
