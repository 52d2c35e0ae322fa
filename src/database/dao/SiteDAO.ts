/**
 * SiteDAO - Data Access Object for polled sites
 */

import { DatabaseConnection } from '../connection';
import { isSiteType } from '../codec';
import { CorruptValueError, InvalidEnumError } from '../errors';
import { SITE_TYPES, Site, SiteData, SiteRow, SqlValue } from '../models';
import { EntityDAO } from './EntityDAO';

export class SiteDAO extends EntityDAO<Site, SiteData, SiteRow> {
  constructor(connection: DatabaseConnection) {
    super(connection, {
      kind: 'site',
      table: 'sites',
      columns: ['parent_id', 'site_url', 'site_type'],
      enumValues: SITE_TYPES,
    });
  }

  /**
   * Sites polled for one source, in insertion order
   */
  listBySource(sourceId: number): Site[] {
    return this.listWhere('parent_id', sourceId);
  }

  protected validate(data: SiteData): void {
    this.requireText('site_url', data.site_url);
    if (!isSiteType(data.site_type)) {
      throw new InvalidEnumError('site', 'site_type', data.site_type, SITE_TYPES);
    }
    this.requireParent('source_id', 'sources', data.source_id);
  }

  protected encode(data: SiteData): SqlValue[] {
    return [data.source_id, data.site_url, data.site_type];
  }

  protected decode(row: SiteRow): Site {
    // The CHECK constraint makes this unreachable for rows written through the store
    if (!isSiteType(row.site_type)) {
      throw new CorruptValueError('site_type', row.site_type);
    }

    return {
      id: row.id,
      source_id: row.parent_id,
      site_url: row.site_url,
      site_type: row.site_type,
    };
  }
}
