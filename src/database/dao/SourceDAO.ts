/**
 * SourceDAO - Data Access Object for scrape sources
 */

import { DatabaseConnection } from '../connection';
import { decodeBoolean, decodeStringList, encodeBoolean, encodeStringList } from '../codec';
import { Source, SourceData, SourceRow, SqlValue } from '../models';
import { EntityDAO } from './EntityDAO';

export class SourceDAO extends EntityDAO<Source, SourceData, SourceRow> {
  constructor(connection: DatabaseConnection) {
    super(connection, {
      kind: 'source',
      table: 'sources',
      columns: ['channel_id', 'source_url', 'parse_media', 'forbidden_words'],
    });
  }

  /**
   * Sources owned by one channel, in insertion order
   */
  listByChannel(channelId: number): Source[] {
    return this.listWhere('channel_id', channelId);
  }

  protected validate(data: SourceData): void {
    this.requireText('source_url', data.source_url);
    this.requireParent('channel_id', 'channels', data.channel_id);
  }

  protected encode(data: SourceData): SqlValue[] {
    return [
      data.channel_id,
      data.source_url,
      encodeBoolean(data.parse_media),
      encodeStringList(data.forbidden_words),
    ];
  }

  protected decode(row: SourceRow): Source {
    return {
      id: row.id,
      channel_id: row.channel_id,
      source_url: row.source_url,
      parse_media: decodeBoolean(row.parse_media),
      forbidden_words: decodeStringList(row.forbidden_words, 'forbidden_words'),
    };
  }
}
