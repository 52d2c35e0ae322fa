/**
 * ChannelDAO - Data Access Object for channels
 */

import { DatabaseConnection } from '../connection';
import { decodeStringList, encodeStringList } from '../codec';
import { Channel, ChannelData, ChannelRow, SqlValue } from '../models';
import { EntityDAO } from './EntityDAO';

export class ChannelDAO extends EntityDAO<Channel, ChannelData, ChannelRow> {
  constructor(connection: DatabaseConnection) {
    super(connection, {
      kind: 'channel',
      table: 'channels',
      columns: ['name', 'url', 'post_times', 'forbidden_words'],
    });
  }

  // name and url uniqueness is enforced by the table's UNIQUE constraints
  protected validate(data: ChannelData): void {
    this.requireText('name', data.name);
    this.requireText('url', data.url);
  }

  protected encode(data: ChannelData): SqlValue[] {
    return [
      data.name,
      data.url,
      encodeStringList(data.post_times),
      encodeStringList(data.forbidden_words),
    ];
  }

  protected decode(row: ChannelRow): Channel {
    return {
      id: row.id,
      name: row.name,
      url: row.url,
      post_times: decodeStringList(row.post_times, 'post_times'),
      forbidden_words: decodeStringList(row.forbidden_words, 'forbidden_words'),
    };
  }
}
