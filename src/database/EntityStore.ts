/**
 * EntityStore - the configuration store's public surface.
 *
 * Owns the three DAOs over a single connection supplied by the caller and
 * dispatches on EntityKind. Closing the store closes the connection.
 */

import { ConnectionStatus, DatabaseConnection } from './connection';
import { ChannelDAO, EntityRepository, SiteDAO, SourceDAO } from './dao';
import { EntityDataMap, EntityKind, EntityMap } from './models';

type RepositoryMap = {
  [K in EntityKind]: EntityRepository<EntityMap[K], EntityDataMap[K]>;
};

export class EntityStore {
  readonly channels: ChannelDAO;
  readonly sources: SourceDAO;
  readonly sites: SiteDAO;
  private readonly repositories: RepositoryMap;

  constructor(private readonly connection: DatabaseConnection) {
    this.channels = new ChannelDAO(connection);
    this.sources = new SourceDAO(connection);
    this.sites = new SiteDAO(connection);
    this.repositories = {
      channel: this.channels,
      source: this.sources,
      site: this.sites,
    };
  }

  repository<K extends EntityKind>(kind: K): RepositoryMap[K] {
    return this.repositories[kind];
  }

  list<K extends EntityKind>(kind: K): EntityMap[K][] {
    return this.repository(kind).list();
  }

  getById<K extends EntityKind>(kind: K, id: number): EntityMap[K] {
    return this.repository(kind).getById(id);
  }

  create<K extends EntityKind>(kind: K, data: EntityDataMap[K]): number {
    return this.repository(kind).create(data);
  }

  update<K extends EntityKind>(kind: K, id: number, data: EntityDataMap[K]): void {
    this.repository(kind).update(id, data);
  }

  delete(kind: EntityKind, id: number): void {
    this.repository(kind).delete(id);
  }

  /**
   * Words a source's content is filtered on: the channel's list followed by
   * the source's own, first occurrence kept.
   */
  effectiveForbiddenWords(sourceId: number): string[] {
    const source = this.sources.getById(sourceId);
    const channel = this.channels.getById(source.channel_id);
    return [...new Set([...channel.forbidden_words, ...source.forbidden_words])];
  }

  status(): ConnectionStatus {
    return this.connection.getStatus();
  }

  close(): void {
    this.connection.close();
  }
}
