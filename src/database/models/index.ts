/**
 * Database models index - exports all model types and interfaces
 */

import { Channel, ChannelData } from './Channel';
import { Source, SourceData } from './Source';
import { Site, SiteData } from './Site';

export * from './Channel';
export * from './Source';
export * from './Site';

export const ENTITY_KINDS = ['channel', 'source', 'site'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

// Shared capability of every stored record
export interface Identified {
  id: number;
}

export interface EntityMap {
  channel: Channel;
  source: Source;
  site: Site;
}

export interface EntityDataMap {
  channel: ChannelData;
  source: SourceData;
  site: SiteData;
}

export type SqlValue = string | number | null;
