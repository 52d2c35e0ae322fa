/**
 * DAO (Data Access Object) exports
 */

export * from './EntityDAO';
export * from './ChannelDAO';
export * from './SourceDAO';
export * from './SiteDAO';
