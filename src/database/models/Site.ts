/**
 * Site model - a pollable endpoint owned by exactly one source
 */

export const SITE_TYPES = ['AUTO', 'RENT', 'BUY', 'FREE'] as const;

export type SiteType = (typeof SITE_TYPES)[number];

export interface Site {
  id: number;
  source_id: number;
  site_url: string;
  site_type: SiteType;
}

export interface SiteData {
  source_id: number;
  site_url: string;
  // Checked against SITE_TYPES by the store, so callers may pass raw input
  site_type: string;
}

// The parent reference is persisted in the `parent_id` column
export interface SiteRow {
  id: number;
  parent_id: number;
  site_url: string;
  site_type: string;
}
