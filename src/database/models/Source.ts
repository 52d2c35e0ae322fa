/**
 * Source model - a scrape target owned by exactly one channel
 */

export interface Source {
  id: number;
  channel_id: number;
  source_url: string;
  parse_media: boolean;
  forbidden_words: string[];
}

export interface SourceData {
  channel_id: number;
  source_url: string;
  parse_media: boolean;
  forbidden_words: string[];
}

export interface SourceRow {
  id: number;
  channel_id: number;
  source_url: string;
  parse_media: number;
  forbidden_words: string | null;
}
