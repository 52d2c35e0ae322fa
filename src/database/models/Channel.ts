/**
 * Channel model - an output destination with its own posting schedule
 * and word filter. Root of the configuration tree.
 */

export interface Channel {
  id: number;
  name: string; // unique
  url: string; // unique
  post_times: string[]; // ordered, e.g. ["09:00", "18:00"]
  forbidden_words: string[];
}

/**
 * Full record accepted by create and update (update replaces every field).
 */
export interface ChannelData {
  name: string;
  url: string;
  post_times: string[];
  forbidden_words: string[];
}

export interface ChannelRow {
  id: number;
  name: string;
  url: string;
  post_times: string | null;
  forbidden_words: string | null;
}
