/**
 * Request body schemas for the configuration API.
 *
 * These only check shape. Required-field, reference and site_type checks
 * belong to the store, so its typed errors reach the client unchanged.
 */

import { z } from 'zod';

const stringListSchema = z.array(z.string()).default([]);

const idSchema = z.number().int().positive();

export const channelBodySchema = z.object({
  name: z.string(),
  url: z.string(),
  post_times: stringListSchema,
  forbidden_words: stringListSchema,
});

export const sourceBodySchema = z.object({
  channel_id: idSchema,
  source_url: z.string(),
  parse_media: z.boolean(),
  forbidden_words: stringListSchema,
});

export const siteBodySchema = z.object({
  source_id: idSchema,
  site_url: z.string(),
  site_type: z.string(),
});

// Route and query parameters arrive as strings
export const idParamSchema = z.coerce.number().int().positive();
