/**
 * Column codecs for values SQLite has no native type for.
 *
 * String lists are stored as JSON array text and booleans as 0/1. Both
 * directions are exact: order and duplicates survive a write/read pair.
 */

import { z } from 'zod';
import { CorruptValueError } from './errors';
import { SITE_TYPES, SiteType } from './models';

const stringListSchema = z.array(z.string());

export const encodeStringList = (values: readonly string[]): string =>
  JSON.stringify(values);

export const decodeStringList = (value: string | null, field: string): string[] => {
  // Rows written before the column was populated
  if (value === null) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new CorruptValueError(field, value, error);
  }

  const result = stringListSchema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptValueError(field, value, result.error);
  }
  return result.data;
};

export const encodeBoolean = (value: boolean): 0 | 1 => (value ? 1 : 0);

export const decodeBoolean = (value: number): boolean => value !== 0;

export const isSiteType = (value: string): value is SiteType =>
  SITE_TYPES.some((type) => type === value);
