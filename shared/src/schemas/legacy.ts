/**
 * Legacy Record Schemas
 *
 * Files written by the original desktop application:
 * - cigar_inventory.json: lots keyed by `cigar` with a single combined `shipping`
 * - sales_history.json: one record per sold line, grouped only by `date`
 * - cigar_brands.json / cigar_sizes.json / cigar_types.json: pick lists
 *
 * Numbers were sometimes written as strings; they are coerced here.
 */

import { z } from 'zod';
import { amountSchema, quantitySchema } from './common.js';

export const legacyLotSchema = z.object({
  brand: z.string().default(''),
  cigar: z.string(),
  size: z.string().default(''),
  type: z.string().default(''),
  count: quantitySchema.default(0),
  price: amountSchema.default(0),
  shipping: amountSchema.default(0),
  price_per_stick: z.coerce.number().optional(),
  /** Stored as a float by the old rating dialog */
  personal_rating: z.coerce.number().nullable().optional(),
  original_quantity: quantitySchema.nullable().optional(),
});

export type LegacyLot = z.infer<typeof legacyLotSchema>;

export const legacySaleSchema = z.object({
  /** "YYYY-MM-DD HH:MM:SS", local time */
  date: z.string().min(1),
  brand: z.string().default(''),
  cigar: z.string(),
  size: z.string().default(''),
  price_per_stick: amountSchema,
  quantity: z.coerce.number().int().positive().default(1),
  /** Missing on the oldest records; defaults to price_per_stick × quantity */
  total_cost: amountSchema.optional(),
});

export type LegacySale = z.infer<typeof legacySaleSchema>;

export const legacyInventorySchema = z.array(legacyLotSchema);

export const legacySalesSchema = z.array(legacySaleSchema);

export const legacyCatalogListSchema = z.array(z.string());
