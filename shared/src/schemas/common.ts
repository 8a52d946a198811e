/**
 * Common Zod Schemas
 *
 * Base schemas used by the record schemas.
 * This file should NOT import from index.ts to avoid circular dependencies.
 */

import { z } from 'zod';

/** Non-negative money amount; numeric strings from older files are coerced */
export const amountSchema = z.coerce.number().finite().nonnegative();

export const quantitySchema = z.coerce.number().int().nonnegative();

export const positiveQuantitySchema = z.coerce.number().int().positive();

export const ratingSchema = z.number().int().min(1).max(10);

export const isoTimestampSchema = z.string().min(1);

export const ledgerEntryKindSchema = z.enum(['sale', 'resupply']);

export const transactionStatusSchema = z.enum(['recorded', 'partially_reversed', 'fully_reversed']);

export const duplicateResolutionSchema = z.enum(['combine', 'keep_separate', 'cancel']);

export const catalogSchema = z.object({
  brands: z.array(z.string()).default([]),
  sizes: z.array(z.string()).default([]),
  types: z.array(z.string()).default([]),
});
