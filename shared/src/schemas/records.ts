/**
 * Persistence Record Schemas
 *
 * Shape of lots, ledger entries and transactions as plain records.
 * Field names follow the domain model. The combined `shipping` (lots) and
 * `shippingTaxAllocated` (resupply entries) are written for older readers;
 * when a record carries only the combined value it is read as shipping with
 * no separate tax.
 */

import { z } from 'zod';
import {
  amountSchema,
  catalogSchema,
  isoTimestampSchema,
  positiveQuantitySchema,
  quantitySchema,
  ratingSchema,
  transactionStatusSchema,
  ledgerEntryKindSchema,
} from './common.js';

// ============================================
// LOTS
// ============================================

export const mergeEventRecordSchema = z.object({
  at: isoTimestampSchema,
  count: quantitySchema,
  price: amountSchema,
  shipping: amountSchema,
  tax: amountSchema.default(0),
  unitCost: z.number().finite(),
});

export const lotRecordSchema = z.object({
  /** Missing on records written before lots had stable ids */
  id: z.string().min(1).optional(),
  brand: z.string().default(''),
  name: z.string(),
  size: z.string().default(''),
  type: z.string().default(''),
  count: quantitySchema.default(0),
  price: amountSchema.default(0),
  /** Combined shipping + tax */
  shipping: amountSchema.default(0),
  allocatedShipping: amountSchema.optional(),
  allocatedTax: amountSchema.optional(),
  taxRate: z.number().finite().nonnegative().optional(),
  /** Informational; recomputed on load */
  unitCost: z.number().finite().optional(),
  originalQuantity: quantitySchema.nullable().optional(),
  rating: ratingSchema.nullable().default(null),
  history: z.array(mergeEventRecordSchema).default([]),
});

export type LotRecord = z.output<typeof lotRecordSchema>;

// ============================================
// LEDGER ENTRIES
// ============================================

const ledgerEntryBaseSchema = z.object({
  id: z.string().min(1),
  transactionId: z.string().min(1),
  timestamp: isoTimestampSchema,
  lotId: z.string().min(1).nullable().default(null),
  brand: z.string().default(''),
  name: z.string(),
  size: z.string().default(''),
  unitPrice: amountSchema,
  quantity: positiveQuantitySchema,
  recordedQuantity: positiveQuantitySchema.optional(),
  totalCost: amountSchema,
});

export const saleEntryRecordSchema = ledgerEntryBaseSchema.extend({
  kind: z.literal('sale'),
});

export const resupplyEntryRecordSchema = ledgerEntryBaseSchema.extend({
  kind: z.literal('resupply'),
  price: amountSchema,
  /** Combined shipping + tax */
  shippingTaxAllocated: amountSchema.default(0),
  allocatedShipping: amountSchema.optional(),
  allocatedTax: amountSchema.optional(),
});

export const ledgerEntryRecordSchema = z.discriminatedUnion('kind', [
  saleEntryRecordSchema,
  resupplyEntryRecordSchema,
]);

export type LedgerEntryRecord = z.output<typeof ledgerEntryRecordSchema>;

// ============================================
// TRANSACTIONS
// ============================================

export const transactionRecordSchema = z.object({
  id: z.string().min(1),
  kind: ledgerEntryKindSchema,
  timestamp: isoTimestampSchema,
  status: transactionStatusSchema.default('recorded'),
  entryCount: positiveQuantitySchema,
  totalShipping: amountSchema.optional(),
  taxRatePercent: amountSchema.optional(),
});

export type TransactionRecord = z.output<typeof transactionRecordSchema>;

// ============================================
// SNAPSHOT
// ============================================

export const SNAPSHOT_VERSION = 1;

export const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION).default(SNAPSHOT_VERSION),
  lots: z.array(lotRecordSchema).default([]),
  ledger: z.array(ledgerEntryRecordSchema).default([]),
  transactions: z.array(transactionRecordSchema).default([]),
  catalog: catalogSchema.default({}),
  settings: z
    .object({
      /** Fraction, e.g. 0.086 */
      defaultTaxRate: z.number().finite().nonnegative().optional(),
    })
    .default({}),
});

export type Snapshot = z.output<typeof snapshotSchema>;
