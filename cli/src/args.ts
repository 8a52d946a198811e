/**
 * Argument parsing for commands that take structured input
 */

import { z } from 'zod';
import {
  INVENTORY_ERROR_CODES,
  duplicateResolutionSchema,
  inventoryError,
  inventorySuccess,
  type DuplicateResolution,
  type InventoryResult,
  type LotInput,
  type LotPatch,
  type SaleItem,
} from '@humidor/shared';

// ============================================
// SALE ITEMS
// ============================================

/** "lotId:qty", or "lotId" for a single unit */
const saleItemSchema = z
  .string()
  .min(1)
  .transform((arg) => {
    const at = arg.lastIndexOf(':');
    return at === -1 ? { lotId: arg, quantity: '1' } : { lotId: arg.slice(0, at), quantity: arg.slice(at + 1) };
  })
  .pipe(
    z.object({
      lotId: z.string().min(1, 'missing lot id'),
      quantity: z.coerce.number(),
    })
  );

export function parseSaleItems(args: readonly string[]): InventoryResult<SaleItem[]> {
  const items: SaleItem[] = [];
  for (const arg of args) {
    const parsed = saleItemSchema.safeParse(arg);
    if (!parsed.success) {
      return inventoryError(
        INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT,
        `"${arg}" is not lotId:quantity (${parsed.error.issues[0]?.message})`
      );
    }
    items.push(parsed.data);
  }
  return inventorySuccess(items);
}

// ============================================
// RESUPPLY ITEMS
// ============================================

export const resupplyItemSchema = z.object({
  brand: z.string().default(''),
  name: z.string().min(1),
  size: z.string().default(''),
  type: z.string().optional(),
  count: z.coerce.number(),
  price: z.coerce.number(),
  rating: z.number().int().min(1).max(10).nullable().optional(),
});

/** Each `--item` is a JSON object: {"brand":"Padron","name":"1926","size":"Robusto","count":10,"price":50} */
export function parseResupplyItems(args: readonly string[]): InventoryResult<LotInput[]> {
  const items: LotInput[] = [];
  for (const [i, arg] of args.entries()) {
    let raw: unknown;
    try {
      raw = JSON.parse(arg);
    } catch {
      return inventoryError(INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT, `Item ${i + 1} is not valid JSON`);
    }
    const parsed = resupplyItemSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return inventoryError(
        INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT,
        `Item ${i + 1}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`
      );
    }
    items.push(parsed.data);
  }
  return inventorySuccess(items);
}

// ============================================
// LOT EDITS
// ============================================

export interface LotEditOptions {
  brand?: string;
  name?: string;
  size?: string;
  type?: string;
  count?: string;
  price?: string;
  shipping?: string;
  tax?: string;
  rating?: string;
}

const PATCH_FIELDS = ['brand', 'name', 'size', 'type', 'count', 'price', 'shipping', 'tax', 'rating'] as const;

/** Only the options that were given; numeric strings are parsed by the engine */
export function toLotPatch(opts: LotEditOptions): LotPatch {
  const patch: LotPatch = {};
  for (const key of PATCH_FIELDS) {
    const value = opts[key];
    if (value !== undefined) patch[key] = value;
  }
  return patch;
}

/** "keep" is accepted as shorthand for keep_separate */
const onDuplicateSchema = z
  .string()
  .toLowerCase()
  .transform((value) => (value === 'keep' ? 'keep_separate' : value))
  .pipe(duplicateResolutionSchema);

export function parseOnDuplicate(value: string | undefined): DuplicateResolution | undefined {
  if (value === undefined) return undefined;
  const parsed = onDuplicateSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}
