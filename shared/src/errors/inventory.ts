/**
 * Inventory Error Utilities
 *
 * Error codes, user-friendly messages, and InventoryError class for the lot and ledger domain.
 * Domain operations report these as results; nothing here is thrown by the engine itself.
 */

// ============================================
// ERROR CODES
// ============================================

/**
 * Error codes for the lot and ledger domain
 */
export const INVENTORY_ERROR_CODES = {
  // Input
  INVALID_NUMERIC_INPUT: 'INVENTORY_INVALID_NUMERIC_INPUT',
  INVALID_QUANTITY: 'INVENTORY_INVALID_QUANTITY',
  INVALID_RATING: 'INVENTORY_INVALID_RATING',

  // Stock
  INSUFFICIENT_STOCK: 'INVENTORY_INSUFFICIENT_STOCK',
  DUPLICATE_LOT_CONFLICT: 'INVENTORY_DUPLICATE_LOT_CONFLICT',
  LOT_NOT_FOUND: 'INVENTORY_LOT_NOT_FOUND',

  // Ledger
  REVERSAL_NOT_FOUND: 'INVENTORY_REVERSAL_NOT_FOUND',

  // Storage
  PERSISTENCE_FAILED: 'INVENTORY_PERSISTENCE_FAILED',
  INVALID_SNAPSHOT: 'INVENTORY_INVALID_SNAPSHOT',

  // General
  UNKNOWN: 'INVENTORY_UNKNOWN_ERROR',
} as const;

export type InventoryErrorCode = (typeof INVENTORY_ERROR_CODES)[keyof typeof INVENTORY_ERROR_CODES];

// ============================================
// USER-FRIENDLY MESSAGES
// ============================================

export const INVENTORY_ERROR_MESSAGES: Record<string, string> = {
  [INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT]: 'Please enter a valid number',
  [INVENTORY_ERROR_CODES.INVALID_QUANTITY]: 'Quantity must be a whole number of at least 1',
  [INVENTORY_ERROR_CODES.INVALID_RATING]: 'Rating must be a whole number between 1 and 10',

  [INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK]: 'Not enough stock for this item',
  [INVENTORY_ERROR_CODES.DUPLICATE_LOT_CONFLICT]: 'A lot with the same brand, name and size already exists',
  [INVENTORY_ERROR_CODES.LOT_NOT_FOUND]: 'Lot not found',

  [INVENTORY_ERROR_CODES.REVERSAL_NOT_FOUND]: 'This entry has already been reversed or does not exist',

  [INVENTORY_ERROR_CODES.PERSISTENCE_FAILED]: 'Changes were applied but could not be saved',
  [INVENTORY_ERROR_CODES.INVALID_SNAPSHOT]: 'Stored inventory data is not readable',

  [INVENTORY_ERROR_CODES.UNKNOWN]: 'An unexpected error occurred',
};

// ============================================
// HELPER FUNCTIONS
// ============================================

export function getInventoryErrorMessage(code: string, fallback?: string): string {
  return INVENTORY_ERROR_MESSAGES[code] || fallback || 'An error occurred';
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(INVENTORY_ERROR_CODES));

export function isInventoryErrorCode(code: unknown): code is InventoryErrorCode {
  return typeof code === 'string' && KNOWN_CODES.has(code);
}

// ============================================
// INVENTORY ERROR CLASS
// ============================================

/**
 * Structured error for the inventory domain
 * Includes both a technical message (for logs) and user-friendly message (for UI)
 */
export class InventoryError extends Error {
  readonly code: InventoryErrorCode;
  readonly userMessage: string;
  readonly context?: Record<string, unknown>;

  constructor(
    code: InventoryErrorCode,
    options?: {
      technicalMessage?: string;
      context?: Record<string, unknown>;
    }
  ) {
    const userMessage = getInventoryErrorMessage(code);
    super(options?.technicalMessage || userMessage);
    this.name = 'InventoryError';
    this.code = code;
    this.userMessage = userMessage;
    this.context = options?.context;
    Object.setPrototypeOf(this, InventoryError.prototype);
  }

  toResult(): InventoryErrorResult {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.userMessage,
      },
    };
  }
}

// ============================================
// RESULT TYPES
// ============================================

export interface InventoryErrorResult {
  success: false;
  error: {
    code: InventoryErrorCode;
    message: string;
  };
}

export interface InventorySuccessResult<T> {
  success: true;
  data: T;
}

export type InventoryResult<T> = InventorySuccessResult<T> | InventoryErrorResult;

/**
 * One skipped line of a batch (sale items, resupply items, reversal entries).
 * `index` is the position in the caller's input.
 */
export interface ItemFailure {
  index: number;
  code: InventoryErrorCode;
  message: string;
  context?: Record<string, unknown>;
}

// ============================================
// RESULT HELPERS
// ============================================

export function inventorySuccess<T>(data: T): InventorySuccessResult<T> {
  return { success: true, data };
}

export function inventoryError(code: InventoryErrorCode, message?: string): InventoryErrorResult {
  return {
    success: false,
    error: {
      code,
      message: message || getInventoryErrorMessage(code),
    },
  };
}

export function itemFailure(
  index: number,
  code: InventoryErrorCode,
  context?: Record<string, unknown>,
  message?: string,
): ItemFailure {
  return {
    index,
    code,
    message: message || getInventoryErrorMessage(code),
    ...(context ? { context } : {}),
  };
}

export function isInventoryError<T>(result: InventoryResult<T>): result is InventoryErrorResult {
  return result.success === false;
}
