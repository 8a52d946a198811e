/**
 * Shared Error Utilities
 *
 * Export barrel for domain-specific error utilities.
 */

export {
  // Error codes
  INVENTORY_ERROR_CODES,
  type InventoryErrorCode,
  // Messages
  INVENTORY_ERROR_MESSAGES,
  getInventoryErrorMessage,
  isInventoryErrorCode,
  // Error class
  InventoryError,
  // Result types
  type InventoryErrorResult,
  type InventorySuccessResult,
  type InventoryResult,
  type ItemFailure,
  // Result helpers
  inventorySuccess,
  inventoryError,
  itemFailure,
  isInventoryError,
} from './inventory.js';
