/**
 * Tests for inventory error codes and result helpers
 */

import {
  INVENTORY_ERROR_CODES,
  InventoryError,
  inventoryError,
  isInventoryError,
  isInventoryErrorCode,
  itemFailure,
} from '../inventory.js';

describe('isInventoryErrorCode', () => {
  it('accepts known codes only', () => {
    expect(isInventoryErrorCode('INVENTORY_LOT_NOT_FOUND')).toBe(true);
    expect(isInventoryErrorCode('LOT_NOT_FOUND')).toBe(false);
    expect(isInventoryErrorCode(404)).toBe(false);
  });
});

describe('inventoryError', () => {
  it('falls back to the user message for the code', () => {
    expect(inventoryError(INVENTORY_ERROR_CODES.LOT_NOT_FOUND)).toEqual({
      success: false,
      error: { code: 'INVENTORY_LOT_NOT_FOUND', message: 'Lot not found' },
    });
  });

  it('is recognised as an error result', () => {
    expect(isInventoryError(inventoryError(INVENTORY_ERROR_CODES.UNKNOWN, 'boom'))).toBe(true);
  });
});

describe('itemFailure', () => {
  it('omits context when none is given', () => {
    expect(itemFailure(2, INVENTORY_ERROR_CODES.LOT_NOT_FOUND)).toEqual({
      index: 2,
      code: 'INVENTORY_LOT_NOT_FOUND',
      message: 'Lot not found',
    });
  });
});

describe('InventoryError', () => {
  it('keeps the technical message for logs and the user message for results', () => {
    const error = new InventoryError(INVENTORY_ERROR_CODES.LOT_NOT_FOUND, {
      technicalMessage: 'no lot with id lot-9',
    });

    expect(error).toBeInstanceOf(InventoryError);
    expect(error.message).toBe('no lot with id lot-9');
    expect(error.toResult()).toEqual({
      success: false,
      error: { code: 'INVENTORY_LOT_NOT_FOUND', message: 'Lot not found' },
    });
  });
});
