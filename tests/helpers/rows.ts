// Row fixtures shaped like node-postgres results (bigint ids and NUMERICs as strings)

export function lotRow(overrides: Record<string, unknown> = {}) {
     return {
          id: '1',
          purchase_id: '1',
          item_id: '1',
          lot_number: 'LOT-1',
          manufacturing_date: null,
          expiry_date: null,
          initial_quantity: '10.0000',
          remaining_quantity: '10.0000',
          created_at: new Date('2026-01-01T00:00:00Z'),
          ...overrides,
     };
}

export function journalRow(overrides: Record<string, unknown> = {}) {
     return {
          id: '1',
          item_id: '1',
          lot_id: null,
          quantity: '5.0000',
          updated_by: 'tester',
          timestamp: new Date('2026-01-02T00:00:00Z'),
          ...overrides,
     };
}

export function purchaseRow(overrides: Record<string, unknown> = {}) {
     return {
          id: '1',
          item_id: '1',
          quantity: '40.0000',
          type: 'imported',
          supplier: 'Harbor Imports',
          unit_price: '12.5000',
          created_by: 'buyer',
          purchase_date: new Date('2026-01-01T00:00:00Z'),
          ...overrides,
     };
}

export function itemRow(overrides: Record<string, unknown> = {}) {
     return {
          id: '1',
          name: 'Arabica Beans 1kg',
          description: null,
          created_at: new Date('2026-01-01T00:00:00Z'),
          ...overrides,
     };
}
