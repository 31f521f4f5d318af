import { PoolClient } from 'pg';
import { AllocationEngine, parseExplicitLotIncreasePolicy } from '@lotledger/shared/src/services/allocation-engine';
import {
     InsufficientAggregateQuantityError,
     InsufficientLotQuantityError,
     InvalidQuantityError,
     ItemNotFoundError,
     LotNotFoundError,
} from '@lotledger/shared/src/utils/errors';
import { journalRow, lotRow } from '../helpers/rows';

function statements(client: jest.Mocked<PoolClient>): string[] {
     return client.query.mock.calls.map(([sql]) => String(sql).replace(/\s+/g, ' ').trim());
}

describe('AllocationEngine (Unit)', () => {
     let engine: AllocationEngine;
     let mockClient: jest.Mocked<PoolClient>;

     beforeEach(() => {
          engine = new AllocationEngine();
          mockClient = {
               query: jest.fn(),
          } as unknown as jest.Mocked<PoolClient>;
     });

     describe('validation', () => {
          it('should reject a non-finite quantity before touching the database', async () => {
               const result = await engine.record(mockClient, {
                    itemId: 1,
                    quantity: Number.NaN,
                    actor: 'tester',
               });

               expect(!result.ok && result.error).toBeInstanceOf(InvalidQuantityError);
               expect(mockClient.query).not.toHaveBeenCalled();
          });

          it('should reject more than four decimal places', async () => {
               const result = await engine.record(mockClient, {
                    itemId: 1,
                    quantity: 1.00001,
                    actor: 'tester',
               });

               expect(!result.ok && result.error).toBeInstanceOf(InvalidQuantityError);
          });

          it('should reject a withdrawal too large for the quantity column', async () => {
               const result = await engine.record(mockClient, {
                    itemId: 1,
                    quantity: -1e15,
                    actor: 'tester',
               });

               expect(!result.ok && result.error).toBeInstanceOf(InvalidQuantityError);
               expect(!result.ok && result.error.message).toBe(
                    'Quantity -1000000000000000 is out of range, must be below 100000000000000'
               );
               expect(mockClient.query).not.toHaveBeenCalled();
          });

          it('should reject an unknown item', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               const result = await engine.record(mockClient, {
                    itemId: 42,
                    quantity: 5,
                    actor: 'tester',
               });

               expect(!result.ok && result.error).toBeInstanceOf(ItemNotFoundError);
               expect(mockClient.query).toHaveBeenCalledTimes(1);
          });
     });

     describe('increase without a lot', () => {
          it('should journal the change without touching any lot', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [journalRow({ id: '10', quantity: '5.0000' })],
               } as never);
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    quantity: 5,
                    actor: 'tester',
               });

               expect(result.ok).toBe(true);
               if (result.ok) {
                    expect(result.value.allocations).toEqual([]);
                    expect(result.value.entry).toMatchObject({ id: 10, lotId: null, quantity: 5 });
               }
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    2,
                    expect.stringContaining('INSERT INTO inventory_record'),
                    [1, null, '5.0000', 'tester']
               );
               expect(statements(mockClient).some((sql) => /\blot\b/.test(sql))).toBe(false);
          });
     });

     describe('FIFO withdrawal', () => {
          it('should drain the oldest lot first and journal one entry', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [
                         lotRow({ id: '1', remaining_quantity: '5.0000', initial_quantity: '5.0000' }),
                         lotRow({ id: '2', lot_number: 'LOT-2', remaining_quantity: '10.0000' }),
                    ],
               } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [lotRow({ id: '1', remaining_quantity: '0.0000', initial_quantity: '5.0000' })],
               } as never);
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [lotRow({ id: '2', lot_number: 'LOT-2', remaining_quantity: '7.0000' })],
               } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [journalRow({ id: '11', lot_id: '1', quantity: '-8.0000' })],
               } as never);
               mockClient.query.mockResolvedValue({ rows: [] } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    quantity: -8,
                    actor: 'tester',
               });

               expect(result.ok).toBe(true);
               if (result.ok) {
                    expect(result.value.allocations).toEqual([
                         { lotId: 1, quantity: 5 },
                         { lotId: 2, quantity: 3 },
                    ]);
                    expect(result.value.entry).toMatchObject({ id: 11, lotId: 1, quantity: -8 });
               }

               const sql = statements(mockClient);
               expect(sql[1]).toContain('FOR UPDATE OF l');
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    3,
                    expect.stringContaining('UPDATE lot l'),
                    ['5.0000', 1]
               );
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    4,
                    expect.stringContaining('INSERT INTO domain_event'),
                    ['LotDepleted', expect.any(String)]
               );
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    5,
                    expect.stringContaining('UPDATE lot l'),
                    ['3.0000', 2]
               );
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    6,
                    expect.stringContaining('INSERT INTO inventory_record'),
                    [1, 1, '-8.0000', 'tester']
               );
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    7,
                    expect.stringContaining('INSERT INTO lot_allocation'),
                    [11, 1, '5.0000']
               );
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    8,
                    expect.stringContaining('INSERT INTO lot_allocation'),
                    [11, 2, '3.0000']
               );
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    9,
                    expect.stringContaining('INSERT INTO domain_event'),
                    ['InventoryRecorded', expect.any(String)]
               );
               expect(mockClient.query).toHaveBeenCalledTimes(9);
          });

          it('should reject a shortfall without updating any lot', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [
                         lotRow({ id: '1', remaining_quantity: '5.0000' }),
                         lotRow({ id: '2', lot_number: 'LOT-2', remaining_quantity: '10.0000' }),
                    ],
               } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    quantity: -20,
                    actor: 'tester',
               });

               expect(result.ok).toBe(false);
               if (!result.ok) {
                    expect(result.error).toBeInstanceOf(InsufficientAggregateQuantityError);
                    expect(result.error.details).toEqual({
                         itemId: 1,
                         requested: 20,
                         available: 15,
                         shortfall: 5,
                    });
               }
               expect(mockClient.query).toHaveBeenCalledTimes(2);
               expect(statements(mockClient).some((sql) => sql.startsWith('UPDATE'))).toBe(false);
          });

          it('should treat an item with no lots as having nothing available', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    quantity: -1,
                    actor: 'tester',
               });

               expect(!result.ok && result.error.details).toEqual({
                    itemId: 1,
                    requested: 1,
                    available: 0,
                    shortfall: 1,
               });
          });
     });

     describe('named lot', () => {
          it('should deduct a withdrawal from the named lot only', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [lotRow({ id: '2', remaining_quantity: '10.0000' })],
               } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [lotRow({ id: '2', remaining_quantity: '6.0000' })],
               } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [journalRow({ id: '12', lot_id: '2', quantity: '-4.0000' })],
               } as never);
               mockClient.query.mockResolvedValue({ rows: [] } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    lotId: 2,
                    quantity: -4,
                    actor: 'tester',
               });

               expect(result.ok && result.value.allocations).toEqual([{ lotId: 2, quantity: 4 }]);
               const sql = statements(mockClient);
               expect(sql[1]).toContain('FOR UPDATE OF l');
               expect(sql.some((statement) => statement.includes('remaining_quantity > 0'))).toBe(false);
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    3,
                    expect.stringContaining('UPDATE lot l'),
                    ['4.0000', 2]
               );
          });

          it('should refuse to overdraw the named lot', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [lotRow({ id: '2', remaining_quantity: '3.0000' })],
               } as never);
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [lotRow({ id: '2', remaining_quantity: '3.0000' })],
               } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    lotId: 2,
                    quantity: -5,
                    actor: 'tester',
               });

               expect(!result.ok && result.error).toBeInstanceOf(InsufficientLotQuantityError);
               expect(
                    statements(mockClient).some((sql) => sql.includes('INSERT INTO inventory_record'))
               ).toBe(false);
          });

          it('should refuse a lot that belongs to another item', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [lotRow({ id: '2', item_id: '9' })],
               } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    lotId: 2,
                    quantity: -1,
                    actor: 'tester',
               });

               expect(!result.ok && result.error).toBeInstanceOf(LotNotFoundError);
          });

          it('should leave the lot alone for an increase under record-only', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({ rows: [lotRow({ id: '2' })] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [journalRow({ id: '13', lot_id: '2', quantity: '3.0000' })],
               } as never);
               mockClient.query.mockResolvedValue({ rows: [] } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    lotId: 2,
                    quantity: 3,
                    actor: 'tester',
               });

               expect(result.ok && result.value.entry.lotId).toBe(2);
               expect(result.ok && result.value.allocations).toEqual([]);
               expect(statements(mockClient).some((sql) => sql.startsWith('UPDATE'))).toBe(false);
          });

          it('should deduct an increase from the lot under consume', async () => {
               engine = new AllocationEngine({ explicitLotIncrease: 'consume' });
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);
               mockClient.query.mockResolvedValueOnce({ rows: [lotRow({ id: '2' })] } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [lotRow({ id: '2', remaining_quantity: '7.0000' })],
               } as never);
               mockClient.query.mockResolvedValueOnce({
                    rows: [journalRow({ id: '14', lot_id: '2', quantity: '3.0000' })],
               } as never);
               mockClient.query.mockResolvedValue({ rows: [] } as never);

               const result = await engine.record(mockClient, {
                    itemId: 1,
                    lotId: 2,
                    quantity: 3,
                    actor: 'tester',
               });

               expect(result.ok && result.value.allocations).toEqual([{ lotId: 2, quantity: 3 }]);
               expect(mockClient.query).toHaveBeenNthCalledWith(
                    3,
                    expect.stringContaining('UPDATE lot l'),
                    ['3.0000', 2]
               );
          });
     });

     describe('parseExplicitLotIncreasePolicy', () => {
          it('should default to record-only', () => {
               expect(parseExplicitLotIncreasePolicy(undefined)).toBe('record-only');
               expect(parseExplicitLotIncreasePolicy('bogus')).toBe('record-only');
               expect(parseExplicitLotIncreasePolicy('consume')).toBe('consume');
          });
     });
});
