import { PoolClient } from 'pg';
import { ItemCatalog } from '@lotledger/shared/src/services/item-catalog';
import { DuplicateItemNameError, ItemNotFoundError } from '@lotledger/shared/src/utils/errors';
import { itemRow } from '../helpers/rows';

describe('ItemCatalog (Unit)', () => {
     let catalog: ItemCatalog;
     let mockClient: jest.Mocked<PoolClient>;

     beforeEach(() => {
          catalog = new ItemCatalog();
          mockClient = {
               query: jest.fn(),
          } as unknown as jest.Mocked<PoolClient>;
     });

     it('should create an item with a unique name', async () => {
          mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
          mockClient.query.mockResolvedValueOnce({
               rows: [itemRow({ id: '3', description: 'Whole bean' })],
          } as never);

          const result = await catalog.createItem(mockClient, {
               name: 'Arabica Beans 1kg',
               description: 'Whole bean',
          });

          expect(mockClient.query).toHaveBeenNthCalledWith(
               2,
               expect.stringContaining('INSERT INTO item'),
               ['Arabica Beans 1kg', 'Whole bean']
          );
          expect(result).toMatchObject({
               ok: true,
               value: { id: 3, name: 'Arabica Beans 1kg', description: 'Whole bean' },
          });
     });

     it('should reject a name already in the catalog', async () => {
          mockClient.query.mockResolvedValueOnce({ rows: [{ id: '1' }] } as never);

          const result = await catalog.createItem(mockClient, { name: 'Arabica Beans 1kg' });

          expect(result.ok).toBe(false);
          if (!result.ok) {
               expect(result.error).toBeInstanceOf(DuplicateItemNameError);
               expect(result.error.message).toBe('Item with name "Arabica Beans 1kg" already exists');
          }
     });

     it('should map a unique violation from a concurrent insert', async () => {
          mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
          mockClient.query.mockRejectedValueOnce({
               code: '23505',
               constraint: 'item_name_key',
          } as never);

          const result = await catalog.createItem(mockClient, { name: 'Arabica Beans 1kg' });

          expect(!result.ok && result.error).toBeInstanceOf(DuplicateItemNameError);
     });

     it('should return a missing item as not found', async () => {
          mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

          const result = await catalog.getItem(mockClient, 8);

          expect(!result.ok && result.error).toBeInstanceOf(ItemNotFoundError);
     });

     it('should page through items in id order', async () => {
          mockClient.query.mockResolvedValueOnce({
               rows: [itemRow({ id: '11' }), itemRow({ id: '12', name: 'Robusta Beans 1kg' })],
          } as never);

          const items = await catalog.listItems(mockClient, { skip: 10, limit: 2 });

          expect(mockClient.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY id'), [
               10, 2,
          ]);
          expect(items.map((item) => item.id)).toEqual([11, 12]);
          expect(items[0].description).toBeUndefined();
     });
});
