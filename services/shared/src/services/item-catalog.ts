import { PoolClient } from 'pg';
import { CreateItemRequest, Item, Page } from '../types/ledger.types';
import { DuplicateItemNameError, ItemNotFoundError } from '../utils/errors';
import { isUniqueViolation } from '../utils/pg-errors';
import { Result, err, ok } from '../utils/result';
import { logger } from '../utils/logger';

interface ItemRow {
     id: string;
     name: string;
     description: string | null;
     created_at: Date;
}

function toItem(row: ItemRow): Item {
     return {
          id: Number(row.id),
          name: row.name,
          description: row.description ?? undefined,
          createdAt: row.created_at,
     };
}

export class ItemCatalog {
     async createItem(
          client: PoolClient,
          request: CreateItemRequest
     ): Promise<Result<Item, DuplicateItemNameError>> {
          const { rows: existing } = await client.query<{ id: string }>(
               `SELECT id FROM item WHERE name = $1`,
               [request.name]
          );
          if (existing.length > 0) {
               return err(new DuplicateItemNameError(request.name));
          }

          try {
               const { rows } = await client.query<ItemRow>(
                    `
        INSERT INTO item (name, description)
        VALUES ($1, $2)
        RETURNING id, name, description, created_at
      `,
                    [request.name, request.description ?? null]
               );
               const item = toItem(rows[0]);
               logger.info({ itemId: item.id, name: item.name }, 'Item created');
               return ok(item);
          } catch (error) {
               // Lost a race with a concurrent insert of the same name
               if (isUniqueViolation(error, 'item_name_key')) {
                    return err(new DuplicateItemNameError(request.name));
               }
               throw error;
          }
     }

     async getItem(client: PoolClient, itemId: number): Promise<Result<Item, ItemNotFoundError>> {
          const { rows } = await client.query<ItemRow>(
               `SELECT id, name, description, created_at FROM item WHERE id = $1`,
               [itemId]
          );
          if (rows.length === 0) {
               return err(new ItemNotFoundError(itemId));
          }
          return ok(toItem(rows[0]));
     }

     async itemExists(client: PoolClient, itemId: number): Promise<boolean> {
          const { rows } = await client.query<{ id: string }>(`SELECT id FROM item WHERE id = $1`, [
               itemId,
          ]);
          return rows.length > 0;
     }

     async listItems(client: PoolClient, { skip = 0, limit = 100 }: Page = {}): Promise<Item[]> {
          const { rows } = await client.query<ItemRow>(
               `
      SELECT id, name, description, created_at
      FROM item
      ORDER BY id
      OFFSET $1
      LIMIT $2
    `,
               [skip, limit]
          );
          return rows.map(toItem);
     }
}
