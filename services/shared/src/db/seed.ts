import { pool, withTransaction } from './client';
import { ItemCatalog } from '../services/item-catalog';
import { PurchaseRecorder } from '../services/purchase-recorder';
import { CreatePurchaseRequest } from '../types/ledger.types';
import { logger } from '../utils/logger';

const catalog = new ItemCatalog();
const recorder = new PurchaseRecorder(catalog);

const sampleItems = [
     { name: 'Arabica Beans 1kg', description: 'Single-origin green coffee' },
     { name: 'Paper Filters #4', description: 'Box of 100' },
     { name: 'Oat Milk 1L' },
];

async function seedDatabase() {
     try {
          logger.info('Seeding database with sample data');

          await withTransaction(async (client) => {
               for (const sample of sampleItems) {
                    const created = await catalog.createItem(client, sample);
                    if (!created.ok) {
                         logger.info({ name: sample.name }, 'Item already present, skipping');
                         continue;
                    }

                    const item = created.value;
                    const purchases: CreatePurchaseRequest[] = [
                         {
                              itemId: item.id,
                              quantity: 40,
                              type: 'imported',
                              supplier: 'Harbor Imports',
                              unitPrice: 12.5,
                              createdBy: 'seed',
                              expiryDate: '2027-06-30',
                         },
                         {
                              itemId: item.id,
                              quantity: 25,
                              type: 'domestic',
                              supplier: 'Local Wholesale',
                              unitPrice: 9.75,
                              createdBy: 'seed',
                              lotNumber: `SEED-${item.id}-B`,
                         },
                    ];

                    for (const purchase of purchases) {
                         const recorded = await recorder.createPurchase(client, purchase);
                         if (!recorded.ok) {
                              throw recorded.error;
                         }
                    }
               }
          });

          logger.info('Database seeding completed successfully');
     } catch (error) {
          logger.error({ error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((error) => {
          logger.fatal({ err: error }, 'Seed error');
          process.exit(1);
     });
}

export { seedDatabase };
