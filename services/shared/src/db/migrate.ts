import { promises as fs } from 'fs';
import { join } from 'path';
import { pool } from './client';
import { logger } from '../utils/logger';

async function runMigrations() {
     const migrationsDir = join(__dirname, 'migrations');

     try {
          const files = await fs.readdir(migrationsDir);
          const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

          logger.info({ count: sqlFiles.length }, 'Running database migrations');

          for (const file of sqlFiles) {
               const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               await pool.query(sql);
          }

          logger.info('All migrations completed successfully');
     } catch (error) {
          logger.error({ error }, 'Migration failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     runMigrations().catch((error) => {
          logger.fatal({ err: error }, 'Migration error');
          process.exit(1);
     });
}

export { runMigrations };
