import * as dotenv from 'dotenv';
import { buildApp } from './app';
import { logger } from '@lotledger/shared/src/utils/logger';

dotenv.config();

const PORT = parseInt(process.env.INVENTORY_API_PORT || '3000', 10);
const HOST = process.env.INVENTORY_API_HOST || '0.0.0.0';

async function main() {
     const app = await buildApp({
          logger: { level: process.env.LOG_LEVEL || 'info' },
          corsOrigins: process.env.CORS_ORIGINS?.split(',').map((origin) => origin.trim()),
     });

     await app.listen({ port: PORT, host: HOST });
     logger.info(`Lot Ledger API listening on ${HOST}:${PORT}, docs at /docs`);

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((error) => {
     logger.fatal({ err: error }, 'Failed to start server');
     process.exit(1);
});
