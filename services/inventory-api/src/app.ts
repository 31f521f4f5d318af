import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { registerItemRoutes } from './routes/items';
import { registerInventoryRoutes } from './routes/inventory';
import { registerPurchaseRoutes } from './routes/purchases';
import { registerLotRoutes } from './routes/lots';
import { checkConnection } from '@lotledger/shared/src/db/client';

export interface BuildAppOptions {
     logger?: FastifyServerOptions['logger'];
     corsOrigins?: string[];
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? false,
          requestIdHeader: 'x-correlation-id',
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, { origin: options.corsOrigins ?? true });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Lot Ledger API',
                    description: 'Purchases create lots; withdrawals drain them oldest first',
                    version: '1.0.0',
               },
               tags: [
                    { name: 'items' },
                    { name: 'inventory' },
                    { name: 'purchases' },
                    { name: 'lots' },
               ],
          },
     });
     await app.register(swaggerUi, { routePrefix: '/docs' });

     app.get('/health', async () => ({ status: 'ok' }));

     app.get('/health/ready', async (_request, reply) => {
          if (!(await checkConnection())) {
               return reply.code(503).send({ status: 'not_ready', database: 'unreachable' });
          }
          return { status: 'ready', database: 'ok' };
     });

     await app.register(registerItemRoutes, { prefix: '/items' });
     await app.register(registerInventoryRoutes, { prefix: '/inventory' });
     await app.register(registerPurchaseRoutes, { prefix: '/purchases' });
     await app.register(registerLotRoutes, { prefix: '/lots' });

     return app;
}
