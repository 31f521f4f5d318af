import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const INVENTORY_EVENTS_EXCHANGE = 'inventory.events';
export const INVENTORY_AUDIT_QUEUE = 'inventory.audit';
const DEAD_LETTER_EXCHANGE = 'dlx.inventory';
const INVENTORY_AUDIT_DLQ = 'dlq.inventory.audit';

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (error) => {
          logger.error({ err: error }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, will reconnect on next publish');
          connection = null;
          channel = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();

     await ch.assertExchange(INVENTORY_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     await ch.assertQueue(INVENTORY_AUDIT_QUEUE, {
          durable: true,
          deadLetterExchange: DEAD_LETTER_EXCHANGE,
          deadLetterRoutingKey: INVENTORY_AUDIT_DLQ,
     });
     await ch.assertQueue(INVENTORY_AUDIT_DLQ, { durable: true });

     // Every ledger event is retained on the audit queue
     await ch.bindQueue(INVENTORY_AUDIT_QUEUE, INVENTORY_EVENTS_EXCHANGE, 'inventory.#');
     await ch.bindQueue(INVENTORY_AUDIT_DLQ, DEAD_LETTER_EXCHANGE, INVENTORY_AUDIT_DLQ);

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}
