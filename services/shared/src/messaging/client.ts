import * as amqplib from 'amqplib';
import type { Channel, Options } from 'amqplib';
import { StockEventType } from '../types/inventory.types';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const INVENTORY_EVENTS_EXCHANGE = 'inventory.events';

export function routingKeyFor(type: StockEventType): string {
     return `inventory.${type}`;
}

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
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

     const conn = connection ?? (await connect());
     connection = conn;

     const ch = await conn.createChannel();
     await ch.assertExchange(INVENTORY_EVENTS_EXCHANGE, 'topic', { durable: true });

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

/**
 * Publishes one stock event. Resolves false when the channel's write buffer is full;
 * the message is still queued locally in that case.
 */
export async function publishEvent(
     type: StockEventType,
     payload: Record<string, unknown>,
     options: Options.Publish = {}
): Promise<boolean> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     return ch.publish(INVENTORY_EVENTS_EXCHANGE, routingKeyFor(type), content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
          type,
          ...options,
     });
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
