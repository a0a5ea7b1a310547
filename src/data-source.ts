import { DataSource } from 'typeorm';
import * as dotenv from 'dotenv';
import { WebhookEndpoint } from './webhooks/entities/webhook-endpoint.entity';
import { WebhookDelivery } from './webhooks/entities/webhook-delivery.entity';

// Load environment variables
dotenv.config();

/**
 * Used by the TypeORM CLI (`npm run migration:run`) and by bootstrap when RUN_MIGRATIONS=true.
 */
export const AppDataSource = new DataSource({
  type: 'postgres',
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USER || 'webhooks',
  password: process.env.DB_PASSWORD || '',
  database: process.env.DB_NAME || 'webhooks',
  entities: [WebhookEndpoint, WebhookDelivery],
  // dist: __dirname is dist/src → dist/src/migrations/*.js
  migrations: [__dirname + '/migrations/*.' + (__filename.endsWith('.ts') ? 'ts' : 'js')],
  synchronize: false,
  logging: process.env.NODE_ENV === 'development',
});
