/**
 * Health Check Controller
 * Reports the service as degraded while the database is unreachable.
 */

import { Controller, Get, Inject } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { LoggerService } from '../../shared/logger/logger.service';

export const SERVICE_NAME = 'webhook-dispatch-service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly dataSource: DataSource,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  @Get()
  async health() {
    const database = await this.pingDatabase();
    return {
      success: database === 'up',
      status: database === 'up' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      database,
    };
  }

  private async pingDatabase(): Promise<'up' | 'down'> {
    if (!this.dataSource.isInitialized) {
      return 'down';
    }
    try {
      await this.dataSource.query('SELECT 1');
      return 'up';
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`[HEALTH] Database ping failed: ${errorMessage}`, 'HealthController');
      return 'down';
    }
  }
}
