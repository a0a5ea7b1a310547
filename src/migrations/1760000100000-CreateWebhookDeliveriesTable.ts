import { MigrationInterface, QueryRunner, Table, TableIndex, TableForeignKey } from 'typeorm';

export class CreateWebhookDeliveriesTable1760000100000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'webhook_deliveries',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            generationStrategy: 'uuid',
            default: 'uuid_generate_v4()',
          },
          {
            name: 'endpoint_id',
            type: 'uuid',
          },
          {
            name: 'event',
            type: 'varchar',
            length: '50',
          },
          {
            name: 'payload',
            type: 'jsonb',
          },
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            default: "'pending'",
          },
          {
            name: 'attempt_count',
            type: 'int',
            default: 0,
          },
          {
            name: 'max_attempts',
            type: 'int',
            default: 3,
          },
          {
            name: 'response_status_code',
            type: 'int',
            isNullable: true,
          },
          {
            name: 'response_body',
            type: 'text',
            default: "''",
          },
          {
            name: 'error_message',
            type: 'text',
            default: "''",
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'CURRENT_TIMESTAMP',
          },
          {
            name: 'updated_at',
            type: 'timestamptz',
            default: 'CURRENT_TIMESTAMP',
          },
          {
            name: 'delivered_at',
            type: 'timestamptz',
            isNullable: true,
          },
          {
            name: 'next_retry_at',
            type: 'timestamptz',
            isNullable: true,
          },
          {
            name: 'claimed_at',
            type: 'timestamptz',
            isNullable: true,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'webhook_deliveries',
      new TableIndex({
        name: 'idx_webhook_deliveries_status_next_retry',
        columnNames: ['status', 'next_retry_at'],
      }),
    );

    await queryRunner.createIndex(
      'webhook_deliveries',
      new TableIndex({
        name: 'idx_webhook_deliveries_endpoint_created',
        columnNames: ['endpoint_id', 'created_at'],
      }),
    );

    await queryRunner.createForeignKey(
      'webhook_deliveries',
      new TableForeignKey({
        columnNames: ['endpoint_id'],
        referencedTableName: 'webhook_endpoints',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    const table = await queryRunner.getTable('webhook_deliveries');
    if (table) {
      for (const fk of table.foreignKeys) {
        await queryRunner.dropForeignKey('webhook_deliveries', fk);
      }
    }
    await queryRunner.dropTable('webhook_deliveries');
  }
}
