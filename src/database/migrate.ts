import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { Kysely, Migration, MigrationProvider, Migrator, PostgresDialect } from 'kysely';
import { Pool } from 'pg';
import * as inventoryCosting from './migrations/0001-inventory-costing';

const logger = new Logger('Migrate');

class StaticMigrationProvider implements MigrationProvider {
  async getMigrations(): Promise<Record<string, Migration>> {
    return {
      '0001-inventory-costing': inventoryCosting,
    };
  }
}

async function migrate() {
  const db = new Kysely<unknown>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString: process.env.DATABASE_URL }),
    }),
  });

  const migrator = new Migrator({ db, provider: new StaticMigrationProvider() });
  const { error, results } = await migrator.migrateToLatest();

  for (const result of results ?? []) {
    if (result.status === 'Success') {
      logger.log(`Applied migration ${result.migrationName}`);
    } else if (result.status === 'Error') {
      logger.error(`Failed to apply migration ${result.migrationName}`);
    }
  }

  await db.destroy();

  if (error) {
    throw error;
  }
}

migrate().catch((error: unknown) => {
  logger.error('Migration run failed', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
