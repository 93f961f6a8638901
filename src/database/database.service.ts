import { HttpException, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kysely, PostgresDialect } from 'kysely';
import { Pool, types } from 'pg';
import { DatabaseConfig } from '../config/configuration';
import { TransactionFailedException } from '../common/exceptions';
import { Database, DbExecutor } from './database.types';

const PG_DATE_OID = 1082;

// Keep `date` columns as calendar strings instead of local-midnight Dates.
types.setTypeParser(PG_DATE_OID, (value: string) => value);

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly db: DbExecutor;

  constructor(configService: ConfigService) {
    const config = configService.getOrThrow<DatabaseConfig>('database');

    this.db = new Kysely<Database>({
      dialect: new PostgresDialect({
        pool: new Pool({
          connectionString: config.url,
          max: config.poolSize,
        }),
      }),
    });
  }

  /**
   * Run `work` inside one database transaction.
   * Domain exceptions pass through untouched after the rollback; anything
   * else (driver errors, constraint violations) is reported as a
   * TransactionFailedException carrying the original error as its cause.
   */
  async transaction<T>(operation: string, work: (trx: DbExecutor) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction().execute(work);
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      this.logger.error(
        `Transaction failed during ${operation}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new TransactionFailedException(operation, error);
    }
  }

  async onModuleDestroy() {
    await this.db.destroy();
  }
}
