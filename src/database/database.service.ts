import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<R>>;
}

@Injectable()
export class DatabaseService implements Queryable, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;
  private readonly schemaPath: string;

  constructor(private readonly configService: ConfigService) {
    const connectionString = this.configService.getOrThrow<string>('database.url');
    this.schemaPath = resolve(
      process.cwd(),
      this.configService.get<string>('database.schemaPath', 'sql/schema.sql'),
    );
    this.pool = new Pool({ connectionString });
    this.pool.on('error', (err) => {
      this.logger.error(`Idle PostgreSQL client error: ${err.message}`);
    });
  }

  async onModuleInit() {
    try {
      await this.pool.query('SELECT 1');
      this.logger.log('Successfully connected to PostgreSQL database');
    } catch (error) {
      this.logger.error('Failed to connect to PostgreSQL database', error);
      throw error;
    }
    await this.applySchema();
  }

  async onModuleDestroy() {
    await this.pool.end();
    this.logger.log('Disconnected from PostgreSQL database');
  }

  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<R>> {
    return this.pool.query<R>(text, params);
  }

  /** Runs `work` on one client inside BEGIN/COMMIT, rolling back on failure. */
  async transaction<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
    const client: PoolClient = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work({
        query: <R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []) =>
          client.query<R>(text, params),
      });
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /** Creates the pipeline tables if they do not exist yet. */
  private async applySchema(): Promise<void> {
    const ddl = await readFile(this.schemaPath, 'utf8');
    await this.pool.query(ddl);
    this.logger.log(`Schema applied from ${this.schemaPath}`);
  }
}
