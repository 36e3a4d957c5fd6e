import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { StorageError } from '../common/errors';
import { AppConfig } from './env.schema';

export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
  queryOne<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<T | null>;
}

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionOptions {
  isolation?: IsolationLevel;
  readOnly?: boolean;
}

@Injectable()
export class DatabaseService implements Queryable, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool;

  constructor(private configService: ConfigService<AppConfig, true>) {
    const connectionString = this.configService.get('DATABASE_URL', { infer: true });

    this.pool = new Pool({
      connectionString,
      max: this.configService.get('DB_POOL_MAX', { infer: true }),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', (err) => {
      this.logger.error('Unexpected error on idle client', err.stack);
    });
  }

  async onModuleInit() {
    try {
      const row = await this.queryOne<{ now: Date }>('SELECT NOW() AS now');
      this.logger.log(`Database connected at ${row?.now.toISOString()}`);
    } catch (error) {
      this.logger.error('Failed to connect to database');
      throw error;
    }
  }

  async onModuleDestroy() {
    await this.pool.end();
    this.logger.log('Database pool closed');
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<T[]> {
    return this.run(text, () => this.pool.query<T>(text, params));
  }

  async queryOne<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<T | null> {
    const rows = await this.query<T>(text, params);
    return rows[0] ?? null;
  }

  /**
   * Runs `work` inside BEGIN/COMMIT on a dedicated client. Any error rolls
   * the transaction back and is rethrown; driver errors surface as StorageError.
   */
  async transaction<T>(
    work: (tx: Queryable) => Promise<T>,
    options: TransactionOptions = {},
  ): Promise<T> {
    const client = await this.acquire();
    const tx: Queryable = {
      query: <R extends QueryResultRow>(text: string, params?: unknown[]) =>
        this.run(text, () => client.query<R>(text, params)),
      queryOne: async <R extends QueryResultRow>(
        text: string,
        params?: unknown[],
      ): Promise<R | null> => {
        const rows = await this.run(text, () => client.query<R>(text, params));
        return rows[0] ?? null;
      },
    };

    try {
      await tx.query(beginStatement(options));
      const result = await work(tx);
      await tx.query('COMMIT');
      return result;
    } catch (error) {
      await this.rollback(client);
      throw error;
    } finally {
      client.release();
    }
  }

  private async acquire(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      this.logger.error('Failed to acquire database client', describe(error));
      throw new StorageError('Failed to acquire database client', error);
    }
  }

  private async rollback(client: PoolClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error) {
      // keep the original error
      this.logger.error('Rollback failed', describe(error));
    }
  }

  private async run<T extends QueryResultRow>(
    text: string,
    execute: () => Promise<QueryResult<T>>,
  ): Promise<T[]> {
    const start = Date.now();
    try {
      const result = await execute();
      const duration = Date.now() - start;
      this.logger.debug(`Query executed in ${duration}ms: ${text.substring(0, 100)}`);
      return result.rows;
    } catch (error) {
      this.logger.error(`Query failed: ${text}`, describe(error));
      throw new StorageError('Database query failed', error);
    }
  }
}

function beginStatement({ isolation, readOnly }: TransactionOptions): string {
  const modes: string[] = [];
  if (isolation) modes.push(`ISOLATION LEVEL ${isolation}`);
  if (readOnly) modes.push('READ ONLY');
  return modes.length ? `BEGIN ${modes.join(' ')}` : 'BEGIN';
}

function describe(error: unknown): string {
  return error instanceof Error ? (error.stack ?? error.message) : String(error);
}
