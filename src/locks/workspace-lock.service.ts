import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient } from 'pg';

const LOCK_PREFIX = 'workspace:';

/**
 * raw pg client, no TypeORM: the advisory lock lives on one dedicated connection
 * for as long as the run holds it.
 */

export interface AcquireResult {
  acquired: boolean;
  release: () => Promise<void>;
}

/**
 * PostgreSQL advisory lock per workspace directory, so two runs never share a checkout.
 * If the process dies, the lock goes away with its connection.
 */
@Injectable()
export class WorkspaceLockService implements OnModuleDestroy {
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService) {}

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.configService.getOrThrow<string>('DATABASE_URL'),
      });
    }
    return this.pool;
  }

  /**
   * Non-blocking. When acquired, call release() once the run is over so the
   * connection goes back to the pool.
   */
  async tryAcquire(workspaceDir: string): Promise<AcquireResult> {
    const key = LOCK_PREFIX + workspaceDir;
    const client: PoolClient = await this.getPool().connect();

    try {
      const result = await client.query<{ acquired: boolean }>(
        `SELECT pg_try_advisory_lock(hashtext($1)) AS "acquired"`,
        [key],
      );
      if (!result.rows[0]?.acquired) {
        client.release();
        return { acquired: false, release: async () => {} };
      }

      const release = async (): Promise<void> => {
        try {
          await client.query(`SELECT pg_advisory_unlock(hashtext($1))`, [key]);
        } finally {
          client.release();
        }
      };
      return { acquired: true, release };
    } catch (err) {
      client.release();
      throw err;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
