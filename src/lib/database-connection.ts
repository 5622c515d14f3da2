import pg from 'pg';
import { RowsmithEnv } from '@src/lib/config.js';
import { logger } from '@src/lib/logger.js';

const { Pool } = pg;

/**
 * Centralized Database Connection Manager
 *
 * This is the only module that calls new pg.Pool(). Pools are keyed by
 * connection string and live until closeConnections().
 */
export class DatabaseConnection {
    private static pools = new Map<string, pg.Pool>();

    /**
     * Retrieve or create the pool for a connection string (DATABASE_URL by default)
     */
    static getPool(connectionString: string = this.getDatabaseURL(), maxConnections: number = RowsmithEnv.poolMax()): pg.Pool {
        const existing = this.pools.get(connectionString);
        if (existing) {
            return existing;
        }

        const pool = new Pool(this.getPoolConfig(connectionString, maxConnections));

        // Idle clients can error when the server drops them; surface it without crashing
        pool.on('error', error => {
            logger.warn('Idle database client error', { error: error.message });
        });

        this.pools.set(connectionString, pool);
        logger.info('Database pool created', { database: this.describe(connectionString), maxConnections });
        return pool;
    }

    /** Close all pooled connections - used during shutdown */
    static async closeConnections(): Promise<void> {
        const closePromises: Promise<void>[] = [];

        for (const [connectionString, pool] of this.pools.entries()) {
            const database = this.describe(connectionString);
            closePromises.push(
                pool
                    .end()
                    .then(() => logger.info('Database pool closed', { database }))
                    .catch((error: unknown) => {
                        logger.warn('Failed to close database pool', {
                            database,
                            error: error instanceof Error ? error.message : String(error),
                        });
                    })
            );
        }

        this.pools.clear();
        await Promise.all(closePromises);
    }

    /** Get pool statistics for debugging */
    static getPoolStats(): { totalPools: number; databases: string[] } {
        const databases = Array.from(this.pools.keys(), connectionString => this.describe(connectionString));
        return { totalPools: databases.length, databases };
    }

    /** Resolve DATABASE_URL and ensure supported protocol */
    static getDatabaseURL(): string {
        const databaseUrl = RowsmithEnv.databaseUrl();

        if (!databaseUrl.startsWith('postgresql://') && !databaseUrl.startsWith('postgres://')) {
            throw new Error(
                `Invalid DATABASE_URL format: ${this.describe(databaseUrl)}. Must start with postgresql:// or postgres://`
            );
        }

        return databaseUrl;
    }

    /** Translate connection string into pg.Pool configuration */
    private static getPoolConfig(connectionString: string, maxConnections: number): pg.PoolConfig {
        return {
            connectionString,
            max: maxConnections,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
            ssl: connectionString.includes('sslmode=require') ? { rejectUnauthorized: false } : false,
        };
    }

    /** Connection string without credentials, for logs */
    private static describe(connectionString: string): string {
        try {
            const url = new URL(connectionString);
            return `${url.host}${url.pathname}`;
        } catch {
            return '<invalid url>';
        }
    }
}
