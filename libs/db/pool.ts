import pg from 'pg';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import { GuardConfigError } from '../bootstrap/config/guard-config.js';
import type { PoolClientLike, PoolLike } from './types.js';

const { Pool } = pg;

/**
 * Hardened PostgreSQL pool. Connection parameters must be configured
 * explicitly; there are no silent fallbacks.
 */
export function createPool(env: NodeJS.ProcessEnv = process.env): pg.Pool {
    const errors = ConfigGuard.check(DB_CONFIG_GUARDS, env);
    if (errors.length > 0) {
        throw new GuardConfigError(errors);
    }

    const isProtectedEnv = env.NODE_ENV === 'production' || env.NODE_ENV === 'staging';
    const poolMax = env.DB_POOL_MAX ? parseInt(env.DB_POOL_MAX, 10) : 20;

    return new Pool({
        host: env.DB_HOST,
        port: Number(env.DB_PORT),
        user: env.DB_USER,
        password: env.DB_PASSWORD,
        database: env.DB_NAME,
        max: Number.isFinite(poolMax) ? poolMax : 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: isProtectedEnv || env.DB_SSL_QUERY === 'true'
            ? { rejectUnauthorized: true, ca: env.DB_CA_CERT }
            : false
    });
}

/**
 * Narrows a pg.Pool to the surface the stores use.
 */
export function asPoolLike(pool: pg.Pool): PoolLike {
    const wrapClient = (client: pg.PoolClient): PoolClientLike => ({
        query: (text: string, params?: unknown[]) => client.query(text, params),
        release: (err?: Error | boolean) => client.release(err)
    });

    return {
        query: (text: string, params?: unknown[]) => pool.query(text, params),
        connect: async () => wrapClient(await pool.connect())
    };
}
