import { Pool } from 'pg';

/**
 * The part of a pg client the repositories use
 */
export interface QueryClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface ReleasableClient extends QueryClient {
  release(): void;
}

export interface ConnectionSource {
  connect(): Promise<ReleasableClient>;
}

export interface PoolOptions {
  databaseUrl: string;
  ssl?: boolean;
}

export function createPool(options: PoolOptions): Pool {
  // Production/serverless: always SSL (managed DBs require it)
  // Development: SSL by default, DATABASE_SSL=false disables it
  const sslConfig: boolean | { rejectUnauthorized: boolean } =
    options.ssl === false ? false : { rejectUnauthorized: false };

  // Drop SSL query params so the explicit ssl config takes precedence
  let cleanConnectionString = options.databaseUrl;
  try {
    const url = new URL(options.databaseUrl);
    const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
    sslParams.forEach(param => url.searchParams.delete(param));
    cleanConnectionString = url.toString();
  } catch {
    // Non-URL connection strings are passed through unchanged
  }

  const pool = new Pool({
    connectionString: cleanConnectionString,
    ssl: sslConfig,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  return pool;
}

export function isProductionEnvironment(env: NodeJS.ProcessEnv): boolean {
  return (
    env.NODE_ENV === 'production' ||
    env.VERCEL === '1' ||
    env.VERCEL_ENV === 'production' ||
    !!env.VERCEL_URL ||
    !!env.AWS_LAMBDA_FUNCTION_NAME
  );
}

export async function withClient<T>(
  source: ConnectionSource,
  callback: (client: QueryClient) => Promise<T>
): Promise<T> {
  const client = await source.connect();
  try {
    return await callback(client);
  } finally {
    client.release();
  }
}

export async function withTransaction<T>(
  source: ConnectionSource,
  callback: (client: QueryClient) => Promise<T>
): Promise<T> {
  const client = await source.connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
