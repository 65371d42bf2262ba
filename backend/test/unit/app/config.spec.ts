import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults when only DATABASE_URL is set', () => {
    const config = buildConfig({ DATABASE_URL: 'postgres://localhost/accounts' });

    expect(config).toEqual({
      nodeEnv: 'development',
      host: '0.0.0.0',
      port: 8000,
      db: {
        url: 'postgres://localhost/accounts',
        poolMax: 10,
        connectionTimeoutMs: 10_000,
        statementTimeoutMs: 30_000,
      },
      logLevel: 'info',
      serviceName: 'accounts-backend',
    });
  });

  it('coerces numeric env vars', () => {
    const config = buildConfig({
      DATABASE_URL: 'postgres://localhost/accounts',
      PORT: '9001',
      DB_POOL_MAX: '4',
      DB_STATEMENT_TIMEOUT_MS: '500',
    });

    expect(config.port).toBe(9001);
    expect(config.db.poolMax).toBe(4);
    expect(config.db.statementTimeoutMs).toBe(500);
  });

  it('rejects a missing DATABASE_URL', () => {
    expect(() => buildConfig({})).toThrow();
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() =>
      buildConfig({ DATABASE_URL: 'postgres://localhost/accounts', NODE_ENV: 'staging' }),
    ).toThrow();
  });
});
