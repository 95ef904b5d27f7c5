import { loadConfig } from '../config/env.validation';
import { ConfigError } from '../errors/http.errors';

describe('loadConfig', () => {
  it('applies defaults outside production', () => {
    const config = loadConfig({ NODE_ENV: 'development' });

    expect(config).toEqual({
      nodeEnv: 'development',
      port: 8000,
      databasePath: 'transactions.db',
      jwtSecret: 'dev-secret-change-me',
      jwtAlgorithm: 'HS256',
      accessTokenExpireMinutes: 30,
      authRequired: false,
      rateLimitMax: 100,
      quoteApiUrl: 'https://query1.finance.yahoo.com',
      quoteTimeoutMs: 10000,
    });
  });

  it('reads overrides from the given environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '9000',
      JWT_SECRET: 'test-secret',
      JWT_ALGORITHM: 'HS512',
      ACCESS_TOKEN_EXPIRE_MINUTES: '5',
      AUTH_REQUIRED: 'true',
      QUOTE_API_URL: 'http://quotes.test/',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.port).toBe(9000);
    expect(config.jwtAlgorithm).toBe('HS512');
    expect(config.accessTokenExpireMinutes).toBe(5);
    expect(config.authRequired).toBe(true);
    expect(config.quoteApiUrl).toBe('http://quotes.test');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({ NODE_ENV: 'development' }))).toBe(true);
  });

  it('requires a signing secret when NODE_ENV is unset', () => {
    expect(() => loadConfig({})).toThrow('Invalid environment variables: JWT_SECRET');
  });

  it('requires a signing secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(
      new ConfigError('Invalid environment variables: JWT_SECRET')
    );
  });

  it('rejects an unsupported signing algorithm', () => {
    expect(() => loadConfig({ NODE_ENV: 'development', JWT_ALGORITHM: 'none' })).toThrow(ConfigError);
  });

  it('rejects a non-positive token lifetime', () => {
    expect(() => loadConfig({ NODE_ENV: 'development', ACCESS_TOKEN_EXPIRE_MINUTES: '0' })).toThrow(
      'Invalid environment variables: ACCESS_TOKEN_EXPIRE_MINUTES'
    );
  });
});
