import { cleanEnv, str, port, num, bool, url } from 'envalid';
import { ConfigError } from '../errors/http.errors';

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export const NODE_ENVS = ['development', 'test', 'production'] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];

export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly databasePath: string;
  readonly jwtSecret: string;
  readonly jwtAlgorithm: JwtAlgorithm;
  readonly accessTokenExpireMinutes: number;
  readonly authRequired: boolean;
  readonly rateLimitMax: number;
  readonly quoteApiUrl: string;
  readonly quoteTimeoutMs: number;
}

const isJwtAlgorithm = (value: string): value is JwtAlgorithm =>
  JWT_ALGORITHMS.some((algorithm) => algorithm === value);

const isNodeEnv = (value: string): value is NodeEnv =>
  NODE_ENVS.some((env) => env === value);

/**
 * Reads and validates the process configuration once. The result is frozen
 * and handed to whatever needs it; nothing else reads the environment.
 */
export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const env = cleanEnv(
    source,
    {
      NODE_ENV: str({ choices: [...NODE_ENVS], default: 'development' }),
      PORT: port({ default: 8000 }),
      DATABASE_PATH: str({ default: 'transactions.db' }),
      JWT_SECRET: str({ devDefault: 'dev-secret-change-me' }),
      JWT_ALGORITHM: str({ choices: [...JWT_ALGORITHMS], default: 'HS256' }),
      ACCESS_TOKEN_EXPIRE_MINUTES: num({ default: 30 }),
      AUTH_REQUIRED: bool({ default: false }),
      RATE_LIMIT_MAX: num({ default: 100 }),
      QUOTE_API_URL: url({ default: 'https://query1.finance.yahoo.com' }),
      QUOTE_TIMEOUT_MS: num({ default: 10000 }),
    },
    {
      reporter: ({ errors }) => {
        const invalid = Object.keys(errors);
        if (invalid.length > 0) {
          throw new ConfigError(`Invalid environment variables: ${invalid.join(', ')}`);
        }
      },
    }
  );

  if (!isNodeEnv(env.NODE_ENV) || !isJwtAlgorithm(env.JWT_ALGORITHM)) {
    throw new ConfigError('Invalid environment variables: NODE_ENV, JWT_ALGORITHM');
  }
  if (env.ACCESS_TOKEN_EXPIRE_MINUTES <= 0) {
    throw new ConfigError('Invalid environment variables: ACCESS_TOKEN_EXPIRE_MINUTES');
  }

  return Object.freeze({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    jwtSecret: env.JWT_SECRET,
    jwtAlgorithm: env.JWT_ALGORITHM,
    accessTokenExpireMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
    authRequired: env.AUTH_REQUIRED,
    rateLimitMax: env.RATE_LIMIT_MAX,
    quoteApiUrl: env.QUOTE_API_URL.replace(/\/+$/, ''),
    quoteTimeoutMs: env.QUOTE_TIMEOUT_MS,
  });
};
