import { cleanEnv, str, num, bool, host, port } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean)
 * - Enforces choices for enums
 * - Fails fast on startup if a value is malformed
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging and CORS)',
  }),
  HOST: host({
    default: '0.0.0.0',
    desc: 'Interface the HTTP server binds to',
  }),
  PORT: port({
    default: 5099,
    desc: 'HTTP server port',
  }),
  SHUTDOWN_TIMEOUT_MS: num({
    default: 10_000,
    desc: 'Forced exit delay once a shutdown signal is received',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development (JSON otherwise)',
  }),

  // ==========================================
  // Upstream (Yahoo Finance)
  // ==========================================
  UPSTREAM_USER_AGENT: str({
    default:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    desc: 'Browser signature sent with every upstream request',
  }),
});

export type Env = typeof env;
