import { cleanEnv, str, bool } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, boolean)
 * - Enforces choices for enums
 * - Provides defaults so the CLI starts with no configuration at all
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Runtime
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects log formatting)',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'warn',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: false,
    desc: 'Pretty-print logs in development (stderr only)',
  }),
  LOG_FILE: str({
    default: '',
    desc: 'Append logs to this file instead of stderr',
    example: './bank.log',
  }),

  // ==========================================
  // Bank Configuration
  // ==========================================
  BRANCH_CODE: str({
    default: '0001',
    desc: 'Branch code shared by every account',
  }),
  CURRENCY_SYMBOL: str({
    default: 'R$',
    desc: 'Currency symbol printed before formatted amounts',
  }),
  SEED_DEMO_DATA: bool({
    default: false,
    desc: 'Pre-register the users and accounts listed in data/demo-seed.json',
  }),
});

export type Env = typeof env;
