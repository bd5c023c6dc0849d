/**
 * Environment Configuration
 *
 * Loads and validates environment variables.
 *
 * @module infrastructure/config/environment
 */

import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file (override: false preserves existing env vars for testing)
dotenv.config({ override: false });

/**
 * Environment variables schema for validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Storage
  STORAGE_CONNECTION_STRING: z.string().optional(),
});

/**
 * Parse and validate environment variables
 */
const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error('Invalid environment variables:', parsedEnv.error.flatten().fieldErrors);
  throw new Error('Invalid environment variables');
}

/**
 * Typed environment configuration
 */
export const env = parsedEnv.data;
