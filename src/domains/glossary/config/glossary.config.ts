/**
 * Glossary Staging Configuration
 *
 * Configuration hierarchy:
 * 1. Environment variables (highest priority)
 * 2. Default values
 *
 * @module domains/glossary/config
 */

import { z } from 'zod';

/** Appended to the caller's base name to form the container name */
export const GLOSSARY_CONTAINER_SUFFIX = 'gls';

/**
 * Azure container naming rule: 3-63 chars, lowercase letters, digits and
 * single hyphens, starting and ending with a letter or digit.
 */
export const ContainerNameSchema = z
  .string()
  .min(3)
  .max(63)
  .regex(/^[a-z0-9](?:[a-z0-9]|-(?=[a-z0-9]))*$/, 'Invalid container name');

const ExtensionSchema = z
  .string()
  .regex(/^\.[^./\\]+$/, 'Extensions must start with a dot')
  .transform((ext) => ext.toLowerCase());

export const GlossaryConfigSchema = z.object({
  /** Max concurrent in-flight uploads */
  uploadConcurrency: z.number().int().min(1).max(100).default(10),

  /** Lifetime of signed URIs */
  signedUriTtlHours: z.number().positive().max(24 * 7).default(5),

  /** Accepted glossary extensions, with leading dot */
  allowedExtensions: z.array(ExtensionSchema).min(1),
});

export type GlossaryConfig = z.infer<typeof GlossaryConfigSchema>;

export const DEFAULT_GLOSSARY_CONFIG: GlossaryConfig = {
  uploadConcurrency: 10,
  signedUriTtlHours: 5,
  allowedExtensions: ['.csv', '.tsv', '.tab', '.xlf', '.xliff'],
};

let cachedConfig: GlossaryConfig | null = null;

function parseEnvInt(envVar: string | undefined, fallback: number): number {
  if (!envVar) return fallback;
  const parsed = parseInt(envVar, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function parseEnvFloat(envVar: string | undefined, fallback: number): number {
  if (!envVar) return fallback;
  const parsed = parseFloat(envVar);
  return isNaN(parsed) ? fallback : parsed;
}

function parseEnvList(envVar: string | undefined, fallback: string[]): string[] {
  if (!envVar) return fallback;
  const items = envVar.split(',').map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

/**
 * Get glossary configuration
 *
 * Merges default values with environment variable overrides.
 * Configuration is cached after first call.
 *
 * Environment variables:
 * - GLOSSARY_UPLOAD_CONCURRENCY
 * - GLOSSARY_SIGNED_URI_TTL_HOURS
 * - GLOSSARY_EXTENSIONS (comma separated, e.g. ".csv,.tsv")
 */
export function getGlossaryConfig(): GlossaryConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const envConfig = {
    uploadConcurrency: parseEnvInt(
      process.env.GLOSSARY_UPLOAD_CONCURRENCY,
      DEFAULT_GLOSSARY_CONFIG.uploadConcurrency
    ),
    signedUriTtlHours: parseEnvFloat(
      process.env.GLOSSARY_SIGNED_URI_TTL_HOURS,
      DEFAULT_GLOSSARY_CONFIG.signedUriTtlHours
    ),
    allowedExtensions: parseEnvList(
      process.env.GLOSSARY_EXTENSIONS,
      DEFAULT_GLOSSARY_CONFIG.allowedExtensions
    ),
  };

  cachedConfig = GlossaryConfigSchema.parse(envConfig);
  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function __resetGlossaryConfig(): void {
  cachedConfig = null;
}
